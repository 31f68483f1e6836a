import { z } from "zod";
import { DEFAULT_ASSOCIATIONS } from "../associations/defaults.js";
import { FILE_PLACEHOLDER, parseTemplateArg } from "../associations/template.js";
import type { Association, LaunchWithConfig } from "../types.js";
import { errorMessage } from "../utils.js";
import { ConfigError } from "./errors.js";

// `g` and `y` are refused: they make RegExp matching stateful.
const flagsSchema = z.string().regex(/^[imsu]*$/, "flags may only contain i, m, s, u");

const associationSchema = z
  .object({
    pattern: z.string().min(1),
    flags: flagsSchema.optional(),
    program: z.string().trim().min(1),
    args: z.array(z.string()).default([FILE_PLACEHOLDER]),
  })
  .strict();

const exclusionSchema = z.union([
  z.string().min(1),
  z.object({ pattern: z.string().min(1), flags: flagsSchema.optional() }).strict(),
]);

export const configFileSchema = z
  .object({
    enabled: z.boolean().default(true),
    confirm: z.boolean().default(false),
    launcher: z.enum(["auto", "shell", "native"]).default("auto"),
    associations: z.array(associationSchema).optional(),
    exclusions: z.array(exclusionSchema).default([]),
  })
  .strict();

export type ConfigFile = z.input<typeof configFileSchema>;

export function defaultConfig(): LaunchWithConfig {
  return {
    enabled: true,
    confirm: false,
    launcher: "auto",
    associations: [...DEFAULT_ASSOCIATIONS],
    exclusions: [],
  };
}

function compilePattern(
  source: string,
  flags: string | undefined,
  where: string,
  file: string,
): RegExp {
  try {
    return new RegExp(source, flags ?? "");
  } catch (err) {
    throw new ConfigError(`${where}: ${errorMessage(err)}`, file);
  }
}

function formatIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

/** Validates a parsed config document and compiles its patterns. */
export function parseConfig(data: unknown, file: string): LaunchWithConfig {
  const result = configFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), file);
  }
  const parsed = result.data;

  const associations: Association[] = parsed.associations
    ? parsed.associations.map((a, i) => ({
        pattern: compilePattern(a.pattern, a.flags, `associations.${i}.pattern`, file),
        program: a.program,
        args: a.args.map(parseTemplateArg),
      }))
    : [...DEFAULT_ASSOCIATIONS];

  const exclusions = parsed.exclusions.map((e, i) =>
    typeof e === "string"
      ? compilePattern(e, undefined, `exclusions.${i}`, file)
      : compilePattern(e.pattern, e.flags, `exclusions.${i}.pattern`, file),
  );

  return {
    enabled: parsed.enabled,
    confirm: parsed.confirm,
    launcher: parsed.launcher,
    associations,
    exclusions,
  };
}
