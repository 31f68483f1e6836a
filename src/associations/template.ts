import type { Association, ResolvedInvocation, TemplateArg } from "../types.js";

export const FILE_PLACEHOLDER = "{file}";

export const fileArg: TemplateArg = { kind: "file" };

export function literal(value: string): TemplateArg {
  return { kind: "literal", value };
}

/** Config strings: exactly "{file}" is the placeholder, anything else is literal. */
export function parseTemplateArg(raw: string): TemplateArg {
  return raw === FILE_PLACEHOLDER ? fileArg : literal(raw);
}

export function substituteArgs(template: readonly TemplateArg[], file: string): string[] {
  return template.map((arg) => (arg.kind === "file" ? file : arg.value));
}

export function resolveInvocation(assoc: Association, file: string): ResolvedInvocation {
  return {
    program: assoc.program,
    args: substituteArgs(assoc.args, file),
    file,
  };
}

export function describeInvocation(inv: ResolvedInvocation): string {
  return [inv.program, ...inv.args].join(" ");
}
