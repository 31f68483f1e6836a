export type TemplateArg = { kind: "literal"; value: string } | { kind: "file" };

export type Association = {
  pattern: RegExp;
  program: string;
  args: TemplateArg[];
};

export type ResolvedInvocation = {
  program: string;
  args: string[];
  file: string;
};

/** The buffer a host is about to load the file into. */
export type TargetBuffer = {
  isModified(): boolean;
  size(): number;
  close(): void;
};

export type FileOpenEvent = {
  path: string;
  triggerId: string;
  target?: TargetBuffer | null;
};

export type SkipReason =
  | "disabled"
  | "not_pristine"
  | "debounced"
  | "excluded"
  | "no_match"
  | "declined";

export type DispatchResult =
  | { status: "handled"; invocation: ResolvedInvocation }
  | { status: "not_handled"; reason: SkipReason };

export type LauncherKind = "auto" | "shell" | "native";

export type LaunchWithConfig = {
  enabled: boolean;
  confirm: boolean;
  launcher: LauncherKind;
  associations: Association[];
  exclusions: RegExp[];
};
