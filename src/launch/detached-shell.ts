import type { ResolvedInvocation } from "../types.js";
import {
  DETACHED_OPTIONS,
  logLaunchError,
  spawnDetached,
  type SpawnDetached,
} from "./spawn.js";
import type { LaunchErrorHandler, ProcessLauncher } from "./types.js";

export type DetachedShellOptions = {
  shell?: string;
  spawn?: SpawnDetached;
  onError?: LaunchErrorHandler;
};

/** POSIX single-quoting; embedded quotes become '\''. */
export function quoteShellArg(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * `nohup` keeps the child alive after the host exits. The program is left
 * unquoted so a configured program may carry its own leading options.
 */
export function buildShellCommand(inv: Pick<ResolvedInvocation, "program" | "args">): string {
  const parts = ["exec", "nohup", inv.program, ...inv.args.map(quoteShellArg)];
  return `${parts.join(" ")} >/dev/null`;
}

export class DetachedShellLauncher implements ProcessLauncher {
  readonly name = "shell";
  private readonly shell: string;
  private readonly spawn: SpawnDetached;
  private readonly onError: LaunchErrorHandler;

  constructor(opts: DetachedShellOptions = {}) {
    this.shell = opts.shell ?? "/bin/sh";
    this.spawn = opts.spawn ?? spawnDetached;
    this.onError = opts.onError ?? logLaunchError;
  }

  launch(invocation: ResolvedInvocation): void {
    const command = buildShellCommand(invocation);
    const child = this.spawn(this.shell, ["-c", command], DETACHED_OPTIONS);
    child.on("error", (err) => this.onError(err, invocation));
    child.unref();
  }
}
