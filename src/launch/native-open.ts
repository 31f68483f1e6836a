import type { ResolvedInvocation } from "../types.js";
import {
  DETACHED_OPTIONS,
  logLaunchError,
  spawnDetached,
  type SpawnDetached,
} from "./spawn.js";
import type { LaunchErrorHandler, ProcessLauncher } from "./types.js";

export type NativeOpenOptions = {
  platform?: NodeJS.Platform;
  spawn?: SpawnDetached;
  onError?: LaunchErrorHandler;
};

export function nativeOpenCommand(
  platform: NodeJS.Platform,
  file: string,
): { command: string; args: string[] } {
  if (platform === "win32") {
    // `start` takes its first quoted argument as a window title.
    return { command: "cmd", args: ["/c", "start", "", file] };
  }
  if (platform === "darwin") {
    return { command: "open", args: [file] };
  }
  return { command: "xdg-open", args: [file] };
}

/**
 * Hands the file to the OS default handler; the association's program and
 * template are not used.
 */
export class NativeOpenLauncher implements ProcessLauncher {
  readonly name = "native";
  private readonly platform: NodeJS.Platform;
  private readonly spawn: SpawnDetached;
  private readonly onError: LaunchErrorHandler;

  constructor(opts: NativeOpenOptions = {}) {
    this.platform = opts.platform ?? process.platform;
    this.spawn = opts.spawn ?? spawnDetached;
    this.onError = opts.onError ?? logLaunchError;
  }

  launch(invocation: ResolvedInvocation): void {
    const { command, args } = nativeOpenCommand(this.platform, invocation.file);
    const child = this.spawn(command, args, DETACHED_OPTIONS);
    child.on("error", (err) => this.onError(err, invocation));
    child.unref();
  }
}
