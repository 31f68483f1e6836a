import type { LauncherKind } from "../types.js";
import { DetachedShellLauncher } from "./detached-shell.js";
import { NativeOpenLauncher } from "./native-open.js";
import type { SpawnDetached } from "./spawn.js";
import type { LaunchErrorHandler, ProcessLauncher } from "./types.js";

export type CreateLauncherOptions = {
  platform?: NodeJS.Platform;
  spawn?: SpawnDetached;
  onError?: LaunchErrorHandler;
};

export function createLauncher(
  kind: LauncherKind,
  opts: CreateLauncherOptions = {},
): ProcessLauncher {
  const platform = opts.platform ?? process.platform;
  const resolved = kind === "auto" ? (platform === "win32" ? "native" : "shell") : kind;
  if (resolved === "native") {
    return new NativeOpenLauncher({ platform, spawn: opts.spawn, onError: opts.onError });
  }
  return new DetachedShellLauncher({ spawn: opts.spawn, onError: opts.onError });
}

export {
  DetachedShellLauncher,
  buildShellCommand,
  quoteShellArg,
} from "./detached-shell.js";
export { NativeOpenLauncher, nativeOpenCommand } from "./native-open.js";
export type { LaunchErrorHandler, ProcessLauncher } from "./types.js";
export { logLaunchError, type DetachedChild, type SpawnDetached } from "./spawn.js";
