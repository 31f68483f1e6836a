import { spawn, type SpawnOptions } from "node:child_process";
import type { Logger } from "pino";
import { LOG_LEVEL } from "../config/env.js";
import { createLogger } from "../logger.js";
import type { LaunchErrorHandler } from "./types.js";

export type DetachedChild = {
  unref(): void;
  on(event: "error", listener: (err: Error) => void): unknown;
};

export type SpawnDetached = (
  command: string,
  args: string[],
  options: SpawnOptions,
) => DetachedChild;

export const spawnDetached: SpawnDetached = (command, args, options) =>
  spawn(command, args, options);

export const DETACHED_OPTIONS: SpawnOptions = {
  detached: true,
  stdio: "ignore",
  windowsHide: true,
};

let fallbackLogger: Logger | null = null;

/** Error handler for launchers built without `onError`. */
export const logLaunchError: LaunchErrorHandler = (err, invocation) => {
  fallbackLogger ??= createLogger(LOG_LEVEL);
  fallbackLogger.error(
    { err: err.message, program: invocation.program, file: invocation.file },
    "external program failed to start",
  );
};
