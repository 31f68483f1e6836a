import type { ResolvedInvocation } from "../types.js";

/**
 * Starts a program and returns as soon as it is running. Implementations
 * keep no handle on the child and never wait for it.
 */
export interface ProcessLauncher {
  readonly name: string;
  launch(invocation: ResolvedInvocation): void;
}

export type LaunchErrorHandler = (err: Error, invocation: ResolvedInvocation) => void;
