import type { DispatchResult, FileOpenEvent } from "../types.js";
import type { EditorIntegration, FileOpenHook } from "./types.js";

export type DefaultOpener = (event: FileOpenEvent) => void | Promise<void>;

export type ChainOutcome = { handledBy: "hook"; result: DispatchResult } | { handledBy: "default" };

/**
 * In-process stand-in for a host's file handler list: hooks run in
 * registration order and the first "handled" result suppresses the
 * default open.
 */
export class FileHandlerChain implements EditorIntegration {
  private hooks: FileOpenHook[] = [];

  registerHook(hook: FileOpenHook): void {
    if (this.hooks.includes(hook)) return;
    this.hooks = [...this.hooks, hook];
  }

  unregisterHook(hook: FileOpenHook): void {
    this.hooks = this.hooks.filter((h) => h !== hook);
  }

  get size(): number {
    return this.hooks.length;
  }

  async open(event: FileOpenEvent, fallback: DefaultOpener): Promise<ChainOutcome> {
    // Snapshot so a hook that unregisters itself does not skip its neighbour.
    for (const hook of [...this.hooks]) {
      const result = await hook(event);
      if (result.status === "handled") return { handledBy: "hook", result };
    }
    await fallback(event);
    return { handledBy: "default" };
  }
}
