import type { DispatchResult, FileOpenEvent } from "../types.js";

export type FileOpenHook = (event: FileOpenEvent) => Promise<DispatchResult>;

/** How a host lets launchwith intercept its file opens. */
export interface EditorIntegration {
  registerHook(hook: FileOpenHook): void;
  unregisterHook(hook: FileOpenHook): void;
}

export interface Confirmer {
  /** Resolve true to go ahead. There is no timeout. */
  confirm(question: string): Promise<boolean>;
}

export interface Notifier {
  notify(message: string): void;
}

export interface RecentFiles {
  add(file: string): void;
}
