import pino from "pino";
import type { Confirmer, Notifier, RecentFiles } from "../src/host/types.js";
import type { ProcessLauncher } from "../src/launch/types.js";
import type { ResolvedInvocation, TargetBuffer } from "../src/types.js";

export const silentLogger = pino({ level: "silent" });

export class FakeLauncher implements ProcessLauncher {
  readonly name = "fake";
  calls: ResolvedInvocation[] = [];
  failWith: Error | null = null;

  launch(invocation: ResolvedInvocation): void {
    if (this.failWith) throw this.failWith;
    this.calls.push(invocation);
  }
}

export class RecordingNotifier implements Notifier {
  messages: string[] = [];

  notify(message: string): void {
    this.messages.push(message);
  }
}

export class RecordingRecentFiles implements RecentFiles {
  files: string[] = [];

  add(file: string): void {
    this.files.push(file);
  }
}

export class ScriptedConfirmer implements Confirmer {
  questions: string[] = [];

  constructor(private readonly answer: boolean) {}

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return this.answer;
  }
}

export class FakeBuffer implements TargetBuffer {
  closed = false;

  constructor(
    private readonly modified = false,
    private readonly chars = 0,
  ) {}

  isModified(): boolean {
    return this.modified;
  }

  size(): number {
    return this.chars;
  }

  close(): void {
    this.closed = true;
  }
}

export class ManualClock {
  constructor(public ms = 0) {}

  now = (): number => this.ms;

  advance(ms: number): void {
    this.ms += ms;
  }
}

export async function waitFor(check: () => boolean, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, 25));
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
