import readline from "node:readline";
import type { Confirmer } from "./types.js";

export type TerminalConfirmerOptions = {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
};

export function parseYesNo(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/** y/n on the terminal. Without a TTY nobody can answer, so the answer is no. */
export class TerminalConfirmer implements Confirmer {
  private readonly input: NodeJS.ReadableStream & { isTTY?: boolean };
  private readonly output: NodeJS.WritableStream;

  constructor(opts: TerminalConfirmerOptions = {}) {
    this.input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
  }

  async confirm(question: string): Promise<boolean> {
    if (!this.input.isTTY) return false;

    const rl = readline.createInterface({ input: this.input, output: this.output });
    try {
      // Input ending before an answer (Ctrl-D, closed pty) counts as no.
      const answer = await new Promise<string | null>((resolve) => {
        rl.once("close", () => resolve(null));
        rl.question(`${question}(y or n) `, resolve);
      });
      return answer !== null && parseYesNo(answer);
    } finally {
      rl.close();
    }
  }
}

export class StaticConfirmer implements Confirmer {
  constructor(private readonly answer: boolean) {}

  async confirm(): Promise<boolean> {
    return this.answer;
  }
}
