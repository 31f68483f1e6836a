import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export function createLogger(level: string): Logger {
  return pino({ name: "launchwith", level });
}
