import type { Logger } from "pino";
import type { Notifier } from "./types.js";

export class LoggerNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  notify(message: string): void {
    this.logger.info({ notification: true }, message);
  }
}
