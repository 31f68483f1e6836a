import type { Logger } from "pino";
import type { Dispatcher } from "../dispatch/dispatcher.js";
import type { EditorIntegration, FileOpenHook } from "./types.js";

/**
 * On/off switch: enabling flips the dispatcher's mode gate and registers
 * its hook with the host, disabling undoes both.
 */
export class LaunchWithMode {
  private readonly hook: FileOpenHook;
  private registered = false;

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly integration: EditorIntegration,
    private readonly logger: Logger,
  ) {
    this.hook = (event) => this.dispatcher.handle(event);
  }

  get enabled(): boolean {
    return this.dispatcher.isEnabled && this.registered;
  }

  enable(): void {
    this.dispatcher.setEnabled(true);
    if (!this.registered) {
      this.integration.registerHook(this.hook);
      this.registered = true;
    }
    this.logger.info("launchwith mode enabled");
  }

  disable(): void {
    this.dispatcher.setEnabled(false);
    if (this.registered) {
      this.integration.unregisterHook(this.hook);
      this.registered = false;
    }
    this.logger.info("launchwith mode disabled");
  }

  toggle(): boolean {
    if (this.enabled) this.disable();
    else this.enable();
    return this.enabled;
  }
}
