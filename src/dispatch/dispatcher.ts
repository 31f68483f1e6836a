import path from "node:path";
import type { Logger } from "pino";
import { matchesAnywhere, resolveAssociation } from "../associations/resolver.js";
import { describeInvocation, resolveInvocation } from "../associations/template.js";
import type { Confirmer, Notifier, RecentFiles } from "../host/types.js";
import type { ProcessLauncher } from "../launch/types.js";
import type {
  DispatchResult,
  FileOpenEvent,
  LaunchWithConfig,
  SkipReason,
  TargetBuffer,
} from "../types.js";
import type { DebounceGuard } from "./debounce.js";

export type DispatcherDeps = {
  config: LaunchWithConfig;
  guard: DebounceGuard;
  launcher: ProcessLauncher;
  confirmer: Confirmer;
  notifier: Notifier;
  recentFiles?: RecentFiles | null;
  logger: Logger;
  now?: () => number;
};

export function isPristine(target: TargetBuffer | null | undefined): boolean {
  if (!target) return true;
  return !target.isModified() && target.size() === 0;
}

export function isExcluded(triggerId: string, exclusions: readonly RegExp[]): boolean {
  return exclusions.some((rule) => matchesAnywhere(triggerId, rule));
}

export function openedMessage(file: string): string {
  return `Opened ${path.basename(file)} in external program`;
}

export class Dispatcher {
  private config: LaunchWithConfig;
  private launcher: ProcessLauncher;
  private enabled: boolean;
  private readonly now: () => number;

  constructor(private readonly deps: DispatcherDeps) {
    this.config = deps.config;
    this.launcher = deps.launcher;
    this.enabled = deps.config.enabled;
    this.now = deps.now ?? Date.now;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /** Replaces associations, exclusions and the confirm flag wholesale. */
  setConfig(config: LaunchWithConfig): void {
    this.config = config;
  }

  currentConfig(): LaunchWithConfig {
    return this.config;
  }

  setLauncher(launcher: ProcessLauncher): void {
    this.launcher = launcher;
  }

  async handle(event: FileOpenEvent): Promise<DispatchResult> {
    const { logger, guard } = this.deps;
    const config = this.config;

    if (!this.enabled) return this.skip(event, "disabled");
    if (!isPristine(event.target)) return this.skip(event, "not_pristine");
    // Before the first await, so a reentrant call already sees the new timestamp.
    if (!guard.tryActivate(this.now())) return this.skip(event, "debounced");
    if (isExcluded(event.triggerId, config.exclusions)) return this.skip(event, "excluded");

    const assoc = resolveAssociation(event.path, config.associations);
    if (!assoc) return this.skip(event, "no_match");

    const invocation = resolveInvocation(assoc, event.path);

    if (config.confirm) {
      const ok = await this.deps.confirmer.confirm(`${describeInvocation(invocation)}? `);
      if (!ok) return this.skip(event, "declined");
    }

    this.launcher.launch(invocation);
    logger.info(
      {
        file: event.path,
        program: invocation.program,
        args: invocation.args,
        launcher: this.launcher.name,
      },
      "launched external program",
    );

    event.target?.close();
    this.deps.recentFiles?.add(event.path);
    this.deps.notifier.notify(openedMessage(event.path));

    return { status: "handled", invocation };
  }

  private skip(event: FileOpenEvent, reason: SkipReason): DispatchResult {
    this.deps.logger.debug(
      { file: event.path, triggerId: event.triggerId, reason },
      "file open passed through",
    );
    return { status: "not_handled", reason };
  }
}
