import type { Logger } from "pino";
import { ConfigLoader } from "./config/loader.js";
import {
  CONFIG_PATH,
  DEBOUNCE_MS,
  LAUNCHER_OVERRIDE,
  LOG_LEVEL,
  RECENT_DB_PATH,
  RECENT_MAX,
} from "./config/env.js";
import { DebounceGuard } from "./dispatch/debounce.js";
import { Dispatcher } from "./dispatch/dispatcher.js";
import { TerminalConfirmer } from "./host/confirm.js";
import { LaunchWithMode } from "./host/mode.js";
import { LoggerNotifier } from "./host/notify.js";
import type { Confirmer, EditorIntegration, Notifier, RecentFiles } from "./host/types.js";
import { createLauncher, type CreateLauncherOptions } from "./launch/index.js";
import type { ProcessLauncher } from "./launch/types.js";
import { createLogger } from "./logger.js";
import { SqliteRecentFiles } from "./recent/sqlite.js";
import type { LaunchWithConfig } from "./types.js";
import { errorMessage } from "./utils.js";

export type LaunchWithOptions = {
  integration: EditorIntegration;
  configPath?: string;
  logger?: Logger;
  confirmer?: Confirmer;
  notifier?: Notifier;
  /** `null` turns recent-file tracking off. */
  recentFiles?: RecentFiles | null;
  /** Fixed launcher; otherwise one is built from the config's `launcher`. */
  launcher?: ProcessLauncher;
  launcherOptions?: Omit<CreateLauncherOptions, "onError">;
  debounceMs?: number;
  now?: () => number;
};

export async function createLaunchWith(opts: LaunchWithOptions) {
  const logger = opts.logger ?? createLogger(LOG_LEVEL);
  const loader = new ConfigLoader(opts.configPath ?? CONFIG_PATH);

  let ownedRecent: SqliteRecentFiles | null = null;
  let recentFiles: RecentFiles | null;
  if (opts.recentFiles === undefined) {
    ownedRecent = new SqliteRecentFiles(RECENT_DB_PATH, { maxItems: RECENT_MAX });
    recentFiles = ownedRecent;
  } else {
    recentFiles = opts.recentFiles;
  }

  function launcherFor(config: LaunchWithConfig): ProcessLauncher {
    if (opts.launcher) return opts.launcher;
    return createLauncher(LAUNCHER_OVERRIDE ?? config.launcher, {
      ...opts.launcherOptions,
      onError: (err, invocation) => {
        logger.error(
          { err: err.message, program: invocation.program, file: invocation.file },
          "external program failed to start",
        );
      },
    });
  }

  async function loadConfig(reason: string): Promise<LaunchWithConfig> {
    try {
      const { config, version, source } = await loader.load();
      logger.info(
        {
          reason,
          version,
          source,
          associations: config.associations.length,
          exclusions: config.exclusions.length,
        },
        "config loaded",
      );
      return config;
    } catch (err) {
      logger.error(
        { reason, err: errorMessage(err), file: loader.path },
        "config load failed",
      );
      return loader.lastGoodConfig();
    }
  }

  const initial = await loadConfig("startup");
  const dispatcher = new Dispatcher({
    config: initial,
    guard: new DebounceGuard({ windowMs: opts.debounceMs ?? DEBOUNCE_MS }),
    launcher: launcherFor(initial),
    confirmer: opts.confirmer ?? new TerminalConfirmer(),
    notifier: opts.notifier ?? new LoggerNotifier(logger),
    recentFiles,
    logger,
    now: opts.now,
  });
  const mode = new LaunchWithMode(dispatcher, opts.integration, logger);
  if (initial.enabled) mode.enable();
  else mode.disable();

  /** Full replace; the mode switch is left as it is. */
  async function reloadConfig(reason: string): Promise<LaunchWithConfig> {
    const config = await loadConfig(reason);
    dispatcher.setConfig(config);
    dispatcher.setLauncher(launcherFor(config));
    return config;
  }

  function watchConfig(): Promise<void> {
    return loader.watch(() => void reloadConfig("watch"));
  }

  async function close(): Promise<void> {
    mode.disable();
    await loader.close();
    ownedRecent?.close();
  }

  return {
    dispatcher,
    mode,
    loader,
    logger,
    reloadConfig,
    watchConfig,
    close,
  };
}

export type LaunchWith = Awaited<ReturnType<typeof createLaunchWith>>;
