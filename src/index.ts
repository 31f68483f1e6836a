export { createLaunchWith, type LaunchWith, type LaunchWithOptions } from "./launchwith.js";
export { matchesAnywhere, resolveAssociation } from "./associations/resolver.js";
export {
  FILE_PLACEHOLDER,
  describeInvocation,
  fileArg,
  literal,
  parseTemplateArg,
  resolveInvocation,
  substituteArgs,
} from "./associations/template.js";
export { DEFAULT_ASSOCIATIONS } from "./associations/defaults.js";
export {
  DebounceGuard,
  DEFAULT_DEBOUNCE_MS,
  type DebounceGuardOptions,
} from "./dispatch/debounce.js";
export {
  Dispatcher,
  isExcluded,
  isPristine,
  openedMessage,
  type DispatcherDeps,
} from "./dispatch/dispatcher.js";
export {
  createLauncher,
  logLaunchError,
  DetachedShellLauncher,
  NativeOpenLauncher,
  buildShellCommand,
  nativeOpenCommand,
  quoteShellArg,
  type CreateLauncherOptions,
  type DetachedChild,
  type LaunchErrorHandler,
  type ProcessLauncher,
  type SpawnDetached,
} from "./launch/index.js";
export { ConfigLoader, type ConfigLoadResult } from "./config/loader.js";
export { configFileSchema, defaultConfig, parseConfig, type ConfigFile } from "./config/schema.js";
export { ConfigError } from "./config/errors.js";
export { createLogger } from "./logger.js";
export { SqliteRecentFiles, type RecentFileRecord } from "./recent/sqlite.js";
export { FileHandlerChain, type ChainOutcome, type DefaultOpener } from "./host/handler-chain.js";
export { StaticConfirmer, TerminalConfirmer, parseYesNo } from "./host/confirm.js";
export { LoggerNotifier } from "./host/notify.js";
export { LaunchWithMode } from "./host/mode.js";
export type {
  Confirmer,
  EditorIntegration,
  FileOpenHook,
  Notifier,
  RecentFiles,
} from "./host/types.js";
export type {
  Association,
  DispatchResult,
  FileOpenEvent,
  LauncherKind,
  LaunchWithConfig,
  ResolvedInvocation,
  SkipReason,
  TargetBuffer,
  TemplateArg,
} from "./types.js";
