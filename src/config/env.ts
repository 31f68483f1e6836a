import os from "node:os";
import path from "node:path";
import process from "node:process";
import pino from "pino";
import type { LauncherKind } from "../types.js";

const DEFAULT_LOG_LEVEL = "warn";

function numberFromEnv(name: string, fallback: number, min: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? Math.max(min, n) : fallback;
}

export function launcherFromEnv(raw: string | undefined): LauncherKind | null {
  const v = raw?.trim().toLowerCase();
  return v === "auto" || v === "shell" || v === "native" ? v : null;
}

/** Unknown names fall back to "warn"; pino throws on them. */
export function logLevelFromEnv(raw: string | undefined): string {
  const v = raw?.trim().toLowerCase();
  if (!v) return DEFAULT_LOG_LEVEL;
  return v === "silent" || Object.hasOwn(pino.levels.values, v) ? v : DEFAULT_LOG_LEVEL;
}

export const CONFIG_PATH =
  process.env.LAUNCHWITH_CONFIG?.trim() ||
  path.join(os.homedir(), ".config", "launchwith", "config.json");
export const RECENT_DB_PATH =
  process.env.LAUNCHWITH_RECENT_DB?.trim() ||
  path.join(os.homedir(), ".local", "state", "launchwith", "recent.db");
export const RECENT_MAX = Math.floor(numberFromEnv("LAUNCHWITH_RECENT_MAX", 20, 1));
export const LOG_LEVEL = logLevelFromEnv(process.env.LAUNCHWITH_LOG_LEVEL);
export const DEBOUNCE_MS = numberFromEnv("LAUNCHWITH_DEBOUNCE_MS", 2000, 0);
/** Overrides the config file's `launcher` when set. */
export const LAUNCHER_OVERRIDE = launcherFromEnv(process.env.LAUNCHWITH_LAUNCHER);
