import chokidar, { type FSWatcher } from "chokidar";
import fs from "node:fs/promises";
import path from "node:path";
import type { LaunchWithConfig } from "../types.js";
import { errorMessage, isErrnoException } from "../utils.js";
import { ConfigError } from "./errors.js";
import { defaultConfig, parseConfig } from "./schema.js";

export type ConfigLoadResult = {
  config: LaunchWithConfig;
  version: number;
  source: "file" | "defaults";
};

export class ConfigLoader {
  private readonly configPath: string;
  private version = 0;
  private lastGood: LaunchWithConfig = defaultConfig();
  private watcher: FSWatcher | null = null;

  constructor(configPath: string) {
    this.configPath = path.resolve(configPath);
  }

  get path(): string {
    return this.configPath;
  }

  /** Reads the whole file again; a missing file means the built-in defaults. */
  async load(): Promise<ConfigLoadResult> {
    this.version++;

    let raw: string;
    try {
      raw = await fs.readFile(this.configPath, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        this.lastGood = defaultConfig();
        return { config: this.lastGood, version: this.version, source: "defaults" };
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`invalid JSON: ${errorMessage(err)}`, this.configPath);
    }

    this.lastGood = parseConfig(data, this.configPath);
    return { config: this.lastGood, version: this.version, source: "file" };
  }

  lastGoodConfig(): LaunchWithConfig {
    return this.lastGood;
  }

  /** Resolves once the initial scan is done and later changes will be reported. */
  watch(onChange: (changed: string) => void): Promise<void> {
    if (this.watcher) return Promise.resolve();
    // Watch the directory so editors that replace the file on save are still seen.
    const dir = path.dirname(this.configPath);
    const target = path.basename(this.configPath);
    const relevant = (changed: string) => {
      if (path.basename(changed) === target) onChange(changed);
    };
    const watcher = chokidar.watch(dir, { ignoreInitial: true, depth: 0 });
    this.watcher = watcher;
    watcher.on("add", relevant);
    watcher.on("change", relevant);
    watcher.on("unlink", relevant);
    return new Promise((resolve) => {
      watcher.once("ready", () => resolve());
    });
  }

  async close(): Promise<void> {
    await this.watcher?.close();
    this.watcher = null;
  }
}
