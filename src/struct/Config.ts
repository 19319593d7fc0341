import { existsSync, writeFileSync } from "fs";
import path from "path";
import Logger from "../core/Logger";
import type { Json, JsonValues } from "../types";
import { isBoolean, checkRange, isDirectory, isJson } from "../util";
import OssError from "./OssError";
import { Constant } from "./Constant";

export default class Config {
  songsPath: string; // osu! Songs folder, one subfolder per beatmapset
  parallel: boolean; // Parse folders in parallel
  concurrency: number;
  cacheFile: string; // Empty = inside the Songs folder
  isFirstRun: boolean;

  static configFilePath = "./config.json";

  constructor(contents?: string, isFirstRun = false) {
    this.isFirstRun = isFirstRun;
    let config: Json = {};
    if (contents) {
      try {
        const parsed: unknown = JSON.parse(contents);
        if (!isJson(parsed)) {
          throw new TypeError("config should be a json object");
        }
        config = parsed;
      } catch (e) {
        const error = new OssError("INVALID_CONFIG", e);
        Logger.generateErrorLog(error);
        throw error;
      }
    }

    this.songsPath = this._getPath(config.songsPath);
    this.parallel = isBoolean(config.parallel) ? config.parallel : true;

    this.concurrency = !isNaN(Number(config.concurrency))
      ? Number(config.concurrency)
      : 4;
    if (!Number.isInteger(this.concurrency) || !checkRange(this.concurrency, 1, 16)) {
      this.concurrency = 4;
    }

    this.cacheFile = this._getPath(config.cacheFile);
  }

  get cachePath(): string {
    if (this.cacheFile) return this.cacheFile;
    if (!this.songsPath) return "";
    return path.join(this.songsPath, Constant.CacheFileName);
  }

  // Number of folders parsed at once
  get scanConcurrency(): number {
    return this.parallel ? this.concurrency : 1;
  }

  isSongsPathValid(): boolean {
    return !!this.songsPath && isDirectory(this.songsPath);
  }

  static generateConfig(): Config {
    const isFirstRun = !existsSync(Config.configFilePath);
    if (isFirstRun) {
      new Config().save();
    }
    return new Config(undefined, isFirstRun);
  }

  toJson(): Json {
    return {
      songsPath: this.songsPath,
      parallel: this.parallel,
      concurrency: this.concurrency,
      cacheFile: this.cacheFile,
    };
  }

  save(): void {
    writeFileSync(Config.configFilePath, JSON.stringify(this.toJson(), null, 2));
  }

  // Only absolute paths are kept
  private _getPath(data: JsonValues): string {
    if (typeof data !== "string" || !data.trim()) return "";
    const trimmed = data.trim();
    return path.isAbsolute(trimmed) ? path.normalize(trimmed) : "";
  }
}
