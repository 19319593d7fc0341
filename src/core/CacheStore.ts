import { readFileSync, existsSync, writeFileSync, unlinkSync } from "fs";
import { BeatmapIndex } from "../struct/BeatmapIndex";
import { BeatmapSet } from "../struct/BeatmapSet";
import { CACHE_VERSION } from "../struct/Constant";
import OssError from "../struct/OssError";
import type { Json } from "../types";
import { checkUndefined, isJson, readNumber, readString } from "../util";
import Logger from "./Logger";

export interface CacheStore {
  // null when nothing usable is persisted
  load(): BeatmapIndex | null;
  save(index: BeatmapIndex): void;
  invalidate(): void;
}

// Persists the index as one JSON document next to (or inside) the Songs folder
export class JsonCacheStore implements CacheStore {
  private cachePath: string;
  private songsPath: string;
  // Last load or save failure, if any
  lastError: OssError | null = null;

  constructor(cachePath: string, songsPath: string) {
    this.cachePath = cachePath;
    this.songsPath = songsPath;
  }

  load(): BeatmapIndex | null {
    this.lastError = null;
    if (!existsSync(this.cachePath)) return null;

    try {
      const data = readFileSync(this.cachePath, "utf-8");
      return this.decode(JSON.parse(data));
    } catch (e) {
      // Cache corrupted or written by another version
      this.lastError = OssError.is(e, "CACHE_CORRUPT") ? e : new OssError("CACHE_CORRUPT", e);
      Logger.generateErrorLog(this.lastError);
      return null;
    }
  }

  save(index: BeatmapIndex): void {
    const data: Json = {
      version: CACHE_VERSION,
      root: this.songsPath,
      lastScan: Date.now(),
      sets: index.sets().map((beatmapSet) => beatmapSet.toJson()),
    };

    try {
      writeFileSync(this.cachePath, JSON.stringify(data));
      this.lastError = null;
    } catch (e) {
      // Failed to save cache, the next session rebuilds it
      this.lastError = new OssError("CACHE_WRITE_FAILED", e);
      Logger.generateErrorLog(this.lastError);
    }
  }

  // Drops the persisted state
  invalidate(): void {
    try {
      if (existsSync(this.cachePath)) {
        unlinkSync(this.cachePath);
      }
    } catch (e) {
      this.lastError = new OssError("CACHE_WRITE_FAILED", e);
      Logger.generateErrorLog(this.lastError);
    }
  }

  private decode(parsed: unknown): BeatmapIndex {
    if (!isJson(parsed)) {
      throw new OssError("CACHE_CORRUPT", "cache root should be an object");
    }

    const und = checkUndefined(parsed, ["version", "root", "sets"]);
    if (und) {
      throw new OssError("CACHE_CORRUPT", `${und} is required`);
    }

    const version = readNumber(parsed, "version");
    if (version !== CACHE_VERSION) {
      throw new OssError("CACHE_CORRUPT", `unsupported cache version ${version}`);
    }

    const root = readString(parsed, "root");
    if (root !== this.songsPath) {
      throw new OssError("CACHE_CORRUPT", `cache was built for ${root}`);
    }

    const { sets } = parsed;
    if (!Array.isArray(sets)) {
      throw new OssError("CACHE_CORRUPT", "sets should be an array");
    }

    const beatmapSets = sets.map((entry) => {
      if (!isJson(entry)) {
        throw new OssError("CACHE_CORRUPT", "set should be an object");
      }
      return BeatmapSet.fromJson(entry);
    });

    return new BeatmapIndex(beatmapSets);
  }
}
