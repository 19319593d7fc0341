import { BeatmapIndex } from "../struct/BeatmapIndex";
import type { CacheStore } from "./CacheStore";
import Logger from "./Logger";
import type SongsScanner from "./SongsScanner";
import type { ScanSummary } from "./SongsScanner";

// Owns the session's index: loaded or built once, replaced only by a scan
export default class Library {
  private scanner: SongsScanner;
  private store: CacheStore;
  index: BeatmapIndex = new BeatmapIndex();
  lastSummary: ScanSummary | null = null;

  constructor(scanner: SongsScanner, store: CacheStore) {
    this.scanner = scanner;
    this.store = store;
  }

  // Loads the cache, then re-parses only the folders that changed since it was written
  async open(): Promise<ScanSummary> {
    const cached = this.store.load();
    return this.commit(cached ?? new BeatmapIndex());
  }

  async refresh(): Promise<ScanSummary> {
    return this.commit(this.index);
  }

  // Forgets everything and parses every folder again
  async flush(): Promise<ScanSummary> {
    this.store.invalidate();
    return this.commit(new BeatmapIndex());
  }

  private async commit(previous: BeatmapIndex): Promise<ScanSummary> {
    const { index, summary } = await this.scanner.scan(previous);

    this.index = index;
    this.lastSummary = summary;
    this.store.save(index);

    if (summary.warnings.length) {
      Logger.generateScanLog(summary);
    }
    return summary;
  }
}
