import type { Dirent } from "fs";
import { readdir, readFile, stat } from "fs/promises";
import { createHash } from "crypto";
import _path from "path";
import PQueue from "p-queue";
import { BeatmapIndex } from "../struct/BeatmapIndex";
import { BeatmapSet, compareText } from "../struct/BeatmapSet";
import type { ChartRecord } from "../struct/ChartRecord";
import { Constant } from "../struct/Constant";
import OssError, { type ErrorTypeKey } from "../struct/OssError";
import { isDirectory } from "../util";
import { type ChartParserFn, parseChart } from "./ChartParser";

export interface ScanProgress {
  current: number;
  total: number;
  currentFolder: string;
}

export interface ScanWarning {
  type: Extract<ErrorTypeKey, "PARSE_FAILED" | "FOLDER_SCAN_FAILED">;
  path: string;
  message: string;
}

export interface ScanSummary {
  total: number;  // Candidate folders found under the root
  parsed: number;  // Folders (re)parsed this scan
  reused: number;  // Folders taken from the previous index unchanged
  omitted: number;  // Folders without any parseable chart
  skipped: number;  // Unreadable folders
  warnings: ScanWarning[];
}

export interface ScanResult {
  index: BeatmapIndex;
  summary: ScanSummary;
}

export interface SongsScannerOptions {
  concurrency?: number;
  parser?: ChartParserFn;
}

export interface FileEntry {
  name: string;
  size: number;
  mtimeMs: number;
}

type FolderOutcome =
  | { kind: "reused"; beatmapSet: BeatmapSet }
  | { kind: "parsed"; beatmapSet: BeatmapSet | null; warnings: ScanWarning[] }
  | { kind: "skipped"; warning: ScanWarning };

export default class SongsScanner {
  private songsPath: string;
  private queue: PQueue;
  private parser: ChartParserFn;
  private onProgress: ((progress: ScanProgress) => void) | null = null;

  constructor(songsPath: string, options: SongsScannerOptions = {}) {
    this.songsPath = songsPath;
    this.parser = options.parser ?? parseChart;
    this.queue = new PQueue({ concurrency: Math.max(1, options.concurrency ?? 1) });
  }

  setProgressCallback(callback: (progress: ScanProgress) => void): void {
    this.onProgress = callback;
  }

  // Folders whose fingerprint matches their entry in `previous` are reused without parsing
  async scan(previous: BeatmapIndex = new BeatmapIndex()): Promise<ScanResult> {
    if (!isDirectory(this.songsPath)) {
      throw new OssError("ROOT_PATH_INVALID", this.songsPath);
    }

    const folders = await this.getBeatmapFolders();
    const total = folders.length;
    let current = 0;

    // Folders are parsed in parallel, merged in order once every task has settled
    const outcomes = await Promise.all(
      folders.map((folder) =>
        this.queue.add(async () => {
          const outcome = await this.scanFolder(folder, previous);

          current++;
          if (this.onProgress) {
            this.onProgress({ current, total, currentFolder: folder });
          }
          return outcome;
        })
      )
    );

    return this.merge(outcomes, total);
  }

  private merge(outcomes: FolderOutcome[], total: number): ScanResult {
    const beatmapSets: BeatmapSet[] = [];
    const summary: ScanSummary = {
      total,
      parsed: 0,
      reused: 0,
      omitted: 0,
      skipped: 0,
      warnings: [],
    };

    for (const outcome of outcomes) {
      switch (outcome.kind) {
        case "reused":
          summary.reused++;
          beatmapSets.push(outcome.beatmapSet);
          break;
        case "parsed":
          summary.warnings.push(...outcome.warnings);
          if (outcome.beatmapSet) {
            summary.parsed++;
            beatmapSets.push(outcome.beatmapSet);
          } else {
            summary.omitted++;
          }
          break;
        case "skipped":
          summary.skipped++;
          summary.warnings.push(outcome.warning);
          break;
      }
    }

    return { index: new BeatmapIndex(beatmapSets), summary };
  }

  private async getBeatmapFolders(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.songsPath, { withFileTypes: true });
    } catch (e) {
      throw new OssError("ROOT_PATH_INVALID", e);
    }

    return entries
      .filter((entry) => !entry.name.startsWith("."))
      .filter(
        (entry) =>
          entry.isDirectory() ||
          // Linked set folders count, dangling links do not
          (entry.isSymbolicLink() && isDirectory(_path.join(this.songsPath, entry.name)))
      )
      .map((entry) => entry.name)
      .sort(compareText);
  }

  private async scanFolder(folder: string, previous: BeatmapIndex): Promise<FolderOutcome> {
    const folderPath = _path.join(this.songsPath, folder);

    let files: FileEntry[];
    try {
      files = await this.listFiles(folderPath);
    } catch (e) {
      return {
        kind: "skipped",
        warning: { type: "FOLDER_SCAN_FAILED", path: folderPath, message: String(e) },
      };
    }

    const fingerprint = SongsScanner.fingerprint(folderPath, files);

    // Check cache for this folder
    const cached = previous.get(folderPath);
    if (cached && cached.fingerprint === fingerprint) {
      return { kind: "reused", beatmapSet: cached };
    }

    const charts: ChartRecord[] = [];
    const warnings: ScanWarning[] = [];
    const chartFiles = files.filter((file) =>
      file.name.toLowerCase().endsWith(Constant.ChartExtension)
    );

    for (const file of chartFiles) {
      const filePath = _path.join(folderPath, file.name);
      try {
        const content = await readFile(filePath);
        charts.push(this.parser(content, { folderPath, fileName: file.name }));
      } catch (e) {
        const message = e instanceof OssError ? e.detail : String(e);
        warnings.push({ type: "PARSE_FAILED", path: filePath, message });
      }
    }

    return {
      kind: "parsed",
      beatmapSet: charts.length ? new BeatmapSet(folderPath, fingerprint, charts) : null,
      warnings,
    };
  }

  private async listFiles(folderPath: string): Promise<FileEntry[]> {
    const entries = await readdir(folderPath, { withFileTypes: true });
    const files: FileEntry[] = [];

    for (const entry of entries) {
      if (!entry.isFile() && !entry.isSymbolicLink()) continue;
      // Follows links, so a linked chart is read like a regular one
      const stats = await stat(_path.join(folderPath, entry.name));
      if (!stats.isFile()) continue;
      files.push({ name: entry.name, size: stats.size, mtimeMs: stats.mtimeMs });
    }

    return files.sort((a, b) => compareText(a.name, b.name));
  }

  // Changes when a file is added, removed, resized or touched
  static fingerprint(folderPath: string, files: FileEntry[]): string {
    const hash = createHash("sha1").update(folderPath);
    for (const file of files) {
      hash.update(`\0${file.name}\0${file.size}\0${file.mtimeMs}`);
    }
    return hash.digest("hex");
  }
}
