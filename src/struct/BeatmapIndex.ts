import { type BeatmapSet, type BeatmapSetId, compareText } from "./BeatmapSet";

// In-memory index of a Songs folder, keyed by folder path
export class BeatmapIndex {
  private beatmapSets: Map<string, BeatmapSet> = new Map();
  // Derived view, rebuilt on every mutation
  private folderPathsBySetId: Map<BeatmapSetId, string[]> = new Map();
  chartCount = 0;

  constructor(beatmapSets: Iterable<BeatmapSet> = []) {
    for (const beatmapSet of beatmapSets) {
      this.beatmapSets.set(beatmapSet.folderPath, beatmapSet);
    }
    this._rebuildViews();
  }

  get size(): number {
    return this.beatmapSets.size;
  }

  get(folderPath: string): BeatmapSet | undefined {
    return this.beatmapSets.get(folderPath);
  }

  has(folderPath: string): boolean {
    return this.beatmapSets.has(folderPath);
  }

  set(beatmapSet: BeatmapSet): void {
    this.beatmapSets.set(beatmapSet.folderPath, beatmapSet);
    this._rebuildViews();
  }

  delete(folderPath: string): boolean {
    const deleted = this.beatmapSets.delete(folderPath);
    if (deleted) this._rebuildViews();
    return deleted;
  }

  reset(): void {
    this.beatmapSets = new Map();
    this._rebuildViews();
  }

  // Folder paths of every set carrying this id, ascending
  foldersWithSetId(id: BeatmapSetId): string[] {
    return [...(this.folderPathsBySetId.get(id) ?? [])];
  }

  // Snapshot ordered by folder path
  sets(): BeatmapSet[] {
    return [...this.beatmapSets.values()].sort((a, b) =>
      compareText(a.folderPath, b.folderPath)
    );
  }

  private _rebuildViews(): void {
    const bySetId = new Map<BeatmapSetId, string[]>();
    let chartCount = 0;

    for (const beatmapSet of this.sets()) {
      chartCount += beatmapSet.charts.length;
      const id = beatmapSet.id;
      if (id === 0) continue;

      const folders = bySetId.get(id);
      if (folders) {
        folders.push(beatmapSet.folderPath);
      } else {
        bySetId.set(id, [beatmapSet.folderPath]);
      }
    }

    this.folderPathsBySetId = bySetId;
    this.chartCount = chartCount;
  }
}
