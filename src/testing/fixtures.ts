import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import _path from "path";
import { BeatmapSet } from "../struct/BeatmapSet";
import { ChartRecord, type ChartRecordData } from "../struct/ChartRecord";

export interface ChartSections {
  formatVersion?: number;
  general?: Record<string, string>;
  metadata?: Record<string, string>;
  difficulty?: Record<string, string>;
}

// Writes a .osu file the way the editor lays it out, with object sections the reader must skip
export function writeChart(sections: ChartSections): string {
  const block = (name: string, fields: Record<string, string> = {}, separator = ":") => [
    `[${name}]`,
    ...Object.entries(fields).map(([key, value]) => `${key}${separator}${value}`),
    "",
  ];

  return [
    `osu file format v${sections.formatVersion ?? 14}`,
    "",
    ...block("General", sections.general, ": "),
    ...block("Metadata", sections.metadata),
    ...block("Difficulty", sections.difficulty),
    "[Events]",
    "//Background and Video events",
    '0,0,"bg.jpg",0,0',
    "",
    "[TimingPoints]",
    "120,500,4,2,0,100,1,0",
    "",
    "[HitObjects]",
    "256,192,1000,1,0,0:0:0:0:",
    "",
  ].join("\r\n");
}

export function makeChart(overrides: Partial<ChartRecordData> = {}): ChartRecord {
  return new ChartRecord({
    beatmapId: 0,
    beatmapSetId: 0,
    title: "Song",
    artist: "Artist",
    creator: "Mapper",
    difficultyName: "Normal",
    audioFileName: "audio.mp3",
    formatVersion: 14,
    folderPath: "/beatmaps/folder",
    fileName: "Artist - Song (Mapper) [Normal].osu",
    extra: {},
    ...overrides,
  });
}

// A set whose charts all live in `folderPath`
export function makeSet(
  folderPath: string,
  charts: Partial<ChartRecordData>[] = [{}],
  fingerprint = "fp"
): BeatmapSet {
  return new BeatmapSet(
    folderPath,
    fingerprint,
    charts.map((chart, i) =>
      makeChart({ fileName: `chart-${i}.osu`, ...chart, folderPath })
    )
  );
}

export interface TempSongs {
  root: string;
  addFolder(name: string, files: Record<string, string | Buffer>): string;
  cleanup(): void;
}

export function createTempSongs(): TempSongs {
  const base = mkdtempSync(_path.join(tmpdir(), "oss-test-"));
  const root = _path.join(base, "Songs");
  mkdirSync(root);

  return {
    root,
    addFolder(name, files) {
      const folder = _path.join(root, name);
      mkdirSync(folder, { recursive: true });
      for (const [fileName, content] of Object.entries(files)) {
        writeFileSync(_path.join(folder, fileName), content);
      }
      return folder;
    },
    cleanup() {
      rmSync(base, { recursive: true, force: true });
    },
  };
}
