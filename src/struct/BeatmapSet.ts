import type { Json } from "../types";
import { checkUndefined, isJson, readNumber, readString } from "../util";
import { ChartRecord } from "./ChartRecord";
import OssError from "./OssError";

export type BeatmapSetId = number;

export class BeatmapSet {
  folderPath: string;
  fingerprint: string;
  charts: ChartRecord[];

  constructor(folderPath: string, fingerprint: string, charts: ChartRecord[]) {
    this.folderPath = folderPath;
    this.fingerprint = fingerprint;
    this.charts = [...charts].sort((a, b) => compareText(a.fileName, b.fileName));
  }

  // 0 means unsubmitted
  get id(): BeatmapSetId {
    return this.charts.find((chart) => chart.beatmapSetId > 0)?.beatmapSetId ?? 0;
  }

  static fromJson(jsonData: Json): BeatmapSet {
    const und = checkUndefined(jsonData, ["folderPath", "fingerprint", "charts"]);
    if (und) {
      throw new OssError("CACHE_CORRUPT", `set ${und} is required`);
    }

    const { charts } = jsonData;
    if (!Array.isArray(charts)) {
      throw new OssError("CACHE_CORRUPT", "set charts should be an array");
    }

    try {
      const folderPath = readString(jsonData, "folderPath");
      const fingerprint = readString(jsonData, "fingerprint");
      const records = charts.map((chart) => {
        if (!isJson(chart)) {
          throw new TypeError("chart should be an object");
        }
        return ChartRecord.fromJson(chart);
      });
      const set = new BeatmapSet(folderPath, fingerprint, records);

      // The persisted id is only a check: the charts are the source of truth
      if (readNumber(jsonData, "beatmapSetId") !== set.id) {
        throw new TypeError(`beatmapSetId of ${folderPath} does not match its charts`);
      }
      return set;
    } catch (e) {
      throw new OssError("CACHE_CORRUPT", e);
    }
  }

  toJson(): Json {
    return {
      beatmapSetId: this.id,
      folderPath: this.folderPath,
      fingerprint: this.fingerprint,
      charts: this.charts.map((chart) => chart.toJson()),
    };
  }
}

// Plain code-unit ordering, so results do not depend on the host locale
export function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
