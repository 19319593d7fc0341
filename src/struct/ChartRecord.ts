import type { Json } from "../types";
import { checkUndefined, readNumber, readString, readStringRecord } from "../util";
import OssError from "./OssError";

export type BeatmapId = number;

export interface ChartRecordData {
  beatmapId: BeatmapId;
  beatmapSetId: number;
  title: string;
  artist: string;
  creator: string;
  difficultyName: string;
  audioFileName: string;
  formatVersion: number;
  folderPath: string;
  fileName: string;
  // Every key/value pair not promoted to a named field
  extra: Record<string, string>;
}

const REQUIRED_FIELDS: (keyof ChartRecordData)[] = [
  "beatmapId",
  "beatmapSetId",
  "title",
  "artist",
  "creator",
  "difficultyName",
  "audioFileName",
  "formatVersion",
  "folderPath",
  "fileName",
  "extra",
];

// One difficulty of a beatmapset, read from a single .osu file
export class ChartRecord implements ChartRecordData {
  beatmapId: BeatmapId;
  beatmapSetId: number;
  title: string;
  artist: string;
  creator: string;
  difficultyName: string;
  audioFileName: string;
  formatVersion: number;
  folderPath: string;
  fileName: string;
  extra: Record<string, string>;

  constructor(data: ChartRecordData) {
    this.beatmapId = data.beatmapId;
    this.beatmapSetId = data.beatmapSetId;
    this.title = data.title;
    this.artist = data.artist;
    this.creator = data.creator;
    this.difficultyName = data.difficultyName;
    this.audioFileName = data.audioFileName;
    this.formatVersion = data.formatVersion;
    this.folderPath = data.folderPath;
    this.fileName = data.fileName;
    this.extra = { ...data.extra };
  }

  static fromJson(jsonData: Json): ChartRecord {
    const und = checkUndefined(jsonData, REQUIRED_FIELDS);
    if (und) {
      throw new OssError("CACHE_CORRUPT", `chart ${und} is required`);
    }

    try {
      return new ChartRecord({
        beatmapId: readNumber(jsonData, "beatmapId"),
        beatmapSetId: readNumber(jsonData, "beatmapSetId"),
        title: readString(jsonData, "title"),
        artist: readString(jsonData, "artist"),
        creator: readString(jsonData, "creator"),
        difficultyName: readString(jsonData, "difficultyName"),
        audioFileName: readString(jsonData, "audioFileName"),
        formatVersion: readNumber(jsonData, "formatVersion"),
        folderPath: readString(jsonData, "folderPath"),
        fileName: readString(jsonData, "fileName"),
        extra: readStringRecord(jsonData, "extra"),
      });
    } catch (e) {
      throw new OssError("CACHE_CORRUPT", e);
    }
  }

  toJson(): Json {
    return {
      beatmapId: this.beatmapId,
      beatmapSetId: this.beatmapSetId,
      title: this.title,
      artist: this.artist,
      creator: this.creator,
      difficultyName: this.difficultyName,
      audioFileName: this.audioFileName,
      formatVersion: this.formatVersion,
      folderPath: this.folderPath,
      fileName: this.fileName,
      extra: { ...this.extra },
    };
  }
}
