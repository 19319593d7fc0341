import { ChartRecord } from "../struct/ChartRecord";
import { isKeyValueSection } from "../struct/Constant";
import OssError from "../struct/OssError";
import { parseId } from "../util";

export interface ChartLocation {
  folderPath: string;
  fileName: string;
}

export type ChartParserFn = (content: string | Buffer, location: ChartLocation) => ChartRecord;

const SECTION_REGEX = /^\s*\[(.+)]\s*$/;
const FORMAT_REGEX = /^\s*osu file format v(\d+)\s*$/;

// Keys promoted to named ChartRecord fields; everything else stays in `extra`
const PROMOTED_KEYS = new Set([
  "BeatmapID",
  "BeatmapSetID",
  "Title",
  "Artist",
  "Creator",
  "Version",
  "AudioFilename",
]);

const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function decode(content: string | Buffer): string {
  const text = typeof content === "string" ? content : decoder.decode(content);
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Reads the metadata of one .osu file.
 * Format: https://osu.ppy.sh/wiki/en/Client/File_formats/osu_%28file_format%29
 *
 * Only the key/value sections are read; events, timing points and hit objects are skipped.
 */
export function parseChart(content: string | Buffer, location: ChartLocation): ChartRecord {
  let text: string;
  try {
    text = decode(content);
  } catch (e) {
    throw new OssError("PARSE_FAILED", `${location.fileName} is not valid UTF-8 text (${String(e)})`);
  }

  const fields = new Map<string, string>();
  const seenSections = new Set<string>();
  let formatVersion = 0;
  let section = "";

  for (const [i, line] of text.split(/\r?\n/).entries()) {
    if (i === 0) {
      const format = line.match(FORMAT_REGEX);
      if (format) {
        formatVersion = parseId(format[1]);
        continue;
      }
    }

    const header = line.match(SECTION_REGEX);
    if (header) {
      section = header[1].trim();
      seenSections.add(section);
      continue;
    }

    if (!isKeyValueSection(section)) continue;

    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("//")) continue;

    const separator = trimmed.indexOf(":");
    if (separator <= 0) continue;

    fields.set(trimmed.slice(0, separator).trim(), trimmed.slice(separator + 1).trim());
  }

  if (!seenSections.has("General") && !seenSections.has("Metadata")) {
    throw new OssError("PARSE_FAILED", `${location.fileName} has no [General] or [Metadata] section`);
  }

  const extra: Record<string, string> = {};
  for (const [key, value] of fields) {
    if (!PROMOTED_KEYS.has(key)) extra[key] = value;
  }

  return new ChartRecord({
    beatmapId: parseId(fields.get("BeatmapID")),
    beatmapSetId: parseId(fields.get("BeatmapSetID")),
    title: fields.get("Title") ?? "",
    artist: fields.get("Artist") ?? "",
    creator: fields.get("Creator") ?? "",
    difficultyName: fields.get("Version") ?? "",
    audioFileName: fields.get("AudioFilename") ?? "",
    formatVersion,
    folderPath: location.folderPath,
    fileName: location.fileName,
    extra,
  });
}
