import type { BeatmapIndex } from "../struct/BeatmapIndex";
import { type BeatmapSet, compareText } from "../struct/BeatmapSet";
import { normalizeText } from "../util";

export type DuplicateReason = "beatmapSetId" | "signature";

export interface DuplicateGroup {
  reason: DuplicateReason;
  key: string;
  // At least two sets, ascending by folder path
  sets: BeatmapSet[];
}

/**
 * Content signature of an unsubmitted set: its distinct title/artist/creator
 * tuples and its chart count. Sets without an id can only be compared this way.
 */
export function contentSignature(beatmapSet: BeatmapSet): string {
  const tuples = new Map<string, string[]>();
  for (const chart of beatmapSet.charts) {
    const tuple = [chart.title, chart.artist, chart.creator].map(normalizeText);
    tuples.set(JSON.stringify(tuple), tuple);
  }

  const sorted = [...tuples.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([, tuple]) => tuple);
  return JSON.stringify([beatmapSet.charts.length, sorted]);
}

function identityOf(beatmapSet: BeatmapSet): { reason: DuplicateReason; key: string } {
  const id = beatmapSet.id;
  return id > 0
    ? { reason: "beatmapSetId", key: id.toString() }
    : { reason: "signature", key: contentSignature(beatmapSet) };
}

// Sets sharing one identity key; sets without charts take no part
export function findDuplicates(index: BeatmapIndex): DuplicateGroup[] {
  const groups = new Map<string, DuplicateGroup>();

  // index.sets() is ordered by folder path, so members stay ordered
  for (const beatmapSet of index.sets()) {
    if (!beatmapSet.charts.length) continue;

    const { reason, key } = identityOf(beatmapSet);
    const groupKey = `${reason}:${key}`;
    const group = groups.get(groupKey);
    if (group) {
      group.sets.push(beatmapSet);
    } else {
      groups.set(groupKey, { reason, key, sets: [beatmapSet] });
    }
  }

  return [...groups.values()]
    .filter((group) => group.sets.length > 1)
    .sort(
      (a, b) =>
        b.sets.length - a.sets.length ||
        compareText(a.sets[0].folderPath, b.sets[0].folderPath)
    );
}
