import type { BeatmapIndex } from "../struct/BeatmapIndex";
import type { BeatmapSet } from "../struct/BeatmapSet";
import type { ChartRecord } from "../struct/ChartRecord";
import OssError from "../struct/OssError";

export type QueryField = "sid" | "bid" | "name" | "artist" | "creator" | "diff";

export type Query =
  | { field: null; keyword: string }
  | { field: QueryField; keyword: string };

export interface QueryMatch {
  set: BeatmapSet;
  // Charts of the set that satisfied the query
  charts: ChartRecord[];
}

interface FieldRule {
  numeric: boolean;
  pick: (chart: ChartRecord) => string | number;
}

const FIELD_RULES: Record<QueryField, FieldRule> = {
  sid: { numeric: true, pick: (chart) => chart.beatmapSetId },
  bid: { numeric: true, pick: (chart) => chart.beatmapId },
  name: { numeric: false, pick: (chart) => chart.title },
  artist: { numeric: false, pick: (chart) => chart.artist },
  creator: { numeric: false, pick: (chart) => chart.creator },
  diff: { numeric: false, pick: (chart) => chart.difficultyName },
};

const QUALIFIER_REGEX = /^\s*(\w+)\s*=(.*)$/s;

function isQueryField(name: string): name is QueryField {
  return Object.prototype.hasOwnProperty.call(FIELD_RULES, name);
}

/**
 * `field=keyword` or a bare keyword. Text starting with `=` is a bare keyword,
 * so artists such as "=LOVE" stay searchable.
 */
export function parseQuery(text: string): Query {
  const qualified = text.match(QUALIFIER_REGEX);
  if (!qualified) {
    return { field: null, keyword: text.trim() };
  }

  const field = qualified[1].toLowerCase();
  const keyword = qualified[2].trim();

  if (!isQueryField(field)) {
    throw new OssError(
      "INVALID_QUERY",
      `unknown field '${qualified[1]}', expected one of: ${Object.keys(FIELD_RULES).join(", ")}`
    );
  }
  if (FIELD_RULES[field].numeric && keyword && !/^\d+$/.test(keyword)) {
    throw new OssError("INVALID_QUERY", `${field} expects a number, got '${keyword}'`);
  }

  return { field, keyword };
}

function chartMatches(chart: ChartRecord, query: Query): boolean {
  const keyword = query.keyword.toLowerCase();

  if (query.field === null) {
    return [chart.title, chart.artist, chart.creator].some((value) =>
      value.toLowerCase().includes(keyword)
    );
  }

  const value = FIELD_RULES[query.field].pick(chart);
  if (typeof value === "number") {
    return value === Number(keyword);
  }
  return value.toLowerCase().includes(keyword);
}

function matchSet(beatmapSet: BeatmapSet, query: Query): QueryMatch | null {
  if (!query.keyword) {
    return { set: beatmapSet, charts: [...beatmapSet.charts] };
  }

  // `sid` selects the whole set, whether the id is the set's own or one chart's
  if (query.field === "sid") {
    const id = Number(query.keyword);
    const matched =
      beatmapSet.id === id || beatmapSet.charts.some((chart) => chart.beatmapSetId === id);
    return matched ? { set: beatmapSet, charts: [...beatmapSet.charts] } : null;
  }

  const charts = beatmapSet.charts.filter((chart) => chartMatches(chart, query));
  return charts.length ? { set: beatmapSet, charts } : null;
}

// Lazily filters a snapshot of the index; every iteration starts over
export class QueryResult implements Iterable<QueryMatch> {
  readonly query: Query;
  private readonly snapshot: readonly BeatmapSet[];

  constructor(snapshot: readonly BeatmapSet[], query: Query) {
    this.snapshot = snapshot;
    this.query = query;
  }

  *[Symbol.iterator](): Iterator<QueryMatch> {
    for (const beatmapSet of this.snapshot) {
      const match = matchSet(beatmapSet, this.query);
      if (match) yield match;
    }
  }

  toArray(): QueryMatch[] {
    return [...this];
  }
}

export function runQuery(index: BeatmapIndex, query: string | Query): QueryResult {
  const parsed = typeof query === "string" ? parseQuery(query) : query;
  return new QueryResult(index.sets(), parsed);
}
