import OssError, { type ErrorTypeKey } from "../struct/OssError";
import { COMMAND_NAMES, type CommandName } from "../types";
import { type DuplicateGroup, findDuplicates } from "./DuplicateDetector";
import type Library from "./Library";
import { type Query, type QueryMatch, runQuery } from "./QueryEngine";
import type { ScanSummary } from "./SongsScanner";

export type CommandResult =
  | { kind: "matches"; query: Query; matches: QueryMatch[] }
  | { kind: "duplicates"; groups: DuplicateGroup[]; summary: ScanSummary }
  | { kind: "scanned"; summary: ScanSummary }
  | { kind: "path" }
  | { kind: "exit" }
  | { kind: "error"; type: ErrorTypeKey; message: string };

export interface ParsedCommand {
  name: string;
  args: string;
}

function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((command) => command === name);
}

// `find artist=camellia` -> { name: "find", args: "artist=camellia" }
export function parseCommand(line: string): ParsedCommand {
  const trimmed = line.trim();
  const space = trimmed.search(/\s/);
  if (space === -1) {
    return { name: trimmed.toLowerCase(), args: "" };
  }
  return {
    name: trimmed.slice(0, space).toLowerCase(),
    args: trimmed.slice(space + 1).trim(),
  };
}

function toErrorResult(e: unknown): CommandResult {
  if (e instanceof OssError) {
    return { kind: "error", type: e.type, message: e.detail };
  }
  throw e;
}

// Runs one command against the library; rejected requests come back as `error` results
export async function execute(library: Library, line: string): Promise<CommandResult> {
  const { name, args } = parseCommand(line);

  if (!isCommandName(name)) {
    return {
      kind: "error",
      type: "UNKNOWN_COMMAND",
      message: `'${name}', expected one of: ${COMMAND_NAMES.join(" | ")}`,
    };
  }

  try {
    switch (name) {
      case "list":
      case "find": {
        const result = runQuery(library.index, name === "list" ? "" : args);
        return { kind: "matches", query: result.query, matches: result.toArray() };
      }
      case "check": {
        // Pick up folders downloaded since the last scan before comparing
        const summary = await library.refresh();
        return { kind: "duplicates", groups: findDuplicates(library.index), summary };
      }
      case "flush":
        return { kind: "scanned", summary: await library.flush() };
      case "path":
        return { kind: "path" };
      case "exit":
        return { kind: "exit" };
    }
  } catch (e) {
    return toErrorResult(e);
  }
}
