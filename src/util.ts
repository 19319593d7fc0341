import { statSync } from "fs";
import type { Json, JsonValues } from "./types";

export function isBoolean(obj: unknown): obj is boolean {
  return !!obj === obj;
}

export function isJson(obj: unknown): obj is Json {
  return typeof obj === "object" && obj !== null && !Array.isArray(obj);
}

export function checkUndefined(
  obj: Record<string, unknown>,
  fields: string[]
): string | null {
  for (const field of fields) {
    if (!Object.prototype.hasOwnProperty.call(obj, field)) {
      return field;
    }
  }
  return null;
}

export function checkRange(number: number, start: number, end: number): boolean {
  return number >= start && number <= end;
}

// Lenient integer coercion: anything that is not a positive integer becomes `fallback`
export function parseId(value: string | undefined, fallback = 0): number {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return fallback;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
}

// Lower-cased, trimmed, inner whitespace collapsed
export function normalizeText(str: string): string {
  return str.trim().replace(/\s+/g, " ").toLowerCase();
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function readString(obj: Json, field: string): string {
  const value: JsonValues = obj[field];
  if (typeof value !== "string") {
    throw new TypeError(`${field} should be a string`);
  }
  return value;
}

export function readNumber(obj: Json, field: string): number {
  const value: JsonValues = obj[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TypeError(`${field} should be a number`);
  }
  return value;
}

export function readStringRecord(obj: Json, field: string): Record<string, string> {
  const value: JsonValues = obj[field];
  if (!isJson(value)) {
    throw new TypeError(`${field} should be an object`);
  }
  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new TypeError(`${field}.${key} should be a string`);
    }
    record[key] = entry;
  }
  return record;
}

// ANSI escape codes for setting terminal title
const ESC = "\x1b";  // Escape character (code 27)
const BEL = "\x07";  // Bell character (code 7)

export function setTerminalTitle(title: string): void {
  // OSC (Operating System Command) sequence for setting title
  process.stdout.write(`${ESC}]0;${title}${BEL}`);
}
