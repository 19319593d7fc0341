export interface Json {
  [x: string]: JsonValues;
}

export type JsonValues = string | number | boolean | null | Json | JsonArray;
export type JsonArray = Array<JsonValues>;

// Commands understood by the interactive loop
export type CommandName = "check" | "exit" | "find" | "flush" | "list" | "path";

export const COMMAND_NAMES: readonly CommandName[] = [
  "check",
  "exit",
  "find",
  "flush",
  "list",
  "path",
];
