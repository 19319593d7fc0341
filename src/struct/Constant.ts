export enum Constant {
  AppName = "osu-songs-search",
  ChartExtension = ".osu",
  CacheFileName = "oss-index-cache.json",
}

// Bump when the persisted index layout changes; older caches are rebuilt
export const CACHE_VERSION = 1;

// Sections of a .osu file made of `Key:Value` lines
export const KEY_VALUE_SECTIONS = ["General", "Editor", "Metadata", "Difficulty"] as const;

export type KeyValueSection = (typeof KEY_VALUE_SECTIONS)[number];

export function isKeyValueSection(name: string): name is KeyValueSection {
  return KEY_VALUE_SECTIONS.some((section) => section === name);
}
