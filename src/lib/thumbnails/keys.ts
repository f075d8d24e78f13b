import { basename, extname } from "path";
import { crc32 } from "crc";
import transliteration from "./transliteration.json";
import type { EntryFormat } from "./types";

const TRANSLITERATION: Record<string, string> = transliteration;

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#039;",
};

const ENTRY_NAME_PATTERN = /^(.*-([0-9a-f]{8}))\.(jpg|png|webp)$/;

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ENTITIES[ch] ?? ch);
}

/**
 * Turn a filename (without extension) into a lowercase, hyphenated ASCII slug.
 * Characters that have no ASCII equivalent become blanks and collapse away.
 */
export function sanitizeName(filename: string): string {
  let mapped = "";
  for (const ch of escapeHtml(filename.toLowerCase())) {
    mapped += TRANSLITERATION[ch] ?? ch;
  }

  return mapped
    .normalize("NFD")
    .replace(/\p{M}/gu, "")
    .replace(/[^a-z0-9 ]/g, " ")
    .trim()
    .replace(/ /g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * CRC-32 of the source basename (filename plus extension), as 8 hex digits.
 *
 * This identifies a source by name only. Two files sharing a basename share
 * this component, and rewriting a file in place does not change it.
 */
export function hashSourceName(sourcePath: string): string {
  return crc32(basename(sourcePath)).toString(16).padStart(8, "0");
}

/**
 * Derive the cache key for a source and requested size.
 * Structure: {name}-{width}[x{height}]-{hash}
 *
 * `height` must only be passed when the caller asked for it; a height derived
 * from the source aspect ratio is not part of the key.
 */
export function deriveCacheKey(sourcePath: string, width: number, height?: number): string {
  const file = basename(sourcePath);
  const name = sanitizeName(basename(file, extname(file)));
  const heightPart = height !== undefined ? `x${height}` : "";
  return `${name}-${width}${heightPart}-${hashSourceName(sourcePath)}`;
}

/**
 * Split a cache directory entry name into its components.
 * Returns null for anything that is not a committed entry (staging files,
 * foreign files, other extensions).
 */
export function parseCacheEntryName(
  fileName: string
): { key: string; hash: string; format: EntryFormat } | null {
  const match = fileName.match(ENTRY_NAME_PATTERN);
  if (!match) return null;

  const [, key, hash, format] = match;
  if (format !== "jpg" && format !== "png" && format !== "webp") return null;

  return { key, hash, format };
}
