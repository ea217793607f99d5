// -----------------------------------------------------------------------------
// Save-directory policy
// - Direct uploads:   <saveDir>/<userName>/<YYYY-MM-DD>
// - Forwarded media:  <saveDir>/<userName>/<sourceKind>_<sourceName>/<YYYY-MM-DD>
// Each segment is sanitized so user-controlled names cannot escape saveDir.
// -----------------------------------------------------------------------------

import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { SourceKind } from "../../types/media.js";
import { toLocalDayKey } from "../../utils/time.js";

export interface DirectoryResolver {
  /** Returns the directory for a save, creating it when missing. */
  resolve(
    userName: string,
    sourceName: string | null,
    sourceKind: SourceKind,
    date: Date,
  ): Promise<string>;
}

const UNSAFE_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

/** Makes a single path segment safe ("a/b" → "a_b", ".." → "_"). */
export function sanitizeSegment(input: string): string {
  const cleaned = input
    .replace(UNSAFE_CHARS, "_")
    .replace(/\s+/g, " ")
    .trim()
    .slice(0, 100);
  if (!cleaned || /^\.+$/.test(cleaned)) return "_";
  return cleaned;
}

export function buildSaveDirectory(
  saveDir: string,
  userName: string,
  sourceName: string | null,
  sourceKind: SourceKind,
  date: Date,
): string {
  const parts = [saveDir, sanitizeSegment(userName)];
  if (sourceKind !== "direct") {
    parts.push(sanitizeSegment(`${sourceKind}_${sourceName ?? "unknown"}`));
  }
  parts.push(toLocalDayKey(date));
  return path.join(...parts);
}

export function createDirectoryResolver(saveDir: string): DirectoryResolver {
  return {
    async resolve(userName, sourceName, sourceKind, date) {
      const dir = buildSaveDirectory(saveDir, userName, sourceName, sourceKind, date);
      await mkdir(dir, { recursive: true });
      return dir;
    },
  };
}
