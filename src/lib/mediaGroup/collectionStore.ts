// -----------------------------------------------------------------------------
// Collection store: durable map of in-flight media groups (one JSON document).
// - load(): missing → {}, corrupt → quarantined to <path>.bak.<unixtime> and {}
// - save(): write <path>.tmp, then rename over <path> (atomic replace)
// - No internal locking. Callers go through readCollection / mutateCollection,
//   which hold the aggregation lock around load → work → save.
// -----------------------------------------------------------------------------

import { access, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import type { MediaItem } from "../../types/media.js";
import type { Collection, GroupRecord } from "../../types/mediaGroup.js";
import type { AsyncLock } from "../../utils/asyncLock.js";
import { toUnixSeconds } from "../../utils/time.js";

// ===== Schema =====

const MediaItemSchema: z.ZodType<MediaItem> = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("photo"),
    fileId: z.string(),
    fileUniqueId: z.string(),
    width: z.number().optional(),
    height: z.number().optional(),
  }),
  z.object({
    kind: z.literal("video"),
    fileId: z.string(),
    fileUniqueId: z.string(),
    mimeType: z.string().optional(),
    fileName: z.string().optional(),
    duration: z.number().optional(),
  }),
  z.object({
    kind: z.literal("animation"),
    fileId: z.string(),
    fileUniqueId: z.string(),
    mimeType: z.string().optional(),
    fileName: z.string().optional(),
  }),
  z.object({
    kind: z.literal("document_image"),
    fileId: z.string(),
    fileUniqueId: z.string(),
    mimeType: z.string(),
    fileName: z.string().optional(),
  }),
]);

const GroupRecordSchema: z.ZodType<GroupRecord> = z.object({
  chatId: z.number(),
  groupId: z.string(),
  userId: z.number(),
  userName: z.string(),
  items: z.array(MediaItemSchema),
  firstSeenAt: z.string(),
  statusHandle: z.number().nullable(),
  sourceName: z.string().nullable(),
  sourceId: z.string().nullable(),
  sourceLink: z.string().nullable(),
  sourceKind: z.enum(["direct", "user", "hidden_user", "chat", "channel"]),
});

const CollectionSchema = z.record(z.string(), GroupRecordSchema);

// ===== Store =====

export class CollectionStore {
  constructor(readonly filePath: string) {}

  get tempPath(): string {
    return `${this.filePath}.tmp`;
  }

  /** Never throws: a missing or corrupt document yields an empty collection. */
  async load(): Promise<Collection> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (e) {
      if (isNotFound(e)) return {};
      console.error(`[store] read failed (${this.filePath}):`, e);
      return {};
    }

    const parsed = CollectionSchema.safeParse(safeJson(raw));
    if (parsed.success) return parsed.data;

    await this.quarantine();
    return {};
  }

  async save(collection: Collection): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.tempPath, JSON.stringify(collection, null, 2), "utf8");
    await rename(this.tempPath, this.filePath);
  }

  /** Moves an unreadable document aside so the next save starts clean. */
  private async quarantine(): Promise<void> {
    try {
      const backup = await unusedPath(`${this.filePath}.bak.${toUnixSeconds(new Date())}`);
      await rename(this.filePath, backup);
      console.warn(`[store] corrupt collection quarantined → ${backup}`);
    } catch (e) {
      console.error(`[store] quarantine failed (${this.filePath}):`, e);
    }
  }
}

/** `base`, or `base.1`, `base.2`… when an earlier backup from the same second exists. */
async function unusedPath(base: string): Promise<string> {
  for (let n = 0; ; n++) {
    const candidate = n === 0 ? base : `${base}.${n}`;
    if (!(await exists(candidate))) return candidate;
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

// ===== Transactions =====

export interface CollectionContext {
  lock: AsyncLock;
  store: CollectionStore;
}

/** Lock → load → fn(collection). Nothing is written back. */
export function readCollection<T>(
  ctx: CollectionContext,
  fn: (collection: Collection) => T,
): Promise<T> {
  return ctx.lock(async () => fn(await ctx.store.load()));
}

/** Lock → load → fn(collection) mutates in place → save. */
export function mutateCollection<T>(
  ctx: CollectionContext,
  fn: (collection: Collection) => T,
): Promise<T> {
  return ctx.lock(async () => {
    const collection = await ctx.store.load();
    const result = fn(collection);
    await ctx.store.save(collection);
    return result;
  });
}

// ===== Internals =====

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isNotFound(e: unknown): boolean {
  return (
    typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT"
  );
}
