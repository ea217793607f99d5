// -----------------------------------------------------------------------------
// Batch processor: drains one media group.
//
// Flow:
// 1) Lock, load, copy the group record; unlock. Missing → log, return.
// 2) No items → "nothing to process" notice, delete the record.
// 3) Resolve the save directory.
// 4) Turn the "collecting" notice into "0/N" (edit in place, else post new).
// 5) Per item, in arrival order: download → sniff → rename → metadata → "i/N".
//    A failed download/rename is logged and skipped; it is not counted.
// 6) Terminal "processed/N" summary.
// 7) Lock, reload, delete the record; unlock. Items that arrived while this
//    drain was running are kept as a fresh record and re-enqueued.
//
// Notes:
// - drain() never throws. Any unexpected fault is logged and the record is
//   still removed so a poisoned group cannot be re-queued forever.
// - Network calls happen outside the lock.
// -----------------------------------------------------------------------------

import type { GroupKey, GroupRecord } from "../../types/mediaGroup.js";
import type { MetadataWriter } from "../../types/metadata.js";
import type { ChatTransport } from "../../types/transport.js";
import {
  formatElapsedSeconds,
  toUnixSeconds,
} from "../../utils/time.js";
import type { DirectoryResolver } from "../media/directoryResolver.js";
import type { FormatSniffer } from "../media/formatSniffer.js";
import { saveMediaFile } from "../media/saveMediaFile.js";
import {
  mutateCollection,
  readCollection,
  type CollectionContext,
} from "./collectionStore.js";
import {
  NOTHING_TO_PROCESS_NOTICE,
  doneNotice,
  progressNotice,
} from "./notices.js";
import { ProgressNotice } from "./progressNotice.js";

export interface BatchProcessorDeps {
  ctx: CollectionContext;
  transport: ChatTransport;
  directories: DirectoryResolver;
  metadata: MetadataWriter;
  sniffer: FormatSniffer;
  /** Re-enqueue a key whose record was re-opened by late items. */
  reopen: (key: GroupKey) => Promise<void>;
  now?: () => Date;
}

export interface DrainSummary {
  key: GroupKey;
  total: number;
  processed: number;
}

export class BatchProcessor {
  private readonly now: () => Date;

  constructor(private readonly deps: BatchProcessorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async drain(key: GroupKey): Promise<DrainSummary | null> {
    try {
      return await this.drainOrThrow(key);
    } catch (e) {
      console.error(`[mediaGroup] drain of ${key} failed, dropping group:`, e);
      await this.forceRemove(key);
      return null;
    }
  }

  private async drainOrThrow(key: GroupKey): Promise<DrainSummary | null> {
    const { ctx, transport, directories, metadata, sniffer } = this.deps;

    // --- 1) Snapshot the record ---
    const snapshot = await readCollection(ctx, (collection) => {
      const record = collection[key];
      return record ? cloneRecord(record) : null;
    });
    if (!snapshot) {
      console.warn(`[mediaGroup] ${key} not in store (already drained?), skip`);
      return null;
    }

    const total = snapshot.items.length;
    const notice = new ProgressNotice(
      transport,
      snapshot.chatId,
      snapshot.statusHandle,
    );
    console.log(
      `[mediaGroup] draining ${key}: ${total} item(s), notice ${snapshot.statusHandle ?? "none"}`,
    );

    // --- 2) Empty group ---
    if (total === 0) {
      await notice.open(NOTHING_TO_PROCESS_NOTICE);
      await this.removeRecord(key, snapshot);
      return { key, total: 0, processed: 0 };
    }

    // --- 3) Target directory ---
    const startedAt = this.now();
    const dir = await directories.resolve(
      snapshot.userName,
      snapshot.sourceName,
      snapshot.sourceKind,
      startedAt,
    );

    // --- 4) "collecting" → "0/N" ---
    await notice.open(progressNotice(0, total));

    // --- 5) Items in arrival order ---
    let processed = 0;
    for (const [i, item] of snapshot.items.entries()) {
      const index = i + 1;
      const baseName = `${toUnixSeconds(this.now())}_${item.fileUniqueId}_${snapshot.groupId}`;

      try {
        const saved = await saveMediaFile({
          transport,
          sniffer,
          item,
          dir,
          baseName,
        });
        processed++;
        console.log(
          `[mediaGroup] saved ${key} (${index}/${total}): ${saved.filePath}`,
        );

        try {
          await metadata.record({
            chatId: snapshot.chatId,
            userId: snapshot.userId,
            userName: snapshot.userName,
            item,
            fileName: saved.fileName,
            filePath: saved.filePath,
            mimeType: saved.mimeType,
            groupId: snapshot.groupId,
            source: {
              sourceName: snapshot.sourceName,
              sourceId: snapshot.sourceId,
              sourceLink: snapshot.sourceLink,
              sourceKind: snapshot.sourceKind,
            },
            savedAt: this.now(),
          });
        } catch (e) {
          console.error(`[mediaGroup] metadata write failed (${saved.fileName}):`, e);
        }
      } catch (e) {
        console.error(`[mediaGroup] item ${index}/${total} of ${key} failed:`, e);
      }

      await notice.edit(progressNotice(index, total));
    }

    // --- 6) Summary ---
    const elapsed = formatElapsedSeconds(startedAt, this.now());
    await notice.edit(doneNotice(processed, total, elapsed));
    console.log(`[mediaGroup] ${key} done: ${processed}/${total} in ${elapsed}s`);

    // --- 7) Remove (or re-open with late items) ---
    await this.removeRecord(key, snapshot);
    return { key, total, processed };
  }

  /**
   * Deletes the drained record. Items appended after the snapshot was taken
   * become a new record with a fresh firstSeenAt and are re-enqueued.
   */
  private async removeRecord(key: GroupKey, snapshot: GroupRecord): Promise<void> {
    const reopened = await mutateCollection(this.deps.ctx, (collection) => {
      const current = collection[key];
      if (!current) return false;
      delete collection[key];

      const late = current.items.slice(snapshot.items.length);
      if (current.firstSeenAt !== snapshot.firstSeenAt || late.length === 0) {
        return false;
      }
      collection[key] = {
        ...current,
        items: late,
        firstSeenAt: this.now().toISOString(),
        statusHandle: null,
      };
      return true;
    });

    if (reopened) {
      console.log(`[mediaGroup] ${key} received late items, re-opening`);
      await this.deps.reopen(key);
    }
  }

  private async forceRemove(key: GroupKey): Promise<void> {
    try {
      await mutateCollection(this.deps.ctx, (collection) => {
        delete collection[key];
      });
    } catch (e) {
      console.error(`[mediaGroup] could not remove ${key} from store:`, e);
    }
  }
}

function cloneRecord(record: GroupRecord): GroupRecord {
  return { ...record, items: [...record.items] };
}
