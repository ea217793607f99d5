// -----------------------------------------------------------------------------
// Media-group aggregator
// - Upserts an arriving item into its group record under the store lock
// - The first item of a group creates the record and posts one "collecting"
//   notice; later items only append (no per-item notice edits)
// -----------------------------------------------------------------------------

import type { MediaItem, Sender, SourceMeta } from "../../types/media.js";
import type { GroupKey } from "../../types/mediaGroup.js";
import { mutateCollection, type CollectionContext } from "./collectionStore.js";
import { COLLECTING_NOTICE } from "./notices.js";

export type NotifyFn = (text: string) => Promise<number>;

export interface MediaArrival {
  key: GroupKey;
  chatId: number;
  groupId: string;
  item: MediaItem;
  sender: Sender;
  source: SourceMeta;
  notify: NotifyFn;
}

export interface ArrivalResult {
  count: number;
  isFirst: boolean;
}

export class MediaGroupAggregator {
  constructor(
    private readonly ctx: CollectionContext,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async onMediaArrived(arrival: MediaArrival): Promise<ArrivalResult> {
    const { key, chatId, groupId, item, sender, source } = arrival;

    const result = await mutateCollection(this.ctx, (collection) => {
      const existing = collection[key];
      if (existing) {
        existing.items.push(item);
        return { count: existing.items.length, isFirst: false };
      }

      collection[key] = {
        chatId,
        groupId,
        userId: sender.id,
        userName: sender.name,
        items: [item],
        firstSeenAt: this.now().toISOString(),
        statusHandle: null,
        ...source,
      };
      return { count: 1, isFirst: true };
    });

    if (result.isFirst) {
      console.log(`[mediaGroup] collecting ${key}`);
      await this.postCollectingNotice(key, arrival.notify);
    }

    return result;
  }

  /**
   * Posted outside the lock so a slow Telegram call never blocks other
   * arrivals. The handle is attached afterwards if the record still exists.
   */
  private async postCollectingNotice(
    key: GroupKey,
    notify: NotifyFn,
  ): Promise<void> {
    let handle: number;
    try {
      handle = await notify(COLLECTING_NOTICE);
    } catch (e) {
      console.warn(`[mediaGroup] collecting notice failed for ${key}:`, e);
      return;
    }

    try {
      await mutateCollection(this.ctx, (collection) => {
        const record = collection[key];
        if (record && record.statusHandle === null) record.statusHandle = handle;
      });
    } catch (e) {
      console.error(`[mediaGroup] saving notice handle failed for ${key}:`, e);
    }
  }
}
