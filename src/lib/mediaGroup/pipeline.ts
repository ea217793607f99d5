// -----------------------------------------------------------------------------
// Media-group pipeline wiring
// - One lock shared by the collection store and the dispatch queue
// - Aggregator → scheduler → batch processor
// - resumePending(): re-enqueue groups persisted before a restart
// -----------------------------------------------------------------------------

import type { MediaArrived } from "../../types/media.js";
import { formatGroupKey, type GroupKey } from "../../types/mediaGroup.js";
import type { MetadataWriter } from "../../types/metadata.js";
import type { ChatTransport } from "../../types/transport.js";
import { createAsyncLock } from "../../utils/asyncLock.js";
import type { DirectoryResolver } from "../media/directoryResolver.js";
import type { FormatSniffer } from "../media/formatSniffer.js";
import { MediaGroupAggregator, type ArrivalResult } from "./aggregator.js";
import { BatchProcessor } from "./batchProcessor.js";
import {
  CollectionStore,
  readCollection,
  type CollectionContext,
} from "./collectionStore.js";
import { DispatchScheduler } from "./scheduler.js";

export interface MediaGroupPipelineOptions {
  storePath: string;
  transport: ChatTransport;
  directories: DirectoryResolver;
  metadata: MetadataWriter;
  sniffer: FormatSniffer;
  debounceMs?: number;
  cooldownMs?: number;
  rollingDebounce?: boolean;
  now?: () => Date;
}

export interface MediaGroupPipeline {
  ctx: CollectionContext;
  aggregator: MediaGroupAggregator;
  scheduler: DispatchScheduler;
  processor: BatchProcessor;
  /** Record one album item; the first item of a group schedules its drain. */
  handleArrival(
    event: MediaArrived & { groupId: string },
  ): Promise<ArrivalResult & { key: GroupKey }>;
  /** Re-enqueue persisted groups (oldest first). Returns how many. */
  resumePending(): Promise<number>;
}

export function createMediaGroupPipeline(
  opts: MediaGroupPipelineOptions,
): MediaGroupPipeline {
  const ctx: CollectionContext = {
    lock: createAsyncLock(),
    store: new CollectionStore(opts.storePath),
  };

  const scheduler = new DispatchScheduler({
    lock: ctx.lock,
    drain: async (key) => {
      await processor.drain(key);
    },
    debounceMs: opts.debounceMs,
    cooldownMs: opts.cooldownMs,
    rollingDebounce: opts.rollingDebounce,
  });

  const processor = new BatchProcessor({
    ctx,
    transport: opts.transport,
    directories: opts.directories,
    metadata: opts.metadata,
    sniffer: opts.sniffer,
    reopen: (key) => scheduler.schedule(key),
    now: opts.now,
  });

  const aggregator = new MediaGroupAggregator(ctx, opts.now);

  async function handleArrival(
    event: MediaArrived & { groupId: string },
  ): Promise<ArrivalResult & { key: GroupKey }> {
    const key = formatGroupKey(event.chatId, event.groupId);
    const result = await aggregator.onMediaArrived({
      key,
      chatId: event.chatId,
      groupId: event.groupId,
      item: event.item,
      sender: event.sender,
      source: event.source,
      notify: (text) => opts.transport.sendMessage(event.chatId, text, event.messageId),
    });

    if (result.isFirst) {
      await scheduler.schedule(key);
    } else {
      await scheduler.rearm(key);
    }
    return { ...result, key };
  }

  async function resumePending(): Promise<number> {
    const keys = await readCollection(ctx, (collection) =>
      Object.entries(collection)
        .sort(([, a], [, b]) => a.firstSeenAt.localeCompare(b.firstSeenAt))
        .map(([key]) => key),
    );
    for (const key of keys) {
      await scheduler.schedule(key);
    }
    if (keys.length > 0) {
      console.log(`[mediaGroup] resumed ${keys.length} pending group(s)`);
    }
    return keys.length;
  }

  return {
    ctx,
    aggregator,
    scheduler,
    processor,
    handleArrival,
    resumePending,
  };
}
