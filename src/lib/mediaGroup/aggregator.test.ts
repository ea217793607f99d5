import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  FakeTransport,
  makeTempDir,
  photo,
  removeDir,
  video,
} from "../../test-utils/fakes.js";
import { DIRECT_SOURCE, type MediaItem } from "../../types/media.js";
import { createAsyncLock } from "../../utils/asyncLock.js";
import { MediaGroupAggregator } from "./aggregator.js";
import {
  CollectionStore,
  readCollection,
  type CollectionContext,
} from "./collectionStore.js";
import { COLLECTING_NOTICE } from "./notices.js";

const FIXED_NOW = new Date("2026-01-05T10:00:00.000Z");

describe("MediaGroupAggregator", () => {
  let dir: string;
  let ctx: CollectionContext;
  let transport: FakeTransport;
  let aggregator: MediaGroupAggregator;

  beforeEach(async () => {
    dir = await makeTempDir();
    ctx = {
      lock: createAsyncLock(),
      store: new CollectionStore(path.join(dir, "collection.json")),
    };
    transport = new FakeTransport();
    aggregator = new MediaGroupAggregator(ctx, () => FIXED_NOW);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  function arrive(item: MediaItem, groupId = "100", chatId = 7) {
    return aggregator.onMediaArrived({
      key: `${chatId}_${groupId}`,
      chatId,
      groupId,
      item,
      sender: { id: 42, name: "alice" },
      source: DIRECT_SOURCE,
      notify: (text) => transport.sendMessage(chatId, text),
    });
  }

  it("creates the record on the first item and posts one collecting notice", async () => {
    const result = await arrive(photo("photo-1"));

    expect(result).toEqual({ count: 1, isFirst: true });
    expect(transport.sentTexts()).toEqual([COLLECTING_NOTICE]);

    const record = await readCollection(ctx, (c) => c["7_100"]);
    expect(record).toEqual({
      chatId: 7,
      groupId: "100",
      userId: 42,
      userName: "alice",
      items: [photo("photo-1")],
      firstSeenAt: "2026-01-05T10:00:00.000Z",
      statusHandle: 100,
      sourceName: null,
      sourceId: null,
      sourceLink: null,
      sourceKind: "direct",
    });
  });

  it("appends later items in arrival order without further notices", async () => {
    await arrive(photo("photo-1"));
    const second = await arrive(video("video-1"));
    const third = await arrive(photo("photo-2"));

    expect(second).toEqual({ count: 2, isFirst: false });
    expect(third).toEqual({ count: 3, isFirst: false });
    expect(transport.sent).toHaveLength(1);

    const ids = await readCollection(ctx, (c) => c["7_100"]?.items.map((i) => i.fileId));
    expect(ids).toEqual(["photo-1", "video-1", "photo-2"]);
  });

  it("produces exactly one collecting notice when N items race", async () => {
    const results = await Promise.all(
      Array.from({ length: 8 }, (_, i) => arrive(photo(`photo-${i}`))),
    );

    expect(results.filter((r) => r.isFirst)).toHaveLength(1);
    expect(transport.sentTexts()).toEqual([COLLECTING_NOTICE]);

    const ids = await readCollection(ctx, (c) => c["7_100"]?.items.map((i) => i.fileId));
    expect(ids).toEqual(Array.from({ length: 8 }, (_, i) => `photo-${i}`));
  });

  it("keeps separate records per key", async () => {
    await arrive(photo("photo-1"), "100", 7);
    await arrive(photo("photo-2"), "200", 7);
    await arrive(photo("photo-3"), "100", 8);

    const keys = await readCollection(ctx, (c) => Object.keys(c).sort());
    expect(keys).toEqual(["7_100", "7_200", "8_100"]);
    expect(transport.sent).toHaveLength(3);
  });

  it("still creates the record when the collecting notice cannot be posted", async () => {
    transport.failSend = true;

    const result = await arrive(photo("photo-1"));

    expect(result).toEqual({ count: 1, isFirst: true });
    const record = await readCollection(ctx, (c) => c["7_100"]);
    expect(record?.statusHandle).toBeNull();
    expect(record?.items).toHaveLength(1);
  });

  it("starts a new record with a fresh firstSeenAt after the old one was removed", async () => {
    await arrive(photo("photo-1"));
    await ctx.lock(async () => {
      const c = await ctx.store.load();
      delete c["7_100"];
      await ctx.store.save(c);
    });

    const later = new MediaGroupAggregator(ctx, () => new Date("2026-01-05T10:05:00.000Z"));
    const result = await later.onMediaArrived({
      key: "7_100",
      chatId: 7,
      groupId: "100",
      item: photo("photo-late"),
      sender: { id: 42, name: "alice" },
      source: DIRECT_SOURCE,
      notify: (text) => transport.sendMessage(7, text),
    });

    expect(result).toEqual({ count: 1, isFirst: true });
    const record = await readCollection(ctx, (c) => c["7_100"]);
    expect(record?.firstSeenAt).toBe("2026-01-05T10:05:00.000Z");
    expect(record?.items.map((i) => i.fileId)).toEqual(["photo-late"]);
    expect(transport.sent).toHaveLength(2);
  });
});
