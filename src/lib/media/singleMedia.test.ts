import { readdir } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  FakeTransport,
  MemoryMetadataWriter,
  makeTempDir,
  photo,
  prefixSniffer,
  removeDir,
} from "../../test-utils/fakes.js";
import { DIRECT_SOURCE, type MediaArrived } from "../../types/media.js";
import { createDirectoryResolver } from "./directoryResolver.js";
import { SAVED_REPLY, saveSingleMedia, type SingleMediaDeps } from "./singleMedia.js";

const NOW = new Date(2026, 0, 5, 12, 0, 0);

describe("saveSingleMedia", () => {
  let dir: string;
  let transport: FakeTransport;
  let metadata: MemoryMetadataWriter;
  let deps: SingleMediaDeps;

  const event: MediaArrived = {
    chatId: 7,
    messageId: 11,
    sender: { id: 42, name: "alice" },
    groupId: null,
    item: photo("photo-1"),
    source: DIRECT_SOURCE,
  };

  beforeEach(async () => {
    dir = await makeTempDir();
    transport = new FakeTransport();
    metadata = new MemoryMetadataWriter();
    deps = {
      transport,
      directories: createDirectoryResolver(dir),
      metadata,
      sniffer: prefixSniffer,
      now: () => NOW,
    };
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it("saves the file without a group suffix and replies to the message", async () => {
    const saved = await saveSingleMedia(event, deps);

    const expectedName = `${Math.floor(NOW.getTime() / 1000)}_u-photo-1.jpg`;
    expect(saved?.fileName).toBe(expectedName);
    expect(await readdir(path.join(dir, "alice", "2026-01-05"))).toEqual([expectedName]);
    expect(metadata.entries).toEqual([
      {
        chatId: 7,
        userId: 42,
        userName: "alice",
        item: photo("photo-1"),
        fileName: expectedName,
        filePath: path.join(dir, "alice", "2026-01-05", expectedName),
        mimeType: "image/jpeg",
        groupId: null,
        source: DIRECT_SOURCE,
        savedAt: NOW,
      },
    ]);
    expect(transport.sent).toEqual([
      { chatId: 7, text: SAVED_REPLY, replyTo: 11, messageId: 100 },
    ]);
  });

  it("replies with the failure reason when the download fails", async () => {
    transport.failingFiles.add("photo-1");

    await expect(saveSingleMedia(event, deps)).resolves.toBeNull();

    expect(metadata.entries).toEqual([]);
    expect(transport.sentTexts()).toEqual(["❌ Save failed: download failed: photo-1"]);
  });

  it("still confirms the save when the metadata write fails", async () => {
    metadata.fail = true;

    const saved = await saveSingleMedia(event, deps);

    expect(saved).not.toBeNull();
    expect(transport.sentTexts()).toEqual([SAVED_REPLY]);
  });

  it("does not throw when the reply cannot be sent", async () => {
    transport.failSend = true;

    await expect(saveSingleMedia(event, deps)).resolves.not.toBeNull();
  });
});
