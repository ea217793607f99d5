import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  FakeTransport,
  MemoryMetadataWriter,
  makeTempDir,
  prefixSniffer,
  removeDir,
} from "../../test-utils/fakes.js";
import type { MediaArrived } from "../../types/media.js";
import type { TelegramMessage, TelegramUpdate } from "../../types/telegram.js";
import { createUpdateDeduper } from "../../utils/updateCache.js";
import { createDirectoryResolver } from "../media/directoryResolver.js";
import { SAVED_REPLY } from "../media/singleMedia.js";
import {
  HELP_REPLY,
  LINK_NOT_SUPPORTED_REPLY,
  NOT_ALLOWED_REPLY,
  UNSUPPORTED_DOCUMENT_REPLY,
} from "./commands.js";
import { handleTelegramUpdate, type UpdateHandlerDeps } from "./handleUpdate.js";

let nextUpdateId = 1;

function update(fields: Partial<TelegramMessage>): TelegramUpdate {
  return {
    update_id: nextUpdateId++,
    message: {
      message_id: 11,
      date: 1767607200,
      chat: { id: 7, type: "private" },
      from: { id: 42, is_bot: false, first_name: "Alice", username: "alice" },
      ...fields,
    },
  };
}

const PHOTO = [{ file_id: "photo-1", file_unique_id: "u-photo-1", width: 90, height: 90 }];

describe("handleTelegramUpdate", () => {
  let dir: string;
  let transport: FakeTransport;
  let metadata: MemoryMetadataWriter;
  let arrivals: Array<MediaArrived & { groupId: string }>;
  let deps: UpdateHandlerDeps;

  beforeEach(async () => {
    dir = await makeTempDir();
    transport = new FakeTransport();
    metadata = new MemoryMetadataWriter();
    arrivals = [];
    deps = {
      transport,
      pipeline: {
        handleArrival: async (event) => {
          arrivals.push(event);
          return {
            key: `${event.chatId}_${event.groupId}`,
            count: arrivals.length,
            isFirst: arrivals.length === 1,
          };
        },
      },
      single: {
        transport,
        directories: createDirectoryResolver(dir),
        metadata,
        sniffer: prefixSniffer,
      },
      allowedUsers: [],
      updates: createUpdateDeduper(),
    };
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it("routes album items to the media-group pipeline", async () => {
    const outcome = await handleTelegramUpdate(
      update({ media_group_id: "100", photo: PHOTO }),
      deps,
    );

    expect(outcome).toBe("album");
    expect(arrivals).toEqual([
      {
        chatId: 7,
        messageId: 11,
        sender: { id: 42, name: "alice" },
        groupId: "100",
        item: {
          kind: "photo",
          fileId: "photo-1",
          fileUniqueId: "u-photo-1",
          width: 90,
          height: 90,
        },
        source: {
          sourceName: null,
          sourceId: null,
          sourceLink: null,
          sourceKind: "direct",
        },
      },
    ]);
    expect(transport.sent).toEqual([]);
  });

  it("saves single media immediately and replies", async () => {
    const outcome = await handleTelegramUpdate(update({ photo: PHOTO }), deps);

    expect(outcome).toBe("single");
    expect(arrivals).toEqual([]);
    expect(metadata.entries).toHaveLength(1);
    expect(metadata.entries[0]?.groupId).toBeNull();
    expect(transport.sent).toEqual([
      { chatId: 7, text: SAVED_REPLY, replyTo: 11, messageId: 100 },
    ]);
  });

  it("skips a re-delivered update", async () => {
    const u = update({ media_group_id: "100", photo: PHOTO });

    expect(await handleTelegramUpdate(u, deps)).toBe("album");
    expect(await handleTelegramUpdate(u, deps)).toBe("duplicate");
    expect(arrivals).toHaveLength(1);
  });

  it("processes a re-delivery of an update whose handling failed", async () => {
    const u = update({ media_group_id: "100", photo: PHOTO });
    const handleArrival = deps.pipeline.handleArrival;
    let failures = 1;
    deps.pipeline = {
      handleArrival: async (event) => {
        if (failures-- > 0) throw new Error("store unavailable");
        return handleArrival(event);
      },
    };

    await expect(handleTelegramUpdate(u, deps)).rejects.toThrow("store unavailable");
    expect(arrivals).toEqual([]);

    expect(await handleTelegramUpdate(u, deps)).toBe("album");
    expect(arrivals).toHaveLength(1);
    expect(await handleTelegramUpdate(u, deps)).toBe("duplicate");
  });

  it("refuses senders outside the allowlist", async () => {
    deps.allowedUsers = ["bob"];

    const outcome = await handleTelegramUpdate(
      update({ media_group_id: "100", photo: PHOTO }),
      deps,
    );

    expect(outcome).toBe("denied");
    expect(arrivals).toEqual([]);
    expect(transport.sentTexts()).toEqual([NOT_ALLOWED_REPLY]);
  });

  it("answers /start and /help", async () => {
    expect(await handleTelegramUpdate(update({ text: "/start" }), deps)).toBe("command");
    expect(await handleTelegramUpdate(update({ text: "/help@media_bot" }), deps)).toBe("command");
    expect(await handleTelegramUpdate(update({ text: "/unknown" }), deps)).toBe("ignored");

    expect(transport.sentTexts()).toEqual([
      "Hello Alice! I will save the media you send me.",
      HELP_REPLY,
    ]);
  });

  it("rejects non-image documents", async () => {
    const outcome = await handleTelegramUpdate(
      update({
        document: { file_id: "d", file_unique_id: "ud", mime_type: "application/pdf" },
      }),
      deps,
    );

    expect(outcome).toBe("rejected");
    expect(transport.sentTexts()).toEqual([UNSUPPORTED_DOCUMENT_REPLY]);
  });

  it("explains that links are not downloaded", async () => {
    const outcome = await handleTelegramUpdate(
      update({
        text: "https://example.com/clip",
        entities: [{ type: "url", offset: 0, length: 24 }],
      }),
      deps,
    );

    expect(outcome).toBe("link");
    expect(transport.sentTexts()).toEqual([LINK_NOT_SUPPORTED_REPLY]);
  });

  it("ignores plain text and updates without a sender", async () => {
    expect(await handleTelegramUpdate(update({ text: "hi" }), deps)).toBe("ignored");
    expect(await handleTelegramUpdate(update({ from: undefined, photo: PHOTO }), deps)).toBe(
      "ignored",
    );
    expect(await handleTelegramUpdate({ update_id: nextUpdateId++ }, deps)).toBe("ignored");
    expect(transport.sent).toEqual([]);
  });
});
