import { describe, expect, it } from "vitest";

import { DIRECT_SOURCE } from "../../types/media.js";
import type { TelegramMessage, TelegramMessageOrigin } from "../../types/telegram.js";
import { resolveSource, senderName } from "./source.js";

function forwarded(origin?: TelegramMessageOrigin): TelegramMessage {
  return {
    message_id: 1,
    date: 1767607200,
    chat: { id: 7, type: "private" },
    forward_origin: origin,
  };
}

describe("resolveSource", () => {
  it("returns the direct source for messages that were not forwarded", () => {
    expect(resolveSource(forwarded())).toEqual(DIRECT_SOURCE);
  });

  it("uses @username for a forwarded user", () => {
    const source = resolveSource(
      forwarded({
        type: "user",
        date: 1,
        sender_user: { id: 5, is_bot: false, first_name: "Bob", username: "bob" },
      }),
    );
    expect(source).toEqual({
      sourceName: "@bob",
      sourceId: "5",
      sourceLink: null,
      sourceKind: "user",
    });
  });

  it("falls back to the full name for a user without username", () => {
    const source = resolveSource(
      forwarded({
        type: "user",
        date: 1,
        sender_user: { id: 5, is_bot: false, first_name: "Bob", last_name: "Stone" },
      }),
    );
    expect(source.sourceName).toBe("Bob Stone");
  });

  it("keeps only the display name of a hidden user", () => {
    const source = resolveSource(
      forwarded({ type: "hidden_user", date: 1, sender_user_name: " Anon " }),
    );
    expect(source).toEqual({
      sourceName: "Anon",
      sourceId: null,
      sourceLink: null,
      sourceKind: "hidden_user",
    });
  });

  it("links public channel posts", () => {
    const source = resolveSource(
      forwarded({
        type: "channel",
        date: 1,
        message_id: 77,
        chat: { id: -1001, type: "channel", title: "Daily  News", username: "dailynews" },
      }),
    );
    expect(source).toEqual({
      sourceName: "Daily News",
      sourceId: "-1001",
      sourceLink: "https://t.me/dailynews/77",
      sourceKind: "channel",
    });
  });

  it("has no link for private channels and no title falls back to the id", () => {
    const source = resolveSource(
      forwarded({
        type: "channel",
        date: 1,
        message_id: 77,
        chat: { id: -1002, type: "channel" },
      }),
    );
    expect(source.sourceName).toBe("chat:-1002");
    expect(source.sourceLink).toBeNull();
  });

  it("uses the group title for messages forwarded on behalf of a chat", () => {
    const source = resolveSource(
      forwarded({
        type: "chat",
        date: 1,
        sender_chat: { id: -300, type: "supergroup", title: "Team" },
      }),
    );
    expect(source).toEqual({
      sourceName: "Team",
      sourceId: "-300",
      sourceLink: null,
      sourceKind: "chat",
    });
  });
});

describe("senderName", () => {
  it("prefers the username and falls back to the first name", () => {
    expect(senderName({ id: 1, is_bot: false, first_name: "Alice", username: "alice" })).toBe(
      "alice",
    );
    expect(senderName({ id: 1, is_bot: false, first_name: "Alice" })).toBe("Alice");
    expect(senderName({ id: 1, is_bot: false, first_name: "" })).toBe("1");
  });
});
