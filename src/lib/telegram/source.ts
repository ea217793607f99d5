// -----------------------------------------------------------------------------
// Forward-source resolution
// - Maps Telegram's forward_origin to SourceMeta
// - Messages that were not forwarded resolve to DIRECT_SOURCE
// -----------------------------------------------------------------------------

import { DIRECT_SOURCE, type SourceMeta } from "../../types/media.js";
import type {
  TelegramChat,
  TelegramMessage,
  TelegramUser,
} from "../../types/telegram.js";

/**
 * Resolves where a message was forwarded from.
 *
 * Rules:
 * - user: @username, else full name; id = user id
 * - hidden_user: the display name Telegram exposes; no id
 * - chat / channel: title, else @username; channel posts with a public
 *   username get a t.me link
 */
export function resolveSource(message: TelegramMessage): SourceMeta {
  const origin = message.forward_origin;
  if (!origin) return DIRECT_SOURCE;

  switch (origin.type) {
    case "user":
      return {
        sourceName: userLabel(origin.sender_user),
        sourceId: String(origin.sender_user.id),
        sourceLink: null,
        sourceKind: "user",
      };

    case "hidden_user":
      return {
        sourceName: origin.sender_user_name.trim() || null,
        sourceId: null,
        sourceLink: null,
        sourceKind: "hidden_user",
      };

    case "chat":
      return {
        sourceName: chatLabel(origin.sender_chat),
        sourceId: String(origin.sender_chat.id),
        sourceLink: null,
        sourceKind: "chat",
      };

    case "channel":
      return {
        sourceName: chatLabel(origin.chat),
        sourceId: String(origin.chat.id),
        sourceLink: origin.chat.username
          ? `https://t.me/${origin.chat.username}/${origin.message_id}`
          : null,
        sourceKind: "channel",
      };
  }
}

/** Display name for the sender: username, falling back to first name. */
export function senderName(user: TelegramUser): string {
  return user.username || user.first_name || String(user.id);
}

function userLabel(user: TelegramUser): string {
  if (user.username) return `@${user.username}`;
  const full = [user.first_name, user.last_name].filter(Boolean).join(" ");
  return full.replace(/\s+/g, " ").trim() || `user:${user.id}`;
}

function chatLabel(chat: TelegramChat): string {
  const title = (chat.title ?? "").replace(/\s+/g, " ").trim();
  if (title) return title;
  if (chat.username) return `@${chat.username}`;
  return `chat:${chat.id}`;
}
