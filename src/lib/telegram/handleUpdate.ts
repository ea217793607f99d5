// -----------------------------------------------------------------------------
// Telegram update router
//
// Flow:
// 1) Skip duplicate update_id and updates without a message/sender.
// 2) Allowlist check (ALLOWED_USERS); unknown senders get a refusal.
// 3) Commands → fixed replies.
// 4) Media:
//    - with media_group_id → media-group pipeline (aggregate + schedule)
//    - without             → saved immediately
// 5) Non-image documents and links → explanatory reply.
// -----------------------------------------------------------------------------

import type { MediaArrived } from "../../types/media.js";
import type { TelegramUpdate } from "../../types/telegram.js";
import type { ChatTransport } from "../../types/transport.js";
import type { UpdateDeduper } from "../../utils/updateCache.js";
import { isAllowedSender } from "../isAllowed.js";
import type { SingleMediaDeps } from "../media/singleMedia.js";
import { saveSingleMedia } from "../media/singleMedia.js";
import type { MediaGroupPipeline } from "../mediaGroup/pipeline.js";
import {
  LINK_NOT_SUPPORTED_REPLY,
  NOT_ALLOWED_REPLY,
  UNSUPPORTED_DOCUMENT_REPLY,
  commandReply,
} from "./commands.js";
import { detectMessageType, extractMediaItem } from "./messageType.js";
import { resolveSource, senderName } from "./source.js";

export type UpdateOutcome =
  | "duplicate"
  | "ignored"
  | "denied"
  | "command"
  | "album"
  | "single"
  | "rejected"
  | "link";

export interface UpdateHandlerDeps {
  transport: ChatTransport;
  pipeline: Pick<MediaGroupPipeline, "handleArrival">;
  single: SingleMediaDeps;
  allowedUsers: readonly string[];
  updates: UpdateDeduper;
}

export async function handleTelegramUpdate(
  update: TelegramUpdate,
  deps: UpdateHandlerDeps,
): Promise<UpdateOutcome> {
  // --- 1) Idempotency ---
  if (deps.updates.isDuplicate(update.update_id)) {
    console.log("[TG webhook] duplicate update_id, skipped:", update.update_id);
    return "duplicate";
  }

  try {
    return await routeMessage(update, deps);
  } catch (e) {
    // The webhook answers 500 and Telegram re-delivers; let that retry through.
    deps.updates.forget(update.update_id);
    throw e;
  }
}

async function routeMessage(
  update: TelegramUpdate,
  deps: UpdateHandlerDeps,
): Promise<UpdateOutcome> {
  const msg = update.message;
  if (!msg?.from) return "ignored";

  const chatId = msg.chat.id;
  const reply = async (text: string): Promise<void> => {
    try {
      await deps.transport.sendMessage(chatId, text, msg.message_id);
    } catch (e) {
      console.warn(`[telegram] reply failed (chat ${chatId}):`, e);
    }
  };

  // --- 2) Access control ---
  if (!isAllowedSender(msg.from, deps.allowedUsers)) {
    console.warn(
      `[TG webhook] sender not allowed: ${msg.from.username ?? msg.from.id}`,
    );
    await reply(NOT_ALLOWED_REPLY);
    return "denied";
  }

  const type = detectMessageType(msg);

  // --- 3) Commands ---
  if (type === "command") {
    const text = commandReply(msg);
    if (!text) return "ignored";
    await reply(text);
    return "command";
  }

  // --- 4) Media ---
  const item = extractMediaItem(msg);
  if (item) {
    const event: MediaArrived = {
      chatId,
      messageId: msg.message_id,
      sender: { id: msg.from.id, name: senderName(msg.from) },
      groupId: msg.media_group_id ?? null,
      item,
      source: resolveSource(msg),
    };

    if (msg.media_group_id) {
      const { key, count } = await deps.pipeline.handleArrival({
        ...event,
        groupId: msg.media_group_id,
      });
      console.log(`[TG webhook] ${key} now has ${count} item(s)`);
      return "album";
    }

    await saveSingleMedia(event, deps.single);
    return "single";
  }

  // --- 5) Unsupported input ---
  if (type === "other_document") {
    await reply(UNSUPPORTED_DOCUMENT_REPLY);
    return "rejected";
  }
  if (type === "link") {
    await reply(LINK_NOT_SUPPORTED_REPLY);
    return "link";
  }

  return "ignored";
}
