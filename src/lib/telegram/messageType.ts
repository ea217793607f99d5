// -----------------------------------------------------------------------------
// Telegram message classification
// - detectMessageType(): what kind of message this is
// - extractMediaItem(): the MediaItem to save, if any
// -----------------------------------------------------------------------------

import type { MediaItem } from "../../types/media.js";
import type { TelegramMessage } from "../../types/telegram.js";

export type MessageType =
  | "command"
  | "photo"
  | "video"
  | "animation"
  | "image_document"
  | "other_document"
  | "link"
  | "text"
  | "other";

/**
 * Detects the MessageType from a Telegram `message` object.
 * Reference: https://core.telegram.org/bots/api#message
 *
 * Order of checks:
 * 1. Commands (text starting with "/")
 * 2. Media (photo, video, animation, document)
 * 3. Text with a url entity, then plain text
 * 4. Fallback → "other"
 */
export function detectMessageType(message: TelegramMessage): MessageType {
  const text = message.text ?? "";
  if (text.startsWith("/")) return "command";

  if (Array.isArray(message.photo) && message.photo.length > 0) return "photo";
  if (message.video) return "video";
  // Telegram sends GIFs with both `animation` and `document`; animation wins
  if (message.animation) return "animation";
  if (message.document) {
    return message.document.mime_type?.startsWith("image/")
      ? "image_document"
      : "other_document";
  }

  if (text.length > 0) {
    const hasUrl = (message.entities ?? []).some((e) => e.type === "url");
    return hasUrl ? "link" : "text";
  }

  return "other";
}

/**
 * Builds the MediaItem for a media message.
 * Photos use the largest size (last entry of `photo`).
 * Returns null for anything that is not a savable media message.
 */
export function extractMediaItem(message: TelegramMessage): MediaItem | null {
  switch (detectMessageType(message)) {
    case "photo": {
      const sizes = message.photo ?? [];
      const largest = sizes[sizes.length - 1];
      if (!largest) return null;
      return {
        kind: "photo",
        fileId: largest.file_id,
        fileUniqueId: largest.file_unique_id,
        width: largest.width,
        height: largest.height,
      };
    }

    case "video": {
      const v = message.video;
      if (!v) return null;
      return {
        kind: "video",
        fileId: v.file_id,
        fileUniqueId: v.file_unique_id,
        mimeType: v.mime_type,
        fileName: v.file_name,
        duration: v.duration,
      };
    }

    case "animation": {
      const a = message.animation;
      if (!a) return null;
      return {
        kind: "animation",
        fileId: a.file_id,
        fileUniqueId: a.file_unique_id,
        mimeType: a.mime_type,
        fileName: a.file_name,
      };
    }

    case "image_document": {
      const d = message.document;
      if (!d?.mime_type) return null;
      return {
        kind: "document_image",
        fileId: d.file_id,
        fileUniqueId: d.file_unique_id,
        mimeType: d.mime_type,
        fileName: d.file_name,
      };
    }

    default:
      return null;
  }
}
