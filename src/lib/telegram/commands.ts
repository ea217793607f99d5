// -----------------------------------------------------------------------------
// Bot commands (/start, /help) and fixed replies for unsupported input.
// -----------------------------------------------------------------------------

import type { TelegramMessage } from "../../types/telegram.js";

export const HELP_REPLY =
  "Send me photos, videos, GIFs or image files and I will save them. " +
  "Albums are collected and saved together.";

export const UNSUPPORTED_DOCUMENT_REPLY = "❌ Only image files are supported";

export const LINK_NOT_SUPPORTED_REPLY =
  "Link detected, but downloading media from URLs is not supported yet.";

export const NOT_ALLOWED_REPLY = "⛔ You are not allowed to use this bot.";

/** "/start@my_bot arg" → "start". Returns null for non-commands. */
export function parseCommand(text: string | undefined): string | null {
  const m = /^\/([a-z0-9_]+)(?:@\w+)?(?:\s|$)/i.exec(text ?? "");
  return m?.[1]?.toLowerCase() ?? null;
}

/** Reply text for a command, or null when the command is unknown. */
export function commandReply(message: TelegramMessage): string | null {
  switch (parseCommand(message.text)) {
    case "start":
      return `Hello ${message.from?.first_name ?? "there"}! I will save the media you send me.`;
    case "help":
      return HELP_REPLY;
    default:
      return null;
  }
}
