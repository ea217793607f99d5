// Subset of the Telegram Bot API objects this bot reads.
// Reference: https://core.telegram.org/bots/api#available-types

export interface TelegramUser {
  id: number;
  is_bot: boolean;
  first_name: string;
  last_name?: string;
  username?: string;
}

export interface TelegramChat {
  id: number;
  type: "private" | "group" | "supergroup" | "channel";
  title?: string;
  username?: string;
  first_name?: string;
  last_name?: string;
}

export interface TelegramPhotoSize {
  file_id: string;
  file_unique_id: string;
  width: number;
  height: number;
  file_size?: number;
}

export interface TelegramVideo {
  file_id: string;
  file_unique_id: string;
  duration?: number;
  file_name?: string;
  mime_type?: string;
}

export interface TelegramAnimation {
  file_id: string;
  file_unique_id: string;
  file_name?: string;
  mime_type?: string;
}

export interface TelegramDocument {
  file_id: string;
  file_unique_id: string;
  file_name?: string;
  mime_type?: string;
}

export interface TelegramMessageEntity {
  type: string; // "url", "bot_command", "mention", ...
  offset: number;
  length: number;
}

// Bot API 7.0+ forward origin (replaces forward_from / forward_from_chat)
export type TelegramMessageOrigin =
  | { type: "user"; date: number; sender_user: TelegramUser }
  | { type: "hidden_user"; date: number; sender_user_name: string }
  | { type: "chat"; date: number; sender_chat: TelegramChat }
  | {
      type: "channel";
      date: number;
      chat: TelegramChat;
      message_id: number;
    };

export interface TelegramMessage {
  message_id: number;
  date: number;
  chat: TelegramChat;
  from?: TelegramUser;
  media_group_id?: string;
  text?: string;
  caption?: string;
  entities?: TelegramMessageEntity[];
  photo?: TelegramPhotoSize[];
  video?: TelegramVideo;
  animation?: TelegramAnimation;
  document?: TelegramDocument;
  forward_origin?: TelegramMessageOrigin;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

/** Shape check for webhook payloads: update_id, and message.chat when a message is present. */
export function isTelegramUpdate(value: unknown): value is TelegramUpdate {
  if (!value || typeof value !== "object") return false;
  if (!("update_id" in value) || typeof value.update_id !== "number") {
    return false;
  }
  if ("message" in value && value.message !== undefined) {
    const msg = value.message;
    if (!msg || typeof msg !== "object") return false;
    if (!("chat" in msg) || !msg.chat || typeof msg.chat !== "object") {
      return false;
    }
  }
  return true;
}
