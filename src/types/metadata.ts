// Firestore document: media_items/{docId}
// One doc per file written to disk. docId is a deterministic hash of
// chatId + fileUniqueId + fileName so a re-recorded file overwrites its row.

import type { Timestamp } from "firebase-admin/firestore";

import type { MediaItem, MediaKind, SourceMeta } from "./media.js";

/** What the savers hand to a MetadataWriter. */
export interface MediaMetadataEntry {
  chatId: number;
  userId: number;
  userName: string;
  item: MediaItem;
  fileName: string;
  filePath: string;
  mimeType: string | null; // detected from the bytes, else as Telegram declared it
  groupId: string | null;
  source: SourceMeta;
  savedAt: Date;
}

export interface MetadataWriter {
  record(entry: MediaMetadataEntry): Promise<void>;
}

export interface MediaItemDoc {
  // --- Identifiers ---
  chatId: string; // Telegram chat.id (stringified)
  userId: string; // Telegram user.id (stringified)
  userName: string; // Directory name used for this user

  // --- File ---
  fileId: string;
  fileUniqueId: string;
  fileName: string;
  filePath: string;
  mediaKind: MediaKind;
  mimeType: string | null;

  // --- Grouping ---
  mediaGroupId: string | null; // null for single uploads

  // --- Forward source ---
  sourceKind: SourceMeta["sourceKind"];
  sourceName: string | null;
  sourceId: string | null;
  sourceLink: string | null;

  // --- Timestamps ---
  savedAt: Timestamp;
}
