// Collection store document: <SAVE_DIR>/media_groups_collection.json
// - One JSON object keyed by "{chatId}_{groupId}".
// - Each value is an in-flight media group waiting to be drained.
// - A record is deleted once its group has been drained.

import type { MediaItem, SourceKind } from "./media.js";

export type GroupKey = string;

export interface GroupRecord {
  // --- Identity ---
  chatId: number;
  groupId: string; // Telegram media_group_id

  // --- Sender snapshot ---
  userId: number;
  userName: string;

  // --- Collected items (arrival order, append-only) ---
  items: MediaItem[];
  firstSeenAt: string; // ISO-8601

  // --- "Collecting" notice; null when posting it failed ---
  statusHandle: number | null;

  // --- Forward source ---
  sourceName: string | null;
  sourceId: string | null;
  sourceLink: string | null;
  sourceKind: SourceKind;
}

export type Collection = Record<GroupKey, GroupRecord>;

export function formatGroupKey(chatId: number, groupId: string): GroupKey {
  return `${chatId}_${groupId}`;
}
