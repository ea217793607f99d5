// Media items captured from inbound messages, plus where they were forwarded from.
// Items are immutable once captured and are persisted as-is in the collection store.

export type MediaKind = "photo" | "video" | "animation" | "document_image";

export interface PhotoItem {
  kind: "photo";
  fileId: string;
  fileUniqueId: string;
  width?: number;
  height?: number;
}

export interface VideoItem {
  kind: "video";
  fileId: string;
  fileUniqueId: string;
  mimeType?: string;
  fileName?: string;
  duration?: number;
}

export interface AnimationItem {
  kind: "animation";
  fileId: string;
  fileUniqueId: string;
  mimeType?: string;
  fileName?: string;
}

export interface DocumentImageItem {
  kind: "document_image";
  fileId: string;
  fileUniqueId: string;
  mimeType: string; // always image/*
  fileName?: string;
}

export type MediaItem = PhotoItem | VideoItem | AnimationItem | DocumentImageItem;

// "direct" = sent by the user themselves, not forwarded
export type SourceKind = "direct" | "user" | "hidden_user" | "chat" | "channel";

export interface SourceMeta {
  sourceName: string | null;
  sourceId: string | null;
  sourceLink: string | null; // public channel post link when available
  sourceKind: SourceKind;
}

export interface Sender {
  id: number;
  name: string; // username, falling back to first name
}

/** One inbound media message, as produced by the update router. */
export interface MediaArrived {
  chatId: number;
  messageId: number;
  sender: Sender;
  groupId: string | null;
  item: MediaItem;
  source: SourceMeta;
}

export const DIRECT_SOURCE: SourceMeta = {
  sourceName: null,
  sourceId: null,
  sourceLink: null,
  sourceKind: "direct",
};
