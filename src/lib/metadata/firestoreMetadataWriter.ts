// -----------------------------------------------------------------------------
// Metadata writer backed by Firestore.
// Each saved file is stored under: <collection>/{stableDocId(chatId, fileUniqueId, fileName)}
// -----------------------------------------------------------------------------

import { Timestamp, type Firestore } from "firebase-admin/firestore";

import type {
  MediaItemDoc,
  MediaMetadataEntry,
  MetadataWriter,
} from "../../types/metadata.js";
import { stableDocId } from "../../utils/hash.js";

export function buildMediaItemDoc(entry: MediaMetadataEntry): MediaItemDoc {
  const { item, source } = entry;
  return {
    chatId: String(entry.chatId),
    userId: String(entry.userId),
    userName: entry.userName,
    fileId: item.fileId,
    fileUniqueId: item.fileUniqueId,
    fileName: entry.fileName,
    filePath: entry.filePath,
    mediaKind: item.kind,
    mimeType: entry.mimeType,
    mediaGroupId: entry.groupId,
    sourceKind: source.sourceKind,
    sourceName: source.sourceName,
    sourceId: source.sourceId,
    sourceLink: source.sourceLink,
    savedAt: Timestamp.fromDate(entry.savedAt),
  };
}

export function mediaItemDocId(entry: MediaMetadataEntry): string {
  return stableDocId(entry.chatId, entry.item.fileUniqueId, entry.fileName);
}

export class FirestoreMetadataWriter implements MetadataWriter {
  constructor(
    private readonly db: Firestore,
    private readonly collection: string = "media_items",
  ) {}

  async record(entry: MediaMetadataEntry): Promise<void> {
    const id = mediaItemDocId(entry);
    await this.db
      .collection(this.collection)
      .doc(id)
      .set(buildMediaItemDoc(entry), { merge: false });
  }
}
