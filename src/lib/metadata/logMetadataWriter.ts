// Fallback metadata writer when Firestore is not configured: one log line per file.

import type { MetadataWriter } from "../../types/metadata.js";

export const logMetadataWriter: MetadataWriter = {
  async record(entry) {
    console.log(
      `[metadata] ${entry.userName} ${entry.item.kind} ${entry.fileName}` +
        (entry.groupId ? ` (group ${entry.groupId})` : ""),
    );
  },
};
