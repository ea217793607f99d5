// -----------------------------------------------------------------------------
// Single media (no media_group_id): saved immediately and acknowledged with
// a reply. Metadata and reply failures are logged, never thrown.
// -----------------------------------------------------------------------------

import type { MediaArrived } from "../../types/media.js";
import type { MetadataWriter } from "../../types/metadata.js";
import type { ChatTransport } from "../../types/transport.js";
import { toUnixSeconds } from "../../utils/time.js";
import type { DirectoryResolver } from "./directoryResolver.js";
import type { FormatSniffer } from "./formatSniffer.js";
import { saveMediaFile, type SavedFile } from "./saveMediaFile.js";

export interface SingleMediaDeps {
  transport: ChatTransport;
  directories: DirectoryResolver;
  metadata: MetadataWriter;
  sniffer: FormatSniffer;
  now?: () => Date;
}

export const SAVED_REPLY = "✅ Saved";

export function saveFailedReply(reason: string): string {
  return `❌ Save failed: ${reason}`;
}

export async function saveSingleMedia(
  event: MediaArrived,
  deps: SingleMediaDeps,
): Promise<SavedFile | null> {
  const { transport, directories, metadata, sniffer } = deps;
  const now = deps.now ?? (() => new Date());
  const { chatId, messageId, sender, item, source } = event;

  let saved: SavedFile;
  try {
    const dir = await directories.resolve(
      sender.name,
      source.sourceName,
      source.sourceKind,
      now(),
    );
    saved = await saveMediaFile({
      transport,
      sniffer,
      item,
      dir,
      baseName: `${toUnixSeconds(now())}_${item.fileUniqueId}`,
    });
    console.log(`[media] saved ${item.kind}: ${saved.filePath}`);
  } catch (e) {
    console.error(`[media] save failed (chat ${chatId}, message ${messageId}):`, e);
    await reply(transport, chatId, messageId, saveFailedReply(errorMessage(e)));
    return null;
  }

  try {
    await metadata.record({
      chatId,
      userId: sender.id,
      userName: sender.name,
      item,
      fileName: saved.fileName,
      filePath: saved.filePath,
      mimeType: saved.mimeType,
      groupId: null,
      source,
      savedAt: now(),
    });
  } catch (e) {
    console.error(`[media] metadata write failed (${saved.fileName}):`, e);
  }

  await reply(transport, chatId, messageId, SAVED_REPLY);
  return saved;
}

async function reply(
  transport: ChatTransport,
  chatId: number,
  messageId: number,
  text: string,
): Promise<void> {
  try {
    await transport.sendMessage(chatId, text, messageId);
  } catch (e) {
    console.warn(`[media] reply failed (chat ${chatId}):`, e);
  }
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
