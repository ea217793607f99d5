// -----------------------------------------------------------------------------
// Download one media item into a directory.
// 1) Download to a hidden ".<base>.part" file next to the target
// 2) Sniff the real format from the bytes
// 3) Rename to "<base>.<ext>"
// A failed download or rename removes the partial file and rethrows.
// -----------------------------------------------------------------------------

import { rename, rm } from "node:fs/promises";
import path from "node:path";

import type { MediaItem } from "../../types/media.js";
import type { ChatTransport } from "../../types/transport.js";
import type { FormatSniffer } from "./formatSniffer.js";

export interface SavedFile {
  fileName: string;
  filePath: string;
  mimeType: string | null;
}

export async function saveMediaFile(params: {
  transport: ChatTransport;
  sniffer: FormatSniffer;
  item: MediaItem;
  dir: string;
  baseName: string;
}): Promise<SavedFile> {
  const { transport, sniffer, item, dir, baseName } = params;
  const partPath = path.join(dir, `.${baseName}.part`);

  try {
    await transport.downloadFile(item.fileId, partPath);

    const detected = await sniffer.sniff(partPath);
    const ext = detected?.ext ?? fallbackExtension(item);
    const fileName = `${baseName}.${ext}`;
    const filePath = path.join(dir, fileName);

    await rename(partPath, filePath);
    return {
      fileName,
      filePath,
      mimeType: detected?.mime ?? declaredMimeType(item),
    };
  } catch (e) {
    await rm(partPath, { force: true });
    throw e;
  }
}

/**
 * Extension used when sniffing finds nothing.
 * Prefers the sender's file name, then the declared MIME subtype.
 */
export function fallbackExtension(item: MediaItem): string {
  switch (item.kind) {
    case "photo":
      return "jpg";
    case "video":
    case "animation":
      return extFromName(item.fileName) ?? extFromMime(item.mimeType) ?? "mp4";
    case "document_image":
      return extFromName(item.fileName) ?? extFromMime(item.mimeType) ?? "bin";
  }
}

function declaredMimeType(item: MediaItem): string | null {
  if (item.kind === "photo") return "image/jpeg";
  return item.mimeType ?? null;
}

function extFromName(fileName: string | undefined): string | undefined {
  const ext = path.extname(fileName ?? "").slice(1).toLowerCase();
  return /^[a-z0-9]{1,8}$/.test(ext) ? ext : undefined;
}

function extFromMime(mime: string | undefined): string | undefined {
  const subtype = (mime ?? "").split("/")[1]?.split(/[+;]/)[0]?.toLowerCase();
  if (!subtype) return undefined;
  if (subtype === "jpeg") return "jpg";
  if (subtype === "quicktime") return "mov";
  return /^[a-z0-9]{1,8}$/.test(subtype) ? subtype : undefined;
}
