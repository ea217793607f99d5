// In-process stand-ins for the Telegram transport, metadata writer and sniffer.

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { FormatSniffer } from "../lib/media/formatSniffer.js";
import type { MediaItem } from "../types/media.js";
import type { MediaMetadataEntry, MetadataWriter } from "../types/metadata.js";
import type { ChatTransport } from "../types/transport.js";

export type SentMessage = {
  chatId: number;
  text: string;
  replyTo?: number;
  messageId: number;
};

export type EditedMessage = { chatId: number; messageId: number; text: string };

export class FakeTransport implements ChatTransport {
  readonly sent: SentMessage[] = [];
  readonly edits: EditedMessage[] = [];
  readonly downloads: string[] = [];
  readonly failingFiles = new Set<string>();
  failSend = false;
  failEdit = false;
  private nextMessageId = 100;

  async sendMessage(chatId: number, text: string, replyTo?: number): Promise<number> {
    if (this.failSend) throw new Error("sendMessage failed");
    const messageId = this.nextMessageId++;
    this.sent.push({ chatId, text, replyTo, messageId });
    return messageId;
  }

  async editMessageText(chatId: number, messageId: number, text: string): Promise<void> {
    if (this.failEdit) throw new Error("editMessageText failed");
    this.edits.push({ chatId, messageId, text });
  }

  /** Writes the file id itself as the file content. */
  async downloadFile(fileId: string, destPath: string): Promise<void> {
    this.downloads.push(fileId);
    if (this.failingFiles.has(fileId)) {
      throw new Error(`download failed: ${fileId}`);
    }
    await writeFile(destPath, fileId, "utf8");
  }

  sentTexts(): string[] {
    return this.sent.map((m) => m.text);
  }

  editTexts(): string[] {
    return this.edits.map((m) => m.text);
  }
}

export class MemoryMetadataWriter implements MetadataWriter {
  readonly entries: MediaMetadataEntry[] = [];
  fail = false;

  async record(entry: MediaMetadataEntry): Promise<void> {
    if (this.fail) throw new Error("metadata write failed");
    this.entries.push(entry);
  }
}

/** Sniffs the FakeTransport's content: "video…" → mp4, "photo…" → jpg. */
export const prefixSniffer: FormatSniffer = {
  async sniff(filePath) {
    const content = await readFile(filePath, "utf8");
    if (content.startsWith("video")) return { ext: "mp4", mime: "video/mp4" };
    if (content.startsWith("photo")) return { ext: "jpg", mime: "image/jpeg" };
    return undefined;
  },
};

export function photo(fileId: string): MediaItem {
  return { kind: "photo", fileId, fileUniqueId: `u-${fileId}` };
}

export function video(fileId: string): MediaItem {
  return { kind: "video", fileId, fileUniqueId: `u-${fileId}`, mimeType: "video/mp4" };
}

export async function makeTempDir(): Promise<string> {
  return await mkdtemp(path.join(os.tmpdir(), "media-group-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
