// Outbound chat operations the media pipeline needs from the messaging platform.
// Implemented by TelegramClient; tests use an in-memory fake.

export interface ChatTransport {
  /** Posts a message and returns its message id. */
  sendMessage(chatId: number, text: string, replyTo?: number): Promise<number>;

  /** Replaces the text of a previously posted message. */
  editMessageText(chatId: number, messageId: number, text: string): Promise<void>;

  /** Downloads the binary behind a file id to destPath. */
  downloadFile(fileId: string, destPath: string): Promise<void>;
}
