// -----------------------------------------------------------------------------
// A single chat notice that is edited in place as a batch progresses.
// - open(): edit the existing notice, or post a new one if that fails
// - edit(): best-effort in-place edit; no-op when no notice exists
// Failures are logged and never thrown.
// -----------------------------------------------------------------------------

import type { ChatTransport } from "../../types/transport.js";

export class ProgressNotice {
  constructor(
    private readonly transport: ChatTransport,
    private readonly chatId: number,
    private handle: number | null,
  ) {}

  get messageId(): number | null {
    return this.handle;
  }

  async open(text: string): Promise<boolean> {
    if (this.handle !== null && (await this.edit(text))) return true;

    try {
      this.handle = await this.transport.sendMessage(this.chatId, text);
      console.log(
        `[mediaGroup] posted new notice ${this.handle} in chat ${this.chatId}`,
      );
      return true;
    } catch (e) {
      console.error(`[mediaGroup] notice post failed (chat ${this.chatId}):`, e);
      this.handle = null;
      return false;
    }
  }

  async edit(text: string): Promise<boolean> {
    if (this.handle === null) return false;
    try {
      await this.transport.editMessageText(this.chatId, this.handle, text);
      return true;
    } catch (e) {
      console.warn(
        `[mediaGroup] notice edit failed (chat ${this.chatId}, message ${this.handle}):`,
        e,
      );
      return false;
    }
  }
}
