// -----------------------------------------------------------------------------
// Telegram Bot API client (fetch-based)
// - sendMessage / editMessageText / getFile + file download
// - Non-2xx or `ok: false` responses raise TelegramApiError
// - Never logs the bot token; truncates response bodies in errors
// -----------------------------------------------------------------------------

import { writeFile } from "node:fs/promises";
import { z } from "zod";

import type { ChatTransport } from "../../types/transport.js";

const DEFAULT_API_BASE = "https://api.telegram.org";

const ApiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

const SentMessageSchema = z.object({ message_id: z.number() });
const FileSchema = z.object({ file_path: z.string().optional() });

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly status: number,
    readonly description: string,
  ) {
    super(`[telegram] ${method} failed: ${status} ${description}`);
    this.name = "TelegramApiError";
  }
}

export class TelegramClient implements ChatTransport {
  constructor(
    private readonly token: string,
    private readonly apiBase: string = DEFAULT_API_BASE,
  ) {}

  async sendMessage(
    chatId: number,
    text: string,
    replyTo?: number,
  ): Promise<number> {
    const payload: Record<string, unknown> = { chat_id: chatId, text };
    if (replyTo !== undefined) {
      payload.reply_parameters = {
        message_id: replyTo,
        allow_sending_without_reply: true,
      };
    }
    const result = await this.call("sendMessage", payload);
    return SentMessageSchema.parse(result).message_id;
  }

  async editMessageText(
    chatId: number,
    messageId: number,
    text: string,
  ): Promise<void> {
    try {
      await this.call("editMessageText", {
        chat_id: chatId,
        message_id: messageId,
        text,
      });
    } catch (e) {
      // Same text twice is not a failure for our purposes
      if (
        e instanceof TelegramApiError &&
        e.description.includes("message is not modified")
      ) {
        return;
      }
      throw e;
    }
  }

  async downloadFile(fileId: string, destPath: string): Promise<void> {
    const file = FileSchema.parse(await this.call("getFile", { file_id: fileId }));
    if (!file.file_path) {
      throw new TelegramApiError("getFile", 200, "file_path missing in response");
    }

    const url = `${this.apiBase}/file/bot${this.token}/${file.file_path}`;
    const resp = await fetch(url);
    if (!resp.ok) {
      throw new TelegramApiError(
        "downloadFile",
        resp.status,
        truncate(await safeText(resp), 300),
      );
    }

    const bytes = Buffer.from(await resp.arrayBuffer());
    await writeFile(destPath, bytes);
  }

  /** POST a Bot API method and return its `result`. */
  private async call(
    method: string,
    payload: Record<string, unknown>,
  ): Promise<unknown> {
    const resp = await fetch(`${this.apiBase}/bot${this.token}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });

    const body = await safeText(resp);
    const parsed = ApiResponseSchema.safeParse(safeJson(body));

    if (!resp.ok || !parsed.success || !parsed.data.ok) {
      const description = parsed.success
        ? (parsed.data.description ?? "")
        : truncate(body, 300);
      throw new TelegramApiError(method, resp.status, description);
    }
    return parsed.data.result;
  }
}

/** Safely read response text (guard against unexpected errors). */
async function safeText(resp: Response): Promise<string> {
  try {
    return await resp.text();
  } catch {
    return "";
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/** Truncate a string to the specified length with ellipsis. */
function truncate(input: string, max: number): string {
  if (!input) return "";
  return input.length > max ? `${input.slice(0, max)}…` : input;
}
