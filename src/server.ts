// -----------------------------------------------------------------------------
// Express application
// - POST /webhook/telegram : Telegram Bot webhook endpoint
// - GET  /healthz          : liveness + number of queued media groups
// -----------------------------------------------------------------------------

import express, { type Express } from "express";

import { isTelegramUpdate, type TelegramUpdate } from "./types/telegram.js";

export interface AppDeps {
  webhookSecret: string;
  onUpdate: (update: TelegramUpdate) => Promise<unknown>;
  pendingGroups: () => number;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" })); // default ~100kb, here set to 1MB

  // ---------------------------------------------------------------------------
  // POST /webhook/telegram
  // ---------------------------------------------------------------------------
  // Flow:
  // 1) Validate secret token (x-telegram-bot-api-secret-token), when configured.
  // 2) Validate Content-Type (must be application/json).
  // 3) Validate the update shape.
  // 4) Route the update (dedupe, access control, media handling).
  // 5) Return 200. Errors → 500 so Telegram re-delivers the update.
  // ---------------------------------------------------------------------------
  app.post("/webhook/telegram", async (req, res) => {
    try {
      // --- 1) Secret token validation ---
      const expected = deps.webhookSecret.trim();
      const got = (req.get("x-telegram-bot-api-secret-token") || "").trim();
      if (expected && got !== expected) {
        console.warn("[TG webhook] secret token mismatch");
        return res.sendStatus(401);
      }

      // --- 2) Content-Type validation ---
      const ct = (req.get("content-type") || "").toLowerCase();
      if (!ct.includes("application/json")) {
        console.warn("[TG webhook] invalid content-type:", ct);
        return res.sendStatus(415);
      }

      // --- 3) Shape ---
      const update: unknown = req.body;
      if (!isTelegramUpdate(update)) {
        console.warn("[TG webhook] malformed update, ignored");
        return res.sendStatus(200);
      }

      // --- 4) Route ---
      await deps.onUpdate(update);

      // --- 5) Done ---
      return res.sendStatus(200);
    } catch (e) {
      console.error("[/webhook/telegram] error:", e);
      return res.sendStatus(500);
    }
  });

  app.get("/healthz", (_req, res) => {
    res.status(200).json({ ok: true, pendingGroups: deps.pendingGroups() });
  });

  return app;
}
