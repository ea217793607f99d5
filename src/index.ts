// -----------------------------------------------------------------------------
// External dependencies
// -----------------------------------------------------------------------------
import "dotenv/config";
import { mkdir } from "node:fs/promises";

// -----------------------------------------------------------------------------
// Internal libraries
// -----------------------------------------------------------------------------
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { getDb } from "./lib/firebase.js";
import { createDirectoryResolver } from "./lib/media/directoryResolver.js";
import { fileTypeSniffer } from "./lib/media/formatSniffer.js";
import { createMediaGroupPipeline } from "./lib/mediaGroup/pipeline.js";
import { FirestoreMetadataWriter } from "./lib/metadata/firestoreMetadataWriter.js";
import { logMetadataWriter } from "./lib/metadata/logMetadataWriter.js";
import { TelegramClient } from "./lib/telegram/client.js";
import { handleTelegramUpdate } from "./lib/telegram/handleUpdate.js";
import { createApp } from "./server.js";
import type { MetadataWriter } from "./types/metadata.js";
import { createUpdateDeduper } from "./utils/updateCache.js";

// -----------------------------------------------------------------------------
// Configuration
// - Fails fast (exit 1) on invalid environment
// -----------------------------------------------------------------------------
function readConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`[config] ${e.message}`);
    } else {
      console.error("[config] failed to load:", e);
    }
    process.exit(1);
  }
}

function createMetadataWriter(config: AppConfig): MetadataWriter {
  if (!config.firebaseProjectId) {
    console.warn(
      "[metadata] FIREBASE_PROJECT_ID is not set; metadata is logged only",
    );
    return logMetadataWriter;
  }
  return new FirestoreMetadataWriter(
    getDb(config.firebaseProjectId),
    config.metadataCollection,
  );
}

// -----------------------------------------------------------------------------
// Bootstrap
// 1) Load config, ensure SAVE_DIR exists
// 2) Wire Telegram client, savers, metadata writer and media-group pipeline
// 3) Re-enqueue media groups persisted before the last shutdown
// 4) Start the HTTP server (webhook + health)
// -----------------------------------------------------------------------------
async function main(): Promise<void> {
  const config = readConfigOrExit();

  await mkdir(config.saveDir, { recursive: true });

  const transport = new TelegramClient(config.botToken);
  const directories = createDirectoryResolver(config.saveDir);
  const metadata = createMetadataWriter(config);

  const pipeline = createMediaGroupPipeline({
    storePath: config.collectionStorePath,
    transport,
    directories,
    metadata,
    sniffer: fileTypeSniffer,
    debounceMs: config.mediaGroup.debounceMs,
    cooldownMs: config.mediaGroup.cooldownMs,
    rollingDebounce: config.mediaGroup.rollingDebounce,
  });

  await pipeline.resumePending();

  const updates = createUpdateDeduper();
  const app = createApp({
    webhookSecret: config.webhookSecret,
    pendingGroups: () => pipeline.scheduler.pendingCount,
    onUpdate: (update) =>
      handleTelegramUpdate(update, {
        transport,
        pipeline,
        single: { transport, directories, metadata, sniffer: fileTypeSniffer },
        allowedUsers: config.allowedUsers,
        updates,
      }),
  });

  const server = app.listen(config.port, () => {
    console.log(`[server] Listening on :${config.port}`);
  });

  // Handle startup errors early (e.g., EADDRINUSE)
  server.on("error", (err) => {
    console.error("[server] Failed to start:", err);
    process.exit(1);
  });

  // Graceful shutdown: stop accepting updates, let the in-flight drain finish.
  // Queued groups stay in the collection store and resume on next start.
  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down…`);
    server.close();
    pipeline.scheduler
      .stop()
      .then(() => process.exit(0))
      .catch((e) => {
        console.error("[server] shutdown error:", e);
        process.exit(1);
      });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((e) => {
  console.error("[server] fatal:", e);
  process.exit(1);
});
