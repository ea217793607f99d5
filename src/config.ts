// -----------------------------------------------------------------------------
// Application configuration
// - Reads environment variables (populated from .env by dotenv/config in index.ts)
// - Validates and applies defaults with zod
// -----------------------------------------------------------------------------

import path from "node:path";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .optional()
  .transform((v) => v === "true" || v === "1");

// Blank values (e.g. `FIREBASE_PROJECT_ID=` in .env) count as unset
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => v || undefined);

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: z
    .string({ required_error: "TELEGRAM_BOT_TOKEN is required" })
    .trim()
    .min(1, "TELEGRAM_BOT_TOKEN is required"),
  TELEGRAM_WEBHOOK_SECRET: z.string().trim().optional(),
  SAVE_DIR: z.string().trim().min(1).default("downloads"),
  COLLECTION_STORE_PATH: optionalString,
  ALLOWED_USERS: z.string().default(""),
  MEDIA_GROUP_DEBOUNCE_MS: z.coerce.number().int().nonnegative().default(2000),
  MEDIA_GROUP_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(500),
  MEDIA_GROUP_ROLLING_DEBOUNCE: booleanFlag,
  PORT: z.coerce.number().int().positive().default(8080),
  FIREBASE_PROJECT_ID: optionalString,
  METADATA_COLLECTION: z.string().trim().min(1).default("media_items"),
});

export interface AppConfig {
  botToken: string;
  webhookSecret: string;
  saveDir: string;
  collectionStorePath: string;
  /** Usernames or numeric ids; empty = no restriction. */
  allowedUsers: string[];
  mediaGroup: {
    debounceMs: number;
    cooldownMs: number;
    rollingDebounce: boolean;
  };
  port: number;
  firebaseProjectId: string | undefined;
  metadataCollection: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n- ${issues.join("\n- ")}`);
    this.name = "ConfigError";
  }
}

/** Parse a comma-separated allowlist ("alice, 12345,,bob") into trimmed entries. */
export function parseAllowedUsers(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim().replace(/^@/, ""))
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const e = parsed.data;

  return {
    botToken: e.TELEGRAM_BOT_TOKEN,
    webhookSecret: e.TELEGRAM_WEBHOOK_SECRET ?? "",
    saveDir: e.SAVE_DIR,
    collectionStorePath:
      e.COLLECTION_STORE_PATH ??
      path.join(e.SAVE_DIR, "media_groups_collection.json"),
    allowedUsers: parseAllowedUsers(e.ALLOWED_USERS),
    mediaGroup: {
      debounceMs: e.MEDIA_GROUP_DEBOUNCE_MS,
      cooldownMs: e.MEDIA_GROUP_COOLDOWN_MS,
      rollingDebounce: e.MEDIA_GROUP_ROLLING_DEBOUNCE,
    },
    port: e.PORT,
    firebaseProjectId: e.FIREBASE_PROJECT_ID,
    metadataCollection: e.METADATA_COLLECTION,
  };
}
