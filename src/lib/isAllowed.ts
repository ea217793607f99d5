/**
 * Sender allowlist
 *
 * - Entries are usernames (without "@") or numeric user ids, from ALLOWED_USERS.
 * - An empty list disables the restriction.
 * - Username comparison is case-insensitive; ids are compared as strings.
 */

import type { TelegramUser } from "../types/telegram.js";

export function isAllowedSender(
  user: TelegramUser | undefined,
  allowed: readonly string[],
): boolean {
  if (allowed.length === 0) return true;
  if (!user) return false;

  const id = String(user.id);
  const username = user.username?.toLowerCase();
  return allowed.some(
    (entry) => entry === id || (!!username && entry.toLowerCase() === username),
  );
}
