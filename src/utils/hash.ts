import { createHash } from "node:crypto";

const DOC_ID_LENGTH = 24;

/**
 * Deterministic Firestore document id for a tuple of key parts.
 * Parts are JSON-encoded before hashing, so ("a:b", "c") and ("a", "b:c") differ.
 */
export function stableDocId(...parts: ReadonlyArray<string | number>): string {
  return createHash("sha256")
    .update(JSON.stringify(parts))
    .digest("hex")
    .slice(0, DOC_ID_LENGTH);
}
