// -----------------------------------------------------------------------------
// Telegram update_id deduplication (in-memory, bounded FIFO).
// Telegram re-delivers a webhook update when our response is slow or fails;
// this keeps the same update from being aggregated twice.
// An update whose handling failed is forgotten so its re-delivery is processed.
// -----------------------------------------------------------------------------

// Default number of update_ids to keep in memory
export const MAX_CACHE = 1000;

export interface UpdateDeduper {
  /**
   * - If new → remembers it and returns false
   * - If duplicate → returns true
   */
  isDuplicate(updateId: number): boolean;
  /** Drops an update_id so a later re-delivery is treated as new. */
  forget(updateId: number): void;
}

export function createUpdateDeduper(maxSize: number = MAX_CACHE): UpdateDeduper {
  const seen = new Set<number>();
  const order: number[] = [];

  return {
    isDuplicate(updateId) {
      if (seen.has(updateId)) return true;

      seen.add(updateId);
      order.push(updateId);

      // FIFO eviction
      if (order.length > maxSize) {
        const oldest = order.shift();
        if (oldest !== undefined) seen.delete(oldest);
      }

      return false;
    },

    forget(updateId) {
      if (!seen.delete(updateId)) return;
      const index = order.indexOf(updateId);
      if (index >= 0) order.splice(index, 1);
    },
  };
}
