// -----------------------------------------------------------------------------
// Dispatch scheduler (debounce + single-flight drain queue)
//
// Flow:
// 1) schedule(key): append { key, ready: false } to the FIFO and arm a debounce
//    timer. When it fires the entry becomes ready and tryAdvance() runs.
// 2) tryAdvance(): under the lock, if no drain is in flight and the head entry
//    is ready, shift it and mark busy. The drain itself runs outside the lock.
// 3) When the drain settles (success or error), clear busy and, if entries
//    remain, try again after a short cool-down.
//
// Notes:
// - At most one drain is in flight at any instant.
// - Groups drain in FIFO order of their first item; a head that is not ready
//   yet holds back later entries until its own timer fires.
// - busy is cleared only by the drain that set it.
// - rollingDebounce: later items re-arm the timer of a still-queued group.
// -----------------------------------------------------------------------------

import type { GroupKey } from "../../types/mediaGroup.js";
import type { AsyncLock } from "../../utils/asyncLock.js";

export const DEFAULT_DEBOUNCE_MS = 2000;
export const DEFAULT_COOLDOWN_MS = 500;

export interface DispatchSchedulerOptions {
  lock: AsyncLock;
  drain: (key: GroupKey) => Promise<void>;
  debounceMs?: number;
  cooldownMs?: number;
  rollingDebounce?: boolean;
}

type QueueEntry = {
  key: GroupKey;
  ready: boolean;
  timer: NodeJS.Timeout | null;
};

export class DispatchScheduler {
  private readonly lock: AsyncLock;
  private readonly drain: (key: GroupKey) => Promise<void>;
  private readonly debounceMs: number;
  private readonly cooldownMs: number;
  private readonly rollingDebounce: boolean;

  private readonly queue: QueueEntry[] = [];
  private busy = false;
  private stopped = false;
  private cooldownTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private idleWaiters: Array<() => void> = [];

  constructor(opts: DispatchSchedulerOptions) {
    this.lock = opts.lock;
    this.drain = opts.drain;
    this.debounceMs = opts.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.cooldownMs = opts.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.rollingDebounce = opts.rollingDebounce ?? false;
  }

  /** Number of groups queued (not counting the one being drained). */
  get pendingCount(): number {
    return this.queue.length;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  /** Enqueue a newly opened group and arm its debounce timer. */
  async schedule(key: GroupKey): Promise<void> {
    await this.lock(() => {
      if (this.stopped) return;
      const entry: QueueEntry = { key, ready: false, timer: null };
      this.arm(entry);
      this.queue.push(entry);
    });
  }

  /** Rolling mode only: restart the debounce window of a queued group. */
  async rearm(key: GroupKey): Promise<void> {
    if (!this.rollingDebounce) return;
    await this.lock(() => {
      if (this.stopped) return;
      const entry = this.queue.find((e) => e.key === key);
      if (!entry) return; // already draining or drained
      if (entry.timer) clearTimeout(entry.timer);
      entry.ready = false;
      this.arm(entry);
    });
  }

  /**
   * Start the next drain if the worker is idle and the head group is ready.
   * Resolves when the drain it started has settled; never rejects.
   */
  async tryAdvance(): Promise<void> {
    const entry = await this.lock(() => {
      if (this.stopped || this.busy) return null;
      const head = this.queue[0];
      if (!head || !head.ready) return null;
      this.queue.shift();
      this.busy = true;
      return head;
    });
    if (!entry) return;

    const run = this.runDrain(entry.key);
    this.inFlight = run;
    await run;
  }

  /** Resolves once the queue is empty and no drain is running. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Cancel all timers and stop starting drains. Queued groups stay in the
   * collection store and are picked up again at the next start.
   * Resolves when the in-flight drain (if any) has settled.
   */
  async stop(): Promise<void> {
    await this.lock(() => {
      this.stopped = true;
      for (const entry of this.queue) {
        if (entry.timer) clearTimeout(entry.timer);
        entry.timer = null;
      }
      if (this.cooldownTimer) clearTimeout(this.cooldownTimer);
      this.cooldownTimer = null;
    });
    if (this.inFlight) await this.inFlight;
  }

  // ===== Internals =====

  private arm(entry: QueueEntry): void {
    entry.timer = setTimeout(() => {
      this.markReady(entry).catch((e) => {
        console.error(`[mediaGroup] scheduling ${entry.key} failed:`, e);
      });
    }, this.debounceMs);
  }

  private async markReady(entry: QueueEntry): Promise<void> {
    await this.lock(() => {
      entry.ready = true;
      entry.timer = null;
    });
    await this.tryAdvance();
  }

  private async runDrain(key: GroupKey): Promise<void> {
    try {
      await this.drain(key);
    } catch (e) {
      console.error(`[mediaGroup] drain of ${key} raised:`, e);
    }

    try {
      await this.lock(() => {
        this.busy = false;
        this.inFlight = null;
        if (this.queue.length > 0 && !this.stopped) {
          this.scheduleCooldown();
        }
      });
    } finally {
      this.settleIdleWaiters();
    }
  }

  private scheduleCooldown(): void {
    if (this.cooldownTimer) clearTimeout(this.cooldownTimer);
    this.cooldownTimer = setTimeout(() => {
      this.cooldownTimer = null;
      this.tryAdvance().catch((e) => {
        console.error("[mediaGroup] queue advance failed:", e);
      });
    }, this.cooldownMs);
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && !this.busy;
  }

  private settleIdleWaiters(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) resolve();
  }
}
