import type { Store } from "../store/store.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Delete undelivered messages older than `retentionDays`. */
export function pruneOldMessages(store: Store, retentionDays: number, now: number = Date.now()): number {
  return store.pruneMessagesOlderThan(now - retentionDays * DAY_MS);
}

/** Start periodic retention pruning (daily, with immediate run on startup). */
export function startRetentionCron(store: Store, retentionDays: number): NodeJS.Timeout {
  // Run immediately on startup
  runRetention(store, retentionDays);

  // Then run daily
  const timer = setInterval(() => runRetention(store, retentionDays), DAY_MS);
  timer.unref();
  return timer;
}

function runRetention(store: Store, retentionDays: number): void {
  try {
    const deleted = pruneOldMessages(store, retentionDays);
    if (deleted > 0) {
      console.log(`[retention] Pruned ${deleted} undelivered messages older than ${retentionDays} days`);
    }
  } catch (err) {
    console.error("[retention] Pruning failed:", err);
  }
}
