/**
 * Sliding-window log for a single quota rule.
 *
 * Each consumption is stored with its timestamp and weight. Usage is the sum
 * of weights recorded in `(now - windowMs, now]`; older entries are evicted
 * lazily whenever the window is read. Entries are kept in timestamp order,
 * which holds as long as the clock feeding `record` is monotonic.
 */

export interface UsageEntry {
  readonly timestamp: number;
  readonly weight: number;
}

export interface UsageWindow {
  /** Current window length (ms) */
  getWindowMs: () => number;
  /** Changes the window length; existing entries are re-evaluated against it */
  resize: (windowMs: number) => void;
  /** Drops entries that have aged out of the window */
  evict: (now: number) => void;
  /** Weighted units currently counted */
  usage: (now: number) => number;
  /** Units still available under `limit` (never negative) */
  headroom: (now: number, limit: number) => number;
  /** Appends a consumption and returns its entry (used for release) */
  record: (now: number, weight: number) => UsageEntry;
  /** Removes a specific entry. Returns false when it already expired. */
  remove: (entry: UsageEntry) => boolean;
  /**
   * Milliseconds until `weight` more units fit under `limit`.
   * 0 when they already fit; Infinity when they never can.
   */
  retryAfterMs: (now: number, weight: number, limit: number) => number;
  /** Number of stored entries (after eviction) */
  size: (now: number) => number;
}

export const createUsageWindow = (initialWindowMs: number): UsageWindow => {
  let windowMs = initialWindowMs;
  let entries: UsageEntry[] = [];
  let total = 0;

  const evict = (now: number): void => {
    let expired = 0;
    while (expired < entries.length && entries[expired].timestamp + windowMs <= now) {
      total -= entries[expired].weight;
      expired++;
    }
    if (expired > 0) {
      entries = entries.slice(expired);
    }
  };

  const usage = (now: number): number => {
    evict(now);
    return total;
  };

  const headroom = (now: number, limit: number): number => Math.max(0, limit - usage(now));

  const record = (now: number, weight: number): UsageEntry => {
    evict(now);
    const entry: UsageEntry = Object.freeze({ timestamp: now, weight });
    entries.push(entry);
    total += weight;
    return entry;
  };

  const remove = (entry: UsageEntry): boolean => {
    const index = entries.indexOf(entry);
    if (index === -1) {
      return false;
    }
    entries.splice(index, 1);
    total -= entry.weight;
    return true;
  };

  const retryAfterMs = (now: number, weight: number, limit: number): number => {
    if (weight > limit) {
      return Number.POSITIVE_INFINITY;
    }
    evict(now);

    let excess = total + weight - limit;
    if (excess <= 0) {
      return 0;
    }

    for (const entry of entries) {
      excess -= entry.weight;
      if (excess <= 0) {
        return entry.timestamp + windowMs - now;
      }
    }

    // Unreachable while weight <= limit: evicting every entry frees `total`
    return windowMs;
  };

  const size = (now: number): number => {
    evict(now);
    return entries.length;
  };

  const getWindowMs = (): number => windowMs;

  const resize = (nextWindowMs: number): void => {
    windowMs = nextWindowMs;
  };

  return {
    getWindowMs,
    resize,
    evict,
    usage,
    headroom,
    record,
    remove,
    retryAfterMs,
    size,
  };
};
