/**
 * Estimates the offset between the local wall clock and a remote
 * authoritative clock, and hands out corrected timestamps.
 *
 * The synchronizer never schedules itself: the pipeline (or the caller)
 * decides when to call `sync()`. The current offset is a frozen snapshot
 * replaced by a single assignment, so readers always see either the previous
 * or the next value.
 */

import { type Clock, MONOTONIC_CLOCK, WALL_CLOCK } from "../clock";
import { getConfig } from "../config";
import { SyncError } from "../errors";
import { type Logger, getDefaultLogger } from "../logger";

/** Returns the remote clock's current time in epoch milliseconds */
export type FetchServerTime = () => Promise<number>;

export interface ClockOffset {
  /** remote - local (ms) */
  readonly offsetMs: number;
  readonly roundTripMs: number;
  /** Monotonic time of the sync */
  readonly syncedAt: number;
}

export interface CorrectedTimestamp {
  timestampMs: number;
  offsetMs: number;
  synchronized: boolean;
  /** Time since the last successful sync, null before the first one */
  ageMs: number | null;
}

export interface TimeSynchronizerConfig {
  fetchServerTime: FetchServerTime;
  /** Local wall clock that offsets are applied to (default: Date.now) */
  clock?: Clock;
  /** Clock used to measure round trips and offset age (default: performance.now) */
  monotonicClock?: Clock;
  /** Round trips slower than this are rejected as too noisy (ms) */
  maxRoundTripMs?: number;
  logger?: Logger;
}

export interface TimeSynchronizer {
  /** One round trip against the remote clock. Concurrent calls share it. */
  sync: () => Promise<ClockOffset>;
  /** Local wall time corrected by the last known offset */
  now: () => CorrectedTimestamp;
  getOffset: () => ClockOffset | null;
  /** True when no offset exists or it is older than `maxAgeMs` */
  isStale: (maxAgeMs: number) => boolean;
  getConsecutiveFailures: () => number;
}

/**
 * Creates a time synchronizer.
 *
 * @example
 * ```typescript
 * const synchronizer = createTimeSynchronizer({
 *   fetchServerTime: async () => {
 *     const response = await fetch("https://api.example.com/time");
 *     return v.parse(serverTimeSchema, await response.json()).serverTime;
 *   },
 * });
 *
 * await synchronizer.sync();
 * const { timestampMs } = synchronizer.now();
 * ```
 */
export const createTimeSynchronizer = (config: TimeSynchronizerConfig): TimeSynchronizer => {
  const {
    fetchServerTime,
    clock = WALL_CLOCK,
    monotonicClock = MONOTONIC_CLOCK,
    maxRoundTripMs = getConfig().timeSync.maxRoundTripMs,
    logger = getDefaultLogger(),
  } = config;

  const log = logger.child({ component: "TimeSynchronizer" });

  let current: ClockOffset | null = null;
  let inFlight: Promise<ClockOffset> | null = null;
  let consecutiveFailures = 0;

  const roundTrip = async (): Promise<ClockOffset> => {
    const localSendMs = clock.now();
    const startedAt = monotonicClock.now();

    let remoteMs: number;
    try {
      remoteMs = await fetchServerTime();
    } catch (error) {
      throw new SyncError(
        `Server time request failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        error,
      );
    }

    const finishedAt = monotonicClock.now();
    const roundTripMs = finishedAt - startedAt;

    if (typeof remoteMs !== "number" || !Number.isFinite(remoteMs) || remoteMs <= 0) {
      throw new SyncError(`Invalid server timestamp: ${String(remoteMs)}`, roundTripMs);
    }
    if (roundTripMs > maxRoundTripMs) {
      throw new SyncError(
        `Round trip of ${roundTripMs}ms exceeds ${maxRoundTripMs}ms`,
        roundTripMs,
      );
    }

    return Object.freeze({
      offsetMs: remoteMs - (localSendMs + roundTripMs / 2),
      roundTripMs,
      syncedAt: finishedAt,
    });
  };

  const sync = (): Promise<ClockOffset> => {
    if (inFlight) {
      return inFlight;
    }

    inFlight = roundTrip()
      .then((offset) => {
        current = offset;
        consecutiveFailures = 0;
        log.debug("Clock synchronized", {
          offsetMs: offset.offsetMs,
          roundTripMs: offset.roundTripMs,
        });
        return offset;
      })
      .catch((error: unknown) => {
        consecutiveFailures++;
        const syncError =
          error instanceof SyncError ? error : new SyncError(String(error), undefined, error);
        log.warn("Clock sync failed", {
          error: syncError.message,
          roundTripMs: syncError.roundTripMs,
          consecutiveFailures,
        });
        throw syncError;
      })
      .finally(() => {
        inFlight = null;
      });

    return inFlight;
  };

  const now = (): CorrectedTimestamp => {
    const snapshot = current;
    const localMs = clock.now();
    if (!snapshot) {
      return { timestampMs: localMs, offsetMs: 0, synchronized: false, ageMs: null };
    }
    return {
      timestampMs: localMs + snapshot.offsetMs,
      offsetMs: snapshot.offsetMs,
      synchronized: true,
      ageMs: monotonicClock.now() - snapshot.syncedAt,
    };
  };

  const getOffset = (): ClockOffset | null => current;

  const isStale = (maxAgeMs: number): boolean =>
    current === null || monotonicClock.now() - current.syncedAt > maxAgeMs;

  const getConsecutiveFailures = (): number => consecutiveFailures;

  return {
    sync,
    now,
    getOffset,
    isStale,
    getConsecutiveFailures,
  };
};
