/**
 * Sliding-window throttler enforcing one or more quota rules.
 *
 * Concurrency model: every check-then-commit runs in a single synchronous
 * section (no `await` between evaluating all matching rules and recording the
 * charges), so concurrent callers on the event loop can never observe or
 * produce partial consumption across rules. Callers blocked in `acquire` wait
 * in a priority/FIFO queue that is drained whenever capacity may have freed up
 * (a window entry expiring, a permit being released, or the rules changing).
 */

import { type Clock, MONOTONIC_CLOCK } from "../clock";
import {
  CancelledError,
  ConfigurationError,
  DeadlineExceededError,
  InvalidUsageError,
  toError,
} from "../errors";
import { type Logger, getDefaultLogger } from "../logger";

import { type QuotaRule, effectiveLimit, matchesPath, validateQuotaRules } from "./quota-rule";
import { type UsageEntry, type UsageWindow, createUsageWindow } from "./sliding-window";

export type ThrottleMode = "wait" | "deny";

export interface AcquisitionRequest {
  /** Endpoint path (or WebSocket channel) matched against rule scopes */
  path: string;
  /** Units charged per matching rule, overriding the rule's own weight */
  weight?: number;
  /** Higher values are served first among waiters of the same rule (default: 0) */
  priority?: number;
  /** Maximum time to wait for quota (ms). Only used in "wait" mode. */
  timeoutMs?: number;
  /** Cancels the wait without charging quota */
  signal?: AbortSignal;
  /** Rules charged regardless of path, including `explicit` ones */
  limitIds?: readonly string[];
}

export interface Permit {
  readonly id: number;
  readonly path: string;
  readonly grantedAt: number;
  /** Time spent queued for quota before the grant (0 when granted immediately) */
  readonly queuedMs: number;
  /** Rules charged by this permit */
  readonly limitIds: readonly string[];
}

export type AcquireDecision =
  | { granted: true; permit: Permit }
  | {
      granted: false;
      /** Time until every saturated rule has room again (ms) */
      retryAfterMs: number;
      /** The saturated rule that frees up last */
      limitId: string;
    };

export interface RuleUsage {
  limitId: string;
  used: number;
  limit: number;
  remaining: number;
}

export interface ThrottlerConfig {
  rules?: readonly QuotaRule[];
  /** "wait" queues callers until quota frees up, "deny" answers immediately */
  mode?: ThrottleMode;
  /** Share of each rule's cap this process may use, in percent (default: 100) */
  sharePercentage?: number;
  /** Part of the share held back for clock drift and in-flight requests, in percent (default: 0) */
  safetyMarginPercentage?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface ConfigureOptions {
  /** Replace the whole rule set instead of merging by id */
  replace?: boolean;
}

export interface Throttler {
  /** Validates and installs rules (merge by id unless `replace`) */
  configure: (rules: readonly QuotaRule[], options?: ConfigureOptions) => void;
  /** Non-blocking check; commits the charge when granted */
  tryAcquire: (request: AcquisitionRequest) => AcquireDecision;
  /** Grants a permit, waiting for headroom in "wait" mode */
  acquire: (request: AcquisitionRequest) => Promise<AcquireDecision>;
  /** Gives back the quota of a permit whose operation never happened */
  release: (permit: Permit) => void;
  /** Current usage of a rule, or undefined for unknown ids */
  getUsage: (limitId: string) => RuleUsage | undefined;
  getRules: () => readonly QuotaRule[];
  getMode: () => ThrottleMode;
  /** Number of callers waiting for quota */
  getPendingCount: () => number;
  /** Rejects every waiter with CancelledError and stops timers */
  close: () => void;
  /** New throttler with the same rules and settings and no recorded usage */
  copy: (overrides?: ThrottlerCopyOptions) => Throttler;
}

export type ThrottlerCopyOptions = Pick<
  ThrottlerConfig,
  "mode" | "sharePercentage" | "safetyMarginPercentage" | "logger"
>;

interface RuleState {
  rule: QuotaRule;
  limit: number;
  window: UsageWindow;
}

interface Charge {
  window: UsageWindow;
  entry: UsageEntry;
}

type Evaluation = { ok: true } | { ok: false; retryAfterMs: number; limitId: string };

interface Waiter {
  seq: number;
  enqueuedAt: number;
  request: AcquisitionRequest;
  priority: number;
  resolve: (decision: AcquireDecision) => void;
  reject: (error: Error) => void;
  dispose: () => void;
}

/**
 * Creates a throttler.
 *
 * @example
 * ```typescript
 * const throttler = createThrottler({
 *   rules: [
 *     { id: "account", maxRequests: 1200, timeWindowMs: 60_000 },
 *     { id: "orders", maxRequests: 10, timeWindowMs: 1_000, pathScope: "/api/v3/order" },
 *   ],
 * });
 *
 * const decision = await throttler.acquire({ path: "/api/v3/order", timeoutMs: 5_000 });
 * ```
 */
export const createThrottler = (config: ThrottlerConfig = {}): Throttler => {
  const {
    rules: initialRules = [],
    mode = "wait",
    sharePercentage = 100,
    safetyMarginPercentage = 0,
    clock = MONOTONIC_CLOCK,
    logger = getDefaultLogger(),
  } = config;

  if (!Number.isFinite(sharePercentage) || sharePercentage <= 0 || sharePercentage > 100) {
    throw new ConfigurationError(
      `sharePercentage must be in (0, 100], got ${sharePercentage}`,
      [`sharePercentage: expected (0, 100], got ${sharePercentage}`],
    );
  }

  if (
    !Number.isFinite(safetyMarginPercentage) ||
    safetyMarginPercentage < 0 ||
    safetyMarginPercentage >= 100
  ) {
    throw new ConfigurationError(
      `safetyMarginPercentage must be in [0, 100), got ${safetyMarginPercentage}`,
      [`safetyMarginPercentage: expected [0, 100), got ${safetyMarginPercentage}`],
    );
  }

  const log = logger.child({ component: "Throttler" });

  let states = new Map<string, RuleState>();
  let waiters: Waiter[] = [];
  let wakeTimer: NodeJS.Timeout | null = null;
  let permitSeq = 0;
  let waiterSeq = 0;
  let closed = false;

  const issued = new WeakMap<Permit, Charge[]>();
  const released = new WeakSet<Permit>();

  const configure = (rules: readonly QuotaRule[], options: ConfigureOptions = {}): void => {
    const merged = options.replace
      ? [...rules]
      : [
          ...[...states.values()]
            .map((state) => state.rule)
            .filter((rule) => !rules.some((next) => next.id === rule.id)),
          ...rules,
        ];
    const validated = validateQuotaRules(merged);

    const next = new Map<string, RuleState>();
    for (const rule of validated) {
      const existing = states.get(rule.id);
      const limit = effectiveLimit(rule, sharePercentage, safetyMarginPercentage);
      if (existing) {
        // Keep recorded usage across redefinitions of the same rule
        existing.window.resize(rule.timeWindowMs);
        next.set(rule.id, { rule, limit, window: existing.window });
      } else {
        next.set(rule.id, { rule, limit, window: createUsageWindow(rule.timeWindowMs) });
      }
    }
    states = next;

    log.debug("Quota rules configured", {
      rules: validated.map((rule) => rule.id),
      replace: options.replace ?? false,
    });

    drain();
  };

  const validateRequest = (request: AcquisitionRequest): void => {
    if (typeof request.path !== "string") {
      throw new InvalidUsageError("Acquisition request requires a string path");
    }
    if (request.weight !== undefined && (!Number.isInteger(request.weight) || request.weight < 1)) {
      throw new InvalidUsageError(`Request weight must be a positive integer, got ${request.weight}`);
    }
    for (const limitId of request.limitIds ?? []) {
      if (!states.has(limitId)) {
        throw new InvalidUsageError(`Unknown limit id "${limitId}"`);
      }
    }
  };

  /**
   * Units to charge per rule id. A rule is charged when its scope matches or
   * the request names it. Linked limits are folded in and charges for the same
   * rule are summed.
   */
  const planCharges = (request: AcquisitionRequest): Map<string, number> => {
    const plan = new Map<string, number>();
    const add = (limitId: string, weight: number): void => {
      if (weight > 0) {
        plan.set(limitId, (plan.get(limitId) ?? 0) + weight);
      }
    };

    const named = new Set<string>(request.limitIds);
    for (const { rule } of states.values()) {
      if (!named.has(rule.id) && (rule.explicit || !matchesPath(rule, request.path))) {
        continue;
      }
      add(rule.id, request.weight ?? rule.weight ?? 1);
      for (const link of rule.linkedLimits ?? []) {
        add(link.limitId, link.weight);
      }
    }
    return plan;
  };

  const evaluate = (plan: Map<string, number>, now: number): Evaluation => {
    let worst: { retryAfterMs: number; limitId: string } | null = null;

    for (const [limitId, weight] of plan) {
      const state = states.get(limitId);
      if (!state) {
        continue;
      }
      if (weight > state.limit) {
        throw new InvalidUsageError(
          `Request weight ${weight} exceeds the cap of rule "${limitId}" (${state.limit})`,
        );
      }
      const retryAfterMs = state.window.retryAfterMs(now, weight, state.limit);
      if (retryAfterMs > 0 && (worst === null || retryAfterMs > worst.retryAfterMs)) {
        worst = { retryAfterMs, limitId };
      }
    }

    return worst === null ? { ok: true } : { ok: false, ...worst };
  };

  const commit = (
    request: AcquisitionRequest,
    plan: Map<string, number>,
    now: number,
    enqueuedAt: number = now,
  ): Permit => {
    const charges: Charge[] = [];
    for (const [limitId, weight] of plan) {
      const state = states.get(limitId);
      if (state) {
        charges.push({ window: state.window, entry: state.window.record(now, weight) });
      }
    }

    permitSeq++;
    const permit: Permit = Object.freeze({
      id: permitSeq,
      path: request.path,
      grantedAt: now,
      queuedMs: now - enqueuedAt,
      limitIds: Object.freeze([...plan.keys()]),
    });
    issued.set(permit, charges);
    return permit;
  };

  const clearWakeTimer = (): void => {
    if (wakeTimer) {
      clearTimeout(wakeTimer);
      wakeTimer = null;
    }
  };

  const removeWaiter = (waiter: Waiter): void => {
    waiters = waiters.filter((candidate) => candidate !== waiter);
    waiter.dispose();
  };

  /**
   * Grants every waiter that fits, in priority/arrival order. A waiter that
   * does not fit blocks later waiters on any of its rules.
   */
  const drain = (): void => {
    clearWakeTimer();
    if (waiters.length === 0) {
      return;
    }

    const now = clock.now();
    const blocked = new Set<string>();
    let nextWakeMs = Number.POSITIVE_INFINITY;

    for (const waiter of [...waiters]) {
      const plan = planCharges(waiter.request);
      const limitIds = [...plan.keys()];
      if (limitIds.some((limitId) => blocked.has(limitId))) {
        continue;
      }

      let evaluation: Evaluation;
      try {
        evaluation = evaluate(plan, now);
      } catch (error) {
        // Rules changed underneath the waiter and it can no longer fit
        removeWaiter(waiter);
        waiter.reject(toError(error));
        continue;
      }

      if (evaluation.ok) {
        removeWaiter(waiter);
        waiter.resolve({ granted: true, permit: commit(waiter.request, plan, now, waiter.enqueuedAt) });
      } else {
        for (const limitId of limitIds) {
          blocked.add(limitId);
        }
        nextWakeMs = Math.min(nextWakeMs, evaluation.retryAfterMs);
      }
    }

    if (waiters.length > 0 && Number.isFinite(nextWakeMs)) {
      wakeTimer = setTimeout(drain, Math.max(1, Math.ceil(nextWakeMs)));
    }
  };

  const hasConflictingWaiter = (plan: Map<string, number>): boolean =>
    waiters.some((waiter) => {
      const waiterPlan = planCharges(waiter.request);
      return [...plan.keys()].some((limitId) => waiterPlan.has(limitId));
    });

  const tryAcquire = (request: AcquisitionRequest): AcquireDecision => {
    if (closed) {
      throw new CancelledError("Throttler is closed");
    }
    validateRequest(request);
    const now = clock.now();
    const plan = planCharges(request);
    const evaluation = evaluate(plan, now);

    if (!evaluation.ok) {
      return {
        granted: false,
        retryAfterMs: evaluation.retryAfterMs,
        limitId: evaluation.limitId,
      };
    }
    return { granted: true, permit: commit(request, plan, now) };
  };

  const enqueue = (request: AcquisitionRequest): Promise<AcquireDecision> =>
    new Promise<AcquireDecision>((resolve, reject) => {
      const { signal, timeoutMs } = request;
      let deadlineTimer: NodeJS.Timeout | null = null;

      const onAbort = (): void => {
        removeWaiter(waiter);
        reject(new CancelledError(`Quota wait for ${request.path} was cancelled`));
        drain();
      };

      const waiter: Waiter = {
        seq: ++waiterSeq,
        enqueuedAt: clock.now(),
        request,
        priority: request.priority ?? 0,
        resolve,
        reject,
        dispose: () => {
          if (deadlineTimer) {
            clearTimeout(deadlineTimer);
            deadlineTimer = null;
          }
          signal?.removeEventListener("abort", onAbort);
        },
      };

      if (timeoutMs !== undefined) {
        deadlineTimer = setTimeout(() => {
          removeWaiter(waiter);
          reject(
            new DeadlineExceededError(
              `Quota wait for ${request.path} exceeded ${timeoutMs}ms`,
              timeoutMs,
            ),
          );
          drain();
        }, timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      // Keep waiters ordered by priority (desc), then arrival
      const index = waiters.findIndex(
        (candidate) =>
          candidate.priority < waiter.priority ||
          (candidate.priority === waiter.priority && candidate.seq > waiter.seq),
      );
      if (index === -1) {
        waiters.push(waiter);
      } else {
        waiters.splice(index, 0, waiter);
      }

      drain();
    });

  const acquire = async (request: AcquisitionRequest): Promise<AcquireDecision> => {
    if (closed) {
      throw new CancelledError("Throttler is closed");
    }
    if (mode === "deny") {
      return tryAcquire(request);
    }

    validateRequest(request);
    if (request.signal?.aborted) {
      throw new CancelledError(`Quota wait for ${request.path} was cancelled`);
    }

    const now = clock.now();
    const plan = planCharges(request);
    const evaluation = evaluate(plan, now);

    if (evaluation.ok && !hasConflictingWaiter(plan)) {
      return { granted: true, permit: commit(request, plan, now) };
    }

    if (request.timeoutMs !== undefined && request.timeoutMs <= 0) {
      throw new DeadlineExceededError(
        `Quota for ${request.path} unavailable and no time to wait`,
        request.timeoutMs,
      );
    }

    log.debug("Quota wait", {
      path: request.path,
      limitId: evaluation.ok ? undefined : evaluation.limitId,
      retryAfterMs: evaluation.ok ? 0 : evaluation.retryAfterMs,
      pending: waiters.length + 1,
    });

    return enqueue(request);
  };

  const release = (permit: Permit): void => {
    const charges = issued.get(permit);
    if (!charges) {
      const error = new InvalidUsageError(
        released.has(permit)
          ? `Permit ${permit.id} was already released`
          : `Permit ${permit.id} was not issued by this throttler`,
      );
      log.error("Invalid permit release", error, { permitId: permit.id, path: permit.path });
      throw error;
    }

    issued.delete(permit);
    released.add(permit);
    for (const charge of charges) {
      charge.window.remove(charge.entry);
    }

    log.debug("Permit released", { permitId: permit.id, path: permit.path });
    drain();
  };

  const getUsage = (limitId: string): RuleUsage | undefined => {
    const state = states.get(limitId);
    if (!state) {
      return undefined;
    }
    const now = clock.now();
    return {
      limitId,
      used: state.window.usage(now),
      limit: state.limit,
      remaining: state.window.headroom(now, state.limit),
    };
  };

  const getRules = (): readonly QuotaRule[] => [...states.values()].map((state) => state.rule);

  const getMode = (): ThrottleMode => mode;

  const getPendingCount = (): number => waiters.length;

  const close = (): void => {
    closed = true;
    clearWakeTimer();
    const pending = waiters;
    waiters = [];
    for (const waiter of pending) {
      waiter.dispose();
      waiter.reject(new CancelledError("Throttler closed while waiting for quota"));
    }
  };

  const copy = (overrides: ThrottlerCopyOptions = {}): Throttler =>
    createThrottler({
      rules: getRules(),
      mode,
      sharePercentage,
      safetyMarginPercentage,
      clock,
      logger,
      ...overrides,
    });

  configure(initialRules, { replace: true });

  return {
    configure,
    tryAcquire,
    acquire,
    release,
    getUsage,
    getRules,
    getMode,
    getPendingCount,
    close,
    copy,
  };
};
