/**
 * @summary Server-reported rate budget tracking per endpoint class.
 *
 * The free endpoints report the requests left in the current window
 * (`X-Rl`) and the seconds until it resets (`X-Ttl`) on every response.
 * This module records those values per endpoint class and, before each
 * request, suspends the caller when the budget is spent.
 *
 * Features:
 * - Independent single and batch budgets
 * - Header fields updated one by one; a missing header keeps the old value
 * - Reset wait plus a safety margin, then an optimistic reset
 * - No-op with an API key (the pro tier has no such budget)
 *
 * Used by:
 * - Dispatcher, around every exchange
 */

import type { EndpointClass, RateBudgetState } from "@ipgeo/core";
import { RATE_LIMIT_HEADERS, sleep, silentLogger } from "@ipgeo/core";
import type { Logger, SleepFn } from "@ipgeo/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Options for the rate budget tracker.
 */
export interface RateBudgetTrackerOptions {
  /**
   * Whether an API key is configured. Disables every wait.
   * @default false
   */
  hasKey?: boolean;

  /**
   * Margin added to the reported reset time, in milliseconds.
   * @default 3000
   */
  ttlHoldMs?: number;

  /**
   * Budget assumed once a spent window has been waited out, per class.
   * Corrected by the next observed response.
   * @default { single: 45, batch: 15 }
   */
  limits?: Partial<Record<EndpointClass, number>>;

  /**
   * Suspension function.
   * @default sleep
   */
  sleep?: SleepFn;

  /**
   * Clock used to stamp observations.
   * @default Date.now
   */
  now?: () => number;

  /**
   * Logger for wait notices.
   */
  logger?: Logger;

  /**
   * Callback invoked before each rate-limit wait.
   */
  onWait?: (endpointClass: EndpointClass, waitMs: number) => void;
}

// ---------------------------------------------------------------------------
// Rate Budget Tracker
// ---------------------------------------------------------------------------

/**
 * Rate budget tracker for one client.
 *
 * @example
 * ```typescript
 * const tracker = new RateBudgetTracker({ ttlHoldMs: 1000 });
 *
 * await tracker.waitIfNeeded("batch");
 * const response = await session.send(request);
 * tracker.observe("batch", response.headers);
 * ```
 */
export class RateBudgetTracker {
  private readonly states = new Map<EndpointClass, RateBudgetState>();
  private readonly hasKey: boolean;
  private readonly ttlHoldMs: number;
  private readonly limits: Record<EndpointClass, number>;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly onWait: RateBudgetTrackerOptions["onWait"] | undefined;

  constructor(options: RateBudgetTrackerOptions = {}) {
    this.hasKey = options.hasKey ?? false;
    this.ttlHoldMs = options.ttlHoldMs ?? 3000;
    this.limits = {
      single: options.limits?.single ?? 45,
      batch: options.limits?.batch ?? 15,
    };
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.onWait = options.onWait;
  }

  /**
   * Record the budget reported by a response.
   *
   * Each header is read on its own; one that is missing or not a
   * non-negative integer leaves its field as it was. When neither header
   * is usable the state is not touched at all.
   *
   * @param endpointClass - Endpoint class the response came from
   * @param headers - Response headers
   */
  observe(endpointClass: EndpointClass, headers: Headers): void {
    const remaining = parseHeaderInteger(headers.get(RATE_LIMIT_HEADERS.REMAINING));
    const ttlSeconds = parseHeaderInteger(headers.get(RATE_LIMIT_HEADERS.TTL));

    if (remaining === undefined && ttlSeconds === undefined) {
      return;
    }

    const state: RateBudgetState = {
      ...this.states.get(endpointClass),
      observedAt: this.now(),
    };
    if (remaining !== undefined) {
      state.remaining = remaining;
    }
    if (ttlSeconds !== undefined) {
      state.resetAfterMs = ttlSeconds * 1000;
    }
    this.states.set(endpointClass, state);
  }

  /**
   * Suspend the caller when the budget of an endpoint class is spent.
   *
   * Waits `resetAfterMs + ttlHoldMs` when `remaining` is 0, then assumes a
   * fresh window. Never waits with an API key, before the first
   * observation, or while requests remain.
   *
   * @param endpointClass - Endpoint class about to be used
   * @returns Milliseconds waited
   */
  async waitIfNeeded(endpointClass: EndpointClass): Promise<number> {
    if (this.hasKey) {
      return 0;
    }

    const state = this.states.get(endpointClass);
    if (state === undefined || state.remaining !== 0) {
      return 0;
    }

    const waitMs = (state.resetAfterMs ?? 0) + this.ttlHoldMs;
    this.logger.warn(
      `API limit is reached on the ${endpointClass} endpoint. ` +
        `Waiting for ${formatSeconds(waitMs)} by rate limit.`
    );
    this.onWait?.(endpointClass, waitMs);

    await this.sleep(waitMs);

    this.states.set(endpointClass, {
      ...state,
      remaining: this.limits[endpointClass],
      resetAfterMs: 0,
      observedAt: this.now(),
    });

    return waitMs;
  }

  /**
   * Get a copy of the current state of an endpoint class.
   *
   * @returns State, or undefined before the first observation
   */
  snapshot(endpointClass: EndpointClass): RateBudgetState | undefined {
    const state = this.states.get(endpointClass);
    return state ? { ...state } : undefined;
  }

  /**
   * Forget every observed budget.
   */
  reset(): void {
    this.states.clear();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseHeaderInteger(value: string | null): number | undefined {
  if (value === null) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return `${Number.isInteger(seconds) ? seconds : seconds.toFixed(1)} seconds`;
}
