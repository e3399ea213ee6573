import { LimitPolicySchema } from "@turnstile/schemas";
import type { ClientKey, ClientState, Decision, LimitPolicy } from "@turnstile/schemas";
import { InvalidPolicyError, UnconfiguredError } from "./errors.js";
import { createInMemoryMetrics } from "../telemetry/metrics.js";
import type { AdmissionMetrics } from "../telemetry/metrics.js";

/** Idle retention defaults to this many windows of the active policy. */
export const DEFAULT_RETENTION_FACTOR = 5;

export interface AdmissionControllerOptions {
  policy?: LimitPolicy;
  /** Idle period after which an expired client entry may be evicted. */
  retentionMs?: number;
  clock?: () => number;
  /** Counters for this controller. Defaults to fresh in-memory counters. */
  metrics?: AdmissionMetrics;
}

/**
 * Fixed-window admission control keyed by client.
 *
 * `check` never awaits, so each call's lookup, window test and increment
 * run to completion on the event loop before any other request is served.
 * Calls for different keys only touch their own entry.
 */
export class AdmissionController {
  private policy: Readonly<LimitPolicy> | null = null;
  private readonly clients = new Map<ClientKey, ClientState>();
  private readonly retentionMs: number | undefined;
  private readonly clock: () => number;
  private readonly metrics: AdmissionMetrics;

  constructor(options: AdmissionControllerOptions = {}) {
    if (options.retentionMs !== undefined && (!Number.isInteger(options.retentionMs) || options.retentionMs <= 0)) {
      throw new RangeError(`retentionMs must be a positive integer, got ${options.retentionMs}`);
    }
    this.retentionMs = options.retentionMs;
    this.clock = options.clock ?? Date.now;
    this.metrics = options.metrics ?? createInMemoryMetrics();
    if (options.policy) {
      this.configure(options.policy);
    }
  }

  /**
   * Replace the active policy. Decisions already made keep the policy they
   * read; entries are not re-evaluated.
   *
   * @throws InvalidPolicyError when either field is not a positive integer;
   *   the previous policy stays active.
   */
  configure(policy: LimitPolicy): LimitPolicy {
    const parsed = LimitPolicySchema.safeParse(policy);
    if (!parsed.success) {
      throw new InvalidPolicyError(
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "policy"}: ${issue.message}`),
      );
    }
    const next = Object.freeze({ ...parsed.data });
    this.policy = next;
    return next;
  }

  /** @throws UnconfiguredError before the first successful configure. */
  currentLimit(): LimitPolicy {
    if (!this.policy) throw new UnconfiguredError();
    return { ...this.policy };
  }

  isConfigured(): boolean {
    return this.policy !== null;
  }

  check(key: ClientKey, now: number = this.clock()): Decision {
    const policy = this.policy;
    if (!policy) throw new UnconfiguredError();

    let state = this.clients.get(key);
    if (!state) {
      state = { count: 0, windowStart: now, lastSeen: now, denied: 0 };
      this.clients.set(key, state);
    }
    state.lastSeen = now;

    // Boundary instant belongs to the new window.
    if (now - state.windowStart >= policy.windowMs) {
      state.windowStart = now;
      state.count = 0;
      state.denied = 0;
    }

    const resetAt = state.windowStart + policy.windowMs;

    if (state.count < policy.maxRequests) {
      state.count += 1;
      this.metrics.decisionsTotal.inc({ outcome: "allowed" });
      return {
        outcome: "allowed",
        limit: policy.maxRequests,
        remaining: policy.maxRequests - state.count,
        resetAt,
      };
    }

    state.denied += 1;
    this.metrics.decisionsTotal.inc({ outcome: "denied" });
    return {
      outcome: "denied",
      limit: policy.maxRequests,
      remaining: 0,
      resetAt,
      retryAfterMs: Math.max(0, resetAt - now),
    };
  }

  inspect(key: ClientKey): Readonly<ClientState> | undefined {
    const state = this.clients.get(key);
    return state ? { ...state } : undefined;
  }

  get size(): number {
    return this.clients.size;
  }

  /**
   * Evict entries that have been idle for the retention period and whose
   * window has closed. Returns the number of entries removed.
   */
  sweep(now: number = this.clock()): number {
    const policy = this.policy;
    if (!policy) return 0;

    const retention = this.retentionMs ?? policy.windowMs * DEFAULT_RETENTION_FACTOR;
    let evicted = 0;
    for (const [key, state] of this.clients) {
      if (now - state.windowStart < policy.windowMs) continue;
      if (now - state.lastSeen < retention) continue;
      this.clients.delete(key);
      evicted++;
    }

    if (evicted > 0) {
      this.metrics.evictionsTotal.inc(undefined, evicted);
    }
    return evicted;
  }

  /** Forget one client, or every client when no key is given. */
  reset(key?: ClientKey): boolean {
    if (key === undefined) {
      const had = this.clients.size > 0;
      this.clients.clear();
      return had;
    }
    return this.clients.delete(key);
  }
}
