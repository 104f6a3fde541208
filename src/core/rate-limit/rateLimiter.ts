/**
 * Windowed rate limiter for named application actions.
 *
 * Windows are fixed-window-reset-on-write: every recorded attempt restarts
 * the counter's TTL, so a caller that keeps trying stays limited until it
 * stops for a full window. Unknown actions are never limited.
 */

import { EventBus } from "../eventBus";
import { toError } from "../errors";
import { ClientIdentityResolver, ClientRequest } from "../identity/clientIdentity";
import { ExpiringStore } from "../storage/expiringStore";
import { RateLimitRule, RateLimitRules } from "./rules";

export interface RateLimitScope {
  userId?: string | number;
  /** Explicit bucket identifier; defaults to the resolved client identity */
  identifier?: string;
  request?: ClientRequest;
}

export type RateLimitOutcome =
  | { success: true; remainingAttempts: number }
  | { success: false; message: string; retryAfter: number };

export interface RateLimitInfo {
  action: string;
  limit: number;
  window: number;
  remainingAttempts: number;
  isRateLimited: boolean;
  timeUntilReset: number;
}

export interface RateLimiterDeps {
  store: ExpiringStore;
  rules: RateLimitRules;
  resolver: ClientIdentityResolver;
  eventBus: EventBus;
}

export class RateLimiter {
  private readonly store: ExpiringStore;
  private readonly rules: RateLimitRules;
  private readonly resolver: ClientIdentityResolver;
  private readonly eventBus: EventBus;

  constructor(deps: RateLimiterDeps) {
    this.store = deps.store;
    this.rules = deps.rules;
    this.resolver = deps.resolver;
    this.eventBus = deps.eventBus;
  }

  async isRateLimited(action: string, scope: RateLimitScope = {}): Promise<boolean> {
    const rule = this.rules.get(action);
    if (!rule) return false;
    const count = await this.getAttempts(this.key(action, scope));
    return count >= rule.limit;
  }

  /**
   * @returns false for unknown actions
   */
  async recordAttempt(action: string, scope: RateLimitScope = {}): Promise<boolean> {
    const rule = this.rules.get(action);
    if (!rule) return false;
    const key = this.key(action, scope);
    try {
      await this.store.increment(key, rule.window);
      return true;
    } catch (error: unknown) {
      this.degraded("increment", key, error);
      return false;
    }
  }

  async getRemainingAttempts(action: string, scope: RateLimitScope = {}): Promise<number> {
    const rule = this.rules.get(action);
    if (!rule) return 0;
    const count = await this.getAttempts(this.key(action, scope));
    return Math.max(0, rule.limit - count);
  }

  /**
   * Seconds until the current window ends. Falls back to the configured
   * window when no window is open or the store cannot say.
   */
  async getTimeUntilReset(action: string, scope: RateLimitScope = {}): Promise<number> {
    const rule = this.rules.get(action);
    if (!rule) return 0;
    return this.remainingWindow(this.key(action, scope), rule);
  }

  async clearRateLimit(action: string, scope: RateLimitScope = {}): Promise<boolean> {
    const key = this.key(action, scope);
    try {
      await this.store.delete(key);
      return true;
    } catch (error: unknown) {
      this.degraded("delete", key, error);
      return false;
    }
  }

  async getRateLimitInfo(action: string, scope: RateLimitScope = {}): Promise<RateLimitInfo | null> {
    const rule = this.rules.get(action);
    if (!rule) return null;
    const key = this.key(action, scope);
    const count = await this.getAttempts(key);
    return {
      action,
      limit: rule.limit,
      window: rule.window,
      remainingAttempts: Math.max(0, rule.limit - count),
      isRateLimited: count >= rule.limit,
      timeUntilReset: await this.remainingWindow(key, rule),
    };
  }

  updateRule(action: string, limit: number, window: number): RateLimitRule {
    return this.rules.update(action, limit, window);
  }

  getRule(action: string): RateLimitRule | undefined {
    return this.rules.get(action);
  }

  getRules(): Record<string, RateLimitRule> {
    return this.rules.all();
  }

  /**
   * Check and record in one atomic step. A refused call is not counted.
   */
  async applyRateLimit(action: string, scope: RateLimitScope = {}): Promise<RateLimitOutcome> {
    const rule = this.rules.get(action);
    if (!rule) {
      return { success: true, remainingAttempts: 0 };
    }
    const key = this.key(action, scope);

    let result: { allowed: boolean; count: number };
    try {
      result = await this.store.incrementIfBelow(key, rule.limit, rule.window);
    } catch (error: unknown) {
      // Throttling fails open
      this.degraded("incrementIfBelow", key, error);
      return { success: true, remainingAttempts: rule.limit };
    }

    if (!result.allowed) {
      const retryAfter = await this.remainingWindow(key, rule);
      this.eventBus.emit("RateLimitedEvent", { action, key, count: result.count, limit: rule.limit, retryAfter });
      return {
        success: false,
        message: `Rate limit exceeded. Please try again in ${Math.ceil(retryAfter / 60)} minutes.`,
        retryAfter,
      };
    }

    return { success: true, remainingAttempts: Math.max(0, rule.limit - result.count) };
  }

  /**
   * `rate_limit_<action>[_user_<id>]_<identifier or client identity>`
   */
  key(action: string, scope: RateLimitScope): string {
    const parts = ["rate_limit", action];
    if (scope.userId !== undefined && scope.userId !== "" && scope.userId !== 0) {
      parts.push(`user_${scope.userId}`);
    }
    parts.push(scope.identifier || this.resolver.resolve(scope.request ?? { headers: {} }));
    return parts.join("_");
  }

  private async getAttempts(key: string): Promise<number> {
    try {
      const value = await this.store.get(key);
      return typeof value === "number" && Number.isFinite(value) ? value : 0;
    } catch (error: unknown) {
      this.degraded("get", key, error);
      return 0;
    }
  }

  private async remainingWindow(key: string, rule: RateLimitRule): Promise<number> {
    try {
      const ttl = await this.store.ttl(key);
      return ttl !== undefined && ttl > 0 ? Math.min(ttl, rule.window) : rule.window;
    } catch (error: unknown) {
      this.degraded("ttl", key, error);
      return rule.window;
    }
  }

  private degraded(operation: string, key: string, error: unknown): void {
    this.eventBus.emit("StorageDegradedEvent", { tier: "cache", operation, key, error: toError(error).message });
  }
}
