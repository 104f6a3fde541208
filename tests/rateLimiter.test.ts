/**
 * Rate Limiter Tests
 */

import { EventBus } from "../src/core/eventBus";
import { ValidationError } from "../src/core/errors";
import { ClientIdentityResolver } from "../src/core/identity/clientIdentity";
import { RateLimiter } from "../src/core/rate-limit/rateLimiter";
import { RateLimitRules } from "../src/core/rate-limit/rules";
import { ExpiringStore, IncrementResult } from "../src/core/storage/expiringStore";
import { createHarness, request } from "./helpers";

class BrokenStore implements ExpiringStore {
  async get(): Promise<unknown> {
    throw new Error("cache down");
  }
  async set(): Promise<void> {
    throw new Error("cache down");
  }
  async delete(): Promise<void> {
    throw new Error("cache down");
  }
  async ttl(): Promise<number | undefined> {
    throw new Error("cache down");
  }
  async increment(): Promise<number> {
    throw new Error("cache down");
  }
  async incrementIfBelow(): Promise<IncrementResult> {
    throw new Error("cache down");
  }
}

describe("RateLimiter", () => {
  let h: ReturnType<typeof createHarness>;
  const scope = { identifier: "client-a" };

  beforeEach(() => {
    h = createHarness();
  });

  describe("applyRateLimit", () => {
    test("allows up to the limit, then refuses without counting", async () => {
      const remaining: number[] = [];
      for (let i = 0; i < 5; i++) {
        const outcome = await h.limiter.applyRateLimit("profile_update", scope);
        if (!outcome.success) throw new Error("unexpected refusal");
        remaining.push(outcome.remainingAttempts);
      }
      expect(remaining).toEqual([4, 3, 2, 1, 0]);

      expect(await h.limiter.applyRateLimit("profile_update", scope)).toEqual({
        success: false,
        message: "Rate limit exceeded. Please try again in 5 minutes.",
        retryAfter: 300,
      });
      expect(await h.cache.get("rate_limit_profile_update_client-a")).toBe(5);
    });

    test("a refusal does not push the reset time back", async () => {
      for (let i = 0; i < 5; i++) await h.limiter.applyRateLimit("profile_update", scope);

      h.clock.advance(100);
      expect(await h.limiter.applyRateLimit("profile_update", scope)).toEqual({
        success: false,
        message: "Rate limit exceeded. Please try again in 4 minutes.",
        retryAfter: 200,
      });

      h.clock.advance(200);
      expect(await h.limiter.applyRateLimit("profile_update", scope)).toEqual({
        success: true,
        remainingAttempts: 4,
      });
    });

    test("emits RateLimitedEvent on refusal", async () => {
      for (let i = 0; i < 6; i++) await h.limiter.applyRateLimit("profile_update", scope);

      const events = h.eventBus.getHistory({ type: "RateLimitedEvent" });
      expect(events).toHaveLength(1);
      expect(events[0].payload).toEqual({
        action: "profile_update",
        key: "rate_limit_profile_update_client-a",
        count: 5,
        limit: 5,
        retryAfter: 300,
      });
    });

    test("concurrent callers never exceed the limit", async () => {
      const outcomes = await Promise.all(
        Array.from({ length: 10 }, () => h.limiter.applyRateLimit("profile_update", scope))
      );
      expect(outcomes.filter((o) => o.success)).toHaveLength(5);
    });

    test("unknown actions are never limited", async () => {
      expect(await h.limiter.applyRateLimit("teleport", scope)).toEqual({ success: true, remainingAttempts: 0 });
    });

    test("fails open when the store is down", async () => {
      const eventBus = new EventBus();
      const limiter = new RateLimiter({
        store: new BrokenStore(),
        rules: new RateLimitRules(),
        resolver: new ClientIdentityResolver(),
        eventBus,
      });

      expect(await limiter.applyRateLimit("profile_update", scope)).toEqual({ success: true, remainingAttempts: 5 });
      expect(eventBus.getHistory({ type: "StorageDegradedEvent" })).toHaveLength(1);
      expect(await limiter.isRateLimited("profile_update", scope)).toBe(false);
    });
  });

  describe("counters", () => {
    test("every recorded attempt restarts the window", async () => {
      expect(await h.limiter.recordAttempt("profile_update", scope)).toBe(true);
      h.clock.advance(200);
      await h.limiter.recordAttempt("profile_update", scope);

      expect(await h.limiter.getTimeUntilReset("profile_update", scope)).toBe(300);
      expect(await h.limiter.getRemainingAttempts("profile_update", scope)).toBe(3);
    });

    test("isRateLimited turns on at the limit", async () => {
      for (let i = 0; i < 4; i++) await h.limiter.recordAttempt("profile_update", scope);
      expect(await h.limiter.isRateLimited("profile_update", scope)).toBe(false);

      await h.limiter.recordAttempt("profile_update", scope);
      expect(await h.limiter.isRateLimited("profile_update", scope)).toBe(true);
      expect(await h.limiter.getRemainingAttempts("profile_update", scope)).toBe(0);
    });

    test("with no open window the reset time is the full window", async () => {
      expect(await h.limiter.getTimeUntilReset("profile_update", scope)).toBe(300);
    });

    test("clearRateLimit restores the full allowance", async () => {
      for (let i = 0; i < 5; i++) await h.limiter.recordAttempt("profile_update", scope);
      expect(await h.limiter.clearRateLimit("profile_update", scope)).toBe(true);
      expect(await h.limiter.getRemainingAttempts("profile_update", scope)).toBe(5);
    });

    test("getRateLimitInfo reports the open window", async () => {
      await h.limiter.recordAttempt("profile_update", scope);
      await h.limiter.recordAttempt("profile_update", scope);
      h.clock.advance(60);

      expect(await h.limiter.getRateLimitInfo("profile_update", scope)).toEqual({
        action: "profile_update",
        limit: 5,
        window: 300,
        remainingAttempts: 3,
        isRateLimited: false,
        timeUntilReset: 240,
      });
    });

    test("unknown actions report neutral values", async () => {
      expect(await h.limiter.isRateLimited("teleport", scope)).toBe(false);
      expect(await h.limiter.recordAttempt("teleport", scope)).toBe(false);
      expect(await h.limiter.getRemainingAttempts("teleport", scope)).toBe(0);
      expect(await h.limiter.getTimeUntilReset("teleport", scope)).toBe(0);
      expect(await h.limiter.getRateLimitInfo("teleport", scope)).toBeNull();
    });
  });

  describe("keys", () => {
    test("user scope comes before the identifier", () => {
      expect(h.limiter.key("message_send", { userId: 42, identifier: "abc" })).toBe(
        "rate_limit_message_send_user_42_abc"
      );
    });

    test("a zero or empty user id is not a scope", () => {
      expect(h.limiter.key("message_send", { userId: 0, identifier: "abc" })).toBe("rate_limit_message_send_abc");
      expect(h.limiter.key("message_send", { userId: "", identifier: "abc" })).toBe("rate_limit_message_send_abc");
    });

    test("falls back to the resolved client identity", () => {
      expect(h.limiter.key("registration", { request: request("198.51.100.2") })).toBe(
        "rate_limit_registration_198.51.100.2"
      );
      expect(h.limiter.key("registration", {})).toBe("rate_limit_registration_127.0.0.1");
    });

    test("users are limited independently", async () => {
      for (let i = 0; i < 5; i++) {
        await h.limiter.applyRateLimit("profile_update", { userId: "1", identifier: "shared" });
      }
      expect(await h.limiter.isRateLimited("profile_update", { userId: "1", identifier: "shared" })).toBe(true);
      expect(await h.limiter.isRateLimited("profile_update", { userId: "2", identifier: "shared" })).toBe(false);
    });
  });

  describe("rules", () => {
    test("updateRule replaces one rule and leaves the rest", () => {
      expect(h.limiter.updateRule("profile_update", 2, 60)).toEqual({ limit: 2, window: 60 });
      expect(h.limiter.getRule("profile_update")).toEqual({ limit: 2, window: 60 });
      expect(h.limiter.getRule("message_send")).toEqual({ limit: 10, window: 300 });
    });

    test("updateRule can add a new action", () => {
      h.limiter.updateRule("comment_post", 3, 120);
      expect(h.limiter.getRules().comment_post).toEqual({ limit: 3, window: 120 });
    });

    test("rejects a non-positive window", () => {
      expect(() => h.limiter.updateRule("profile_update", 5, 0)).toThrow(ValidationError);
      expect(() => h.limiter.updateRule("profile_update", -1, 60)).toThrow(
        "Validation failed: limit must be >= 0 and window > 0"
      );
    });

    test("a new rule applies to the next call", async () => {
      h.limiter.updateRule("profile_update", 1, 60);
      await h.limiter.applyRateLimit("profile_update", scope);

      const outcome = await h.limiter.applyRateLimit("profile_update", scope);
      expect(outcome).toEqual({
        success: false,
        message: "Rate limit exceeded. Please try again in 1 minutes.",
        retryAfter: 60,
      });
    });

    test("the rule table is copied, not shared", () => {
      const rules = h.limiter.getRules();
      rules.profile_update.limit = 999;
      expect(h.limiter.getRule("profile_update")).toEqual({ limit: 5, window: 300 });
    });
  });
});
