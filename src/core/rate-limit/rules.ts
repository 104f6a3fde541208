/**
 * Rate limit rule table.
 * One instance is built at start-up and handed to whoever needs it; nothing
 * here is module-level state.
 */

import { ValidationError } from "../errors";

export interface RateLimitRule {
  limit: number;
  /** Window length in seconds */
  window: number;
}

export const DEFAULT_RATE_LIMIT_RULES: Readonly<Record<string, RateLimitRule>> = {
  message_send: { limit: 10, window: 300 },
  profile_view: { limit: 100, window: 3600 },
  search_request: { limit: 50, window: 3600 },
  like_action: { limit: 50, window: 3600 },
  profile_update: { limit: 5, window: 300 },
  photo_upload: { limit: 10, window: 3600 },
  // keyed by IP only
  registration: { limit: 3, window: 3600 },
  login_attempt: { limit: 5, window: 900 },
};

export class RateLimitRules {
  private rules = new Map<string, RateLimitRule>();

  constructor(initial: Record<string, RateLimitRule> = DEFAULT_RATE_LIMIT_RULES) {
    for (const [action, rule] of Object.entries(initial)) {
      this.rules.set(action, { ...rule });
    }
  }

  get(action: string): RateLimitRule | undefined {
    const rule = this.rules.get(action);
    return rule ? { ...rule } : undefined;
  }

  has(action: string): boolean {
    return this.rules.has(action);
  }

  /**
   * Replace (or add) the rule for one action. Other actions are untouched.
   */
  update(action: string, limit: number, window: number): RateLimitRule {
    if (!action) {
      throw new ValidationError("action name is required");
    }
    const rule = { limit: Math.trunc(limit), window: Math.trunc(window) };
    if (!Number.isFinite(rule.limit) || rule.limit < 0 || !Number.isFinite(rule.window) || rule.window <= 0) {
      throw new ValidationError("limit must be >= 0 and window > 0", { action, limit, window });
    }
    this.rules.set(action, rule);
    return { ...rule };
  }

  /** Copy of the whole table */
  all(): Record<string, RateLimitRule> {
    const out: Record<string, RateLimitRule> = {};
    for (const [action, rule] of this.rules) {
      out[action] = { ...rule };
    }
    return out;
  }
}
