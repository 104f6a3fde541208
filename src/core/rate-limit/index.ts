export { RateLimiter } from "./rateLimiter";
export type { RateLimitScope, RateLimitOutcome, RateLimitInfo, RateLimiterDeps } from "./rateLimiter";
export { RateLimitRules, DEFAULT_RATE_LIMIT_RULES } from "./rules";
export type { RateLimitRule } from "./rules";
