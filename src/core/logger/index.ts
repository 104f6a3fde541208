export { SentinelLogger, sanitizeSecurityDetails } from "./logger";
export type { LoggerContext } from "./logger";
export * from "./config";
export { formatSeconds, formatTimestamp } from "./formatters";
