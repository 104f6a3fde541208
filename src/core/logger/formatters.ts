/**
 * Logger Formatters
 * Custom Pino formatters for structured logging
 */

import pino from "pino";
import { LoggerConfig } from "./config";

/**
 * Create Pino formatters based on configuration.
 * Level labels only apply to direct destinations: transport workers route
 * lines by the numeric level.
 */
export function createFormatter(
  config: LoggerConfig,
  options: { levelLabels?: boolean } = {}
): NonNullable<pino.LoggerOptions["formatters"]> {
  const log = (obj: Record<string, unknown>) => {
    if (config.source) {
      obj.source = config.source;
    }

    // Correlate guard events with the request that caused them
    if (!obj.correlationId && obj.requestId) {
      obj.correlationId = obj.requestId;
    }

    return obj;
  };

  if (!options.levelLabels) {
    return { log };
  }
  return {
    level: (label: string) => {
      return { level: label };
    },
    log,
  };
}

/**
 * Render a duration in seconds the way notifications and CLI output show it
 */
export function formatSeconds(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  } else if (seconds < 3600) {
    return `${Math.ceil(seconds / 60)}m`;
  }
  const totalMinutes = Math.ceil(seconds / 60);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
}

/**
 * Format an epoch-seconds timestamp as `YYYY-MM-DD HH:MM:SS` (UTC)
 */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 19).replace("T", " ");
}
