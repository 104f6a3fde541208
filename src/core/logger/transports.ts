/**
 * Logger Transports
 * Pino transport configurations for different output targets
 */

import pino from "pino";
import { LoggerConfig } from "./config";

/**
 * Pretty console output for development
 */
export function createPrettyTransport(config: LoggerConfig): pino.TransportTargetOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
    level: config.level,
  };
}

/**
 * Plain JSON lines on stdout
 */
export function createStdoutTransport(config: LoggerConfig): pino.TransportTargetOptions {
  return {
    target: "pino/file",
    options: { destination: 1 },
    level: config.level,
  };
}

/**
 * JSON lines appended to `LOG_FILE`
 */
export function createFileTransport(filePath: string, level: LoggerConfig["level"]): pino.TransportTargetOptions {
  return {
    target: "pino/file",
    options: {
      destination: filePath,
      mkdir: true,
      sync: false,
    },
    level,
  };
}

export function createTransportTargets(config: LoggerConfig): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [
    config.format === "pretty" ? createPrettyTransport(config) : createStdoutTransport(config),
  ];
  if (config.file) {
    targets.push(createFileTransport(config.file, config.level));
  }
  return targets;
}
