/**
 * Logger Transports
 * Pino transport targets for the configured outputs
 */

import pino from "pino";
import { LoggerConfig, FileTransportConfig } from "./config";

export function createPrettyTransport(level: string): pino.TransportTargetOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      destination: 2,
    },
    level,
  };
}

export function createFileTransport(config: FileTransportConfig, level: string): pino.TransportTargetOptions {
  return {
    target: "pino/file",
    options: {
      destination: config.path,
      mkdir: true,
    },
    level,
  };
}

/**
 * Worker-thread targets for the config. Empty when plain stderr JSON is enough,
 * which keeps the process free of transport workers.
 */
export function createTransportTargets(config: LoggerConfig): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [];

  if (config.format === "pretty") {
    targets.push(createPrettyTransport(config.level));
  }

  if (config.file?.enabled) {
    if (config.format === "json") {
      targets.push({ target: "pino/file", options: { destination: 2 }, level: config.level });
    }
    targets.push(createFileTransport(config.file, config.level));
  }

  return targets;
}
