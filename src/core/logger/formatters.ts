/**
 * Logger Formatters
 */

import pino from "pino";
import { LoggerConfig } from "./config";

export type PinoFormatters = NonNullable<pino.LoggerOptions["formatters"]>;

export function createFormatter(config: LoggerConfig): PinoFormatters {
  return {
    log: (obj: Record<string, unknown>) => {
      if (config.source && obj.source === undefined) {
        obj.source = config.source;
      }

      // Correlate model calls by request id when no explicit correlation id is set
      if (obj.correlationId === undefined && obj.requestId !== undefined) {
        obj.correlationId = obj.requestId;
      }

      return obj;
    },
  };
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  return `${Math.floor(ms / 60000)}m ${Math.round((ms % 60000) / 1000)}s`;
}
