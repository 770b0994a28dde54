/**
 * modelhub logger - Pino-based structured logging
 *
 * - JSON to stderr, pino-pretty in development, optional file output
 * - EventBus integration: provider and model events become log lines
 * - child loggers share the root pino instance and its subscriptions
 */

import pino from "pino";
import { EventBus, EventEnvelope, EventType, Unsubscribe } from "../eventBus";
import { LoggerConfig, createLoggerConfig, LogLevel } from "./config";
import { createFormatter, formatDuration } from "./formatters";
import { createTransportTargets } from "./transports";

export interface LoggerContext {
  providerId?: string;
  modelId?: string;
  requestId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

type EventLogLevel = "debug" | "info" | "warn" | "error";

const EVENT_MAPPINGS: ReadonlyArray<{ event: EventType; level: EventLogLevel; message: string }> = [
  { event: "ProviderRegisteredEvent", level: "debug", message: "Provider registered" },
  { event: "ProviderRemovedEvent", level: "debug", message: "Provider removed" },
  { event: "ProviderStateChangedEvent", level: "info", message: "Provider state changed" },
  { event: "ActiveModelChangedEvent", level: "info", message: "Active model changed" },
  { event: "ModelRequestEvent", level: "debug", message: "Model request started" },
  { event: "ModelResponseEvent", level: "debug", message: "Model responded" },
  { event: "ModelErrorEvent", level: "warn", message: "Model error" },
  { event: "ModelLoadEvent", level: "debug", message: "Model warm-up finished" },
  { event: "SettingsChangedEvent", level: "info", message: "Settings changed" },
  { event: "ListenerErrorEvent", level: "error", message: "Event listener failed" },
];

function createPinoLogger(config: LoggerConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    formatters: createFormatter(config),
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (config.level === "silent") {
    return pino(options);
  }

  const targets = createTransportTargets(config);
  if (targets.length === 0) {
    return pino(options, pino.destination({ dest: 2, sync: true }));
  }
  return pino(options, pino.transport({ targets }));
}

export class ModelHubLogger {
  private readonly pinoLogger: pino.Logger;
  private readonly config: LoggerConfig;
  private readonly subscriptions: Unsubscribe[] = [];

  constructor(
    private readonly eventBus: EventBus,
    config: Partial<LoggerConfig> = {},
    parent?: pino.Logger
  ) {
    this.config = createLoggerConfig(config);

    if (parent) {
      this.pinoLogger = parent;
    } else {
      this.pinoLogger = createPinoLogger(this.config);
      this.setupEventBusIntegration();
    }
  }

  /**
   * Logger that drops everything; used where no hub logger is wired
   */
  static silent(eventBus: EventBus = new EventBus()): ModelHubLogger {
    return new ModelHubLogger(eventBus, { level: "silent" });
  }

  child(context: LoggerContext): ModelHubLogger {
    return new ModelHubLogger(this.eventBus, this.config, this.pinoLogger.child(context));
  }

  get level(): LogLevel {
    return this.config.level;
  }

  isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  trace(message: string, context?: LoggerContext): void {
    this.pinoLogger.trace(context ?? {}, message);
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  startTimer(name: string, context?: LoggerContext): () => number {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.debug(`Timer: ${name} (${formatDuration(duration)})`, { ...context, duration, timer: name });
      return duration;
    };
  }

  /**
   * Model interaction tracing
   */
  traceModelCall(
    telemetryId: string,
    outcome: { durationMs: number; deltaCount: number; characters: number; error?: string },
    context?: LoggerContext
  ): void {
    const level = outcome.error ? "warn" : "debug";
    this.pinoLogger[level](
      { ...context, telemetryId, ...outcome, type: "model_call" },
      `Completion ${telemetryId} ${outcome.error ? "failed" : "finished"} (${formatDuration(outcome.durationMs)})`
    );
  }

  async flush(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.pinoLogger.flush((error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Detach from the EventBus. Children share the root's subscriptions.
   */
  dispose(): void {
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
  }

  private setupEventBusIntegration(): void {
    for (const { event, level, message } of EVENT_MAPPINGS) {
      this.subscriptions.push(
        this.eventBus.on(event, (evt: EventEnvelope) => {
          this.pinoLogger[level](
            { event, payload: evt.payload, type: "eventbus", correlationId: evt.id },
            message
          );
        })
      );
    }
  }
}

/**
 * Global logger instance
 */
let globalLogger: ModelHubLogger | null = null;

export function initializeLogger(eventBus: EventBus, config: Partial<LoggerConfig> = {}): ModelHubLogger {
  globalLogger?.dispose();
  globalLogger = new ModelHubLogger(eventBus, config);
  return globalLogger;
}

export function getLogger(): ModelHubLogger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return globalLogger;
}

export function createContextualLogger(context: LoggerContext): ModelHubLogger {
  return getLogger().child(context);
}

export { LoggerConfig, LogLevel, LogFormat, parseLogLevel, parseLogFormat } from "./config";
