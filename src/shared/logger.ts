/* eslint-disable no-console */
// Console output mirrors the structured entries locally while they are shipped to Better Stack.
import { type MonitoringConfig, getMonitoringConfig } from "./config/monitoring.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LoggerMetadata = Record<string, unknown>;

export type LoggerOptions = {
  module: string;
  level?: LogLevel;
  monitoring?: MonitoringConfig;
};

type LogtailAdapter = {
  log: (message: string, level: LogLevel, metadata: LoggerMetadata) => Promise<void>;
  flush?: () => Promise<void>;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && value in LEVEL_RANK;
};

export const toErrorPayload = (error: unknown) => {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
  }
  return {
    message: String(error),
    name: "NonErrorThrown",
    stack: undefined,
  };
};

const createLogtailAdapter = (client: unknown): LogtailAdapter => {
  const logtailClient = client as {
    log?: unknown;
    flush?: unknown;
  };

  const log = async (
    message: string,
    level: LogLevel,
    metadata: LoggerMetadata,
  ) => {
    if (typeof logtailClient.log !== "function") {
      return;
    }

    // Logtail has no fatal level.
    const logtailLevel = level === "fatal" ? "error" : level;
    await Reflect.apply(logtailClient.log, logtailClient, [
      message,
      logtailLevel,
      metadata,
    ]);
  };

  const flushFn = logtailClient.flush;
  const flush =
    typeof flushFn === "function"
      ? async () => {
          await Reflect.apply(flushFn, logtailClient, []);
        }
      : undefined;

  return { log, flush };
};

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
  fatal: (...args) => console.error(...args),
};

const formatConsolePayload = (
  level: LogLevel,
  message: string,
  metadata?: LoggerMetadata,
) => {
  const timestamp = new Date().toISOString();
  return [
    `[${timestamp}] [${level.toUpperCase()}] ${message}`,
    metadata ?? {},
  ] as const;
};

export const createLogger = (options: LoggerOptions) => {
  const { module } = options;
  const minRank = LEVEL_RANK[options.level ?? "info"];
  const monitoring = options.monitoring ?? getMonitoringConfig();

  let logtailInstance: Promise<LogtailAdapter | null> | null = null;

  const loadLogtail = (): Promise<LogtailAdapter | null> => {
    if (!monitoring.logtail.enabled) {
      return Promise.resolve(null);
    }
    if (logtailInstance) {
      return logtailInstance;
    }

    logtailInstance = (async () => {
      try {
        const { Logtail } = await import("@logtail/node");
        const client = new Logtail(monitoring.logtail.token);
        return createLogtailAdapter(client);
      } catch (error) {
        console.error("Failed to initialise Better Stack Logtail client", error);
        return null;
      }
    })();
    return logtailInstance;
  };

  const emitLogtail = async (
    level: LogLevel,
    message: string,
    metadata: LoggerMetadata,
  ) => {
    const instance = await loadLogtail();
    if (!instance) {
      return;
    }
    await instance.log(message, level, metadata);
  };

  const createEmitter =
    (level: LogLevel) =>
    (message: string, metadata: LoggerMetadata = {}) => {
      if (LEVEL_RANK[level] < minRank) {
        return;
      }

      const enrichedMetadata = {
        ...metadata,
        module,
        environment: monitoring.environment,
        timestamp: new Date().toISOString(),
        level,
      };

      const [consoleMessage, consoleMetadata] = formatConsolePayload(
        level,
        message,
        enrichedMetadata,
      );

      consoleWriters[level](consoleMessage, consoleMetadata);

      if (monitoring.logtail.enabled) {
        emitLogtail(level, message, enrichedMetadata).catch((error: unknown) => {
          console.error("Failed to send log to Better Stack", error);
        });
      }
    };

  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush?.();
  };

  return {
    debug: createEmitter("debug"),
    info: createEmitter("info"),
    warn: createEmitter("warn"),
    error: createEmitter("error"),
    fatal: createEmitter("fatal"),
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;
