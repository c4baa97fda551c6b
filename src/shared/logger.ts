/* eslint-disable no-console */
// Console output mirrors structured logs locally while shipping them to Better Stack.
import { LOG_LEVELS, type LogLevel, monitoringConfig } from "./config/monitoring";

export type LoggerScope = "sensor" | "fusion" | "probe" | "runtime";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  scope: LoggerScope;
};

type LogtailAdapter = {
  log: (message: string, level: LogLevel, metadata: LoggerMetadata) => Promise<void>;
  flush: () => Promise<void>;
};

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
};

// The client is driven through Reflect so metadata can stay `unknown`-valued.
const readMethod = (client: unknown, name: "log" | "flush"): Function | null => {
  if (typeof client !== "object" || client === null) {
    return null;
  }
  const method: unknown = Reflect.get(client, name);
  return typeof method === "function" ? method : null;
};

const createLogtailAdapter = (client: unknown): LogtailAdapter => {
  const log = readMethod(client, "log");
  const flush = readMethod(client, "flush");

  return {
    log: async (message, level, metadata) => {
      if (!log) {
        return;
      }
      await Reflect.apply(log, client, [
        message,
        level === "fatal" ? "error" : level,
        metadata,
      ]);
    },
    flush: async () => {
      if (!flush) {
        return;
      }
      await Reflect.apply(flush, client, []);
    },
  };
};

let logtailInstance: Promise<LogtailAdapter | null> | null = null;

const loadLogtail = (): Promise<LogtailAdapter | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return Promise.resolve(null);
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail } = await import("@logtail/node");
      return createLogtailAdapter(new Logtail(monitoringConfig.logtail.token));
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

const emitLogtail = async (
  message: string,
  level: LogLevel,
  metadata: LoggerMetadata,
) => {
  const instance = await loadLogtail();
  if (!instance) {
    return;
  }
  await instance.log(message, level, metadata);
};

const isEnabled = (level: LogLevel): boolean =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(monitoringConfig.logLevel);

const createEmitter =
  ({ module, scope }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    if (!isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const enrichedMetadata = {
      ...metadata,
      module,
      scope,
      environment: monitoringConfig.environment,
      timestamp,
      level,
    };

    consoleWriters[level](
      `[${timestamp}] [${level.toUpperCase()}] ${message}`,
      enrichedMetadata,
    );

    if (monitoringConfig.logtail.enabled) {
      emitLogtail(message, level, enrichedMetadata).catch((error: unknown) => {
        console.error("Failed to send log to Better Stack", error);
      });
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush();
  };

  return {
    debug: createEmitter(options, "debug"),
    info: createEmitter(options, "info"),
    warn: createEmitter(options, "warn"),
    error: createEmitter(options, "error"),
    fatal: createEmitter(options, "fatal"),
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string, scope: LoggerScope): Logger => {
  const cacheKey = `${scope}:${module}`;

  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, scope });
  loggerCache.set(cacheKey, logger);
  return logger;
};
