/**
 * Structured Logger
 *
 * Structured logging with:
 * - JSON output for log aggregation
 * - Pretty output in development
 * - Sensitive field redaction (the API token travels in the query string)
 * - Child loggers carrying default context
 */

import { hostname } from "os";
import type {
  Logger,
  LoggerConfig,
  LogContext,
  LogLevel,
  ErrorContext,
  ExternalServiceContext,
  LogEntry,
} from "./types";
import { DEFAULT_REDACT_FIELDS } from "./types";

/**
 * Log level numeric values for comparison
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const ENTRY_FIELDS = [
  "level",
  "message",
  "timestamp",
  "service",
  "environment",
  "version",
  "hostname",
];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/**
 * Get hostname safely
 */
function getHostname(): string {
  try {
    return process.env.HOSTNAME || hostname() || "unknown";
  } catch {
    return "unknown";
  }
}

function shouldRedactKey(key: string, redactFields: string[]): boolean {
  const lowerKey = key.toLowerCase();
  return redactFields.some((field) => lowerKey.includes(field.toLowerCase()));
}

/**
 * Deep clone and redact sensitive fields
 */
function redactValue(
  value: unknown,
  redactFields: string[],
  seen: WeakSet<object>
): unknown {
  if (typeof value !== "object" || value === null) {
    return value;
  }

  // Handle circular references
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, redactFields, seen));
  }

  return redactRecord(Object.entries(value), redactFields, seen);
}

function redactRecord(
  entries: Array<[string, unknown]>,
  redactFields: string[],
  seen: WeakSet<object> = new WeakSet()
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    result[key] = shouldRedactKey(key, redactFields)
      ? "[REDACTED]"
      : redactValue(value, redactFields, seen);
  }
  return result;
}

/**
 * Format error for logging
 */
function formatError(error: Error | ErrorContext): ErrorContext {
  if (error instanceof Error) {
    const code =
      "code" in error &&
      (typeof error.code === "string" || typeof error.code === "number")
        ? error.code
        : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code,
      cause: error.cause,
    };
  }
  return error;
}

/**
 * Create a log entry
 */
function createLogEntry(
  level: LogLevel,
  message: string,
  config: LoggerConfig,
  context?: LogContext,
  additionalFields?: Record<string, unknown>
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    service: config.serviceName,
    environment: config.environment,
    version: config.version,
    hostname: getHostname(),
    ...context,
    ...additionalFields,
  };
}

/**
 * Output log entry
 */
function outputLog(entry: LogEntry, config: LoggerConfig): void {
  const redacted = redactRecord(
    Object.entries(entry),
    config.redactFields || DEFAULT_REDACT_FIELDS
  );
  const toStderr = entry.level === "error" || entry.level === "fatal";

  if (config.prettyPrint) {
    const colors: Record<LogLevel, string> = {
      trace: "\x1b[90m",
      debug: "\x1b[36m",
      info: "\x1b[32m",
      warn: "\x1b[33m",
      error: "\x1b[31m",
      fatal: "\x1b[35m",
    };
    const reset = "\x1b[0m";
    const color = colors[entry.level];

    const time = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.level.toUpperCase().padEnd(5);
    let output = `${color}[${time}] ${level}${reset} ${entry.message}`;

    const contextKeys = Object.keys(redacted).filter(
      (k) => !ENTRY_FIELDS.includes(k)
    );
    if (contextKeys.length > 0) {
      const contextObj: Record<string, unknown> = {};
      for (const key of contextKeys) {
        contextObj[key] = redacted[key];
      }
      output += ` ${JSON.stringify(contextObj, null, 2)}`;
    }

    if (toStderr) {
      console.error(output);
    } else {
      console.log(output);
    }
    return;
  }

  // JSON output for production
  const output = JSON.stringify(redacted);
  if (toStderr) {
    console.error(output);
  } else {
    console.log(output);
  }
}

/**
 * Check if log level should be output
 */
function shouldLog(level: LogLevel, configLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[configLevel];
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  const log = (
    level: LogLevel,
    message: string,
    context?: LogContext,
    additionalFields?: Record<string, unknown>
  ): void => {
    if (!shouldLog(level, config.level)) {
      return;
    }

    const mergedContext = {
      ...config.defaultContext,
      ...context,
    };

    outputLog(
      createLogEntry(level, message, config, mergedContext, additionalFields),
      config
    );
  };

  const logWithError = (
    level: "error" | "fatal",
    message: string,
    context?: LogContext & { error?: Error | ErrorContext }
  ): void => {
    const { error, ...rest } = context || {};
    log(level, message, rest, error ? { error: formatError(error) } : {});
  };

  return {
    trace(message: string, context?: LogContext): void {
      log("trace", message, context);
    },

    debug(message: string, context?: LogContext): void {
      log("debug", message, context);
    },

    info(message: string, context?: LogContext): void {
      log("info", message, context);
    },

    warn(message: string, context?: LogContext): void {
      log("warn", message, context);
    },

    error(message, context): void {
      logWithError("error", message, context);
    },

    fatal(message, context): void {
      logWithError("fatal", message, context);
    },

    child(additionalContext: LogContext): Logger {
      return createLogger({
        ...config,
        defaultContext: {
          ...config.defaultContext,
          ...additionalContext,
        },
      });
    },

    externalService(context: ExternalServiceContext & LogContext): void {
      const { service, endpoint, duration, statusCode, success, ...rest } =
        context;

      const level: LogLevel =
        success === false || (statusCode !== undefined && statusCode >= 400)
          ? "warn"
          : "debug";

      log(level, `External Service: ${service} ${endpoint || ""}`.trim(), rest, {
        externalService: { service, endpoint, duration, statusCode, success },
      });
    },
  };
}

/**
 * Default logger configuration
 */
export function getDefaultLoggerConfig(
  env: NodeJS.ProcessEnv = process.env
): LoggerConfig {
  const environment = env.NODE_ENV || "development";
  const isDevelopment = environment === "development";
  const level = env.LOG_LEVEL;

  return {
    level: isLogLevel(level) ? level : isDevelopment ? "debug" : "info",
    serviceName: env.SERVICE_NAME || "opentoclose-client",
    environment,
    version: env.APP_VERSION || env.npm_package_version || "0.0.0",
    prettyPrint: isDevelopment,
    redactFields: DEFAULT_REDACT_FIELDS,
  };
}

/**
 * Default logger instance (singleton)
 */
let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger(getDefaultLoggerConfig());
  }
  return defaultLogger;
}

/**
 * Initialize logger with custom config
 */
export function initLogger(config: Partial<LoggerConfig>): Logger {
  defaultLogger = createLogger({
    ...getDefaultLoggerConfig(),
    ...config,
  });
  return defaultLogger;
}
