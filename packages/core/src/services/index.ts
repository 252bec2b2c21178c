/**
 * Service Integrations
 *
 * - Open To Close: real-estate transaction management API
 * - Logger: Structured logging
 */

// Observability Services
export * as logger from "./logger";
export {
  createLogger,
  getLogger,
  initLogger,
  getDefaultLoggerConfig,
  DEFAULT_REDACT_FIELDS,
} from "./logger";

export type {
  Logger,
  LogLevel,
  LogContext,
  LoggerConfig,
  LogEntry,
  ErrorContext,
  ExternalServiceContext,
} from "./logger";

// Open To Close
export * from "./opentoclose";
