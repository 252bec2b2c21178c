/**
 * Logger Service
 *
 * Structured logging with sensitive field redaction.
 *
 * @example
 * ```typescript
 * import { getLogger, initLogger } from '@otc/core';
 *
 * initLogger({ level: 'debug', serviceName: 'crm-sync' });
 *
 * const logger = getLogger().child({ component: 'sync' });
 * logger.info('Synced contacts', { count: 12 });
 * ```
 */

export {
  createLogger,
  getLogger,
  initLogger,
  getDefaultLoggerConfig,
} from "./logger";

export type {
  Logger,
  LogLevel,
  LogContext,
  LoggerConfig,
  LogEntry,
  ErrorContext,
  ExternalServiceContext,
} from "./types";

export { DEFAULT_REDACT_FIELDS } from "./types";
