/**
 * Logger Types
 *
 * Type definitions for the structured logging system.
 */

/**
 * Log levels supported by the logger
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Base context included with every log entry
 */
export interface LogContext {
  /** Component that produced the entry */
  component?: string;
  /** Resource facade the entry came from */
  resource?: string;
  /** Environment (development, staging, production) */
  environment?: string;
  /** Additional custom fields */
  [key: string]: unknown;
}

/**
 * Error context for error logging
 */
export interface ErrorContext {
  /** Error name */
  name: string;
  /** Error message */
  message: string;
  /** Stack trace */
  stack?: string;
  /** Error code (if available) */
  code?: string | number;
  /** Original error cause */
  cause?: unknown;
}

/**
 * External service call context
 */
export interface ExternalServiceContext {
  /** Service name */
  service: string;
  /** Endpoint/method called */
  endpoint?: string;
  /** Request duration in milliseconds */
  duration?: number;
  /** HTTP status code (if applicable) */
  statusCode?: number;
  /** Whether the call succeeded */
  success?: boolean;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Service name for log context */
  serviceName: string;
  /** Environment name */
  environment: string;
  /** Application version */
  version?: string;
  /** Whether to pretty print logs (development only) */
  prettyPrint?: boolean;
  /** Fields to redact from logs */
  redactFields?: string[];
  /** Additional default context */
  defaultContext?: LogContext;
}

/**
 * Logger interface
 */
export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext & { error?: Error | ErrorContext }): void;
  fatal(message: string, context?: LogContext & { error?: Error | ErrorContext }): void;

  /** Create a child logger with additional context */
  child(context: LogContext): Logger;

  /** Log an outbound call to the provider */
  externalService(context: ExternalServiceContext & LogContext): void;
}

/**
 * Default fields to redact. Matching is case-insensitive and by substring,
 * so `token` also covers the `api_token` query parameter.
 */
export const DEFAULT_REDACT_FIELDS = [
  // Authentication
  "password",
  "secret",
  "apiKey",
  "api_key",
  "token",
  "jwt",
  "bearer",
  "authorization",

  // Personal Identifiable Information
  "ssn",
  "socialSecurityNumber",
  "social_security_number",
  "taxId",
  "tax_id",
  "driverLicense",
  "driver_license",

  // Financial Information
  "accountNumber",
  "account_number",
  "routingNumber",
  "routing_number",
  "cardNumber",
  "card_number",

  // Other Sensitive Data
  "privateKey",
  "private_key",
  "cookie",
];

/**
 * Log entry structure (for JSON output)
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service: string;
  environment: string;
  version?: string;
  hostname?: string;
  error?: ErrorContext;
  externalService?: ExternalServiceContext;
  [key: string]: unknown;
}
