/**
 * Open To Close error taxonomy
 *
 * Every failure the client can surface is an `OpenToCloseAPIError`, so
 * callers can catch broadly or narrowly. Errors are logged the moment they
 * are constructed; nothing is buffered or retried.
 */

import type { HttpMethod } from "@otc/types";
import { getLogger, type Logger } from "../logger";

// ---------------------------------------------------------------------------
// Shapes
// ---------------------------------------------------------------------------

/** A field-scoped validation problem */
export interface FieldError {
  field: string;
  message: string;
}

export interface OpenToCloseErrorOptions {
  /** HTTP status code, when a response was received */
  statusCode?: number;
  /** Decoded (or raw-text-wrapped) response body */
  responseData?: unknown;
  endpoint?: string;
  method?: HttpMethod;
  /** Underlying failure, e.g. the fetch rejection */
  cause?: unknown;
  /** Logger the construction-time report goes to */
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export class OpenToCloseAPIError extends Error {
  public readonly statusCode?: number;
  public readonly responseData?: unknown;
  public readonly endpoint?: string;
  public readonly method?: HttpMethod;

  /** Timestamp of error creation (ms since epoch). */
  public readonly timestamp: number;

  constructor(
    message: string,
    options: OpenToCloseErrorOptions = {},
    details: Record<string, unknown> = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = new.target.name;
    this.statusCode = options.statusCode;
    this.responseData = options.responseData;
    this.endpoint = options.endpoint;
    this.method = options.method;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    (options.logger ?? getLogger()).error(`${this.name}: ${message}`, {
      ...this.toLog(),
      ...details,
    });
  }

  /**
   * Build a log-friendly object for structured logging.
   */
  toLog(): Record<string, unknown> {
    const cause = this.cause instanceof Error
      ? { name: this.cause.name, message: this.cause.message }
      : this.cause;
    return {
      errorName: this.name,
      statusCode: this.statusCode,
      endpoint: this.endpoint,
      method: this.method,
      responseData: this.responseData,
      cause,
      timestamp: new Date(this.timestamp).toISOString(),
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      endpoint: this.endpoint,
      method: this.method,
      responseData: this.responseData,
    };
  }
}

// ---------------------------------------------------------------------------
// Kinds
// ---------------------------------------------------------------------------

/** Rejected locally before any call, or a 400 from the provider */
export class ValidationError extends OpenToCloseAPIError {
  public readonly fieldErrors: FieldError[];

  constructor(
    message: string,
    options: OpenToCloseErrorOptions & { fieldErrors?: FieldError[] } = {}
  ) {
    const { fieldErrors = [], ...rest } = options;
    super(message, rest, { fieldErrors });
    this.fieldErrors = fieldErrors;
  }
}

/** 401, or no credential could be resolved */
export class AuthenticationError extends OpenToCloseAPIError {}

/** 404 */
export class NotFoundError extends OpenToCloseAPIError {}

/** 429 */
export class RateLimitError extends OpenToCloseAPIError {
  /** Seconds the provider asked callers to wait, from `Retry-After` */
  public readonly retryAfter?: number;

  constructor(
    message: string,
    options: OpenToCloseErrorOptions & { retryAfter?: number } = {}
  ) {
    const { retryAfter, ...rest } = options;
    super(message, rest, { retryAfter });
    this.retryAfter = retryAfter;
  }
}

/** 5xx */
export class ServerError extends OpenToCloseAPIError {}

/** No response was received at all */
export class NetworkError extends OpenToCloseAPIError {}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isOpenToCloseAPIError(
  value: unknown
): value is OpenToCloseAPIError {
  return value instanceof OpenToCloseAPIError;
}

/** Phrase that opens a server-reported error message */
export function describeStatus(statusCode: number): string {
  if (statusCode === 400) return "Bad request";
  if (statusCode === 401) return "Authentication failed";
  if (statusCode === 404) return "Resource not found";
  if (statusCode === 429) return "Rate limit exceeded";
  if (statusCode >= 500 && statusCode < 600) return "Server error";
  return "Unexpected error";
}

/** Detail used when the body carries no message */
export function defaultDetail(statusCode: number): string {
  if (statusCode === 400) return "Invalid request";
  if (statusCode === 401) return "Invalid credentials";
  if (statusCode === 404) return "Not found";
  if (statusCode === 429) return "Too many requests";
  if (statusCode >= 500 && statusCode < 600) return "Internal server error";
  return "Unknown error";
}

/**
 * Normalize a provider `errors` / `field_errors` payload. Accepts either a
 * list of `{ field, message }` objects or a map of field → message(s).
 */
export function toFieldErrors(raw: unknown): FieldError[] | undefined {
  if (Array.isArray(raw)) {
    const errors: FieldError[] = [];
    for (const item of raw) {
      if (typeof item === "string") {
        errors.push({ field: "", message: item });
      } else if (typeof item === "object" && item !== null) {
        const field = "field" in item && typeof item.field === "string" ? item.field : "";
        const message =
          "message" in item && typeof item.message === "string"
            ? item.message
            : JSON.stringify(item);
        errors.push({ field, message });
      }
    }
    return errors.length > 0 ? errors : undefined;
  }

  if (typeof raw === "object" && raw !== null) {
    const errors: FieldError[] = [];
    for (const [field, value] of Object.entries(raw)) {
      const messages = Array.isArray(value) ? value : [value];
      for (const message of messages) {
        errors.push({
          field,
          message: typeof message === "string" ? message : JSON.stringify(message),
        });
      }
    }
    return errors.length > 0 ? errors : undefined;
  }

  return undefined;
}

/**
 * Build the taxonomy member for a non-success status code.
 */
export function errorForStatus(
  statusCode: number,
  message: string,
  options: OpenToCloseErrorOptions & {
    fieldErrors?: FieldError[];
    retryAfter?: number;
  } = {}
): OpenToCloseAPIError {
  const { fieldErrors, retryAfter, ...rest } = options;
  const base = { ...rest, statusCode };

  if (statusCode === 400) return new ValidationError(message, { ...base, fieldErrors });
  if (statusCode === 401) return new AuthenticationError(message, base);
  if (statusCode === 404) return new NotFoundError(message, base);
  if (statusCode === 429) return new RateLimitError(message, { ...base, retryAfter });
  if (statusCode >= 500 && statusCode < 600) return new ServerError(message, base);
  return new OpenToCloseAPIError(message, base);
}
