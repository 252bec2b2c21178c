/**
 * Pre-flight validation for Open To Close calls
 *
 * Field checks are zod schemas whose messages read as a constraint
 * ("must be a non-empty string"); failures are rendered as
 * `<field> <constraint>, got: <value>` and raised as `ValidationError`.
 */

import { z } from "zod";
import type {
  ApiRecord,
  PayloadOperation,
  QueryParams,
} from "@otc/types";
import { getLogger, type Logger } from "../logger";
import { isRecord } from "./envelope";
import { ValidationError, type FieldError } from "./errors";

export const LARGE_LIMIT_THRESHOLD = 1000;

// ============================================================================
// Field schemas
// ============================================================================

function toInteger(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number(value.trim());
  }
  return undefined;
}

/** Integer or integer-looking string, coerced to a number */
export const integerLikeSchema = z.unknown().transform((value, ctx) => {
  const parsed = toInteger(value);
  if (parsed === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be an integer",
      fatal: true,
    });
    return z.NEVER;
  }
  return parsed;
});

export const positiveIntegerSchema = integerLikeSchema.refine((n) => n > 0, {
  message: "must be a positive integer",
});

export const nonNegativeIntegerSchema = integerLikeSchema.refine(
  (n) => n >= 0,
  { message: "must be non-negative" }
);

export const nonEmptyStringSchema = z
  .string({ invalid_type_error: "must be a non-empty string" })
  .refine((value) => value.trim().length > 0, {
    message: "must be a non-empty string",
  });

export const stringSchema = z.string({ invalid_type_error: "must be a string" });

export const booleanSchema = z.boolean({
  invalid_type_error: "must be a boolean",
});

export const emailAddressSchema = z
  .string({ invalid_type_error: "must be a valid email address" })
  .includes("@", { message: "must be a valid email address" });

export const httpUrlSchema = nonEmptyStringSchema.refine(
  (value) => value.startsWith("http://") || value.startsWith("https://"),
  { message: "must be a valid HTTP/HTTPS URL" }
);

/** `#RGB` or `#RRGGBB` */
export const hexColorSchema = nonEmptyStringSchema.refine(
  (value) => value.startsWith("#") && (value.length === 4 || value.length === 7),
  { message: "must be a valid hex color code (e.g. #FF0000)" }
);

export const nonEmptyStringListSchema = z.array(nonEmptyStringSchema, {
  invalid_type_error: "must be a list",
});

export const emailListSchema = z.array(emailAddressSchema, {
  invalid_type_error: "must be a list",
});

// ============================================================================
// Rules
// ============================================================================

export type FieldSchemas = Record<string, z.ZodTypeAny>;

export interface ResourceRules {
  /** Human label that opens payload-level messages, e.g. "Tag" */
  label: string;
  /** Keys that must be present on create */
  required?: string[];
  /** On create, at least one of these keys must be present */
  anyOf?: string[];
  /** Keys rejected on create, with the message to reject them with */
  forbiddenOnCreate?: Record<string, string>;
  /** Keys the provider ignores; their presence logs a warning */
  unsupported?: string[];
  /** Checks applied to each present key */
  fields?: FieldSchemas;
  /** Checks applied to list filters */
  filters?: FieldSchemas;
}

export type PayloadCheckResult =
  | { success: true; data: ApiRecord }
  | { success: false; error: ValidationError };

interface Problem {
  message: string;
  fieldErrors: FieldError[];
}

// ============================================================================
// Rendering
// ============================================================================

export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function display(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

function valueAt(root: unknown, path: Array<string | number>): unknown {
  let current = root;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === "number") {
      current = current[segment];
    } else if (isRecord(current) && typeof segment === "string") {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

function fieldLabel(path: Array<string | number>): string {
  return path
    .map((segment, index) =>
      typeof segment === "number" ? `[${segment}]` : index === 0 ? segment : `.${segment}`
    )
    .join("");
}

function checkFields(
  data: ApiRecord,
  schemas: FieldSchemas,
  suffix = ""
): Problem | undefined {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, schema] of Object.entries(schemas)) {
    shape[key] = schema.optional();
  }

  const result = z.object(shape).passthrough().safeParse(data);
  if (result.success) {
    return undefined;
  }

  const fieldErrors = result.error.issues.map((issue) => {
    const field = fieldLabel(issue.path);
    return {
      field,
      message: `${field}${suffix} ${issue.message}, got: ${display(valueAt(data, issue.path))}`,
    };
  });

  return {
    message: fieldErrors.map((e) => e.message).join("; "),
    fieldErrors,
  };
}

// ============================================================================
// Payloads
// ============================================================================

function findPayloadProblem(
  data: unknown,
  operation: PayloadOperation,
  rules: ResourceRules,
  logger: Logger
): Problem | undefined {
  const prefix = `${rules.label} data for ${operation}`;

  if (!isRecord(data)) {
    return {
      message: `${prefix} must be an object, got ${typeName(data)}`,
      fieldErrors: [],
    };
  }

  if (Object.keys(data).length === 0) {
    return { message: `${prefix} cannot be empty`, fieldErrors: [] };
  }

  if (operation === "create") {
    const missing = (rules.required ?? []).filter((field) => !(field in data));
    if (missing.length > 0) {
      return {
        message: `${prefix} missing required fields: ${missing.join(", ")}`,
        fieldErrors: missing.map((field) => ({ field, message: "is required" })),
      };
    }

    const anyOf = rules.anyOf ?? [];
    if (anyOf.length > 0 && !anyOf.some((field) => field in data)) {
      return {
        message: `${prefix} must include at least one of: ${anyOf.join(", ")}`,
        fieldErrors: [],
      };
    }

    for (const [field, message] of Object.entries(rules.forbiddenOnCreate ?? {})) {
      if (field in data) {
        return { message, fieldErrors: [{ field, message }] };
      }
    }
  }

  const problem = checkFields(data, rules.fields ?? {});
  if (problem) {
    return problem;
  }

  for (const field of rules.unsupported ?? []) {
    if (field in data) {
      logger.warn(
        `Field '${field}' is not supported by the ${rules.label.toLowerCase()} endpoint and will be ignored`,
        { field }
      );
    }
  }

  logger.debug(`${rules.label} data validated for ${operation} operation`);
  return undefined;
}

/**
 * Throw `ValidationError` unless `data` is a non-empty object that meets
 * `rules` for `operation`.
 */
export function validateResourcePayload(
  data: unknown,
  operation: PayloadOperation,
  rules: ResourceRules,
  logger: Logger = getLogger()
): asserts data is ApiRecord {
  const problem = findPayloadProblem(data, operation, rules, logger);
  if (problem) {
    throw new ValidationError(problem.message, {
      fieldErrors: problem.fieldErrors,
      logger,
    });
  }
}

/** Non-throwing form of `validateResourcePayload` */
export function checkResourcePayload(
  data: unknown,
  operation: PayloadOperation,
  rules: ResourceRules,
  logger: Logger = getLogger()
): PayloadCheckResult {
  const problem = findPayloadProblem(data, operation, rules, logger);
  if (problem || !isRecord(data)) {
    return {
      success: false,
      error: new ValidationError(problem?.message ?? "Invalid payload", {
        fieldErrors: problem?.fieldErrors,
        logger,
      }),
    };
  }
  return { success: true, data };
}

// ============================================================================
// Identifiers
// ============================================================================

export function validateResourceId(
  id: unknown,
  resourceType: string,
  logger: Logger = getLogger()
): number {
  if (typeof id !== "number" || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(
      `${resourceType} ID must be a positive integer, got: ${display(id)}`,
      { fieldErrors: [{ field: "id", message: "must be a positive integer" }], logger }
    );
  }
  return id;
}

// ============================================================================
// List parameters
// ============================================================================

function coerceCount(
  name: "Limit" | "Offset",
  raw: unknown,
  logger: Logger
): number {
  const value = toInteger(raw);
  const field = name.toLowerCase();
  if (value === undefined) {
    throw new ValidationError(
      `${name} must be an integer, got ${typeName(raw)}: ${display(raw)}`,
      { fieldErrors: [{ field, message: "must be an integer" }], logger }
    );
  }
  if (name === "Limit" && value <= 0) {
    throw new ValidationError(`Limit must be a positive integer, got ${value}`, {
      fieldErrors: [{ field, message: "must be a positive integer" }],
      logger,
    });
  }
  if (name === "Offset" && value < 0) {
    throw new ValidationError(`Offset must be non-negative, got ${value}`, {
      fieldErrors: [{ field, message: "must be non-negative" }],
      logger,
    });
  }
  return value;
}

/**
 * Check and normalize listing parameters. Returns a new map; `limit` and
 * `offset` come back as integers, other keys unchanged. Whether a value
 * can be sent in a query string is the transport's concern.
 */
export function validateListParams(
  params: unknown,
  filters: FieldSchemas = {},
  logger: Logger = getLogger()
): QueryParams {
  if (params === undefined || params === null) {
    return {};
  }

  if (!isRecord(params)) {
    throw new ValidationError(
      `List parameters must be an object, got ${typeName(params)}`,
      { logger }
    );
  }

  const problem = checkFields(params, filters, " filter");
  if (problem) {
    throw new ValidationError(problem.message, {
      fieldErrors: problem.fieldErrors,
      logger,
    });
  }

  const validated: QueryParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (key === "limit") {
      const limit = coerceCount("Limit", value, logger);
      if (limit > LARGE_LIMIT_THRESHOLD) {
        logger.warn(`Large limit value: ${limit}. Consider using pagination.`, {
          limit,
        });
      }
      validated.limit = limit;
    } else if (key === "offset") {
      validated.offset = coerceCount("Offset", value, logger);
    } else {
      validated[key] = value;
    }
  }

  return validated;
}
