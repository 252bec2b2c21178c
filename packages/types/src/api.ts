/**
 * Wire-level types for the Open To Close REST API
 * Covers records, response envelopes and request descriptors
 */

/**
 * A single API record. The provider's schemas are account-specific,
 * so records stay open-ended.
 */
export type ApiRecord = Record<string, unknown>;

/** HTTP verbs the provider accepts */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/** Scalar query-string value; arrays are sent as repeated keys */
export type QueryValue = string | number | boolean;

/**
 * Query parameters handed to the transport. Scalars and scalar arrays are
 * encoded; `null` and `undefined` are skipped; anything else is rejected
 * when the URL is built.
 */
export type QueryParams = Record<string, unknown>;

/** A file part for multipart uploads; wrap binary content in a `Blob` */
export interface FilePart {
  filename: string;
  content: Blob | string;
  contentType?: string;
}

/** Everything the transport needs to issue one call */
export interface RequestDescriptor {
  method: HttpMethod;
  endpoint: string;
  query?: QueryParams;
  json?: ApiRecord | ApiRecord[];
  form?: Record<string, string>;
  files?: Record<string, FilePart>;
}

export type RequestOptions = Omit<RequestDescriptor, "method" | "endpoint">;

// ============================================================================
// Envelopes
// ============================================================================

/** `{ "data": ... }` wrapper some endpoints use */
export interface DataEnvelope<T> {
  data: T;
}

/** Which call a body answers; list and single-record calls read it differently */
export type EnvelopeCall = "list" | "record";

/**
 * Result of inspecting a decoded response body for one call type. List
 * items are passed on as the provider sent them.
 */
export type EnvelopeShape =
  | { kind: "list"; items: unknown[] }
  | { kind: "wrapped-list"; items: unknown[] }
  | { kind: "record"; record: ApiRecord }
  | { kind: "wrapped-record"; record: ApiRecord }
  | { kind: "unrecognized" };

// ============================================================================
// Listing
// ============================================================================

/** Query parameters accepted by collection listings */
export interface ListParams {
  limit?: number | string;
  offset?: number | string;
  [key: string]: unknown;
}

/** Operation a payload is validated for */
export type PayloadOperation = "create" | "update";
