/**
 * Response envelope normalization
 *
 * The provider answers with a bare list, a bare record, or either of those
 * under a `data` key. These helpers collapse the three into one shape per
 * call type and never throw.
 */

import type {
  ApiRecord,
  DataEnvelope,
  EnvelopeCall,
  EnvelopeShape,
} from "@otc/types";

export function isRecord(value: unknown): value is ApiRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDataEnvelope(value: unknown): value is DataEnvelope<unknown> {
  return isRecord(value) && "data" in value;
}

/**
 * Classify a decoded body for a list or a single-record call.
 *
 * List calls try a bare list, then a `data` wrapper around a list. Record
 * calls try an id-bearing record, then a `data` wrapper around a record;
 * the `id` key marks an object that is the resource itself.
 */
export function classifyEnvelope(
  body: unknown,
  call: EnvelopeCall
): EnvelopeShape {
  if (call === "list") {
    if (Array.isArray(body)) {
      return { kind: "list", items: body };
    }
    if (isDataEnvelope(body) && Array.isArray(body.data)) {
      return { kind: "wrapped-list", items: body.data };
    }
    return { kind: "unrecognized" };
  }

  if (isRecord(body) && "id" in body) {
    return { kind: "record", record: body };
  }
  if (isDataEnvelope(body) && isRecord(body.data)) {
    return { kind: "wrapped-record", record: body.data };
  }
  return { kind: "unrecognized" };
}

/**
 * Items of a list response, as sent. Anything that is not a list, bare or
 * wrapped, yields `[]`.
 */
export function normalizeList(body: unknown): unknown[] {
  const shape = classifyEnvelope(body, "list");
  switch (shape.kind) {
    case "list":
    case "wrapped-list":
      return shape.items;
    default:
      return [];
  }
}

/**
 * The record of a single-resource response. Anything that is not a
 * record, bare or wrapped, yields `{}`.
 */
export function normalizeRecord(body: unknown): ApiRecord {
  const shape = classifyEnvelope(body, "record");
  switch (shape.kind) {
    case "record":
    case "wrapped-record":
      return shape.record;
    default:
      return {};
  }
}
