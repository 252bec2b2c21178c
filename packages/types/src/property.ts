/**
 * Property field-mapping types
 *
 * Properties are the one resource whose wire format is not the caller's
 * keys: the provider wants an array of `{ id, key, value }` triples that
 * reference its field schema, plus the owning team member.
 */

/** Human-readable client types */
export type PropertyClientType = "Buyer" | "Seller" | "Dual";

/** Human-readable contract statuses */
export type PropertyStatus =
  | "Pre-MLS"
  | "Active"
  | "Under Contract"
  | "Withdrawn"
  | "Contract"
  | "Closed"
  | "Terminated";

/**
 * Caller-friendly property description. `null` on an optional key means
 * the same as leaving it out.
 */
export interface PropertyInput {
  title: string;
  /** A `PropertyClientType` label, matched case-insensitively */
  client_type?: string | null;
  /** A `PropertyStatus` label, matched case-insensitively */
  status?: string | null;
  purchase_amount?: number | string | null;
  team_member_id?: number | null;
  time_zone_id?: number | null;
}

/** One entry of the provider's `fields` array */
export interface PropertyFieldValue {
  id: number;
  key: string;
  value: string | number;
}

/** Payload the provider accepts on `POST /properties` */
export type PropertyWirePayload = {
  team_member_id: number;
  time_zone_id: number;
  fields: PropertyFieldValue[];
};

/** Anything `properties.create` accepts */
export type PropertyCreateInput = string | PropertyInput | PropertyWirePayload;

/** Human field names the mapping table knows */
export type PropertyFieldName =
  | "contract_title"
  | "client_type"
  | "status"
  | "purchase_amount";

/** One row of the field-mapping table */
export interface PropertyFieldDefinition {
  /** Provider field id */
  id: number;
  /** Provider field key */
  key: string;
  /** Option label → provider option id, for choice fields; labels match case-insensitively */
  options?: Readonly<Record<string, number>>;
}

export type PropertyFieldMap = Readonly<
  Record<PropertyFieldName, Readonly<PropertyFieldDefinition>>
>;
