/**
 * Default property field-mapping table
 *
 * Field ids and option ids reference the provider's contract schema.
 * Accounts with a customised schema pass their own table to
 * `createPropertyTranslator`.
 */

import type {
  PropertyClientType,
  PropertyFieldDefinition,
  PropertyFieldMap,
  PropertyFieldName,
  PropertyStatus,
} from "@otc/types";

export const DEFAULT_TIME_ZONE_ID = 1;

function defineField(
  id: number,
  key: string,
  options?: Record<string, number>
): Readonly<PropertyFieldDefinition> {
  if (!options) {
    return Object.freeze({ id, key });
  }
  return Object.freeze({ id, key, options: Object.freeze({ ...options }) });
}

/** Build a frozen table from plain rows */
export function createPropertyFieldMap(
  rows: Record<
    PropertyFieldName,
    { id: number; key: string; options?: Record<string, number> }
  >
): PropertyFieldMap {
  return Object.freeze({
    contract_title: defineField(
      rows.contract_title.id,
      rows.contract_title.key,
      rows.contract_title.options
    ),
    client_type: defineField(
      rows.client_type.id,
      rows.client_type.key,
      rows.client_type.options
    ),
    status: defineField(rows.status.id, rows.status.key, rows.status.options),
    purchase_amount: defineField(
      rows.purchase_amount.id,
      rows.purchase_amount.key,
      rows.purchase_amount.options
    ),
  });
}

export const DEFAULT_PROPERTY_FIELD_MAP: PropertyFieldMap = createPropertyFieldMap({
  contract_title: { id: 922675, key: "contract_title" },
  client_type: {
    id: 922663,
    key: "contract_client_type",
    options: {
      Buyer: 797212,
      Seller: 797213,
      Dual: 797214,
    } satisfies Record<PropertyClientType, number>,
  },
  status: {
    id: 922662,
    key: "contract_status",
    options: {
      "Pre-MLS": 797206,
      Active: 797207,
      "Under Contract": 797208,
      Withdrawn: 797209,
      Contract: 797210,
      Closed: 797211,
      Terminated: 797215,
    } satisfies Record<PropertyStatus, number>,
  },
  purchase_amount: { id: 922664, key: "purchase_amount" },
});
