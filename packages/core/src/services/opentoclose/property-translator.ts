/**
 * Property field-mapping translator
 *
 * Turns a title, or a human map such as
 * `{ title: "12 Oak St", client_type: "seller", status: "active" }`, into
 * the provider's `{ team_member_id, time_zone_id, fields }` payload. Only
 * supplied keys produce a field entry.
 */

import { z } from "zod";
import type {
  ApiRecord,
  PropertyFieldMap,
  PropertyFieldValue,
  PropertyWirePayload,
} from "@otc/types";
import { getLogger, type Logger } from "../logger";
import { isRecord, normalizeList } from "./envelope";
import { ValidationError } from "./errors";
import {
  DEFAULT_PROPERTY_FIELD_MAP,
  DEFAULT_TIME_ZONE_ID,
} from "./property-fields";
import { positiveIntegerSchema, typeName } from "./validation";

export type ChoiceField = "client_type" | "status";

/** Keys of a human map that translate to field entries */
const HUMAN_KEYS = new Set([
  "title",
  "client_type",
  "status",
  "purchase_amount",
  "team_member_id",
  "time_zone_id",
]);

const DEFAULT_CLIENT_TYPE = "Buyer";
const DEFAULT_STATUS = "Active";

const wirePayloadSchema = z
  .object({
    team_member_id: z.number().int().positive(),
    time_zone_id: z.number().int().positive().optional(),
    fields: z
      .array(
        z
          .object({
            id: z.number().int(),
            key: z.string(),
            value: z.union([z.string(), z.number()]),
          })
          .passthrough()
      )
      .min(1),
  })
  .passthrough();

export interface PropertyTranslatorOptions {
  /** Field table; defaults to `DEFAULT_PROPERTY_FIELD_MAP` */
  fieldMap?: PropertyFieldMap;
  /** Reads the teams collection when the input names no team member */
  fetchTeams?: () => Promise<unknown>;
  /** Used when the teams collection yields no member */
  defaultTeamMemberId?: number;
  logger?: Logger;
}

export interface PropertyTranslator {
  /** Translate a title, a human map, or an already-wire payload */
  translate(input: unknown): Promise<PropertyWirePayload>;
  /** Option id for a choice label, matched case-insensitively */
  resolveChoice(field: ChoiceField, label: unknown): number;
  /** Caller value, then first team member, then the configured default */
  resolveTeamMemberId(explicit?: unknown): Promise<number>;
}

/** First member id across all teams, in listing order */
export function findFirstTeamMember(teams: unknown[]): number | undefined {
  for (const team of teams) {
    if (!isRecord(team)) {
      continue;
    }
    for (const key of ["members", "team_members"]) {
      const members = team[key];
      if (!Array.isArray(members)) {
        continue;
      }
      for (const member of members) {
        const id = isRecord(member) ? member.id : member;
        if (typeof id === "number" && Number.isInteger(id) && id > 0) {
          return id;
        }
      }
    }
  }
  return undefined;
}

export function createPropertyTranslator(
  options: PropertyTranslatorOptions = {}
): PropertyTranslator {
  const fieldMap = options.fieldMap ?? DEFAULT_PROPERTY_FIELD_MAP;
  const logger = options.logger ?? getLogger();

  const fail = (message: string, field?: string): never => {
    throw new ValidationError(message, {
      fieldErrors: field ? [{ field, message }] : [],
      logger,
    });
  };

  const resolveChoice = (field: ChoiceField, label: unknown): number => {
    const choices = fieldMap[field].options ?? {};
    const valid = Object.keys(choices).join(", ");

    if (typeof label !== "string") {
      return fail(
        `${field} must be a string, got ${typeName(label)}. Valid choices: ${valid}`,
        field
      );
    }

    const wanted = label.trim().toLowerCase();
    for (const [choice, optionId] of Object.entries(choices)) {
      if (choice.toLowerCase() === wanted) {
        return optionId;
      }
    }

    return fail(`Invalid ${field} '${label}'. Valid choices: ${valid}`, field);
  };

  const parsePositiveInteger = (field: string, value: unknown): number => {
    const result = positiveIntegerSchema.safeParse(value);
    if (!result.success) {
      return fail(`${field} must be a positive integer, got: ${String(value)}`, field);
    }
    return result.data;
  };

  const parseAmount = (value: unknown): number => {
    const amount =
      typeof value === "number"
        ? value
        : typeof value === "string" && value.trim().length > 0
          ? Number(value.trim())
          : Number.NaN;

    if (!Number.isFinite(amount)) {
      return fail(
        `purchase_amount must be a number, got: ${String(value)}`,
        "purchase_amount"
      );
    }
    if (amount < 0) {
      return fail(
        `purchase_amount must be non-negative, got: ${amount}`,
        "purchase_amount"
      );
    }
    return amount;
  };

  const entry = (
    name: keyof PropertyFieldMap,
    value: string | number
  ): PropertyFieldValue => ({
    id: fieldMap[name].id,
    key: fieldMap[name].key,
    value,
  });

  const mapFields = (input: ApiRecord): PropertyFieldValue[] => {
    const { title } = input;
    if (typeof title !== "string" || title.trim().length === 0) {
      return fail("title is required and must be a non-empty string", "title");
    }

    const fields: PropertyFieldValue[] = [entry("contract_title", title.trim())];

    // null means not supplied for the optional keys
    if (input.client_type !== undefined && input.client_type !== null) {
      fields.push(entry("client_type", resolveChoice("client_type", input.client_type)));
    }
    if (input.status !== undefined && input.status !== null) {
      fields.push(entry("status", resolveChoice("status", input.status)));
    }
    if (input.purchase_amount !== undefined && input.purchase_amount !== null) {
      fields.push(entry("purchase_amount", parseAmount(input.purchase_amount)));
    }

    const ignored = Object.keys(input).filter((key) => !HUMAN_KEYS.has(key));
    if (ignored.length > 0) {
      logger.warn("Ignoring property keys with no field mapping", { ignored });
    }

    return fields;
  };

  const resolveTeamMemberId = async (explicit?: unknown): Promise<number> => {
    if (explicit !== undefined && explicit !== null) {
      return parsePositiveInteger("team_member_id", explicit);
    }

    if (options.fetchTeams) {
      try {
        const found = findFirstTeamMember(normalizeList(await options.fetchTeams()));
        if (found !== undefined) {
          logger.debug("Resolved team member from teams collection", {
            teamMemberId: found,
          });
          return found;
        }
        logger.warn("Teams collection lists no team members");
      } catch (error) {
        logger.warn("Team member lookup failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (options.defaultTeamMemberId !== undefined) {
      logger.debug("Using configured default team member", {
        teamMemberId: options.defaultTeamMemberId,
      });
      return options.defaultTeamMemberId;
    }

    return fail(
      "team_member_id could not be resolved. Pass team_member_id or configure defaultTeamMemberId.",
      "team_member_id"
    );
  };

  const passThrough = (input: ApiRecord): PropertyWirePayload => {
    const result = wirePayloadSchema.safeParse(input);
    if (!result.success) {
      const problems = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      return fail(`Invalid wire-format property payload: ${problems}`);
    }
    return {
      ...result.data,
      time_zone_id: result.data.time_zone_id ?? DEFAULT_TIME_ZONE_ID,
    };
  };

  const translate = async (input: unknown): Promise<PropertyWirePayload> => {
    if (typeof input === "string") {
      return translate({
        title: input,
        client_type: DEFAULT_CLIENT_TYPE,
        status: DEFAULT_STATUS,
      });
    }

    if (!isRecord(input)) {
      return fail(
        `Property data must be a string or an object, got ${typeName(input)}`
      );
    }

    if ("fields" in input && "team_member_id" in input) {
      return passThrough(input);
    }

    const fields = mapFields(input);
    const timeZoneId =
      input.time_zone_id === undefined || input.time_zone_id === null
        ? DEFAULT_TIME_ZONE_ID
        : parsePositiveInteger("time_zone_id", input.time_zone_id);

    return {
      team_member_id: await resolveTeamMemberId(input.team_member_id),
      time_zone_id: timeZoneId,
      fields,
    };
  };

  return { translate, resolveChoice, resolveTeamMemberId };
}
