/**
 * Properties: `/properties`
 *
 * Create goes through the field-mapping translator; everything else sends
 * the caller's keys as they are.
 */

import type { ApiRecord, PropertyCreateInput, PropertyFieldMap } from "@otc/types";
import { normalizeRecord } from "../envelope";
import type { OpenToCloseHttpClient } from "../http-client";
import {
  createPropertyTranslator,
  type PropertyTranslator,
} from "../property-translator";
import { PROPERTY_RULES } from "../rules";
import { Resource } from "./resource";

export interface PropertiesResourceOptions {
  fieldMap?: PropertyFieldMap;
}

export class PropertiesResource extends Resource<ApiRecord> {
  readonly translator: PropertyTranslator;

  constructor(http: OpenToCloseHttpClient, options: PropertiesResourceOptions = {}) {
    super(http, {
      name: "Property",
      plural: "properties",
      path: "/properties",
      rules: PROPERTY_RULES,
    });
    this.translator = createPropertyTranslator({
      fieldMap: options.fieldMap,
      fetchTeams: () => http.get("/teams"),
      defaultTeamMemberId: http.defaultTeamMemberId,
      logger: this.logger,
    });
  }

  /**
   * Create a property from a title, a human map, or a wire-format payload.
   *
   * @example
   * await client.properties.create("12 Oak St");
   * await client.properties.create({ title: "12 Oak St", status: "under contract" });
   */
  override async create(input: PropertyCreateInput | ApiRecord): Promise<ApiRecord> {
    const payload = await this.translator.translate(input);
    this.logger.debug("Creating property", {
      teamMemberId: payload.team_member_id,
      fieldCount: payload.fields.length,
    });
    const record = normalizeRecord(await this.http.post(this.definition.path, payload));
    this.logger.info("Created property", { id: record.id });
    return record;
  }
}
