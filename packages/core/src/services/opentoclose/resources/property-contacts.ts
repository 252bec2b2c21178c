/**
 * Contacts linked to a property: `/properties/{id}/contacts`
 *
 * The provider stores the association only. Create sends `contact_id`
 * and nothing else; update and delete answer 405 upstream, so they are
 * rejected before any call.
 */

import type { ApiRecord, PropertyContactInput } from "@otc/types";
import { ValidationError } from "../errors";
import type { OpenToCloseHttpClient } from "../http-client";
import { PROPERTY_CONTACT_RULES } from "../rules";
import { positiveIntegerSchema } from "../validation";
import { PropertySubresource } from "./resource";

export class PropertyContactsResource extends PropertySubresource<PropertyContactInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "Property contact",
      plural: "property contacts",
      path: "contacts",
      rules: PROPERTY_CONTACT_RULES,
    });
  }

  protected override toWire(data: PropertyContactInput): ApiRecord {
    // validated as a positive integer before this runs
    return { contact_id: positiveIntegerSchema.parse(data.contact_id) };
  }

  override async update(
    _propertyId: number,
    _id: number,
    _data: Partial<PropertyContactInput>
  ): Promise<ApiRecord> {
    throw new ValidationError(
      "Property contact associations cannot be updated (the API answers 405 Method Not Allowed).",
      { method: "PUT", logger: this.logger }
    );
  }

  override async delete(_propertyId: number, _id: number): Promise<ApiRecord> {
    throw new ValidationError(
      "Property contact associations cannot be deleted through the API (it answers 405 Method Not Allowed). Remove the association in the Open To Close web interface instead.",
      { method: "DELETE", logger: this.logger }
    );
  }
}
