/**
 * Emails logged against a property: `/properties/{id}/emails`
 */

import type { PropertyEmailInput } from "@otc/types";
import type { OpenToCloseHttpClient } from "../http-client";
import { PROPERTY_EMAIL_RULES } from "../rules";
import { PropertySubresource } from "./resource";

export class PropertyEmailsResource extends PropertySubresource<PropertyEmailInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "Property email",
      plural: "property emails",
      path: "emails",
      rules: PROPERTY_EMAIL_RULES,
    });
  }
}
