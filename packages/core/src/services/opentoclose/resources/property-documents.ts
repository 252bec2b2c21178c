/**
 * Documents attached to a property: `/properties/{id}/documents`
 */

import type { PropertyDocumentInput } from "@otc/types";
import type { OpenToCloseHttpClient } from "../http-client";
import { PROPERTY_DOCUMENT_RULES } from "../rules";
import { PropertySubresource } from "./resource";

export class PropertyDocumentsResource extends PropertySubresource<PropertyDocumentInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "Property document",
      plural: "property documents",
      path: "documents",
      rules: PROPERTY_DOCUMENT_RULES,
    });
  }
}
