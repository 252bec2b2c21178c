import type { PropertyNoteInput } from "@otc/types";
import type { OpenToCloseHttpClient } from "../http-client";
import { PROPERTY_NOTE_RULES } from "../rules";
import { PropertySubresource } from "./resource";

export class PropertyNotesResource extends PropertySubresource<PropertyNoteInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "Property note",
      plural: "property notes",
      path: "notes",
      rules: PROPERTY_NOTE_RULES,
    });
  }
}
