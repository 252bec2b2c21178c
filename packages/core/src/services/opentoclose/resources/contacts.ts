/**
 * Contacts: `/contacts`. Create takes `first_name`/`last_name`, never `name`.
 */

import type { ContactInput } from "@otc/types";
import type { OpenToCloseHttpClient } from "../http-client";
import { CONTACT_RULES } from "../rules";
import { Resource } from "./resource";

export class ContactsResource extends Resource<ContactInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "Contact",
      plural: "contacts",
      path: "/contacts",
      rules: CONTACT_RULES,
    });
  }
}
