/**
 * Tags: `/tags`. Listing filters on `category` and `is_active`.
 */

import type { TagInput } from "@otc/types";
import type { OpenToCloseHttpClient } from "../http-client";
import { TAG_RULES } from "../rules";
import { Resource } from "./resource";

export class TagsResource extends Resource<TagInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "Tag",
      plural: "tags",
      path: "/tags",
      rules: TAG_RULES,
    });
  }
}
