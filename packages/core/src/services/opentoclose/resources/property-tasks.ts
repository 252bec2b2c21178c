/**
 * Tasks on a property: `/properties/{id}/tasks`. Listing filters on `status` and `priority`.
 */

import type { PropertyTaskInput } from "@otc/types";
import type { OpenToCloseHttpClient } from "../http-client";
import { PROPERTY_TASK_RULES } from "../rules";
import { PropertySubresource } from "./resource";

export class PropertyTasksResource extends PropertySubresource<PropertyTaskInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "Property task",
      plural: "property tasks",
      path: "tasks",
      rules: PROPERTY_TASK_RULES,
    });
  }
}
