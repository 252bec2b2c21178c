/**
 * Per-resource validation rules
 */

import type { ResourceRules } from "./validation";
import {
  booleanSchema,
  emailAddressSchema,
  emailListSchema,
  hexColorSchema,
  httpUrlSchema,
  nonEmptyStringListSchema,
  nonEmptyStringSchema,
  nonNegativeIntegerSchema,
  positiveIntegerSchema,
  stringSchema,
} from "./validation";

export const AGENT_RULES: ResourceRules = {
  label: "Agent",
  anyOf: ["email", "phone", "name", "first_name", "last_name"],
  fields: {
    email: emailAddressSchema,
    phone: nonEmptyStringSchema,
    name: nonEmptyStringSchema,
    first_name: nonEmptyStringSchema,
    last_name: nonEmptyStringSchema,
    license_number: nonEmptyStringSchema,
  },
};

export const CONTACT_RULES: ResourceRules = {
  label: "Contact",
  anyOf: ["email", "phone", "first_name", "last_name"],
  forbiddenOnCreate: {
    name: "The 'name' field is not supported by the API. Use 'first_name' and 'last_name' fields instead.",
  },
  fields: {
    email: emailAddressSchema,
    phone: nonEmptyStringSchema,
    first_name: nonEmptyStringSchema,
    last_name: nonEmptyStringSchema,
  },
};

export const TAG_RULES: ResourceRules = {
  label: "Tag",
  required: ["name"],
  fields: {
    name: nonEmptyStringSchema,
    color: hexColorSchema,
    description: stringSchema,
    category: nonEmptyStringSchema,
    is_active: booleanSchema,
    sort_order: nonNegativeIntegerSchema,
  },
  filters: {
    category: nonEmptyStringSchema,
    is_active: booleanSchema,
  },
};

export const PROPERTY_NOTE_RULES: ResourceRules = {
  label: "Property note",
  required: ["content"],
  fields: {
    content: nonEmptyStringSchema,
    author: nonEmptyStringSchema,
    priority: nonEmptyStringSchema,
    visibility: nonEmptyStringSchema,
    is_private: booleanSchema,
    tags: nonEmptyStringListSchema,
  },
  filters: {
    author: nonEmptyStringSchema,
    priority: nonEmptyStringSchema,
  },
};

export const PROPERTY_TASK_RULES: ResourceRules = {
  label: "Property task",
  required: ["title"],
  fields: {
    title: nonEmptyStringSchema,
    description: stringSchema,
    status: nonEmptyStringSchema,
    priority: nonEmptyStringSchema,
    assignee: nonEmptyStringSchema,
    assignee_id: positiveIntegerSchema,
    due_date: nonEmptyStringSchema,
    is_completed: booleanSchema,
  },
  filters: {
    status: nonEmptyStringSchema,
    priority: nonEmptyStringSchema,
  },
};

export const PROPERTY_DOCUMENT_RULES: ResourceRules = {
  label: "Property document",
  required: ["name"],
  fields: {
    name: nonEmptyStringSchema,
    type: nonEmptyStringSchema,
    url: httpUrlSchema,
    file_size: nonNegativeIntegerSchema,
    description: stringSchema,
  },
  filters: {
    type: nonEmptyStringSchema,
  },
};

export const PROPERTY_EMAIL_RULES: ResourceRules = {
  label: "Property email",
  fields: {
    subject: nonEmptyStringSchema,
    body: stringSchema,
    recipient: emailAddressSchema,
    sender: emailAddressSchema,
    status: nonEmptyStringSchema,
    priority: nonEmptyStringSchema,
    recipients: emailListSchema,
  },
  filters: {
    status: nonEmptyStringSchema,
  },
};

/** Association only; the provider keeps no per-link attributes */
export const PROPERTY_CONTACT_RULES: ResourceRules = {
  label: "Property contact",
  required: ["contact_id"],
  unsupported: ["role", "is_primary", "priority", "notes"],
  fields: {
    contact_id: positiveIntegerSchema,
  },
};

export const TEAM_RULES: ResourceRules = { label: "Team" };

export const USER_RULES: ResourceRules = { label: "User" };

export const PROPERTY_RULES: ResourceRules = { label: "Property" };
