/**
 * Resource payload types
 *
 * Inputs accepted by the resource facades. Every payload keeps an index
 * signature: the provider accepts account-specific fields beyond the ones
 * named here, and the validators check the named ones.
 */

// ============================================================================
// Top-level resources
// ============================================================================

export interface AgentInput {
  email?: string;
  phone?: string;
  name?: string;
  first_name?: string;
  last_name?: string;
  license_number?: string;
  [key: string]: unknown;
}

/** Contacts take first/last names; `name` is rejected on create */
export interface ContactInput {
  email?: string;
  phone?: string;
  first_name?: string;
  last_name?: string;
  [key: string]: unknown;
}

export interface TagInput {
  name?: string;
  /** `#RGB` or `#RRGGBB` */
  color?: string;
  description?: string;
  category?: string;
  is_active?: boolean;
  sort_order?: number;
  [key: string]: unknown;
}

export interface TeamInput {
  name?: string;
  [key: string]: unknown;
}

export interface UserInput {
  email?: string;
  first_name?: string;
  last_name?: string;
  [key: string]: unknown;
}

// ============================================================================
// Property sub-resources
// ============================================================================

export interface PropertyContactInput {
  contact_id?: number | string;
  [key: string]: unknown;
}

export interface PropertyDocumentInput {
  name?: string;
  type?: string;
  url?: string;
  file_size?: number;
  description?: string;
  [key: string]: unknown;
}

export interface PropertyEmailInput {
  subject?: string;
  body?: string;
  recipient?: string;
  sender?: string;
  recipients?: string[];
  status?: string;
  priority?: string;
  [key: string]: unknown;
}

export interface PropertyNoteInput {
  content?: string;
  author?: string;
  priority?: string;
  visibility?: string;
  is_private?: boolean;
  tags?: string[];
  [key: string]: unknown;
}

export interface PropertyTaskInput {
  title?: string;
  description?: string;
  status?: string;
  priority?: string;
  assignee?: string;
  assignee_id?: number;
  due_date?: string;
  is_completed?: boolean;
  [key: string]: unknown;
}
