/**
 * Open To Close client - shared TypeScript types
 *
 * @example
 * import type { ApiRecord, ContactInput, PropertyInput } from "@otc/types";
 */

// Wire types
export type {
  ApiRecord,
  HttpMethod,
  QueryValue,
  QueryParams,
  FilePart,
  RequestDescriptor,
  RequestOptions,
  DataEnvelope,
  EnvelopeCall,
  EnvelopeShape,
  ListParams,
  PayloadOperation,
} from "./api";

// Resource payloads
export type {
  AgentInput,
  ContactInput,
  TagInput,
  TeamInput,
  UserInput,
  PropertyContactInput,
  PropertyDocumentInput,
  PropertyEmailInput,
  PropertyNoteInput,
  PropertyTaskInput,
} from "./resources";

// Property field mapping
export type {
  PropertyClientType,
  PropertyStatus,
  PropertyInput,
  PropertyFieldValue,
  PropertyWirePayload,
  PropertyCreateInput,
  PropertyFieldName,
  PropertyFieldDefinition,
  PropertyFieldMap,
} from "./property";
