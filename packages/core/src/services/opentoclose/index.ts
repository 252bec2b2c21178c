/**
 * Open To Close Service
 * Client for the Open To Close real-estate transaction API
 */

export { OpenToCloseClient } from "./client";
export type { OpenToCloseClientConfig } from "./client";
export { OpenToCloseHttpClient, USER_AGENT } from "./http-client";
export {
  resolveClientConfig,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  API_KEY_ENV,
  BASE_URL_ENV,
  TEAM_MEMBER_ENV,
} from "./config";
export type {
  EnvMap,
  OpenToCloseClientOptions,
  ResolvedClientConfig,
} from "./config";
export * from "./errors";
export {
  classifyEnvelope,
  normalizeList,
  normalizeRecord,
  isRecord,
} from "./envelope";
export * from "./validation";
export * from "./rules";
export {
  DEFAULT_PROPERTY_FIELD_MAP,
  DEFAULT_TIME_ZONE_ID,
  createPropertyFieldMap,
} from "./property-fields";
export {
  createPropertyTranslator,
  findFirstTeamMember,
} from "./property-translator";
export type {
  ChoiceField,
  PropertyTranslator,
  PropertyTranslatorOptions,
} from "./property-translator";
export { Resource, PropertySubresource } from "./resources/resource";
export type { ResourceDefinition } from "./resources/resource";
export { AgentsResource } from "./resources/agents";
export { ContactsResource } from "./resources/contacts";
export { PropertiesResource } from "./resources/properties";
export type { PropertiesResourceOptions } from "./resources/properties";
export { PropertyContactsResource } from "./resources/property-contacts";
export { PropertyDocumentsResource } from "./resources/property-documents";
export { PropertyEmailsResource } from "./resources/property-emails";
export { PropertyNotesResource } from "./resources/property-notes";
export { PropertyTasksResource } from "./resources/property-tasks";
export { TagsResource } from "./resources/tags";
export { TeamsResource } from "./resources/teams";
export { UsersResource } from "./resources/users";
