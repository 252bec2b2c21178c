/**
 * Resource facade bases
 *
 * A facade validates locally, makes one transport call on its fixed path
 * and unwraps the response envelope. Top-level collections live at
 * `/<name>`; property sub-resources at `/properties/{id}/<name>`.
 */

import type { ApiRecord, ListParams } from "@otc/types";
import type { Logger } from "../../logger";
import { isRecord, normalizeList, normalizeRecord } from "../envelope";
import type { OpenToCloseHttpClient } from "../http-client";
import {
  validateListParams,
  validateResourceId,
  validateResourcePayload,
  type ResourceRules,
} from "../validation";

export interface ResourceDefinition {
  /** Singular label used in id errors, e.g. "Agent" */
  name: string;
  /** Plural label for log lines and the logger's `resource` tag */
  plural: string;
  /** Collection path, e.g. "/agents" or "contacts" under a property */
  path: string;
  rules: ResourceRules;
}

function deletedBody(body: unknown): ApiRecord {
  return isRecord(body) ? body : {};
}

function singular(definition: ResourceDefinition): string {
  return definition.name.toLowerCase();
}

// ============================================================================
// Top-level collections
// ============================================================================

export class Resource<TInput extends ApiRecord = ApiRecord> {
  protected readonly logger: Logger;

  constructor(
    protected readonly http: OpenToCloseHttpClient,
    protected readonly definition: ResourceDefinition
  ) {
    this.logger = http.log.child({ resource: definition.plural });
  }

  async list(params?: ListParams): Promise<unknown[]> {
    const query = validateListParams(
      params,
      this.definition.rules.filters,
      this.logger
    );
    const items = normalizeList(await this.http.get(this.definition.path, query));
    this.logger.info(`Retrieved ${items.length} ${this.definition.plural}`);
    return items;
  }

  async create(data: TInput): Promise<ApiRecord> {
    validateResourcePayload(data, "create", this.definition.rules, this.logger);
    const record = normalizeRecord(await this.http.post(this.definition.path, data));
    this.logger.info(`Created ${singular(this.definition)}`, { id: record.id });
    return record;
  }

  async retrieve(id: number): Promise<ApiRecord> {
    const record = normalizeRecord(await this.http.get(this.itemPath(id)));
    this.logger.info(`Retrieved ${singular(this.definition)}`, { id });
    return record;
  }

  async update(id: number, data: Partial<TInput>): Promise<ApiRecord> {
    const path = this.itemPath(id);
    validateResourcePayload(data, "update", this.definition.rules, this.logger);
    const record = normalizeRecord(await this.http.put(path, data));
    this.logger.info(`Updated ${singular(this.definition)}`, { id });
    return record;
  }

  /** Resolves with the decoded body, `{}` for a 204 */
  async delete(id: number): Promise<ApiRecord> {
    const body = deletedBody(await this.http.delete(this.itemPath(id)));
    this.logger.info(`Deleted ${singular(this.definition)}`, { id });
    return body;
  }

  protected itemPath(id: number): string {
    const resourceId = validateResourceId(id, this.definition.name, this.logger);
    return `${this.definition.path}/${resourceId}`;
  }
}

// ============================================================================
// Property sub-resources
// ============================================================================

export class PropertySubresource<TInput extends ApiRecord = ApiRecord> {
  protected readonly logger: Logger;

  constructor(
    protected readonly http: OpenToCloseHttpClient,
    protected readonly definition: ResourceDefinition
  ) {
    this.logger = http.log.child({ resource: definition.plural });
  }

  async list(propertyId: number, params?: ListParams): Promise<unknown[]> {
    const path = this.collectionPath(propertyId);
    const query = validateListParams(
      params,
      this.definition.rules.filters,
      this.logger
    );
    const items = normalizeList(await this.http.get(path, query));
    this.logger.info(`Retrieved ${items.length} ${this.definition.plural}`, {
      propertyId,
    });
    return items;
  }

  async create(propertyId: number, data: TInput): Promise<ApiRecord> {
    const path = this.collectionPath(propertyId);
    validateResourcePayload(data, "create", this.definition.rules, this.logger);
    const record = normalizeRecord(await this.http.post(path, this.toWire(data)));
    this.logger.info(`Created ${singular(this.definition)}`, {
      propertyId,
      id: record.id,
    });
    return record;
  }

  async retrieve(propertyId: number, id: number): Promise<ApiRecord> {
    const record = normalizeRecord(await this.http.get(this.itemPath(propertyId, id)));
    this.logger.info(`Retrieved ${singular(this.definition)}`, { propertyId, id });
    return record;
  }

  async update(
    propertyId: number,
    id: number,
    data: Partial<TInput>
  ): Promise<ApiRecord> {
    const path = this.itemPath(propertyId, id);
    validateResourcePayload(data, "update", this.definition.rules, this.logger);
    const record = normalizeRecord(await this.http.put(path, data));
    this.logger.info(`Updated ${singular(this.definition)}`, { propertyId, id });
    return record;
  }

  /** Resolves with the decoded body, `{}` for a 204 */
  async delete(propertyId: number, id: number): Promise<ApiRecord> {
    const body = deletedBody(await this.http.delete(this.itemPath(propertyId, id)));
    this.logger.info(`Deleted ${singular(this.definition)}`, { propertyId, id });
    return body;
  }

  /** Body sent on create; subclasses narrow it to what the provider keeps */
  protected toWire(data: TInput): ApiRecord {
    return data;
  }

  protected collectionPath(propertyId: number): string {
    const id = validateResourceId(propertyId, "Property", this.logger);
    return `/properties/${id}/${this.definition.path}`;
  }

  protected itemPath(propertyId: number, id: number): string {
    const resourceId = validateResourceId(id, this.definition.name, this.logger);
    return `${this.collectionPath(propertyId)}/${resourceId}`;
  }
}
