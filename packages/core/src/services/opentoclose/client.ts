/**
 * Open To Close API Client
 * Entry point exposing one facade per resource over a shared transport
 */

import type { PropertyFieldMap } from "@otc/types";
import type { EnvMap, OpenToCloseClientOptions } from "./config";
import { OpenToCloseHttpClient } from "./http-client";
import { AgentsResource } from "./resources/agents";
import { ContactsResource } from "./resources/contacts";
import { PropertiesResource } from "./resources/properties";
import { PropertyContactsResource } from "./resources/property-contacts";
import { PropertyDocumentsResource } from "./resources/property-documents";
import { PropertyEmailsResource } from "./resources/property-emails";
import { PropertyNotesResource } from "./resources/property-notes";
import { PropertyTasksResource } from "./resources/property-tasks";
import { TagsResource } from "./resources/tags";
import { TeamsResource } from "./resources/teams";
import { UsersResource } from "./resources/users";

export interface OpenToCloseClientConfig extends OpenToCloseClientOptions {
  /** Replaces the default property field-mapping table */
  propertyFieldMap?: PropertyFieldMap;
}

// ============================================================================
// Open To Close Client
// ============================================================================

export class OpenToCloseClient {
  readonly http: OpenToCloseHttpClient;
  private readonly propertyFieldMap?: PropertyFieldMap;

  private _agents?: AgentsResource;
  private _contacts?: ContactsResource;
  private _properties?: PropertiesResource;
  private _propertyContacts?: PropertyContactsResource;
  private _propertyDocuments?: PropertyDocumentsResource;
  private _propertyEmails?: PropertyEmailsResource;
  private _propertyNotes?: PropertyNotesResource;
  private _propertyTasks?: PropertyTasksResource;
  private _tags?: TagsResource;
  private _teams?: TeamsResource;
  private _users?: UsersResource;

  constructor(config: OpenToCloseClientConfig = {}) {
    const { propertyFieldMap, ...options } = config;
    this.http = new OpenToCloseHttpClient(options);
    this.propertyFieldMap = propertyFieldMap;
  }

  /**
   * Build a client whose unset options come from `env`
   * (`OPEN_TO_CLOSE_API_KEY`, `OPEN_TO_CLOSE_BASE_URL`,
   * `OPEN_TO_CLOSE_TEAM_MEMBER_ID`).
   */
  static fromEnv(
    env: EnvMap = process.env,
    config: OpenToCloseClientConfig = {}
  ): OpenToCloseClient {
    return new OpenToCloseClient({ ...config, env });
  }

  get agents(): AgentsResource {
    this._agents ??= new AgentsResource(this.http);
    return this._agents;
  }

  get contacts(): ContactsResource {
    this._contacts ??= new ContactsResource(this.http);
    return this._contacts;
  }

  get properties(): PropertiesResource {
    this._properties ??= new PropertiesResource(this.http, {
      fieldMap: this.propertyFieldMap,
    });
    return this._properties;
  }

  get propertyContacts(): PropertyContactsResource {
    this._propertyContacts ??= new PropertyContactsResource(this.http);
    return this._propertyContacts;
  }

  get propertyDocuments(): PropertyDocumentsResource {
    this._propertyDocuments ??= new PropertyDocumentsResource(this.http);
    return this._propertyDocuments;
  }

  get propertyEmails(): PropertyEmailsResource {
    this._propertyEmails ??= new PropertyEmailsResource(this.http);
    return this._propertyEmails;
  }

  get propertyNotes(): PropertyNotesResource {
    this._propertyNotes ??= new PropertyNotesResource(this.http);
    return this._propertyNotes;
  }

  get propertyTasks(): PropertyTasksResource {
    this._propertyTasks ??= new PropertyTasksResource(this.http);
    return this._propertyTasks;
  }

  get tags(): TagsResource {
    this._tags ??= new TagsResource(this.http);
    return this._tags;
  }

  get teams(): TeamsResource {
    this._teams ??= new TeamsResource(this.http);
    return this._teams;
  }

  get users(): UsersResource {
    this._users ??= new UsersResource(this.http);
    return this._users;
  }
}
