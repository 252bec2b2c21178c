/**
 * Client configuration
 *
 * Resolution order for the credential is the explicit option, then the
 * `OPEN_TO_CLOSE_API_KEY` variable of the env map handed in. The env map is
 * a parameter so the process environment is read once, by the caller.
 */

import type { Logger } from "../logger";
import { AuthenticationError, OpenToCloseAPIError } from "./errors";

export const DEFAULT_BASE_URL = "https://api.opentoclose.com/v1";
export const DEFAULT_TIMEOUT_MS = 30000;

export const API_KEY_ENV = "OPEN_TO_CLOSE_API_KEY";
export const BASE_URL_ENV = "OPEN_TO_CLOSE_BASE_URL";
export const TEAM_MEMBER_ENV = "OPEN_TO_CLOSE_TEAM_MEMBER_ID";

export type EnvMap = Record<string, string | undefined>;

export interface OpenToCloseClientOptions {
  apiKey?: string;
  baseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  /**
   * Team member that owns new properties when the payload names none and
   * the teams collection yields no member.
   */
  defaultTeamMemberId?: number;
  logger?: Logger;
  /** Where env-based defaults come from; pass `process.env` to opt in */
  env?: EnvMap;
}

export interface ResolvedClientConfig {
  apiKey: string;
  baseUrl: string;
  timeout: number;
  defaultTeamMemberId?: number;
}

function parseTeamMemberId(
  raw: number | string | undefined,
  logger?: Logger
): number | undefined {
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new OpenToCloseAPIError(
      `Invalid defaultTeamMemberId: ${raw}. Must be a positive integer.`,
      { logger }
    );
  }
  return value;
}

/**
 * Resolve and check client configuration. Throws at construction time,
 * never on first call.
 */
export function resolveClientConfig(
  options: OpenToCloseClientOptions = {},
  env: EnvMap = options.env ?? {}
): ResolvedClientConfig {
  const { logger } = options;
  const apiKey = options.apiKey ?? env[API_KEY_ENV];

  if (apiKey === undefined || apiKey.trim().length === 0) {
    throw new AuthenticationError(
      `API key is required. Set ${API_KEY_ENV} or pass the apiKey option.`,
      { logger }
    );
  }

  const baseUrl = options.baseUrl ?? env[BASE_URL_ENV] ?? DEFAULT_BASE_URL;
  if (!/^https?:\/\//.test(baseUrl)) {
    throw new OpenToCloseAPIError(
      `Invalid baseUrl: ${baseUrl}. Must be a valid HTTP/HTTPS URL.`,
      { logger }
    );
  }

  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new OpenToCloseAPIError(
      `Invalid timeout: ${timeout}. Must be a positive number.`,
      { logger }
    );
  }

  return {
    apiKey,
    baseUrl,
    timeout,
    defaultTeamMemberId: parseTeamMemberId(
      options.defaultTeamMemberId ?? env[TEAM_MEMBER_ENV],
      logger
    ),
  };
}
