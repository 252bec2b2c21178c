/**
 * Open To Close HTTP transport
 *
 * One place where requests are built and responses are mapped onto the
 * error taxonomy. Every call carries the credential as the `api_token`
 * query parameter. No retries.
 */

import type {
  ApiRecord,
  FilePart,
  HttpMethod,
  QueryParams,
  QueryValue,
  RequestOptions,
} from "@otc/types";
import { getLogger, type Logger } from "../logger";
import {
  resolveClientConfig,
  type OpenToCloseClientOptions,
  type ResolvedClientConfig,
} from "./config";
import { isRecord } from "./envelope";
import {
  NetworkError,
  OpenToCloseAPIError,
  ValidationError,
  defaultDetail,
  describeStatus,
  errorForStatus,
  toFieldErrors,
} from "./errors";
import { typeName } from "./validation";

export const USER_AGENT = "opentoclose-client/1.0";

interface PreparedBody {
  body?: string | FormData;
  headers: Record<string, string>;
}

function parseJson(text: string): unknown {
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractDetail(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  for (const key of ["message", "error", "detail"]) {
    const value = body[key];
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) {
    return undefined;
  }
  const seconds = parseInt(header, 10);
  return Number.isNaN(seconds) ? undefined : seconds;
}

function isQueryValue(value: unknown): value is QueryValue {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/** 204 is handled before the body is decoded */
function isSuccessStatus(status: number): boolean {
  return status === 200 || status === 201 || status === 204;
}

function toBlob(part: FilePart): Blob {
  if (typeof part.content !== "string") {
    return part.content;
  }
  return new Blob([part.content], {
    type: part.contentType ?? "application/octet-stream",
  });
}

export class OpenToCloseHttpClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly logger: Logger;
  readonly defaultTeamMemberId?: number;

  constructor(options: OpenToCloseClientOptions = {}) {
    this.logger =
      options.logger ?? getLogger().child({ component: "opentoclose" });

    const config: ResolvedClientConfig = resolveClientConfig({
      ...options,
      logger: this.logger,
    });
    this.apiKey = config.apiKey;
    // used as configured; a trailing slash yields a double slash in paths
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout;
    this.defaultTeamMemberId = config.defaultTeamMemberId;

    this.logger.info("Initialized Open To Close HTTP client", {
      baseUrl: this.baseUrl,
      timeout: this.timeout,
    });
  }

  /** Logger shared with the facades built on this transport */
  get log(): Logger {
    return this.logger;
  }

  // ==========================================================================
  // Verbs
  // ==========================================================================

  get(endpoint: string, query?: QueryParams): Promise<unknown> {
    return this.request("GET", endpoint, { query });
  }

  post(
    endpoint: string,
    json?: ApiRecord | ApiRecord[],
    options: RequestOptions = {}
  ): Promise<unknown> {
    return this.request("POST", endpoint, { ...options, json });
  }

  put(
    endpoint: string,
    json?: ApiRecord | ApiRecord[],
    options: RequestOptions = {}
  ): Promise<unknown> {
    return this.request("PUT", endpoint, { ...options, json });
  }

  patch(
    endpoint: string,
    json?: ApiRecord | ApiRecord[],
    options: RequestOptions = {}
  ): Promise<unknown> {
    return this.request("PATCH", endpoint, { ...options, json });
  }

  delete(endpoint: string, query?: QueryParams): Promise<unknown> {
    return this.request("DELETE", endpoint, { query });
  }

  // ==========================================================================
  // Request Handler
  // ==========================================================================

  /**
   * Issue one call. Resolves with the decoded body (`{}` for 204 and for
   * success bodies that are empty or not JSON); rejects with an
   * `OpenToCloseAPIError`.
   */
  async request(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const path = endpoint.replace(/^\//, "");
    if (path.trim().length === 0) {
      throw new ValidationError("Endpoint cannot be empty", {
        method,
        logger: this.logger,
      });
    }
    const route = `/${path}`;

    const url = this.buildUrl(path, method, route, options.query);
    const prepared = this.prepareBody(method, route, options);

    this.logger.debug(`Making ${method} request to ${route}`, {
      url: `${this.baseUrl}${route}`,
      hasJson: options.json !== undefined,
      hasForm: options.form !== undefined,
      hasFiles: options.files !== undefined,
      queryParamCount: Object.keys(options.query ?? {}).length,
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const startTime = Date.now();

    let response: Response;
    let text = "";
    try {
      response = await fetch(url.toString(), {
        method,
        headers: {
          Accept: "application/json",
          "User-Agent": USER_AGENT,
          ...prepared.headers,
        },
        body: prepared.body,
        signal: controller.signal,
      });
      if (response.status !== 204) {
        text = await response.text();
      }
    } catch (error) {
      const message = controller.signal.aborted
        ? `Request to ${method} ${route} timed out after ${this.timeout}ms`
        : `Network error for ${method} ${route}: ${error instanceof Error ? error.message : String(error)}`;
      throw new NetworkError(message, {
        endpoint: route,
        method,
        cause: error,
        logger: this.logger,
      });
    } finally {
      clearTimeout(timeoutId);
    }

    this.logger.externalService({
      service: "opentoclose",
      endpoint: `${method} ${route}`,
      duration: Date.now() - startTime,
      statusCode: response.status,
      success: isSuccessStatus(response.status),
    });

    return this.handleResponse(response, text, method, route);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private buildUrl(
    path: string,
    method: HttpMethod,
    route: string,
    query: QueryParams = {}
  ): URL {
    const url = new URL(`${this.baseUrl}/${path}`);

    for (const [key, value] of Object.entries(query)) {
      if (value === undefined || value === null) {
        continue;
      }
      if (isQueryValue(value)) {
        url.searchParams.set(key, String(value));
      } else if (Array.isArray(value) && value.every(isQueryValue)) {
        for (const item of value) {
          url.searchParams.append(key, String(item));
        }
      } else {
        throw new ValidationError(
          `Query parameter ${key} cannot be encoded in a URL: ${typeName(value)}`,
          {
            endpoint: route,
            method,
            fieldErrors: [{ field: key, message: "cannot be encoded in a URL" }],
            logger: this.logger,
          }
        );
      }
    }

    url.searchParams.set("api_token", this.apiKey);
    return url;
  }

  private prepareBody(
    method: HttpMethod,
    route: string,
    options: RequestOptions
  ): PreparedBody {
    const multipart = options.form !== undefined || options.files !== undefined;

    if (multipart && options.json !== undefined) {
      throw new ValidationError(
        "A JSON body cannot be combined with form fields or files",
        { endpoint: route, method, logger: this.logger }
      );
    }

    if (multipart) {
      const form = new FormData();
      for (const [key, value] of Object.entries(options.form ?? {})) {
        form.append(key, value);
      }
      for (const [key, part] of Object.entries(options.files ?? {})) {
        form.append(key, toBlob(part), part.filename);
      }
      // fetch sets the multipart boundary header itself
      return { body: form, headers: {} };
    }

    if (options.json !== undefined) {
      return {
        body: JSON.stringify(options.json),
        headers: { "Content-Type": "application/json" },
      };
    }

    return { headers: {} };
  }

  private handleResponse(
    response: Response,
    text: string,
    method: HttpMethod,
    route: string
  ): unknown {
    const { status } = response;

    if (status === 204) {
      return {};
    }

    const parsed = parseJson(text);

    if (isSuccessStatus(status)) {
      if (parsed === undefined && text.trim().length > 0) {
        this.logger.debug(`Non-JSON success body from ${method} ${route}`, {
          statusCode: status,
        });
      }
      return parsed ?? {};
    }

    const responseData =
      parsed ?? (text.length > 0 ? { message: text, raw_content: text } : {});

    if (status < 400) {
      throw new OpenToCloseAPIError(
        `Unexpected status ${status} for ${method} ${route}`,
        {
          statusCode: status,
          responseData,
          endpoint: route,
          method,
          logger: this.logger,
        }
      );
    }

    const detail =
      extractDetail(parsed) ??
      (parsed === undefined && text.length > 0 ? text : defaultDetail(status));

    const fieldErrors = isRecord(parsed)
      ? toFieldErrors(parsed.errors ?? parsed.field_errors)
      : undefined;

    throw errorForStatus(
      status,
      `${describeStatus(status)} ${status === 400 ? "to" : "for"} ${method} ${route}: ${detail}`,
      {
        responseData,
        endpoint: route,
        method,
        fieldErrors,
        retryAfter: parseRetryAfter(response.headers.get("retry-after")),
        logger: this.logger,
      }
    );
  }
}
