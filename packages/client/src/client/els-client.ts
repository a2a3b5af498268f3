/**
 * HTTP client for api.elsevier.com: credentials, request throttling and
 * JSON decoding.
 */
import { z } from "zod";
import { HttpError, parseRetryAfterSeconds } from "../utils/http-error.js";
import {
  InvalidUriError,
  MalformedResponseError,
  NetworkError,
} from "../utils/errors.js";
import { parseResponsePart } from "../utils/parse.js";
import {
  clientSettingsSchema,
  type ClientConfig,
  type ClientSettings,
  type ClientSettingsInput,
} from "./config.js";
import type { Logger } from "./logger.js";

export type JsonObject = Record<string, unknown>;

export const jsonObjectSchema = z.record(z.string(), z.unknown());

export type FetchResponse = Pick<Response, "status" | "headers" | "text">;

export type FetchFn = (
  url: string,
  init: { method: "GET"; headers: Record<string, string> }
) => Promise<FetchResponse>;

export type ElsClientOptions = ClientSettingsInput & {
  fetch?: FetchFn;
  logger?: Logger;
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ElsClient {
  readonly logger: Logger;
  private readonly apiKey: string;
  private instToken: string;
  private readonly settings: ClientSettings;
  private readonly fetchImpl: FetchFn;
  private lastRequestAt: number | undefined;
  private throttleQueue: Promise<void> = Promise.resolve();

  constructor(apiKey: string, options: ElsClientOptions = {}) {
    const { fetch: fetchImpl, logger, ...settings } = options;
    if (!apiKey) {
      throw new Error("ElsClient requires an API key");
    }
    this.apiKey = apiKey;
    this.settings = clientSettingsSchema.parse(settings);
    this.instToken = this.settings.instToken;
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
    this.logger = logger ?? console;
  }

  setInstToken(instToken: string): void {
    this.instToken = instToken;
  }

  getBaseUrl(): string {
    return this.settings.baseUrl;
  }

  showApiKey(): string {
    return this.apiKey;
  }

  /** Maximum number of records the API returns per request. */
  get pageSize(): number {
    return this.settings.pageSize;
  }

  resolveUrl(uri: string): string {
    try {
      return new URL(uri, this.settings.baseUrl).toString();
    } catch (error) {
      throw new InvalidUriError({ uri, cause: error });
    }
  }

  async execRequest(uri: string): Promise<JsonObject> {
    const url = this.resolveUrl(uri);
    await this.throttle();

    const headers: Record<string, string> = {
      "X-ELS-APIKey": this.apiKey,
      "User-Agent": this.settings.userAgent,
      Accept: "application/json",
    };
    if (this.instToken) {
      headers["X-ELS-Insttoken"] = this.instToken;
    }

    this.logger.debug(`[ElsClient] GET ${url}`);

    let status: number;
    let body: string;
    let retryAfter: string | null;
    try {
      const response = await this.fetchImpl(url, { method: "GET", headers });
      status = response.status;
      retryAfter = response.headers.get("retry-after");
      body = await response.text();
    } catch (error) {
      throw new NetworkError({ url, cause: error });
    }

    if (status !== 200) {
      const retryAfterSeconds = parseRetryAfterSeconds(retryAfter);
      throw new HttpError({
        status,
        url,
        body,
        ...(retryAfterSeconds !== undefined ? { retryAfterSeconds } : {}),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new MalformedResponseError({
        message: `Response from ${url} is not valid JSON`,
        path: "$",
        url,
        cause: error,
      });
    }

    return parseResponsePart(jsonObjectSchema, json, { path: "$", url });
  }

  // Slots are chained so overlapping callers still get spaced out.
  private throttle(): Promise<void> {
    const slot = this.throttleQueue.then(() => this.waitForSlot());
    this.throttleQueue = slot;
    return slot;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastRequestAt !== undefined) {
      const remaining =
        this.settings.minRequestIntervalMs - (Date.now() - this.lastRequestAt);
      if (remaining > 0) {
        this.logger.debug(`[ElsClient] Throttling request for ${remaining}ms`);
        await delay(remaining);
      }
    }
    this.lastRequestAt = Date.now();
  }
}

export function createClient(
  config: ClientConfig,
  options: Omit<ElsClientOptions, "instToken" | "baseUrl"> = {}
): ElsClient {
  return new ElsClient(config.apiKey, {
    ...options,
    ...(config.instToken !== undefined ? { instToken: config.instToken } : {}),
    ...(config.baseUrl !== undefined ? { baseUrl: config.baseUrl } : {}),
  });
}
