import type { z } from "zod";
import type { AccessTokenProvider } from "@collabrag/types";
import { TransportError, errorMessage, withRetry } from "@collabrag/errors";
import type { Logger } from "@collabrag/logger";
import { boundedSignal, raceAbort } from "./abort.js";

export type HttpAuth =
  | { type: "basic"; email: string; apiToken: string }
  | { type: "bearer"; tokenProvider: AccessTokenProvider }
  | { type: "none" };

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  query?: QueryParams;
  signal?: AbortSignal;
  /**
   * Set to false for pre-signed URLs: no Authorization or Accept header is
   * sent. Default: true
   */
  authenticated?: boolean;
}

export interface HttpClientConfig {
  /** Provider name used in errors and logs, e.g. "jira". */
  service: string;
  baseUrl: string;
  auth: HttpAuth;
  timeoutMs?: number;
  maxRetries?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 2;

/**
 * Minimal JSON-over-HTTP client for the source providers.
 * Every non-2xx response, network failure or timeout surfaces as a
 * TransportError; 5xx and network failures are retried with backoff.
 */
export class HttpClient {
  readonly service: string;
  private readonly baseUrl: string;
  private readonly auth: HttpAuth;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger?: Logger;

  constructor(config: HttpClientConfig) {
    this.service = config.service;
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.auth = config.auth;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger;
  }

  /** Absolute URLs (such as Graph `@odata.nextLink`) are used as-is. */
  resolve(pathOrUrl: string, query?: QueryParams): string {
    const url = new URL(/^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async getJson(pathOrUrl: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.request(pathOrUrl, options);
    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new TransportError(`${this.service} returned a body that is not JSON`, this.service, {
        cause: error,
      });
    }
  }

  /** GET and validate the JSON body; a body of the wrong shape is a TransportError. */
  async get<T>(
    pathOrUrl: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    const body = await this.getJson(pathOrUrl, options);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(`${this.service} returned an unexpected response shape`, this.service, {
        details: { issues: parsed.error.issues.slice(0, 3).map((issue) => issue.message) },
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async getText(pathOrUrl: string, options: RequestOptions = {}): Promise<string> {
    const response = await this.request(pathOrUrl, options);
    return response.text();
  }

  private async request(pathOrUrl: string, options: RequestOptions): Promise<Response> {
    const url = this.resolve(pathOrUrl, options.query);
    const { signal } = options;
    const authenticated = options.authenticated ?? true;

    return withRetry(
      async () => {
        // The deadline covers token acquisition as well as the request itself
        const timeout = AbortSignal.timeout(this.timeoutMs);
        const bounded = boundedSignal(timeout, signal);

        let response: Response;
        try {
          const headers = authenticated ? await raceAbort(this.headers(bounded), bounded) : {};
          response = await raceAbort(this.fetchFn(url, { headers, signal: bounded }), bounded);
        } catch (error) {
          // Caller cancellation propagates unchanged
          if (signal?.aborted) throw error;
          if (error instanceof TransportError && !timeout.aborted) throw error;
          const reason = timeout.aborted ? `timed out after ${String(this.timeoutMs)}ms` : errorMessage(error);
          throw new TransportError(`${this.service} request failed: ${reason}`, this.service, {
            cause: error,
          });
        }

        if (!response.ok) {
          throw new TransportError(
            `${this.service} responded ${String(response.status)} ${response.statusText}`.trimEnd(),
            this.service,
            { status: response.status, details: { path: new URL(url).pathname } },
          );
        }
        return response;
      },
      {
        maxRetries: this.maxRetries,
        signal,
        onRetry: ({ attempt, maxRetries, delayMs, error }) => {
          this.logger?.warn(
            { service: this.service, attempt, maxRetries, delayMs, err: errorMessage(error) },
            "Retrying provider request",
          );
        },
      },
    );
  }

  private async headers(signal: AbortSignal): Promise<Record<string, string>> {
    const headers: Record<string, string> = { Accept: "application/json" };
    switch (this.auth.type) {
      case "basic":
        headers["Authorization"] =
          `Basic ${Buffer.from(`${this.auth.email}:${this.auth.apiToken}`).toString("base64")}`;
        break;
      case "bearer":
        headers["Authorization"] = `Bearer ${await this.auth.tokenProvider.getAccessToken(signal)}`;
        break;
      case "none":
        break;
    }
    return headers;
  }
}
