import { z } from "zod";
import type { AccessTokenProvider } from "@collabrag/types";
import { TransportError, errorMessage } from "@collabrag/errors";
import { boundedSignal, raceAbort } from "./abort.js";

export interface ClientCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface TokenProviderOptions {
  fetch?: typeof fetch;
  now?: () => number;
  /** Upper bound for one token request. Default: 30000 */
  timeoutMs?: number;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().default(3600),
});

const SERVICE = "microsoft-identity";
const GRAPH_SCOPE = "https://graph.microsoft.com/.default";
/** Tokens are refreshed this long before they expire. */
const EXPIRY_SKEW_MS = 60_000;
const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * OAuth2 client-credentials flow against the Microsoft identity platform.
 * The token is cached until shortly before it expires.
 */
export class ClientCredentialsTokenProvider implements AccessTokenProvider {
  private cached?: { token: string; expiresAt: number };
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;
  private readonly timeoutMs: number;

  constructor(
    private readonly credentials: ClientCredentials,
    options: TokenProviderOptions = {},
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.cached && this.cached.expiresAt > this.now()) {
      return this.cached.token;
    }

    const { tenantId, clientId, clientSecret } = this.credentials;
    const url = `https://login.microsoftonline.com/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`;
    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: clientId,
      client_secret: clientSecret,
      scope: GRAPH_SCOPE,
    });
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const bounded = boundedSignal(timeout, signal);

    let payload: unknown;
    try {
      const response = await raceAbort(this.fetchFn(url, { method: "POST", body: form, signal: bounded }), bounded);
      if (!response.ok) {
        throw new TransportError(`Could not acquire access token: ${String(response.status)}`, SERVICE, {
          status: response.status,
        });
      }
      payload = await raceAbort(
        response.json().catch(() => undefined),
        bounded,
      );
    } catch (error) {
      if (error instanceof TransportError || signal?.aborted) throw error;
      const reason = timeout.aborted ? `timed out after ${String(this.timeoutMs)}ms` : errorMessage(error);
      throw new TransportError(`Token request failed: ${reason}`, SERVICE, { cause: error });
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError("Token response has no access_token", SERVICE);
    }

    this.cached = {
      token: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000 - EXPIRY_SKEW_MS,
    };
    return parsed.data.access_token;
  }
}
