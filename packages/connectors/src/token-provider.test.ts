import { describe, it, expect, vi } from "vitest";
import { TransportError } from "@collabrag/errors";
import { ClientCredentialsTokenProvider } from "./token-provider.js";

const credentials = { tenantId: "tenant-1", clientId: "client-1", clientSecret: "test-secret" };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("ClientCredentialsTokenProvider", () => {
  it("posts the client-credentials grant to the tenant token endpoint", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ access_token: "test-access-token", expires_in: 3600 }));
    const provider = new ClientCredentialsTokenProvider(credentials, { fetch: fetchFn });

    await expect(provider.getAccessToken()).resolves.toBe("test-access-token");

    const [input, init] = fetchFn.mock.calls[0] ?? [];
    expect(String(input)).toBe("https://login.microsoftonline.com/tenant-1/oauth2/v2.0/token");
    expect(init?.method).toBe("POST");
    expect(String(init?.body)).toBe(
      "grant_type=client_credentials&client_id=client-1&client_secret=test-secret" +
        "&scope=https%3A%2F%2Fgraph.microsoft.com%2F.default",
    );
  });

  it("caches the token until a minute before it expires", async () => {
    let clock = 0;
    let issued = 0;
    const fetchFn = vi.fn<typeof fetch>(async () => {
      issued += 1;
      return jsonResponse({ access_token: `token-${String(issued)}`, expires_in: 120 });
    });
    const provider = new ClientCredentialsTokenProvider(credentials, { fetch: fetchFn, now: () => clock });

    expect(await provider.getAccessToken()).toBe("token-1");
    clock = 59_999;
    expect(await provider.getAccessToken()).toBe("token-1");
    clock = 60_000;
    expect(await provider.getAccessToken()).toBe("token-2");
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("raises TransportError with the status of a rejected token request", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response("denied", { status: 401 }));
    const provider = new ClientCredentialsTokenProvider(credentials, { fetch: fetchFn });

    const error = await provider.getAccessToken().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: "Could not acquire access token: 401", statusCode: 401 });
  });

  it("rejects a response without access_token", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ token_type: "Bearer" }));
    const provider = new ClientCredentialsTokenProvider(credentials, { fetch: fetchFn });

    await expect(provider.getAccessToken()).rejects.toThrow("Token response has no access_token");
  });

  it("gives up on a token endpoint that never answers", async () => {
    const fetchFn = vi.fn<typeof fetch>(() => new Promise<Response>(() => undefined));
    const provider = new ClientCredentialsTokenProvider(credentials, { fetch: fetchFn, timeoutMs: 20 });

    const error = await provider.getAccessToken().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: "Token request failed: timed out after 20ms" });
  });

  it("propagates caller cancellation unchanged", async () => {
    const fetchFn = vi.fn<typeof fetch>(() => new Promise<Response>(() => undefined));
    const provider = new ClientCredentialsTokenProvider(credentials, { fetch: fetchFn });
    const controller = new AbortController();
    const reason = new Error("sync cancelled");

    const pending = provider.getAccessToken(controller.signal);
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });
});
