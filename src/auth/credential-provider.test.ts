import { describe, test, expect } from "vitest";
import { CredentialProvider } from "./credential-provider";
import {
  createMockClock,
  createMockHttpClient,
  errorResponse,
  jsonResponse,
  type MockResponder,
} from "#/test-utils/mocks";
import { createSilentLogger } from "#/logging";
import { AuthenticationError } from "#/errors";

const TOKEN_URL = "https://login.microsoftonline.com/tenant-1/oauth2/v2.0/token";

describe("CredentialProvider", () => {
  const createProvider = (responder: MockResponder, start = 1_000_000) => {
    const http = createMockHttpClient({ [`POST ${TOKEN_URL}`]: responder });
    const clock = createMockClock(start);
    const provider = new CredentialProvider(
      { tenantId: "tenant-1", clientId: "client-1", clientSecret: "test-secret" },
      http,
      clock,
      createSilentLogger()
    );
    return { provider, http, clock };
  };

  const issuing = (tokens: string[], expiresIn = 3600): MockResponder => {
    let index = 0;
    return () => {
      const token = tokens[Math.min(index, tokens.length - 1)];
      index += 1;
      return jsonResponse({ access_token: token, token_type: "Bearer", expires_in: expiresIn });
    };
  };

  describe("acquire", () => {
    test("sends a client-credentials grant for the Fabric scope", async () => {
      const { provider, http } = createProvider(issuing(["token-a"]));

      await provider.acquire();

      expect(http.requests).toHaveLength(1);
      const request = http.requests[0]!;
      expect(request.method).toBe("POST");
      expect(request.headers["content-type"]).toBe("application/x-www-form-urlencoded");

      const form = new URLSearchParams(request.body);
      expect(form.get("grant_type")).toBe("client_credentials");
      expect(form.get("client_id")).toBe("client-1");
      expect(form.get("client_secret")).toBe("test-secret");
      expect(form.get("scope")).toBe("https://api.fabric.microsoft.com/.default");
    });

    test("returns the cached token inside the validity window", async () => {
      const { provider, http, clock } = createProvider(issuing(["token-a", "token-b"]));

      const first = await provider.acquire();
      clock.advance(60_000);
      const second = await provider.acquire();

      expect(first).toBe("token-a");
      expect(second).toBe("token-a");
      expect(http.requests).toHaveLength(1);
    });

    test("re-exchanges exactly once after expiry", async () => {
      const { provider, http, clock } = createProvider(issuing(["token-a", "token-b"]));

      await provider.acquire();
      clock.advance(3600 * 1000);
      const renewed = await provider.acquire();
      const again = await provider.acquire();

      expect(renewed).toBe("token-b");
      expect(again).toBe("token-b");
      expect(http.requests).toHaveLength(2);
    });

    test("renews inside the five minute safety margin", async () => {
      const { provider, http, clock } = createProvider(issuing(["token-a", "token-b"]));

      await provider.acquire();
      // 3600s lifetime - 300s margin = 3300s of validity
      clock.advance(3299 * 1000);
      expect(await provider.acquire()).toBe("token-a");

      clock.advance(1000);
      expect(await provider.acquire()).toBe("token-b");
      expect(http.requests).toHaveLength(2);
    });

    test("records the expiry reported by the identity endpoint", async () => {
      const { provider } = createProvider(issuing(["token-a"], 1800), 5_000);

      await provider.acquire();

      expect(provider.expiresAt).toBe(5_000 + 1800 * 1000);
    });

    test("accepts expires_in sent as a string", async () => {
      const { provider } = createProvider(
        jsonResponse({ access_token: "token-a", token_type: "Bearer", expires_in: "3599" }),
        0
      );

      await provider.acquire();

      expect(provider.expiresAt).toBe(3_599_000);
    });

    test("concurrent callers share a single exchange", async () => {
      const { provider, http } = createProvider(issuing(["token-a", "token-b"]));

      const tokens = await Promise.all([provider.acquire(), provider.acquire(), provider.acquire()]);

      expect(tokens).toEqual(["token-a", "token-a", "token-a"]);
      expect(http.requests).toHaveLength(1);
    });

    test("invalidate forces a new exchange", async () => {
      const { provider, http } = createProvider(issuing(["token-a", "token-b"]));

      await provider.acquire();
      provider.invalidate();

      expect(await provider.acquire()).toBe("token-b");
      expect(http.requests).toHaveLength(2);
    });
  });

  describe("failures", () => {
    test("throws AuthenticationError with the endpoint's description on rejection", async () => {
      const { provider } = createProvider(
        jsonResponse({ error: "invalid_client", error_description: "Invalid client secret provided." }, 401)
      );

      const attempt = provider.acquire();

      await expect(attempt).rejects.toBeInstanceOf(AuthenticationError);
      await expect(attempt).rejects.toMatchObject({
        code: "AUTHENTICATION",
        message: "Identity endpoint rejected credentials: 401 invalid_client: Invalid client secret provided.",
        details: { status: 401 },
      });
    });

    test("throws AuthenticationError on network failure", async () => {
      const { provider } = createProvider(() => {
        throw new Error("getaddrinfo ENOTFOUND login.microsoftonline.com");
      });

      await expect(provider.acquire()).rejects.toThrow(
        "Token request failed: getaddrinfo ENOTFOUND login.microsoftonline.com"
      );
    });

    test("throws AuthenticationError when the token response has no access_token", async () => {
      const { provider } = createProvider(jsonResponse({ token_type: "Bearer", expires_in: 3600 }));

      await expect(provider.acquire()).rejects.toBeInstanceOf(AuthenticationError);
    });

    test("does not retry after a rejection within the same call", async () => {
      const { provider, http } = createProvider(errorResponse(400, "bad request"));

      await expect(provider.acquire()).rejects.toThrow("Identity endpoint rejected credentials: 400");
      expect(http.requests).toHaveLength(1);
    });
  });
});
