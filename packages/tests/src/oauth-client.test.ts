import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  AuthError,
  OAuthClient,
  fitbitProvider,
  parseOAuthErrorCode,
  toCredential,
  type OAuthConfig,
} from "@fitsync/connectors";
import { NetworkError } from "@fitsync/proto";
import { T0, jsonResponse, makeCredential, requestUrl } from "./helpers";

const REDIRECT_URI = "http://localhost:5000/fitbit/callback";

function makeClient(config: OAuthConfig = fitbitProvider.oauthConfig): OAuthClient {
  return new OAuthClient({
    config: { ...config, scopes: ["activity", "heartrate"] },
    app: { clientId: "test-client", clientSecret: "test-secret" },
    redirectUri: REDIRECT_URI,
    timeoutMs: 1000,
    now: () => T0,
  });
}

describe("OAuthClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const lastRequest = () => {
    const call = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];
    const init = call[1];
    return {
      url: requestUrl(call[0]),
      method: init?.method,
      headers: new Headers(init?.headers),
      body: new URLSearchParams(String(init?.body)),
    };
  };

  describe("getAuthUrl", () => {
    it("builds the consent URL with client, redirect, scopes and state", () => {
      const url = new URL(makeClient().getAuthUrl("state-123"));

      expect(url.origin + url.pathname).toBe("https://www.fitbit.com/oauth2/authorize");
      expect(url.searchParams.get("client_id")).toBe("test-client");
      expect(url.searchParams.get("redirect_uri")).toBe(REDIRECT_URI);
      expect(url.searchParams.get("response_type")).toBe("code");
      expect(url.searchParams.get("scope")).toBe("activity heartrate");
      expect(url.searchParams.get("state")).toBe("state-123");
    });

    it("adds extra provider params", () => {
      const client = makeClient({
        ...fitbitProvider.oauthConfig,
        extraAuthParams: { prompt: "consent" },
      });
      const url = new URL(client.getAuthUrl("s"));
      expect(url.searchParams.get("prompt")).toBe("consent");
    });
  });

  describe("exchangeCode", () => {
    it("posts the code with Basic auth and normalizes the grant", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          access_token: "a1",
          refresh_token: "r1",
          expires_in: 28800,
          token_type: "Bearer",
          scope: "heartrate activity heartrate",
          user_id: "SUBJ01",
        })
      );

      const grant = await makeClient().exchangeCode("code-abc");

      expect(grant).toEqual({
        accessToken: "a1",
        refreshToken: "r1",
        expiresAt: T0 + 28_800_000,
        scopes: ["heartrate", "activity"],
        tokenType: "Bearer",
        subjectId: "SUBJ01",
      });

      const request = lastRequest();
      expect(request.url).toBe("https://api.fitbit.com/oauth2/token");
      expect(request.method).toBe("POST");
      expect(request.headers.get("Authorization")).toBe(
        `Basic ${Buffer.from("test-client:test-secret").toString("base64")}`
      );
      expect(request.body.get("grant_type")).toBe("authorization_code");
      expect(request.body.get("code")).toBe("code-abc");
      expect(request.body.get("redirect_uri")).toBe(REDIRECT_URI);
      expect(request.body.has("client_secret")).toBe(false);
    });

    it("sends client credentials in the body without Basic auth", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ access_token: "a1", refresh_token: "r1", expires_in: 3600 })
      );

      await makeClient({ ...fitbitProvider.oauthConfig, useBasicAuth: false }).exchangeCode("c");

      const request = lastRequest();
      expect(request.headers.has("Authorization")).toBe(false);
      expect(request.body.get("client_id")).toBe("test-client");
      expect(request.body.get("client_secret")).toBe("test-secret");
    });

    it("fails with a terminal AuthError for a rejected code", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ errors: [{ errorType: "invalid_grant", message: "Authorization code invalid" }] }, 400)
      );

      const error = await makeClient().exchangeCode("bad").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.errorCode).toBe("invalid_grant");
      expect(error instanceof AuthError && error.transient).toBe(false);
    });
  });

  describe("refresh", () => {
    it("posts the refresh token", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ access_token: "a2", refresh_token: "r2", expires_in: 28800, user_id: "SUBJ01" })
      );

      const grant = await makeClient().refresh("r1");

      expect(grant.accessToken).toBe("a2");
      expect(grant.refreshToken).toBe("r2");
      const request = lastRequest();
      expect(request.body.get("grant_type")).toBe("refresh_token");
      expect(request.body.get("refresh_token")).toBe("r1");
    });

    it("treats a rejected refresh token as terminal", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: "invalid_grant" }, 400));

      const error = await makeClient().refresh("r1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.transient).toBe(false);
      expect(error instanceof AuthError && error.revoked).toBe(true);
      expect(error instanceof AuthError && error.message).toBe(
        "Authorization expired or invalid. Please try connecting again."
      );
    });

    it("treats a 401 without an error code as a rejected refresh token", async () => {
      fetchMock.mockResolvedValue(new Response("Unauthorized", { status: 401 }));

      const error = await makeClient().refresh("r1").catch((e: unknown) => e);

      expect(error instanceof AuthError && error.revoked).toBe(true);
    });

    it.each([
      ["invalid_client", 401],
      ["unauthorized_client", 400],
      ["invalid_request", 400],
      ["invalid_scope", 400],
    ])("does not treat %s as a revoked grant", async (errorType, status) => {
      fetchMock.mockResolvedValue(jsonResponse({ errors: [{ errorType }] }, status));

      const error = await makeClient().refresh("r1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.errorCode).toBe(errorType);
      expect(error instanceof AuthError && error.transient).toBe(false);
      expect(error instanceof AuthError && error.revoked).toBe(false);
    });

    it("uses the generic message for error codes it does not know", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: "constructor" }, 400));

      const error = await makeClient().refresh("r1").catch((e: unknown) => e);

      expect(error instanceof AuthError && error.message).toBe(
        "An authentication error occurred. Please try connecting again."
      );
    });

    it("gives up on a token endpoint that never answers", async () => {
      fetchMock.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            const signal = init?.signal;
            if (!signal) {
              reject(new Error("request sent without a timeout signal"));
              return;
            }
            signal.addEventListener("abort", () => reject(signal.reason));
          })
      );
      const client = new OAuthClient({
        config: fitbitProvider.oauthConfig,
        app: { clientId: "test-client", clientSecret: "test-secret" },
        redirectUri: REDIRECT_URI,
        timeoutMs: 20,
      });

      const error = await client.refresh("r1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.transient).toBe(true);
      expect(error instanceof AuthError && error.revoked).toBe(false);
      expect(error instanceof AuthError && error.cause).toBeInstanceOf(NetworkError);
    });

    it.each([500, 503, 408, 429])("treats HTTP %d as transient", async (status) => {
      fetchMock.mockResolvedValue(jsonResponse({}, status));

      const error = await makeClient().refresh("r1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.transient).toBe(true);
    });

    it("treats an unreachable endpoint as transient", async () => {
      fetchMock.mockRejectedValue(new TypeError("fetch failed"));

      const error = await makeClient().refresh("r1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.transient).toBe(true);
      expect(error instanceof AuthError && error.cause).toBeInstanceOf(NetworkError);
    });

    it("treats a malformed token response as transient", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ token: "nope" }));

      const error = await makeClient().refresh("r1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.transient).toBe(true);
      expect(error instanceof AuthError && error.message).toMatch(/^Unexpected token response/);
    });
  });

  describe("revoke", () => {
    it("posts the token to the revocation endpoint", async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 200 }));

      expect(await makeClient().revoke("r1")).toEqual({ success: true, reason: "revoked" });
      const request = lastRequest();
      expect(request.url).toBe("https://api.fitbit.com/oauth2/revoke");
      expect(request.body.get("token")).toBe("r1");
    });

    it("never throws", async () => {
      fetchMock.mockRejectedValue(new TypeError("fetch failed"));
      expect(await makeClient().revoke("r1")).toEqual({ success: false, reason: "failed" });

      fetchMock.mockResolvedValue(new Response(null, { status: 500 }));
      expect(await makeClient().revoke("r1")).toEqual({ success: false, reason: "failed" });
    });

    it("skips providers without a revocation endpoint", async () => {
      const client = makeClient({ ...fitbitProvider.oauthConfig, revokeUrl: undefined });
      expect(await client.revoke("r1")).toEqual({ success: true, reason: "not_supported" });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});

describe("toCredential", () => {
  it("keeps the previous refresh token and createdAt when not rotated", () => {
    const previous = makeCredential();
    const credential = toCredential(
      "default",
      { accessToken: "a2", expiresAt: T0 + 7200_000 },
      T0 + 1000,
      previous
    );

    expect(credential).toEqual({
      ...previous,
      accessToken: "a2",
      expiresAt: T0 + 7200_000,
      updatedAt: T0 + 1000,
    });
  });

  it("starts a new createdAt when a different user connects", () => {
    const credential = toCredential(
      "default",
      { accessToken: "a2", refreshToken: "r2", expiresAt: T0 + 10, subjectId: "OTHER" },
      T0 + 1000,
      makeCredential()
    );

    expect(credential.createdAt).toBe(T0 + 1000);
    expect(credential.subjectId).toBe("OTHER");
  });

  it("never moves updatedAt backwards", () => {
    const previous = makeCredential({ updatedAt: T0 + 5000 });
    const credential = toCredential("default", { accessToken: "a2", expiresAt: T0 }, T0, previous);
    expect(credential.updatedAt).toBe(T0 + 5000);
  });

  it("requires a refresh token", () => {
    expect(() =>
      toCredential("default", { accessToken: "a1", expiresAt: T0, subjectId: "S" }, T0)
    ).toThrow(AuthError);
  });
});

describe("parseOAuthErrorCode", () => {
  it("reads RFC 6749 and provider error bodies", () => {
    expect(parseOAuthErrorCode('{"error":"invalid_grant"}')).toBe("invalid_grant");
    expect(parseOAuthErrorCode('{"errors":[{"errorType":"expired_token"}]}')).toBe("expired_token");
  });

  it("returns undefined for anything else", () => {
    expect(parseOAuthErrorCode("<html>")).toBeUndefined();
    expect(parseOAuthErrorCode('{"errors":[]}')).toBeUndefined();
    expect(parseOAuthErrorCode("null")).toBeUndefined();
  });
});
