/**
 * Unit tests for ServiceAccountTokenProvider
 *
 * Signs with a key pair generated in-process and exchanges tokens against
 * the mock HTTP harness. No network.
 */

import { describe, it, expect, beforeAll, beforeEach } from "vitest";
import { createVerify, generateKeyPairSync } from "crypto";
import { ServiceAccountTokenProvider } from "@/clients/googleSheets";
import { TransportError } from "@/errors";
import type { ServiceAccountCredential } from "@/types";
import { createMockHttp } from "../../helpers/mockHttp";
import type { MockHttp } from "../../helpers/mockHttp";

const TOKEN_URL = "https://oauth2.googleapis.com/token";
const EMAIL = "writer@test-project.iam.gserviceaccount.com";
const NOW_MS = 1_700_000_000_000;
const NOW_SECONDS = 1_700_000_000;

let privateKey: string;
let publicKey: string;

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
}

describe("Unit: ServiceAccountTokenProvider", () => {
  let mock: MockHttp;
  let nowMs: number;
  let issued: number;

  beforeAll(() => {
    const pair = generateKeyPairSync("rsa", {
      modulusLength: 2048,
      publicKeyEncoding: { type: "spki", format: "pem" },
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
    });
    privateKey = pair.privateKey;
    publicKey = pair.publicKey;
  });

  beforeEach(() => {
    mock = createMockHttp();
    nowMs = NOW_MS;
    issued = 0;
    mock.onCustom("POST", TOKEN_URL, async () => {
      issued++;
      return {
        status: 200,
        body: JSON.stringify({
          access_token: `test-token-${issued}`,
          expires_in: 3600,
          token_type: "Bearer",
        }),
      };
    });
  });

  function createProvider(overrides: Partial<ServiceAccountCredential> = {}) {
    const credential: ServiceAccountCredential = {
      kind: "service_account",
      clientEmail: EMAIL,
      privateKey,
      privateKeyId: "key-1",
      ...overrides,
    };
    return new ServiceAccountTokenProvider(credential, mock.request, () => nowMs);
  }

  it("exchanges a signed JWT assertion for a token", async () => {
    const provider = createProvider();

    expect(await provider.getAccessToken()).toBe("test-token-1");

    const [req] = mock.getRecordedRequests();
    expect(req.method).toBe("POST");
    expect(req.headers?.["Content-Type"]).toBe("application/x-www-form-urlencoded");
    const form = new URLSearchParams(req.body);
    expect(form.get("grant_type")).toBe("urn:ietf:params:oauth:grant-type:jwt-bearer");

    const [header, payload, signature] = (form.get("assertion") ?? "").split(".");
    expect(decodeSegment(header)).toEqual({ alg: "RS256", typ: "JWT", kid: "key-1" });
    expect(decodeSegment(payload)).toEqual({
      iss: EMAIL,
      scope:
        "https://www.googleapis.com/auth/spreadsheets https://www.googleapis.com/auth/drive",
      aud: TOKEN_URL,
      exp: NOW_SECONDS + 3600,
      iat: NOW_SECONDS,
    });

    const verifier = createVerify("RSA-SHA256");
    verifier.update(`${header}.${payload}`);
    expect(verifier.verify(publicKey, Buffer.from(signature, "base64url"))).toBe(true);
  });

  it("reuses the token until the expiry buffer", async () => {
    const provider = createProvider();
    await provider.getAccessToken();

    nowMs = NOW_MS + 3539 * 1000;
    expect(await provider.getAccessToken()).toBe("test-token-1");

    nowMs = NOW_MS + 3541 * 1000;
    expect(await provider.getAccessToken()).toBe("test-token-2");
    expect(issued).toBe(2);
  });

  it("shares one exchange between concurrent callers", async () => {
    const provider = createProvider();

    const tokens = await Promise.all([provider.getAccessToken(), provider.getAccessToken()]);

    expect(tokens).toEqual(["test-token-1", "test-token-1"]);
    expect(issued).toBe(1);
  });

  it("uses the credential's token endpoint", async () => {
    const customUrl = "https://oauth2.example.test/token";
    mock.onJson("POST", customUrl, { access_token: "test-token-custom", expires_in: 3600 });
    const provider = createProvider({ tokenUri: customUrl, privateKeyId: undefined });

    expect(await provider.getAccessToken()).toBe("test-token-custom");

    const form = new URLSearchParams(mock.getRecordedRequests()[0].body);
    const [header, payload] = (form.get("assertion") ?? "").split(".");
    expect(decodeSegment(header)).toEqual({ alg: "RS256", typ: "JWT" });
    expect(decodeSegment(payload)).toMatchObject({ aud: customUrl });
  });

  it("rejects a token response without a token", async () => {
    mock.onJson("POST", TOKEN_URL, { token_type: "Bearer" });

    await expect(createProvider().getAccessToken()).rejects.toBeInstanceOf(TransportError);
  });

  it("retries the exchange after a failure", async () => {
    mock.onJson("POST", TOKEN_URL, { error: "invalid_grant" }, 400);
    const provider = createProvider();
    await expect(provider.getAccessToken()).rejects.toThrow("invalid_grant");

    mock.onJson("POST", TOKEN_URL, { access_token: "test-token-retry", expires_in: 3600 });
    expect(await provider.getAccessToken()).toBe("test-token-retry");
  });

  it("fails to sign with a key that is not PEM", async () => {
    const provider = createProvider({ privateKey: "test-secret" });

    await expect(provider.getAccessToken()).rejects.toThrow();
    expect(mock.getRecordedRequests()).toHaveLength(0);
  });
});
