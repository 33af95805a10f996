/**
 * Service-account access tokens
 *
 * Signs an RS256 JWT assertion with the account's private key and exchanges
 * it at Google's OAuth2 token endpoint. The token is cached until shortly
 * before it expires; concurrent callers share one exchange.
 */

import { createSign } from "crypto";

import type {
  AccessTokenProvider,
  HttpRequestFn,
  ServiceAccountCredential,
} from "@/types";
import {
  GOOGLE_OAUTH2_JWT_GRANT_TYPE,
  GOOGLE_OAUTH2_TOKEN_URL,
  GOOGLE_SHEETS_JWT_EXPIRATION_SECONDS,
  GOOGLE_SHEETS_MS_PER_SECOND,
  GOOGLE_SHEETS_SCOPES,
  GOOGLE_SHEETS_TOKEN_EXPIRY_BUFFER_SECONDS,
} from "@/constants";
import { httpRequest } from "@/clients/http";
import { TransportError } from "@/errors";
import { parseJsonObject } from "@/utils";
import * as logger from "@/logger";

function base64url(input: string | Buffer): string {
  return Buffer.from(input).toString("base64url");
}

export class ServiceAccountTokenProvider implements AccessTokenProvider {
  private accessToken: string | null = null;
  /** Unix seconds */
  private tokenExpiry = 0;
  private pending: Promise<string> | null = null;

  constructor(
    private readonly credential: ServiceAccountCredential,
    private readonly request: HttpRequestFn = httpRequest,
    private readonly now: () => number = Date.now,
  ) {}

  private get tokenUrl(): string {
    return this.credential.tokenUri || GOOGLE_OAUTH2_TOKEN_URL;
  }

  /**
   * Signed assertion for the JWT bearer grant
   */
  createJwt(issuedAt: number): string {
    const header: Record<string, string> = { alg: "RS256", typ: "JWT" };
    if (this.credential.privateKeyId) {
      header.kid = this.credential.privateKeyId;
    }

    const payload = {
      iss: this.credential.clientEmail,
      scope: GOOGLE_SHEETS_SCOPES.join(" "),
      aud: this.tokenUrl,
      exp: issuedAt + GOOGLE_SHEETS_JWT_EXPIRATION_SECONDS,
      iat: issuedAt,
    };

    const unsigned = `${base64url(JSON.stringify(header))}.${base64url(JSON.stringify(payload))}`;
    const signer = createSign("RSA-SHA256");
    signer.update(unsigned);
    const signature = signer.sign(this.credential.privateKey);

    return `${unsigned}.${base64url(signature)}`;
  }

  /**
   * Current access token, exchanging a fresh JWT when needed
   *
   * @throws {HttpError} When the token endpoint rejects the assertion
   * @throws {TransportError} When the token response is malformed
   */
  async getAccessToken(): Promise<string> {
    const nowSeconds = Math.floor(this.now() / GOOGLE_SHEETS_MS_PER_SECOND);
    if (
      this.accessToken &&
      this.tokenExpiry > nowSeconds + GOOGLE_SHEETS_TOKEN_EXPIRY_BUFFER_SECONDS
    ) {
      return this.accessToken;
    }

    if (!this.pending) {
      const pending = this.requestToken(nowSeconds).finally(() => {
        if (this.pending === pending) {
          this.pending = null;
        }
      });
      this.pending = pending;
    }
    return this.pending;
  }

  private async requestToken(nowSeconds: number): Promise<string> {
    logger.debug("Requesting Google OAuth2 access token", {
      clientEmail: this.credential.clientEmail,
    });

    const response = await this.request({
      method: "POST",
      url: this.tokenUrl,
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: new URLSearchParams({
        grant_type: GOOGLE_OAUTH2_JWT_GRANT_TYPE,
        assertion: this.createJwt(nowSeconds),
      }).toString(),
    });

    const data = parseJsonObject(response.body, "OAuth2 token response");
    const accessToken = data.access_token;
    const expiresIn = data.expires_in;
    if (typeof accessToken !== "string" || typeof expiresIn !== "number") {
      throw new TransportError(
        "OAuth2 token response is missing access_token or expires_in",
        { operation: "authorize" },
      );
    }

    this.accessToken = accessToken;
    this.tokenExpiry = nowSeconds + expiresIn;
    logger.debug("Google OAuth2 access token obtained", { expiresIn });
    return accessToken;
  }
}
