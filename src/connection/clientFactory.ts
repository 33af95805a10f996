/**
 * ClientFactory — one lazily built transport client per connection
 *
 * Service-account clients are verified with a single token request before
 * first use. A rejected credential stays rejected for the connection's
 * lifetime; any other failure is forgotten so the next call tries again.
 */

import type { Credential, SpreadsheetClient } from "@/types";
import { PublicSheetsClient, ServiceAccountSheetsClient } from "@/clients/googleSheets";
import { AuthError, translateTransportError } from "@/errors";
import * as logger from "@/logger";

export type CreateClientFn = (credential: Credential) => SpreadsheetClient;

export type ClientFactoryOptions = {
  /** Drive folder restricting title lookups (service account only) */
  folderId?: string;
  createClient?: CreateClientFn;
};

export class ClientFactory {
  private pending: Promise<SpreadsheetClient> | null = null;
  private readonly createClient: CreateClientFn;

  constructor(
    private readonly credential: Credential,
    options: ClientFactoryOptions = {},
  ) {
    this.createClient =
      options.createClient ??
      ((cred) =>
        cred.kind === "none"
          ? new PublicSheetsClient()
          : ServiceAccountSheetsClient.fromCredential(cred, {
              folderId: options.folderId,
            }));
  }

  /**
   * Whether a client has been requested (built or building)
   */
  get started(): boolean {
    return this.pending !== null;
  }

  getClient(): Promise<SpreadsheetClient> {
    if (this.pending) {
      return this.pending;
    }
    const pending = this.build();
    this.pending = pending;
    pending.catch((error: unknown) => {
      if (!(error instanceof AuthError) && this.pending === pending) {
        this.pending = null;
      }
    });
    return pending;
  }

  private async build(): Promise<SpreadsheetClient> {
    try {
      const client = this.createClient(this.credential);
      await client.verify();
      logger.debug("Spreadsheet client ready", { mode: client.mode });
      return client;
    } catch (error) {
      const translated = translateTransportError(error, {
        operation: "connect",
        clientEmail:
          this.credential.kind === "service_account"
            ? this.credential.clientEmail
            : undefined,
      });
      logger.error("Could not build spreadsheet client", {
        kind: translated.kind,
        error: translated,
      });
      throw translated;
    }
  }
}
