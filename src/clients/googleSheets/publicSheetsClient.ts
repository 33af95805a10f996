/**
 * PublicSheetsClient — anonymous access to link-shared spreadsheets
 *
 * Downloads worksheets through the CSV export endpoint (by gid) or the
 * visualization endpoint (by title). Read-only: every write rejects with
 * ModeError.
 */

import type {
  HttpRequest,
  HttpRequestFn,
  HttpResponse,
  RawGrid,
  SpreadsheetClient,
  SpreadsheetHandle,
  SpreadsheetReference,
  WorksheetHandle,
  WorksheetProperties,
  WorksheetReference,
} from "@/types";
import { GOOGLE_SHEETS_PUBLIC_BASE_URL } from "@/constants";
import { httpRequest } from "@/clients/http";
import {
  ConfigError,
  ModeError,
  NotFoundError,
  translateTransportError,
} from "@/errors";
import { parseCsv } from "@/table/csvParser";
import { canonicalWorksheetKey } from "@/connection/referenceResolver";
import * as logger from "@/logger";

/**
 * Export endpoints answer with an HTML sign-in page when the spreadsheet is
 * not shared publicly
 */
function isHtmlResponse(contentType: string | null, body: string): boolean {
  if (contentType?.toLowerCase().includes("text/html")) {
    return true;
  }
  return /^\s*<(!doctype html|html)/i.test(body);
}

class PublicWorksheetHandle implements WorksheetHandle {
  readonly key: string;
  readonly title?: string;

  constructor(
    private readonly spreadsheetId: string,
    private readonly ref: WorksheetReference,
    private readonly request: HttpRequestFn,
  ) {
    if (ref.kind === "index") {
      throw new ConfigError(
        "Public spreadsheets select worksheets by gid or title, not by tab index",
        { field: "worksheet" },
      );
    }
    this.key = canonicalWorksheetKey(ref);
    this.title = ref.kind === "title" ? ref.title : undefined;
  }

  private buildRequest(): HttpRequest {
    const base = `${GOOGLE_SHEETS_PUBLIC_BASE_URL}/${this.spreadsheetId}`;
    if (this.ref.kind === "title") {
      return {
        method: "GET",
        url: `${base}/gviz/tq`,
        query: { tqx: "out:csv", sheet: this.ref.title },
      };
    }
    return {
      method: "GET",
      url: `${base}/export`,
      query:
        this.ref.kind === "gid"
          ? { format: "csv", gid: this.ref.gid }
          : { format: "csv" },
    };
  }

  async getAllValues(): Promise<RawGrid> {
    const req = this.buildRequest();
    const context = {
      operation: "read",
      spreadsheet: this.spreadsheetId,
      worksheet: this.key,
    };

    let response: HttpResponse;
    try {
      response = await this.request(req);
    } catch (error) {
      throw translateTransportError(error, context);
    }

    if (isHtmlResponse(response.contentType, response.body)) {
      throw new NotFoundError(
        `Spreadsheet ${this.spreadsheetId} is not publicly readable. ` +
          'Share it as "Anyone with the link can view" or configure service account credentials.',
        { ...context, status: response.status },
      );
    }

    const grid = parseCsv(response.body);
    logger.debug("Downloaded public worksheet", {
      spreadsheet: this.spreadsheetId,
      worksheet: this.key,
      rows: grid.length,
    });
    return grid;
  }

  async update(): Promise<void> {
    throw new ModeError("update");
  }

  async appendRows(): Promise<void> {
    throw new ModeError("append");
  }

  async clear(): Promise<void> {
    throw new ModeError("clear");
  }
}

class PublicSpreadsheetHandle implements SpreadsheetHandle {
  constructor(
    readonly id: string,
    private readonly request: HttpRequestFn,
  ) {}

  async worksheet(ref: WorksheetReference): Promise<WorksheetHandle> {
    return new PublicWorksheetHandle(this.id, ref, this.request);
  }

  async listWorksheets(): Promise<WorksheetProperties[]> {
    throw new ConfigError(
      "Listing worksheets needs service account credentials",
      { spreadsheet: this.id },
    );
  }

  async addWorksheet(): Promise<WorksheetProperties> {
    throw new ModeError("create");
  }
}

export class PublicSheetsClient implements SpreadsheetClient {
  readonly mode = "read_only";

  constructor(private readonly request: HttpRequestFn = httpRequest) {}

  async openSpreadsheet(ref: SpreadsheetReference): Promise<SpreadsheetHandle> {
    if (ref.kind === "name") {
      throw new ConfigError(
        `Spreadsheet "${ref.name}" can only be opened by title with service account credentials`,
        { field: "spreadsheet" },
      );
    }
    return new PublicSpreadsheetHandle(ref.key, this.request);
  }

  async createSpreadsheet(): Promise<SpreadsheetHandle> {
    throw new ModeError("create");
  }

  async verify(): Promise<void> {
    // Nothing to verify without a credential
  }
}
