/**
 * ServiceAccountSheetsClient — authenticated Sheets/Drive access
 *
 * Calls the Sheets v4 and Drive v3 REST APIs with a service-account bearer
 * token, behind the SpreadsheetClient interface. Every remote failure is
 * translated into the connection error taxonomy before it leaves this module.
 */

import type {
  AccessTokenProvider,
  GetValuesOptions,
  HttpMethod,
  HttpRequestFn,
  Logger,
  RawCell,
  RawGrid,
  ServiceAccountClientConfig,
  ServiceAccountCredential,
  SheetCellInput,
  SpreadsheetClient,
  SpreadsheetHandle,
  SpreadsheetReference,
  WorksheetHandle,
  WorksheetProperties,
  WorksheetReference,
} from "@/types";
import {
  GOOGLE_DRIVE_CREATE_FIELDS,
  GOOGLE_DRIVE_FILES_URL,
  GOOGLE_DRIVE_LOOKUP_FIELDS,
  GOOGLE_DRIVE_LOOKUP_PAGE_SIZE,
  GOOGLE_SHEETS_API_VERSION,
  GOOGLE_SHEETS_BASE_URL,
  GOOGLE_SHEETS_INSERT_DATA_OPTION_INSERT_ROWS,
  GOOGLE_SHEETS_METADATA_FIELDS,
  GOOGLE_SHEETS_MIME_TYPE,
  GOOGLE_SHEETS_VALUE_INPUT_OPTION_RAW,
  GOOGLE_SHEETS_VALUE_RENDER_FORMATTED,
  GOOGLE_SHEETS_VALUE_RENDER_FORMULA,
} from "@/constants";
import { NotFoundError, TransportError, translateTransportError } from "@/errors";
import type { TransportErrorContext } from "@/errors";
import { httpRequest } from "@/clients/http";
import type { JsonObject } from "@/utils";
import { isJsonObject, parseJsonObject, quoteSheetTitle, readArray, readObject } from "@/utils";
import { describeWorksheet } from "@/connection/referenceResolver";
import { ServiceAccountTokenProvider } from "./serviceAccountTokenProvider";
import * as logger from "@/logger";

type ApiCall = {
  method: HttpMethod;
  url: string;
  query?: Record<string, string | number | boolean>;
  /** Serialized as JSON */
  body?: unknown;
};

/**
 * Authenticated JSON calls shared by a client and its handles
 */
class GoogleApi {
  constructor(
    private readonly auth: AccessTokenProvider,
    private readonly request: HttpRequestFn,
  ) {}

  async call(context: TransportErrorContext, call: ApiCall): Promise<JsonObject> {
    try {
      const token = await this.auth.getAccessToken();
      const headers: Record<string, string> = {
        Authorization: `Bearer ${token}`,
        Accept: "application/json",
      };
      if (call.body !== undefined) {
        headers["Content-Type"] = "application/json";
      }

      const response = await this.request({
        method: call.method,
        url: call.url,
        query: call.query,
        headers,
        body: call.body === undefined ? undefined : JSON.stringify(call.body),
      });
      return parseJsonObject(response.body, `Google API ${context.operation} response`);
    } catch (error) {
      throw translateTransportError(error, context);
    }
  }
}

function spreadsheetUrl(spreadsheetId: string): string {
  return `${GOOGLE_SHEETS_BASE_URL}${GOOGLE_SHEETS_API_VERSION}/spreadsheets/${encodeURIComponent(spreadsheetId)}`;
}

function valuesUrl(spreadsheetId: string, range: string, action = ""): string {
  return `${spreadsheetUrl(spreadsheetId)}/values/${encodeURIComponent(range)}${action}`;
}

/**
 * Values API cells arrive untyped; keep the scalar ones
 */
function toRawCell(cell: unknown): RawCell {
  if (
    cell === null ||
    cell === undefined ||
    typeof cell === "string" ||
    typeof cell === "number" ||
    typeof cell === "boolean"
  ) {
    return cell;
  }
  return String(cell);
}

function toRawGrid(values: unknown[]): RawGrid {
  return values.map((row) => (Array.isArray(row) ? row.map(toRawCell) : []));
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Zero-valued sheetId and index may be omitted from API responses
 */
function toWorksheetProperties(properties: unknown): WorksheetProperties | null {
  if (!isJsonObject(properties) || typeof properties.title !== "string") {
    return null;
  }
  const grid = readObject(properties, "gridProperties");
  return {
    title: properties.title,
    gid: optionalNumber(properties.sheetId) ?? 0,
    index: optionalNumber(properties.index) ?? 0,
    rowCount: optionalNumber(grid?.rowCount),
    columnCount: optionalNumber(grid?.columnCount),
  };
}

/**
 * Escape a value for a single-quoted Drive query string
 */
function escapeDriveQuery(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

class ServiceAccountWorksheetHandle implements WorksheetHandle {
  readonly key: string;
  readonly title: string;

  constructor(
    private readonly api: GoogleApi,
    private readonly spreadsheetId: string,
    properties: WorksheetProperties,
    private readonly errorContext: (operation: string) => TransportErrorContext,
  ) {
    this.key = `gid:${properties.gid}`;
    this.title = properties.title;
  }

  async getAllValues(options: GetValuesOptions = {}): Promise<RawGrid> {
    const data = await this.api.call(this.errorContext("read"), {
      method: "GET",
      url: valuesUrl(this.spreadsheetId, quoteSheetTitle(this.title)),
      query: {
        majorDimension: "ROWS",
        valueRenderOption:
          options.evaluateFormulas === false
            ? GOOGLE_SHEETS_VALUE_RENDER_FORMULA
            : GOOGLE_SHEETS_VALUE_RENDER_FORMATTED,
      },
    });
    return toRawGrid(readArray(data, "values"));
  }

  async update(range: string, values: SheetCellInput[][]): Promise<void> {
    await this.api.call(this.errorContext("update"), {
      method: "PUT",
      url: valuesUrl(this.spreadsheetId, range),
      query: { valueInputOption: GOOGLE_SHEETS_VALUE_INPUT_OPTION_RAW },
      body: { range, majorDimension: "ROWS", values },
    });
  }

  async appendRows(values: SheetCellInput[][]): Promise<void> {
    await this.api.call(this.errorContext("append"), {
      method: "POST",
      url: valuesUrl(this.spreadsheetId, quoteSheetTitle(this.title), ":append"),
      query: {
        valueInputOption: GOOGLE_SHEETS_VALUE_INPUT_OPTION_RAW,
        insertDataOption: GOOGLE_SHEETS_INSERT_DATA_OPTION_INSERT_ROWS,
      },
      body: { majorDimension: "ROWS", values },
    });
  }

  async clear(): Promise<void> {
    await this.api.call(this.errorContext("clear"), {
      method: "POST",
      url: valuesUrl(this.spreadsheetId, quoteSheetTitle(this.title), ":clear"),
      body: {},
    });
  }
}

class ServiceAccountSpreadsheetHandle implements SpreadsheetHandle {
  /** Tab metadata as of opening; addWorksheet() keeps it current */
  private readonly worksheets: WorksheetProperties[];

  constructor(
    private readonly api: GoogleApi,
    readonly id: string,
    readonly title: string | undefined,
    worksheets: WorksheetProperties[],
    private readonly clientEmail: string,
  ) {
    this.worksheets = [...worksheets].sort((a, b) => a.index - b.index);
  }

  private errorContext(operation: string, worksheet?: string): TransportErrorContext {
    return {
      operation,
      spreadsheet: this.title ? `"${this.title}" (${this.id})` : this.id,
      worksheet,
      clientEmail: this.clientEmail,
    };
  }

  private find(ref: WorksheetReference): WorksheetProperties | undefined {
    switch (ref.kind) {
      case "title":
        return this.worksheets.find((ws) => ws.title === ref.title);
      case "gid":
        return this.worksheets.find((ws) => ws.gid === ref.gid);
      case "index":
        return this.worksheets[ref.index];
      case "default":
        return this.worksheets[0];
    }
  }

  async worksheet(ref: WorksheetReference): Promise<WorksheetHandle> {
    const properties = this.find(ref);
    if (!properties) {
      const available = this.worksheets.map((ws) => `"${ws.title}"`).join(", ");
      throw new NotFoundError(
        `Worksheet ${describeWorksheet(ref)} not found in spreadsheet ${this.id}. ` +
          `Available worksheets: ${available || "(none)"}`,
        { spreadsheet: this.id, worksheet: describeWorksheet(ref) },
      );
    }
    return new ServiceAccountWorksheetHandle(
      this.api,
      this.id,
      properties,
      (operation) => this.errorContext(operation, `"${properties.title}"`),
    );
  }

  async listWorksheets(): Promise<WorksheetProperties[]> {
    return this.worksheets.map((ws) => ({ ...ws }));
  }

  async addWorksheet(
    title: string,
    rows: number,
    cols: number,
  ): Promise<WorksheetProperties> {
    const data = await this.api.call(this.errorContext("create", `"${title}"`), {
      method: "POST",
      url: `${spreadsheetUrl(this.id)}:batchUpdate`,
      body: {
        requests: [
          {
            addSheet: {
              properties: {
                title,
                gridProperties: { rowCount: rows, columnCount: cols },
              },
            },
          },
        ],
      },
    });

    const [reply] = readArray(data, "replies");
    const added = toWorksheetProperties(
      readObject(readObject(reply, "addSheet"), "properties"),
    );
    if (!added) {
      throw new TransportError(
        `Sheets API did not describe the new worksheet "${title}"`,
        { spreadsheet: this.id, worksheet: title, operation: "create" },
      );
    }

    this.worksheets.push(added);
    this.worksheets.sort((a, b) => a.index - b.index);
    return { ...added };
  }
}

export class ServiceAccountSheetsClient implements SpreadsheetClient {
  readonly mode = "crud";
  private readonly log: Logger;
  private readonly api: GoogleApi;

  constructor(
    private readonly auth: AccessTokenProvider,
    private readonly config: ServiceAccountClientConfig,
    request: HttpRequestFn = httpRequest,
  ) {
    this.log = logger.withContext({ client: "service_account" });
    this.api = new GoogleApi(auth, request);
  }

  /**
   * Build a client that signs its own tokens for the credential
   */
  static fromCredential(
    credential: ServiceAccountCredential,
    options: { folderId?: string; request?: HttpRequestFn } = {},
  ): ServiceAccountSheetsClient {
    const request = options.request ?? httpRequest;
    return new ServiceAccountSheetsClient(
      new ServiceAccountTokenProvider(credential, request),
      { clientEmail: credential.clientEmail, folderId: options.folderId },
      request,
    );
  }

  /**
   * Exchange the signed JWT for an access token once
   *
   * @throws {AuthError} When Google rejects the credential
   * @throws {TransportError} When the token endpoint cannot be reached
   */
  async verify(): Promise<void> {
    try {
      await this.auth.getAccessToken();
    } catch (error) {
      throw translateTransportError(error, {
        operation: "authorize",
        clientEmail: this.config.clientEmail,
      });
    }
    this.log.debug("Service account authorized");
  }

  /**
   * Open by id, URL key or title
   *
   * A bare id that matches no spreadsheet is retried as a title.
   */
  async openSpreadsheet(ref: SpreadsheetReference): Promise<SpreadsheetHandle> {
    if (ref.kind === "name") {
      const id = await this.findByName(ref.name);
      return this.openById(id, `"${ref.name}" (${id})`);
    }
    if (ref.kind === "url") {
      return this.openById(ref.key, ref.key);
    }

    try {
      return await this.openById(ref.key, ref.key);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      const ids = await this.lookupByName(ref.key);
      if (ids.length === 0) {
        throw error;
      }
      this.log.debug("No spreadsheet has this id, opened it by title", {
        spreadsheet: ref.key,
      });
      return this.openById(ids[0], `"${ref.key}" (${ids[0]})`);
    }
  }

  /**
   * Create an empty spreadsheet in Drive, inside the configured folder
   */
  async createSpreadsheet(title: string): Promise<SpreadsheetHandle> {
    const data = await this.api.call(
      {
        operation: "create",
        spreadsheet: `"${title}"`,
        clientEmail: this.config.clientEmail,
      },
      {
        method: "POST",
        url: GOOGLE_DRIVE_FILES_URL,
        query: { fields: GOOGLE_DRIVE_CREATE_FIELDS, supportsAllDrives: true },
        body: {
          name: title,
          mimeType: GOOGLE_SHEETS_MIME_TYPE,
          ...(this.config.folderId ? { parents: [this.config.folderId] } : {}),
        },
      },
    );

    const id = data.id;
    if (typeof id !== "string") {
      throw new TransportError(`Drive did not return an id for the new spreadsheet "${title}"`, {
        spreadsheet: title,
        operation: "create",
      });
    }
    this.log.debug("Created spreadsheet", { spreadsheet: id, title });
    return this.openById(id, `"${title}" (${id})`);
  }

  private async openById(id: string, label: string): Promise<SpreadsheetHandle> {
    const data = await this.api.call(
      { operation: "open", spreadsheet: label, clientEmail: this.config.clientEmail },
      {
        method: "GET",
        url: spreadsheetUrl(id),
        query: { fields: GOOGLE_SHEETS_METADATA_FIELDS },
      },
    );

    const worksheets = readArray(data, "sheets")
      .map((sheet) => toWorksheetProperties(readObject(sheet, "properties")))
      .filter((props): props is WorksheetProperties => props !== null);
    const title = readObject(data, "properties")?.title;

    this.log.debug("Opened spreadsheet", {
      spreadsheet: id,
      worksheets: worksheets.length,
    });

    return new ServiceAccountSpreadsheetHandle(
      this.api,
      id,
      typeof title === "string" ? title : undefined,
      worksheets,
      this.config.clientEmail,
    );
  }

  /**
   * Ids of spreadsheets with this exact title, in Drive's order
   */
  private async lookupByName(name: string): Promise<string[]> {
    const clauses = [
      `name = '${escapeDriveQuery(name)}'`,
      `mimeType = '${GOOGLE_SHEETS_MIME_TYPE}'`,
      "trashed = false",
    ];
    if (this.config.folderId) {
      clauses.push(`'${escapeDriveQuery(this.config.folderId)}' in parents`);
    }

    const data = await this.api.call(
      {
        operation: "open",
        spreadsheet: `"${name}"`,
        clientEmail: this.config.clientEmail,
      },
      {
        method: "GET",
        url: GOOGLE_DRIVE_FILES_URL,
        query: {
          q: clauses.join(" and "),
          fields: GOOGLE_DRIVE_LOOKUP_FIELDS,
          pageSize: GOOGLE_DRIVE_LOOKUP_PAGE_SIZE,
          supportsAllDrives: true,
          includeItemsFromAllDrives: true,
        },
      },
    );

    return readArray(data, "files")
      .map((file) => (isJsonObject(file) ? file.id : undefined))
      .filter((fileId): fileId is string => typeof fileId === "string");
  }

  /**
   * Look a spreadsheet up by title in Drive; the first match wins
   */
  private async findByName(name: string): Promise<string> {
    const ids = await this.lookupByName(name);
    if (ids.length === 0) {
      const scope = this.config.folderId
        ? ` in folder ${this.config.folderId}`
        : "";
      throw new NotFoundError(
        `Spreadsheet "${name}" not found${scope}. ` +
          `Make sure it exists and is shared with ${this.config.clientEmail}.`,
        { spreadsheet: name },
      );
    }

    if (ids.length > 1) {
      this.log.warn("Several spreadsheets share this title, opening the first", {
        spreadsheet: name,
        matches: ids.length,
      });
    }
    return ids[0];
  }
}
