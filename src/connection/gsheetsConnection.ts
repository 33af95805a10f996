/**
 * GSheetsConnection — Google Sheets as a tabular data source
 *
 * One instance per configured connection. The mode (public read-only or
 * service-account CRUD) is fixed at construction from the credential; writes
 * on a read-only connection fail with ModeError before anything is resolved
 * or fetched.
 *
 * Reads go through two caches: spreadsheet handles and raw worksheet grids.
 * Every write invalidates the grids it touched, so a read after a write on
 * the same instance sees the write even inside the TTL window. SQL queries
 * load their worksheets through the same grid cache.
 */

import type {
  ConnectionConfig,
  ConnectionMode,
  ConnectionOptions,
  CreateOptions,
  Credential,
  DecodeOptions,
  QueryOptions,
  RawGrid,
  ReadOptions,
  SpreadsheetClient,
  SpreadsheetHandle,
  SpreadsheetReference,
  Table,
  TargetOptions,
  WorksheetHandle,
  WorksheetInput,
  WorksheetReference,
} from "@/types";
import {
  DEFAULT_CACHE_TTL_MS,
  GOOGLE_SHEETS_DEFAULT_NEW_COLS,
  GOOGLE_SHEETS_DEFAULT_NEW_ROWS,
  HTTP_STATUS_FORBIDDEN,
} from "@/constants";
import {
  ConfigError,
  ConflictError,
  ModeError,
  NotFoundError,
  isSheetsConnectionError,
  translateTransportError,
} from "@/errors";
import {
  buildUpdateRange,
  decodeTable,
  encodeForAppend,
  encodeForUpdate,
  validateTable,
} from "@/table";
import { runSqlQuery } from "@/query";
import { loadConnectionConfigFromEnv } from "@/config";
import * as logger from "@/logger";
import {
  connectionModeOf,
  parseConnectionConfig,
  resolveCredential,
} from "./credentialResolver";
import {
  canonicalSpreadsheetKey,
  describeSpreadsheet,
  describeWorksheet,
  resolveSpreadsheetReference,
  resolveWorksheetReference,
} from "./referenceResolver";
import { ClientFactory } from "./clientFactory";
import { HandleCache } from "./handleCache";

type ResolvedTarget = {
  spreadsheet: SpreadsheetReference;
  worksheet: WorksheetReference;
};

type OpenedTarget = {
  spreadsheet: SpreadsheetHandle;
  worksheet: WorksheetHandle;
};

function validateTtl(ttlMs: number, field: string): number {
  if (!Number.isFinite(ttlMs) || ttlMs < 0) {
    throw new ConfigError(`${field} must be a non-negative number of milliseconds`, {
      field,
    });
  }
  return ttlMs;
}

function validateSize(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${field} must be a positive integer, got ${value}`, {
      field,
    });
  }
  return value;
}

function gridCacheKey(
  spreadsheetId: string,
  worksheetKey: string,
  evaluateFormulas: boolean,
): string {
  return `values:${spreadsheetId}:${worksheetKey}:${evaluateFormulas ? "computed" : "formulas"}`;
}

export class GSheetsConnection {
  readonly mode: ConnectionMode;

  private readonly config: ConnectionConfig;
  private readonly credential: Credential;
  private readonly clients: ClientFactory;
  private readonly spreadsheets: HandleCache<SpreadsheetHandle>;
  private readonly grids: HandleCache<RawGrid>;
  private readonly defaultTtlMs: number;

  private defaultSpreadsheet?: string;
  private defaultWorksheet?: WorksheetInput;

  /**
   * @param rawConfig - Host configuration mapping (spreadsheet, worksheet,
   * type, folder_id and the service-account key fields)
   * @throws {ConfigError} When the configuration is malformed
   */
  constructor(rawConfig: Record<string, unknown> = {}, options: ConnectionOptions = {}) {
    this.config = parseConnectionConfig(rawConfig);
    this.credential = resolveCredential(this.config);
    this.mode = connectionModeOf(this.credential);
    this.defaultTtlMs = validateTtl(options.ttlMs ?? DEFAULT_CACHE_TTL_MS, "ttlMs");

    const maxEntries =
      options.maxEntries === undefined
        ? undefined
        : validateSize(options.maxEntries, "maxEntries");
    const cacheOptions = { maxEntries, now: options.now };
    this.spreadsheets = new HandleCache<SpreadsheetHandle>("spreadsheets", cacheOptions);
    this.grids = new HandleCache<RawGrid>("values", cacheOptions);

    this.clients = new ClientFactory(this.credential, {
      folderId: this.config.folder_id,
      createClient: options.createClient,
    });

    // Fail on a bad default reference now rather than on first read
    if (this.config.spreadsheet !== undefined) {
      resolveSpreadsheetReference(this.config.spreadsheet, this.credential);
      this.defaultSpreadsheet = this.config.spreadsheet;
    }
    if (this.config.worksheet !== undefined) {
      resolveWorksheetReference(this.config.worksheet, this.mode);
      this.defaultWorksheet = this.config.worksheet;
    }

    logger.debug("GSheetsConnection initialized", {
      mode: this.mode,
      spreadsheet: this.defaultSpreadsheet,
      ttlMs: this.defaultTtlMs,
    });
  }

  /**
   * Connection configured from GSHEETS_* environment variables
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    options: ConnectionOptions = {},
  ): GSheetsConnection {
    return new GSheetsConnection(loadConnectionConfigFromEnv(env), options);
  }

  /**
   * Replace the spreadsheet (and worksheet) used when a call names none
   */
  setDefault(spreadsheet: string, worksheet?: WorksheetInput): void {
    resolveSpreadsheetReference(spreadsheet, this.credential);
    if (worksheet !== undefined) {
      resolveWorksheetReference(worksheet, this.mode);
    }
    this.defaultSpreadsheet = spreadsheet;
    this.defaultWorksheet = worksheet;
  }

  /**
   * Read a worksheet as a Table
   */
  async read(options: ReadOptions = {}): Promise<Table> {
    const ttlMs = validateTtl(options.ttlMs ?? this.defaultTtlMs, "ttlMs");
    const evaluateFormulas = this.checkEvaluateFormulas(options.evaluateFormulas);
    const target = this.resolveTarget(options);

    return this.run("read", target, () =>
      this.readTable(target, ttlMs, evaluateFormulas, {
        header: options.header,
        useCols: options.useCols,
        nRows: options.nRows,
        naValues: options.naValues,
      }),
    );
  }

  /**
   * Run a SELECT over worksheets of one spreadsheet
   *
   * Table names in the SQL are worksheet references (title, or gid/index
   * in the service-account mode) and are quoted like any SQLite identifier:
   * `SELECT * FROM "Sheet 1" WHERE score > 3`.
   *
   * @throws {ConfigError} When the SQL does not compile or is not a SELECT
   * @throws {NotFoundError} When a named worksheet does not exist
   */
  async query(sql: string, options: QueryOptions = {}): Promise<Table> {
    if (!sql.trim()) {
      throw new ConfigError("SQL query is empty", { field: "sql" });
    }
    const ttlMs = validateTtl(options.ttlMs ?? this.defaultTtlMs, "ttlMs");
    const evaluateFormulas = this.checkEvaluateFormulas(options.evaluateFormulas);
    const target = this.resolveTarget({ spreadsheet: options.spreadsheet });

    return this.run("query", target, async () => {
      const result = await runSqlQuery(sql, (name) =>
        this.readTable(
          {
            spreadsheet: target.spreadsheet,
            worksheet: resolveWorksheetReference(name, this.mode),
          },
          ttlMs,
          evaluateFormulas,
          { header: options.header, naValues: options.naValues },
        ),
      );
      logger.debug("Query finished", {
        spreadsheet: describeSpreadsheet(target.spreadsheet),
        rows: result.rows.length,
      });
      return result;
    });
  }

  /**
   * Replace a worksheet's contents with a table (header row included)
   */
  async update(data: Table, options: TargetOptions = {}): Promise<void> {
    this.assertWritable("update");
    const values = encodeForUpdate(data);
    const target = this.resolveTarget(options);

    await this.run("update", target, async () => {
      const { spreadsheet, worksheet } = await this.open(target, this.defaultTtlMs);
      try {
        await worksheet.clear();
        await worksheet.update(buildUpdateRange(worksheet.title, data), values);
      } finally {
        this.invalidateGrids(spreadsheet.id, worksheet.key);
      }
      logger.info("Worksheet updated", {
        spreadsheet: spreadsheet.id,
        worksheet: worksheet.key,
        rows: data.rows.length,
        columns: data.columns.length,
      });
    });
  }

  /**
   * Append a table's rows (no header) after the worksheet's data
   */
  async append(data: Table, options: TargetOptions = {}): Promise<void> {
    this.assertWritable("append");
    const values = encodeForAppend(data);
    const target = this.resolveTarget(options);

    if (values.length === 0) {
      logger.debug("Nothing to append", {
        spreadsheet: describeSpreadsheet(target.spreadsheet),
      });
      return;
    }

    await this.run("append", target, async () => {
      const { spreadsheet, worksheet } = await this.open(target, this.defaultTtlMs);
      try {
        await worksheet.appendRows(values);
      } finally {
        this.invalidateGrids(spreadsheet.id, worksheet.key);
      }
      logger.info("Rows appended", {
        spreadsheet: spreadsheet.id,
        worksheet: worksheet.key,
        rows: values.length,
      });
    });
  }

  /**
   * Add a worksheet, optionally filled with a table
   *
   * Sized to the data when given, else 1000 x 26 unless rows/cols say
   * otherwise. A spreadsheet named by title or bare key that does not exist
   * is created first (in folder_id when configured); its default first
   * worksheet is reused when it already has the requested title.
   *
   * @returns gid reference to the new worksheet
   * @throws {ConflictError} When a worksheet with this title exists
   */
  async create(worksheet: string, options: CreateOptions = {}): Promise<WorksheetReference> {
    this.assertWritable("create");

    const title = worksheet.trim();
    if (!title) {
      throw new ConfigError("worksheet title is empty", { field: "worksheet" });
    }
    if (options.data) {
      validateTable(options.data);
    }
    const rows = validateSize(
      options.rows ??
        (options.data ? options.data.rows.length + 1 : GOOGLE_SHEETS_DEFAULT_NEW_ROWS),
      "rows",
    );
    const cols = validateSize(
      options.cols ??
        (options.data ? options.data.columns.length : GOOGLE_SHEETS_DEFAULT_NEW_COLS),
      "cols",
    );
    const target = this.resolveTarget({
      spreadsheet: options.spreadsheet,
      worksheet: { kind: "title", title },
    });

    return this.run("create", target, async () => {
      const { spreadsheet, created } = await this.openOrCreateSpreadsheet(target.spreadsheet);

      const existing = await spreadsheet.listWorksheets();
      const taken = existing.find((ws) => ws.title === title);
      if (taken && !created) {
        throw new ConflictError(
          `Worksheet "${title}" already exists in spreadsheet ${spreadsheet.id}`,
          { spreadsheet: spreadsheet.id, worksheet: title },
        );
      }

      const gid = taken ? taken.gid : (await spreadsheet.addWorksheet(title, rows, cols)).gid;
      this.invalidateSpreadsheet(target.spreadsheet, spreadsheet.id);
      const ref: WorksheetReference = { kind: "gid", gid };

      if (options.data) {
        const handle = await spreadsheet.worksheet(ref);
        try {
          await handle.update(
            buildUpdateRange(handle.title, options.data),
            encodeForUpdate(options.data),
          );
        } finally {
          this.invalidateGrids(spreadsheet.id, handle.key);
        }
      }

      logger.info("Worksheet created", {
        spreadsheet: spreadsheet.id,
        worksheet: title,
        gid,
        rows,
        cols,
      });
      return ref;
    });
  }

  /**
   * Clear every value in a worksheet
   */
  async clear(options: TargetOptions = {}): Promise<void> {
    this.assertWritable("clear");
    const target = this.resolveTarget(options);

    await this.run("clear", target, async () => {
      const { spreadsheet, worksheet } = await this.open(target, this.defaultTtlMs);
      try {
        await worksheet.clear();
      } finally {
        this.invalidateGrids(spreadsheet.id, worksheet.key);
      }
      logger.info("Worksheet cleared", {
        spreadsheet: spreadsheet.id,
        worksheet: worksheet.key,
      });
    });
  }

  /**
   * Drop every cached spreadsheet handle and worksheet grid
   */
  resetCache(): void {
    this.spreadsheets.clear();
    this.grids.clear();
    logger.debug("Connection cache reset");
  }

  private assertWritable(operation: string): void {
    if (this.mode !== "crud") {
      throw new ModeError(operation);
    }
  }

  /**
   * Call-time references override the defaults. The default worksheet only
   * applies to the default spreadsheet.
   */
  private resolveTarget(options: TargetOptions): ResolvedTarget {
    const usesDefault = options.spreadsheet === undefined;
    const rawSpreadsheet = options.spreadsheet ?? this.defaultSpreadsheet;
    if (rawSpreadsheet === undefined) {
      throw new ConfigError(
        "No spreadsheet given. Pass one to the call, set it in the configuration or call setDefault().",
        { field: "spreadsheet" },
      );
    }

    const spreadsheet = resolveSpreadsheetReference(rawSpreadsheet, this.credential);
    const rawWorksheet =
      options.worksheet ?? (usesDefault ? this.defaultWorksheet : undefined);
    const worksheet = resolveWorksheetReference(
      rawWorksheet,
      this.mode,
      spreadsheet.kind === "url" ? spreadsheet.gid : undefined,
    );
    return { spreadsheet, worksheet };
  }

  private async openSpreadsheet(
    ref: SpreadsheetReference,
    ttlMs: number,
  ): Promise<SpreadsheetHandle> {
    const client: SpreadsheetClient = await this.clients.getClient();
    return this.spreadsheets.getOrFetch(canonicalSpreadsheetKey(ref), ttlMs, () =>
      client.openSpreadsheet(ref),
    );
  }

  /**
   * Missing spreadsheets are created only for titles and bare keys. A URL
   * always names an existing file, and a 403 means it exists but is not
   * shared.
   */
  private async openOrCreateSpreadsheet(
    ref: SpreadsheetReference,
  ): Promise<{ spreadsheet: SpreadsheetHandle; created: boolean }> {
    try {
      return {
        spreadsheet: await this.openSpreadsheet(ref, this.defaultTtlMs),
        created: false,
      };
    } catch (error) {
      if (
        !(error instanceof NotFoundError) ||
        ref.kind === "url" ||
        error.details.status === HTTP_STATUS_FORBIDDEN
      ) {
        throw error;
      }
    }

    const title = ref.kind === "name" ? ref.name : ref.key;
    const client = await this.clients.getClient();
    const spreadsheet = await client.createSpreadsheet(title);
    this.invalidateSpreadsheet(ref, spreadsheet.id);
    logger.info("Spreadsheet created", { spreadsheet: spreadsheet.id, title });
    return { spreadsheet, created: true };
  }

  private async readTable(
    target: ResolvedTarget,
    ttlMs: number,
    evaluateFormulas: boolean,
    decodeOptions: DecodeOptions,
  ): Promise<Table> {
    const { spreadsheet, worksheet } = await this.open(target, ttlMs);
    const grid = await this.grids.getOrFetch(
      gridCacheKey(spreadsheet.id, worksheet.key, evaluateFormulas),
      ttlMs,
      () => worksheet.getAllValues({ evaluateFormulas }),
    );
    return decodeTable(grid, decodeOptions);
  }

  private checkEvaluateFormulas(evaluateFormulas: boolean | undefined): boolean {
    const value = evaluateFormulas ?? true;
    if (!value && this.mode === "read_only") {
      throw new ConfigError(
        "Reading formulas needs service account credentials; public exports only carry computed values",
        { field: "evaluateFormulas" },
      );
    }
    return value;
  }

  private async open(target: ResolvedTarget, ttlMs: number): Promise<OpenedTarget> {
    const spreadsheet = await this.openSpreadsheet(target.spreadsheet, ttlMs);
    const worksheet = await spreadsheet.worksheet(target.worksheet);
    return { spreadsheet, worksheet };
  }

  private invalidateGrids(spreadsheetId: string, worksheetKey: string): void {
    this.grids.invalidate(gridCacheKey(spreadsheetId, worksheetKey, true));
    this.grids.invalidate(gridCacheKey(spreadsheetId, worksheetKey, false));
  }

  /**
   * Drop the cached handle under both the reference used and the resolved id
   */
  private invalidateSpreadsheet(ref: SpreadsheetReference, spreadsheetId: string): void {
    this.spreadsheets.invalidate(canonicalSpreadsheetKey(ref));
    this.spreadsheets.invalidate(canonicalSpreadsheetKey({ kind: "id", key: spreadsheetId }));
  }

  /**
   * Log and normalize failures so callers only ever see the error taxonomy
   */
  private async run<T>(
    operation: string,
    target: ResolvedTarget,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const spreadsheet = describeSpreadsheet(target.spreadsheet);
      const worksheet = describeWorksheet(target.worksheet);
      const translated = isSheetsConnectionError(error)
        ? error
        : translateTransportError(error, { operation, spreadsheet, worksheet });
      logger.error(`GSheetsConnection.${operation} failed`, {
        kind: translated.kind,
        spreadsheet,
        worksheet,
        error: translated,
      });
      throw translated;
    }
  }
}
