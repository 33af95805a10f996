/**
 * Connection type definitions
 *
 * Shapes for the validated configuration, the resolved credential, the
 * tagged spreadsheet/worksheet references and the facade call options.
 */

import type { SpreadsheetClient } from "./clients/googleSheets";
import type { Table } from "./table";

/**
 * Service-account key fields as they appear in a Google JSON key file
 */
export type ServiceAccountFields = {
  project_id?: string;
  private_key_id?: string;
  private_key?: string;
  client_email?: string;
  client_id?: string;
  auth_uri?: string;
  token_uri?: string;
  auth_provider_x509_cert_url?: string;
  client_x509_cert_url?: string;
};

export type ServiceAccountField = keyof ServiceAccountFields;

/**
 * Validated connection configuration
 *
 * Produced once from the host's raw mapping by parseConnectionConfig().
 */
export type ConnectionConfig = ServiceAccountFields & {
  /** Spreadsheet id, URL or (service account only) title */
  spreadsheet?: string;
  /** Worksheet title, gid or index */
  worksheet?: string | number;
  /** "" for public read-only access, "service_account" for CRUD */
  type?: string;
  /** Drive folder that title lookups are restricted to */
  folder_id?: string;
};

export type ConnectionMode = "read_only" | "crud";

export type NoCredential = {
  kind: "none";
};

export type ServiceAccountCredential = {
  kind: "service_account";
  clientEmail: string;
  /** PEM key with real newlines */
  privateKey: string;
  projectId?: string;
  privateKeyId?: string;
  clientId?: string;
  tokenUri?: string;
};

export type Credential = NoCredential | ServiceAccountCredential;

/**
 * Spreadsheet reference after resolution
 *
 * "id" and "url" both carry the spreadsheet key and share a canonical
 * cache key; "name" needs a Drive lookup and therefore a service account.
 */
export type SpreadsheetReference =
  | { kind: "id"; key: string }
  | { kind: "url"; key: string; url: string; gid?: number }
  | { kind: "name"; name: string };

/**
 * Worksheet reference after resolution
 */
export type WorksheetReference =
  | { kind: "title"; title: string }
  | { kind: "gid"; gid: number }
  | { kind: "index"; index: number }
  | { kind: "default" };

/**
 * Anything a caller may pass where a worksheet is expected
 */
export type WorksheetInput = string | number | WorksheetReference;

/**
 * Options fixed at connection construction
 */
export type ConnectionOptions = {
  /** Default cache TTL for reads in milliseconds; 0 disables caching */
  ttlMs?: number;
  /** Upper bound on cached entries per cache; unbounded when omitted */
  maxEntries?: number;
  /** Replaces the built-in transport (custom hosts, tests) */
  createClient?: (credential: Credential) => SpreadsheetClient;
  /** Clock used for cache expiry */
  now?: () => number;
};

/**
 * Target selection shared by every operation
 */
export type TargetOptions = {
  spreadsheet?: string;
  worksheet?: WorksheetInput;
};

export type ReadOptions = TargetOptions & {
  /** Zero-based column indices to keep, returned in sheet order */
  useCols?: readonly number[];
  /** Cache TTL override in milliseconds */
  ttlMs?: number;
  /** Treat the first row as column names (default true) */
  header?: boolean;
  /** Maximum number of data rows, applied after column selection */
  nRows?: number;
  /** Extra cell strings decoded as NA in addition to "" */
  naValues?: readonly string[];
  /** Service account only: false reads formulas instead of computed values */
  evaluateFormulas?: boolean;
};

export type CreateOptions = {
  spreadsheet?: string;
  rows?: number;
  cols?: number;
  /** Written to the new worksheet; also sizes it when rows/cols are omitted */
  data?: Table;
};

export type QueryOptions = {
  /** Spreadsheet whose worksheets the SQL's table names refer to */
  spreadsheet?: string;
  /** Cache TTL override for the worksheet reads, in milliseconds */
  ttlMs?: number;
  header?: boolean;
  naValues?: readonly string[];
  evaluateFormulas?: boolean;
};
