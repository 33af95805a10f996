/**
 * Connection constants
 *
 * Configuration keys, credential validation and reference patterns
 */

import type { ServiceAccountField } from "@/types";

/**
 * `type` value that selects CRUD mode
 */
export const SERVICE_ACCOUNT_TYPE = "service_account";

/**
 * Every service-account key field recognized in the configuration
 */
export const SERVICE_ACCOUNT_FIELDS: readonly ServiceAccountField[] = [
  "project_id",
  "private_key_id",
  "private_key",
  "client_email",
  "client_id",
  "auth_uri",
  "token_uri",
  "auth_provider_x509_cert_url",
  "client_x509_cert_url",
];

/**
 * Fields that must be present and non-empty in CRUD mode
 */
export const REQUIRED_SERVICE_ACCOUNT_FIELDS: readonly ServiceAccountField[] = [
  "client_email",
  "private_key",
];

/**
 * PEM delimiters accepted in private_key (PKCS#8 and PKCS#1)
 */
export const PRIVATE_KEY_BEGIN_PATTERN = /-----BEGIN (RSA )?PRIVATE KEY-----/;
export const PRIVATE_KEY_END_PATTERN = /-----END (RSA )?PRIVATE KEY-----/;

/**
 * Spreadsheet key inside a URL: /spreadsheets/d/{key} or /d/{key}
 */
export const SPREADSHEET_URL_KEY_PATTERN = /\/d\/([a-zA-Z0-9_-]+)/;

/**
 * Worksheet gid in a URL fragment or query: #gid=123, ?gid=123, &gid=123
 */
export const SPREADSHEET_URL_GID_PATTERN = /[#&?]gid=(\d+)/;

/**
 * Bare spreadsheet key: the character set of the URL key segment, so a key
 * extracted from a URL re-resolves to itself. Anything else is a title.
 */
export const SPREADSHEET_KEY_PATTERN = /^[a-zA-Z0-9_-]+$/;

export const URL_SCHEME_PATTERN = /^https?:\/\//i;

/**
 * Worksheet references made only of digits are numeric (gid or index)
 */
export const NUMERIC_WORKSHEET_PATTERN = /^\d+$/;

/**
 * Default read cache TTL; 0 disables caching
 */
export const DEFAULT_CACHE_TTL_MS = 0;

/**
 * Environment variables read by loadConnectionConfigFromEnv()
 */
export const ENV_PREFIX = "GSHEETS_";
export const ENV_SPREADSHEET = "GSHEETS_SPREADSHEET";
export const ENV_WORKSHEET = "GSHEETS_WORKSHEET";
export const ENV_FOLDER_ID = "GSHEETS_FOLDER_ID";
export const ENV_TYPE = "GSHEETS_TYPE";
export const ENV_SERVICE_ACCOUNT_FILE = "GSHEETS_SERVICE_ACCOUNT_FILE";
