/**
 * Google Sheets transport constants
 *
 * Endpoints, scopes and Sheets API option values
 */

/**
 * Public export endpoint; {key} is the spreadsheet key
 */
export const GOOGLE_SHEETS_PUBLIC_BASE_URL =
  "https://docs.google.com/spreadsheets/d";

/**
 * Sheets REST API base URL and version
 */
export const GOOGLE_SHEETS_BASE_URL = "https://sheets.googleapis.com";
export const GOOGLE_SHEETS_API_VERSION = "/v4";

/**
 * Drive v3 files endpoint, used for title lookups
 */
export const GOOGLE_DRIVE_FILES_URL = "https://www.googleapis.com/drive/v3/files";
export const GOOGLE_DRIVE_LOOKUP_FIELDS = "files(id,name)";
export const GOOGLE_DRIVE_LOOKUP_PAGE_SIZE = 10;
export const GOOGLE_DRIVE_CREATE_FIELDS = "id,name";

/**
 * OAuth2 token endpoint and JWT bearer grant
 */
export const GOOGLE_OAUTH2_TOKEN_URL = "https://oauth2.googleapis.com/token";
export const GOOGLE_OAUTH2_JWT_GRANT_TYPE =
  "urn:ietf:params:oauth:grant-type:jwt-bearer";

/**
 * JWT lifetime (Google's maximum is one hour)
 */
export const GOOGLE_SHEETS_JWT_EXPIRATION_SECONDS = 3600;

/**
 * Refresh the access token this long before it expires
 */
export const GOOGLE_SHEETS_TOKEN_EXPIRY_BUFFER_SECONDS = 60;

export const GOOGLE_SHEETS_MS_PER_SECOND = 1000;

/**
 * OAuth scopes requested by the service-account client
 * Drive access looks spreadsheets up by title and creates missing ones
 */
export const GOOGLE_SHEETS_SCOPES = [
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/drive",
];

/**
 * Drive MIME type of a Google Sheets document
 */
export const GOOGLE_SHEETS_MIME_TYPE = "application/vnd.google-apps.spreadsheet";

/**
 * Value input option for raw (unparsed) writes
 */
export const GOOGLE_SHEETS_VALUE_INPUT_OPTION_RAW = "RAW";

/**
 * Insert data option: insert new rows
 */
export const GOOGLE_SHEETS_INSERT_DATA_OPTION_INSERT_ROWS = "INSERT_ROWS";

/**
 * Value render options for reads
 */
export const GOOGLE_SHEETS_VALUE_RENDER_FORMATTED = "FORMATTED_VALUE";
export const GOOGLE_SHEETS_VALUE_RENDER_FORMULA = "FORMULA";

/**
 * Fields requested when loading spreadsheet metadata
 */
export const GOOGLE_SHEETS_METADATA_FIELDS =
  "spreadsheetId,properties.title,sheets.properties";

/**
 * Size of a worksheet created without data (the Sheets UI defaults)
 */
export const GOOGLE_SHEETS_DEFAULT_NEW_ROWS = 1000;
export const GOOGLE_SHEETS_DEFAULT_NEW_COLS = 26;

/**
 * HTTP status codes inspected when translating transport failures
 */
export const HTTP_STATUS_BAD_REQUEST = 400;
export const HTTP_STATUS_UNAUTHORIZED = 401;
export const HTTP_STATUS_FORBIDDEN = 403;
export const HTTP_STATUS_NOT_FOUND = 404;
export const HTTP_STATUS_CONFLICT = 409;
