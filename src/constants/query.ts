/**
 * SQL query constants
 */

/**
 * Upper bound on worksheets one query may load
 */
export const MAX_QUERY_WORKSHEETS = 32;

/**
 * SQLite's error for a table the statement names but the database lacks
 */
export const MISSING_TABLE_PATTERN = /^no such table: (?:main\.)?(.+)$/;
