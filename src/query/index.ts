/**
 * SQL query public API
 */

export { runSqlQuery, quoteIdentifier } from "./sqlQuery";
export type { WorksheetLoader } from "./sqlQuery";
