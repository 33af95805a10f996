/**
 * Table codec public API
 */

export {
  decodeTable,
  encodeForUpdate,
  encodeForAppend,
  buildUpdateRange,
  validateTable,
  tableToRecords,
} from "./tableCodec";
export { parseCsv } from "./csvParser";
