/**
 * Utils barrel exports
 */

export * from "./sheets/sheetsHelpers";
export * from "./json/jsonHelpers";
