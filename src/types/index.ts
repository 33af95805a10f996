export * from "./logger";
export * from "./connection";
export * from "./table";
export * from "./cache";
export * from "./clients/http";
export * from "./clients/googleSheets";
