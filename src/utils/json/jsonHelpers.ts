/**
 * JSON response helpers
 *
 * Google API bodies are parsed as unknown and narrowed field by field.
 */

import { TransportError } from "@/errors";

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a response body that must be a JSON object; an empty body is {}
 *
 * @throws {TransportError} When the body is not a JSON object
 */
export function parseJsonObject(body: string, source: string): JsonObject {
  if (body.trim() === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new TransportError(`${source} is not valid JSON`, {}, { cause: error });
  }

  if (!isJsonObject(parsed)) {
    throw new TransportError(`${source} is not a JSON object`);
  }
  return parsed;
}

/**
 * Nested object field, or undefined when absent or not an object
 */
export function readObject(value: unknown, key: string): JsonObject | undefined {
  if (!isJsonObject(value)) {
    return undefined;
  }
  const field = value[key];
  return isJsonObject(field) ? field : undefined;
}

/**
 * Array field, or [] when absent or not an array
 */
export function readArray(value: unknown, key: string): unknown[] {
  if (!isJsonObject(value)) {
    return [];
  }
  const field = value[key];
  return Array.isArray(field) ? field : [];
}
