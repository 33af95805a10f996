/**
 * Credential resolution
 *
 * Validates the host's configuration mapping once, then decides between
 * public read-only access and a service-account credential.
 */

import type {
  ConnectionConfig,
  ConnectionMode,
  Credential,
  ServiceAccountField,
  ServiceAccountFields,
} from "@/types";
import {
  REQUIRED_SERVICE_ACCOUNT_FIELDS,
  SERVICE_ACCOUNT_FIELDS,
  SERVICE_ACCOUNT_TYPE,
} from "@/constants";
import { ConfigError } from "@/errors";
import { normalizePrivateKey } from "@/utils";
import * as logger from "@/logger";

const STRING_OPTION_KEYS = ["spreadsheet", "type", "folder_id"] as const;

function isServiceAccountField(key: string): key is ServiceAccountField {
  return SERVICE_ACCOUNT_FIELDS.some((field) => field === key);
}

function readOptionalString(
  raw: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${key} must be a string, got ${typeof value}`, {
      field: key,
    });
  }
  return value;
}

function readWorksheet(raw: Record<string, unknown>): string | number | undefined {
  const value = raw.worksheet;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  throw new ConfigError(
    "worksheet must be a title or a non-negative integer",
    { field: "worksheet" },
  );
}

/**
 * Validate the shape of a raw configuration mapping
 *
 * Keys the connection does not know are ignored.
 *
 * @throws {ConfigError} When a known key holds a value of the wrong type
 */
export function parseConnectionConfig(
  raw: Record<string, unknown>,
): ConnectionConfig {
  const config: ConnectionConfig = {};

  for (const key of STRING_OPTION_KEYS) {
    const value = readOptionalString(raw, key);
    if (value !== undefined) {
      config[key] = value;
    }
  }

  const worksheet = readWorksheet(raw);
  if (worksheet !== undefined) {
    config.worksheet = worksheet;
  }

  const fields: ServiceAccountFields = {};
  for (const field of SERVICE_ACCOUNT_FIELDS) {
    const value = readOptionalString(raw, field);
    if (value !== undefined) {
      fields[field] = value;
    }
  }

  const ignored = Object.keys(raw).filter(
    (key) =>
      key !== "worksheet" &&
      !isServiceAccountField(key) &&
      !STRING_OPTION_KEYS.some((known) => known === key),
  );
  if (ignored.length > 0) {
    logger.debug("Ignoring unknown connection config keys", { keys: ignored });
  }

  return { ...config, ...fields };
}

function hasValue(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== "";
}

/**
 * Decide the credential for a validated configuration
 *
 * Error messages name fields, never their values.
 *
 * @throws {ConfigError} On an unknown type, partial service-account fields or
 * an invalid private key
 */
export function resolveCredential(config: ConnectionConfig): Credential {
  const type = (config.type ?? "").trim();
  const present = SERVICE_ACCOUNT_FIELDS.filter((field) => hasValue(config[field]));

  if (type !== "" && type !== SERVICE_ACCOUNT_TYPE) {
    throw new ConfigError(
      `Unsupported connection type "${type}". Use "${SERVICE_ACCOUNT_TYPE}" or leave it empty for public access.`,
      { field: "type" },
    );
  }

  if (type === "") {
    if (present.length > 0) {
      throw new ConfigError(
        `Service account field(s) ${present.join(", ")} are set but type is empty. ` +
          `Set type = "${SERVICE_ACCOUNT_TYPE}" or remove them.`,
        { field: "type" },
      );
    }
    return { kind: "none" };
  }

  if (present.length === 0) {
    throw new ConfigError(
      `type is "${SERVICE_ACCOUNT_TYPE}" but no service account fields are set`,
      { field: "type" },
    );
  }

  for (const field of REQUIRED_SERVICE_ACCOUNT_FIELDS) {
    if (!hasValue(config[field])) {
      throw new ConfigError(`${field} is missing or empty`, { field });
    }
  }

  const clientEmail = (config.client_email ?? "").trim();
  const privateKey = normalizePrivateKey(config.private_key, "private_key");

  return {
    kind: "service_account",
    clientEmail,
    privateKey,
    projectId: config.project_id,
    privateKeyId: config.private_key_id,
    clientId: config.client_id,
    tokenUri: config.token_uri,
  };
}

export function connectionModeOf(credential: Credential): ConnectionMode {
  return credential.kind === "none" ? "read_only" : "crud";
}
