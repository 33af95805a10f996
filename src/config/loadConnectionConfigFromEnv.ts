/**
 * Connection config from environment variables
 *
 * Builds the raw configuration mapping a GSheetsConnection takes:
 *   GSHEETS_SPREADSHEET, GSHEETS_WORKSHEET, GSHEETS_FOLDER_ID, GSHEETS_TYPE
 *   GSHEETS_<FIELD> for each service-account key field (GSHEETS_CLIENT_EMAIL, ...)
 *   GSHEETS_SERVICE_ACCOUNT_FILE: path to a Google JSON key file, whose
 *   fields (and type) are used instead of the GSHEETS_<FIELD> variables
 *
 * Unset or empty variables are left out.
 */

import * as fs from "fs";
import {
  ENV_FOLDER_ID,
  ENV_PREFIX,
  ENV_SERVICE_ACCOUNT_FILE,
  ENV_SPREADSHEET,
  ENV_TYPE,
  ENV_WORKSHEET,
  SERVICE_ACCOUNT_FIELDS,
} from "@/constants";
import { ConfigError } from "@/errors";
import * as logger from "@/logger";

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Read a service-account JSON key file into a plain mapping
 *
 * @throws {ConfigError} When the file is missing, unreadable or not a JSON object
 */
export function loadServiceAccountFile(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Could not read service account key file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { field: ENV_SERVICE_ACCOUNT_FILE },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ConfigError(`Service account key file ${path} is not valid JSON`, {
      field: ENV_SERVICE_ACCOUNT_FILE,
    });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(
      `Service account key file ${path} must contain a JSON object`,
      { field: ENV_SERVICE_ACCOUNT_FILE },
    );
  }

  return Object.fromEntries(Object.entries(parsed));
}

export function loadConnectionConfigFromEnv(
  env: Env = process.env,
): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const spreadsheet = readEnv(env, ENV_SPREADSHEET);
  const worksheet = readEnv(env, ENV_WORKSHEET);
  const folderId = readEnv(env, ENV_FOLDER_ID);
  if (spreadsheet !== undefined) {
    config.spreadsheet = spreadsheet;
  }
  if (worksheet !== undefined) {
    config.worksheet = worksheet;
  }
  if (folderId !== undefined) {
    config.folder_id = folderId;
  }

  const keyFile = readEnv(env, ENV_SERVICE_ACCOUNT_FILE);
  if (keyFile !== undefined) {
    const key = loadServiceAccountFile(keyFile);
    for (const field of ["type", ...SERVICE_ACCOUNT_FIELDS]) {
      if (key[field] !== undefined) {
        config[field] = key[field];
      }
    }
    logger.debug("Loaded service account key file", {
      path: keyFile,
      clientEmail: typeof key.client_email === "string" ? key.client_email : undefined,
    });
    return config;
  }

  const type = readEnv(env, ENV_TYPE);
  if (type !== undefined) {
    config.type = type;
  }

  for (const field of SERVICE_ACCOUNT_FIELDS) {
    const value = readEnv(env, `${ENV_PREFIX}${field.toUpperCase()}`);
    if (value !== undefined) {
      config[field] = value;
    }
  }

  return config;
}
