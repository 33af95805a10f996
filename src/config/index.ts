/**
 * Configuration loading public API
 */

export {
  loadConnectionConfigFromEnv,
  loadServiceAccountFile,
} from "./loadConnectionConfigFromEnv";
