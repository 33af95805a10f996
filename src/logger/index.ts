export {
  debug,
  info,
  warn,
  error,
  withContext,
  setLogLevel,
} from "./logger";
