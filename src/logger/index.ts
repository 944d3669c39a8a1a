export {
  debug,
  info,
  warn,
  error,
  withContext,
  parseLogLevel,
  setLogLevel,
} from "./logger";
