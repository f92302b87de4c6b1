export {
  prettyLogger,
  formatLogLine,
  LoggerLive,
  withSpan,
  parseLogLevel,
  isLogLevelName,
  LOG_LEVELS,
} from "./logging.js";
