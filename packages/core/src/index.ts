export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export {
  AgentError,
  ParseError,
  ToolValidationError,
  ConfigError,
  isAgentError,
  errorMessage,
  type ValidationIssue,
} from "./errors.js";
export {
  createLogger,
  consoleSink,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogContext,
} from "./logger.js";
export { loadAppConfig, parseAppConfig, LOG_LEVEL_ENV, type AppConfig } from "./config.js";
