export {
  Ok,
  Err,
  map,
  toError,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

export {
  GraphIntegrityError,
  IndexNotBuiltError,
  FrozenGraphError,
  ConfigError,
  BuildInProgressError,
} from "./errors.js";

export { createLogger, currentLogLevel, LOG_LEVEL_ENV } from "./logger.js";
export type { Logger, LogLevel, LogContext } from "./logger.js";

export {
  CONFIG_FILE_NAME,
  DEFAULT_SKIP_PATTERNS,
  ConfigSchema,
  defaultConfig,
  resolveConfig,
  loadConfig,
} from "./config.js";
export type { RepographConfig, GraphConfig, RetrievalConfig, ConfigInput } from "./config.js";

export { errorResponse, successResponse, resultToResponse } from "./mcp.js";
export type { TextContent, ToolResponse } from "./mcp.js";

export { bootstrapServer, runServer, McpServer } from "./server.js";
export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
