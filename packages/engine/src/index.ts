export * from "./aggregate/index.js";
export * from "./compare/index.js";
export * from "./dialects/index.js";
export * from "./run/index.js";

export {
  errnoCode,
  InvalidExecutableError,
  RegistryLockedError,
  ToolNotFoundError,
  UnparsableOutputError,
} from "./errors.js";
export { createLogger, LOG_LEVELS, parseLogLevel, silentLogger } from "./logging/logger.js";
export type { CreateLoggerOptions, Logger } from "./logging/logger.js";
export {
  DEFAULT_MAX_STDERR_BYTES,
  DEFAULT_MAX_STDOUT_BYTES,
  DEFAULT_TIMEOUT_MS,
  runProcess,
} from "./process/runProcess.js";
export type {
  CancelledOutcome,
  ExitedOutcome,
  FailedOutcome,
  RawOutcome,
  RunProcessOptions,
  TimeoutOutcome,
} from "./process/types.js";
export {
  assertExecutable,
  isToolDialect,
  TOOL_DIALECTS,
  ToolRegistry,
} from "./registry/toolRegistry.js";
export type { RegisterToolOptions, ToolDialect, ToolEntry } from "./registry/toolRegistry.js";
