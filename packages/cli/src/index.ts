export { EXIT_CANCELLED, main, parseCliArgs, runCli, usage } from "./cli.js";
export type { MainIo, ParseResult } from "./cli.js";
export {
  fromToolRegistry,
  loadRegistryConfig,
  saveRegistryConfig,
  toToolRegistry,
} from "./config/registryFile.js";
export type { LoadedRegistryConfig, LoadRegistryOptions } from "./config/registryFile.js";
export { DEFAULT_CONFIG_PATH } from "./config/types.js";
export type { RegistryConfig, ToolConfig } from "./config/types.js";
export { formatJsonReport } from "./reporting/formatJson.js";
export { formatPrettyReport } from "./reporting/formatPretty.js";
export { formatToolList } from "./reporting/formatToolList.js";
export { ConfigError, UsageError } from "./util/errors.js";
