import type { ToolDialect } from "@vmparity/engine";

export const DEFAULT_CONFIG_PATH = "vmparity.yml";

/** One tool as persisted in the registry file. */
export interface ToolConfig {
  name: string;
  path: string;
  args: string[];
  dialect: ToolDialect;
}

export interface RegistryConfig {
  schemaVersion: 1;
  tools: ToolConfig[];
}
