import fs from "node:fs/promises";
import path from "node:path";

import YAML from "yaml";

import { errnoCode, isToolDialect, ToolRegistry, type ToolDialect } from "@vmparity/engine";

import { ConfigError } from "../util/errors.js";
import type { RegistryConfig, ToolConfig } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function assertToolConfig(index: number, value: unknown): ToolConfig {
  const where = `tools[${index}]`;
  if (!isRecord(value)) {
    throw new ConfigError(`${where} must be an object`);
  }

  const { name, path: toolPath, args, dialect } = value;
  if (typeof name !== "string" || name.trim().length === 0) {
    throw new ConfigError(`${where}.name must be a non-empty string`);
  }
  if (typeof toolPath !== "string" || toolPath.length === 0) {
    throw new ConfigError(`${where}.path must be a non-empty string`);
  }

  let argList: string[] = [];
  if (args !== undefined && args !== null) {
    if (!Array.isArray(args) || !args.every((a): a is string => typeof a === "string")) {
      throw new ConfigError(`${where}.args must be a string[]`);
    }
    argList = args;
  }

  let toolDialect: ToolDialect = "json";
  if (dialect !== undefined) {
    if (!isToolDialect(dialect)) {
      throw new ConfigError(`${where}.dialect must be one of: json, text (got ${String(dialect)})`);
    }
    toolDialect = dialect;
  }

  return { name, path: toolPath, args: argList, dialect: toolDialect };
}

export interface LoadRegistryOptions {
  cwd: string;
  configPath: string;
  /** Treat a missing file as an empty registry (for `tool register`). */
  allowMissing?: boolean;
}

export interface LoadedRegistryConfig {
  /** Absolute path of the registry file. */
  absPath: string;
  config: RegistryConfig;
}

export async function loadRegistryConfig(opts: LoadRegistryOptions): Promise<LoadedRegistryConfig> {
  const absPath = path.resolve(opts.cwd, opts.configPath);

  let raw: string;
  try {
    raw = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = errnoCode(err);

    if (code === "ENOENT") {
      if (opts.allowMissing) return { absPath, config: { schemaVersion: 1, tools: [] } };
      throw new ConfigError(`tool registry not found: ${opts.configPath} (register a tool first)`);
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new ConfigError(`cannot read tool registry (permission denied): ${opts.configPath}`);
    }

    throw new ConfigError(`failed to read tool registry ${opts.configPath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid YAML in ${opts.configPath}: ${errorMessage(err)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError("registry root must be an object");
  }

  const schemaVersion = parsed.schemaVersion;
  if (schemaVersion !== 1) {
    throw new ConfigError(`schemaVersion must be 1 (got ${String(schemaVersion)})`);
  }

  const toolsRaw = parsed.tools ?? [];
  if (!Array.isArray(toolsRaw)) {
    throw new ConfigError("tools must be a list");
  }

  const tools = toolsRaw.map((t: unknown, i) => assertToolConfig(i, t));
  const seen = new Set<string>();
  for (const t of tools) {
    if (seen.has(t.name)) throw new ConfigError(`duplicate tool name: ${t.name}`);
    seen.add(t.name);
  }

  return { absPath, config: { schemaVersion: 1, tools } };
}

export async function saveRegistryConfig(absPath: string, config: RegistryConfig): Promise<void> {
  await fs.mkdir(path.dirname(absPath), { recursive: true });
  await fs.writeFile(absPath, YAML.stringify(config), "utf8");
}

/**
 * Build a live registry from the file contents.
 *
 * Paths are taken as saved; a tool whose binary has gone away still loads, so
 * it can be unregistered and its units report a ToolError.
 */
export function toToolRegistry(config: RegistryConfig): ToolRegistry {
  return ToolRegistry.fromEntries(
    config.tools.map((t) => ({
      name: t.name,
      executablePath: t.path,
      fixedArgs: t.args,
      dialect: t.dialect,
    })),
  );
}

export function fromToolRegistry(registry: ToolRegistry): RegistryConfig {
  return {
    schemaVersion: 1,
    tools: registry.list().map((t) => ({
      name: t.name,
      path: t.executablePath,
      args: [...t.fixedArgs],
      dialect: t.dialect,
    })),
  };
}
