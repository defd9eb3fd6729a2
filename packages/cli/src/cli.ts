import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import {
  createLogger,
  isLogOrder,
  isToolDialect,
  parseLogLevel,
  RunCoordinator,
  type LogOrder,
  type RunOptions,
  type ToolDialect,
} from "@vmparity/engine";

import {
  fromToolRegistry,
  loadRegistryConfig,
  saveRegistryConfig,
  toToolRegistry,
} from "./config/registryFile.js";
import { DEFAULT_CONFIG_PATH } from "./config/types.js";
import { formatJsonReport } from "./reporting/formatJson.js";
import { formatPrettyReport } from "./reporting/formatPretty.js";
import { formatToolList } from "./reporting/formatToolList.js";
import { ConfigError, UsageError } from "./util/errors.js";

type OutputFormat = "pretty" | "json";

/** Exit code of a run interrupted by SIGINT. */
export const EXIT_CANCELLED = 130;

export type ParseResult =
  | { kind: "help" }
  | {
      kind: "tool-register";
      configPath: string;
      name: string;
      executablePath: string;
      dialect: ToolDialect;
      args: string[];
    }
  | { kind: "tool-unregister"; configPath: string; name: string }
  | { kind: "tool-list"; configPath: string; format: OutputFormat }
  | {
      kind: "test";
      configPath: string;
      testPath: string;
      format: OutputFormat;
      concurrency?: number;
      timeoutMs?: number;
      logOrder?: LogOrder;
      ignorePrefixes: string[];
    };

/**
 * Returns a help/usage string for the `vmparity` CLI.
 */
export function usage(): string {
  return [
    "vmparity: run VM executables against shared test vectors and compare them",
    "",
    "Usage:",
    "  vmparity tool register <name> <path> [--dialect json|text] [-- <args...>]",
    "  vmparity tool unregister <name>",
    "  vmparity tool list [--format pretty|json]",
    "  vmparity test <path> [--concurrency <n>] [--timeout <ms>] [--format pretty|json]",
    "                       [--log-order strict|unordered] [--ignore-prefix <prefix>]...",
    "",
    "Flags:",
    `  --config <path>        Tool registry file (default: ${DEFAULT_CONFIG_PATH})`,
    "  --dialect json|text    Output dialect of the registered tool (default: json)",
    "  --format pretty|json   Output format (default: pretty)",
    "  --concurrency <n>      Maximum concurrent tool processes (default: 4)",
    "  --timeout <ms>         Per-invocation time limit (default: 30000)",
    "  --log-order <mode>     Compare logs in order (strict) or as a multiset (unordered)",
    "  --ignore-prefix <p>    Skip vector files whose name starts with <p> (repeatable)",
    "",
    "Environment:",
    "  VMPARITY_LOG_LEVEL     fatal|error|warn|info|debug|trace|silent (default: info)",
    "",
    "Exit codes:",
    "  0 = every test passed on every tool",
    "  1 = some verdicts failed",
    "  2 = config/usage error, or the run could not start",
    `  ${EXIT_CANCELLED} = run cancelled`,
  ].join("\n");
}

function requireValue(argv: readonly string[], i: number, flag: string, what: string): string {
  const next = argv[i + 1];
  if (!next || next.startsWith("-")) {
    throw new UsageError(`${flag} requires a <${what}>`);
  }
  return next;
}

function parsePositiveInt(flag: string, value: string): number {
  if (!/^[0-9]+$/.test(value) || Number(value) < 1 || !Number.isSafeInteger(Number(value))) {
    throw new UsageError(`${flag} must be a positive integer (got ${value})`);
  }
  return Number(value);
}

/**
 * Parses raw CLI argv into a strongly-typed command or help request.
 */
export function parseCliArgs(rawArgv: string[]): ParseResult {
  const argv: string[] = [];
  const passthrough: string[] = [];
  let parsingFlags = true;

  for (const arg of rawArgv) {
    if (parsingFlags && arg === "--") {
      parsingFlags = false;
      continue;
    }

    if (parsingFlags) {
      argv.push(arg);
    } else {
      passthrough.push(arg);
    }
  }

  let configPath = DEFAULT_CONFIG_PATH;
  let format: OutputFormat | undefined;
  let dialect: ToolDialect | undefined;
  let concurrency: number | undefined;
  let timeoutMs: number | undefined;
  let logOrder: LogOrder | undefined;
  const ignorePrefixes: string[] = [];
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;

    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }

    if (arg === "--config") {
      configPath = requireValue(argv, i, arg, "path");
      i++;
      continue;
    }

    if (arg === "--format") {
      const next = argv[i + 1];
      if (next !== "pretty" && next !== "json") {
        throw new UsageError("--format must be one of: pretty, json");
      }
      format = next;
      i++;
      continue;
    }

    if (arg === "--dialect") {
      const next = argv[i + 1];
      if (!isToolDialect(next)) {
        throw new UsageError("--dialect must be one of: json, text");
      }
      dialect = next;
      i++;
      continue;
    }

    if (arg === "--log-order") {
      const next = argv[i + 1];
      if (!isLogOrder(next)) {
        throw new UsageError("--log-order must be one of: strict, unordered");
      }
      logOrder = next;
      i++;
      continue;
    }

    if (arg === "--concurrency") {
      concurrency = parsePositiveInt(arg, requireValue(argv, i, arg, "n"));
      i++;
      continue;
    }

    if (arg === "--timeout") {
      timeoutMs = parsePositiveInt(arg, requireValue(argv, i, arg, "ms"));
      i++;
      continue;
    }

    if (arg === "--ignore-prefix") {
      ignorePrefixes.push(requireValue(argv, i, arg, "prefix"));
      i++;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`unknown flag: ${arg}`);
    }

    positionals.push(arg);
  }

  const [command, ...rest] = positionals;
  const isRegister = command === "tool" && rest[0] === "register";
  const isTest = command === "test";

  if (passthrough.length > 0 && !isRegister) {
    throw new UsageError("arguments after -- are only accepted by 'tool register'");
  }
  if (dialect !== undefined && !isRegister) {
    throw new UsageError("--dialect is only valid for 'tool register'");
  }
  if (!isTest && (concurrency !== undefined || timeoutMs !== undefined || logOrder !== undefined || ignorePrefixes.length > 0)) {
    throw new UsageError("--concurrency, --timeout, --log-order and --ignore-prefix are only valid for 'test'");
  }

  if (command === undefined) {
    throw new UsageError("missing command");
  }

  if (command === "test") {
    const [testPath, ...extra] = rest;
    if (testPath === undefined) throw new UsageError("test requires a <path>");
    if (extra.length > 0) throw new UsageError(`unexpected positional arguments: ${extra.join(" ")}`);
    return {
      kind: "test",
      configPath,
      testPath,
      format: format ?? "pretty",
      ignorePrefixes,
      ...(concurrency === undefined ? {} : { concurrency }),
      ...(timeoutMs === undefined ? {} : { timeoutMs }),
      ...(logOrder === undefined ? {} : { logOrder }),
    };
  }

  if (command !== "tool") {
    throw new UsageError(`unknown command: ${command}`);
  }

  const [sub, ...args] = rest;
  switch (sub) {
    case "register": {
      const [name, executablePath, ...extra] = args;
      if (name === undefined || executablePath === undefined) {
        throw new UsageError("tool register requires <name> <path>");
      }
      if (extra.length > 0) {
        throw new UsageError(`unexpected positional arguments: ${extra.join(" ")} (pass tool arguments after --)`);
      }
      if (format !== undefined) throw new UsageError("--format is not valid for 'tool register'");
      return { kind: "tool-register", configPath, name, executablePath, dialect: dialect ?? "json", args: passthrough };
    }

    case "unregister": {
      const [name, ...extra] = args;
      if (name === undefined) throw new UsageError("tool unregister requires <name>");
      if (extra.length > 0) throw new UsageError(`unexpected positional arguments: ${extra.join(" ")}`);
      if (format !== undefined) throw new UsageError("--format is not valid for 'tool unregister'");
      return { kind: "tool-unregister", configPath, name };
    }

    case "list":
      if (args.length > 0) throw new UsageError(`unexpected positional arguments: ${args.join(" ")}`);
      return { kind: "tool-list", configPath, format: format ?? "pretty" };

    default:
      throw new UsageError(sub === undefined ? "tool requires a subcommand" : `unknown tool subcommand: ${sub}`);
  }
}

/** IO dependencies for {@link main} (abstracted for testing). */
export interface MainIo {
  cwd: string;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
  /** Cancels a running `test` command. */
  signal?: AbortSignal;
}

async function runTests(parsed: Extract<ParseResult, { kind: "test" }>, io: MainIo): Promise<number> {
  const loaded = await loadRegistryConfig({ cwd: io.cwd, configPath: parsed.configPath });
  const registry = toToolRegistry(loaded.config);
  if (registry.size === 0) {
    throw new ConfigError(`no tools registered in ${parsed.configPath}`);
  }

  const logger = createLogger({ level: parseLogLevel(io.env.VMPARITY_LOG_LEVEL), destination: io.stderr });
  const coordinator = new RunCoordinator({ registry, logger });

  const options: RunOptions = {
    ignorePrefixes: parsed.ignorePrefixes,
    ...(parsed.concurrency === undefined ? {} : { concurrency: parsed.concurrency }),
    ...(parsed.timeoutMs === undefined ? {} : { timeoutMs: parsed.timeoutMs }),
    ...(parsed.logOrder === undefined ? {} : { logOrder: parsed.logOrder }),
    ...(io.signal === undefined ? {} : { signal: io.signal }),
  };
  const report = await coordinator.run(path.resolve(io.cwd, parsed.testPath), options);

  const out = parsed.format === "json" ? formatJsonReport(report) : formatPrettyReport(report);
  io.stdout.write(`${out}\n`);

  if (report.cancelled) return EXIT_CANCELLED;
  return report.records.every((r) => r.verdict.kind === "pass") ? 0 : 1;
}

/**
 * CLI entrypoint: dispatches a command and returns the process exit code.
 */
export async function main(rawArgv: string[], io: MainIo): Promise<number> {
  try {
    const parsed = parseCliArgs(rawArgv);

    switch (parsed.kind) {
      case "help":
        io.stdout.write(`${usage()}\n`);
        return 0;

      case "tool-register": {
        const loaded = await loadRegistryConfig({ cwd: io.cwd, configPath: parsed.configPath, allowMissing: true });
        const registry = toToolRegistry(loaded.config);
        const entry = registry.register(parsed.name, path.resolve(io.cwd, parsed.executablePath), parsed.args, {
          dialect: parsed.dialect,
        });
        await saveRegistryConfig(loaded.absPath, fromToolRegistry(registry));
        io.stdout.write(`registered ${entry.name} -> ${entry.executablePath}\n`);
        return 0;
      }

      case "tool-unregister": {
        const loaded = await loadRegistryConfig({ cwd: io.cwd, configPath: parsed.configPath });
        const registry = toToolRegistry(loaded.config);
        registry.unregister(parsed.name);
        await saveRegistryConfig(loaded.absPath, fromToolRegistry(registry));
        io.stdout.write(`unregistered ${parsed.name}\n`);
        return 0;
      }

      case "tool-list": {
        const loaded = await loadRegistryConfig({ cwd: io.cwd, configPath: parsed.configPath, allowMissing: true });
        io.stdout.write(`${formatToolList(loaded.config.tools, parsed.format)}\n`);
        return 0;
      }

      case "test":
        return await runTests(parsed, io);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);

    if (err instanceof UsageError) {
      io.stderr.write(`error: ${message}\n\n${usage()}\n`);
      return 2;
    }

    io.stderr.write(`error: ${message}\n`);
    return 2;
  }
}

/** Run the CLI against the current process; SIGINT cancels a running test command. */
export async function runCli(): Promise<void> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    process.exitCode = await main(process.argv.slice(2), {
      cwd: process.cwd(),
      stdout: process.stdout,
      stderr: process.stderr,
      env: process.env,
      signal: controller.signal,
    });
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

const isMain =
  process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isMain) {
  void runCli();
}
