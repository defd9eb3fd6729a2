/** Registration target is missing or not an executable regular file. */
export class InvalidExecutableError extends Error {
  override name = "InvalidExecutableError";
  readonly code = "InvalidExecutable";
  readonly executablePath: string;

  constructor(executablePath: string, reason: string) {
    super(`invalid executable ${JSON.stringify(executablePath)}: ${reason}`);
    this.executablePath = executablePath;
  }
}

/** No tool is registered under the requested name. */
export class ToolNotFoundError extends Error {
  override name = "ToolNotFoundError";
  readonly code = "NotFound";
  readonly toolName: string;

  constructor(toolName: string) {
    super(`tool not registered: ${toolName}`);
    this.toolName = toolName;
  }
}

/** Registry mutation attempted while a run holds it read-only. */
export class RegistryLockedError extends Error {
  override name = "RegistryLockedError";
  readonly code = "RegistryLocked";

  constructor(operation: string) {
    super(`cannot ${operation} while a run is using the tool registry`);
  }
}

/**
 * A tool's stdout could not be read as its declared dialect.
 *
 * Never escapes a run: it is classified as a `LoadError` (or `ToolError`
 * when the tool also exited non-zero).
 */
export class UnparsableOutputError extends Error {
  override name = "UnparsableOutputError";
  readonly code = "UnparsableOutput";
  readonly toolName: string;
  readonly reason: string;
  readonly stdout: string;

  constructor(toolName: string, reason: string, stdout: string) {
    super(`unparsable output from ${toolName}: ${reason}`);
    this.toolName = toolName;
    this.reason = reason;
    this.stdout = stdout;
  }
}

/** `code` of a Node system error, if `err` carries one. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}
