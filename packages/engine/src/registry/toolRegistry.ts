import * as fs from "node:fs";

import { errnoCode, InvalidExecutableError, RegistryLockedError, ToolNotFoundError } from "../errors.js";

/**
 * Output dialects understood by the normalizer.
 *
 * Each registered tool declares exactly one; output is never sniffed.
 */
export const TOOL_DIALECTS = ["json", "text"] as const;

export type ToolDialect = (typeof TOOL_DIALECTS)[number];

export function isToolDialect(value: unknown): value is ToolDialect {
  return TOOL_DIALECTS.some((d) => d === value);
}

/** A registered VM executable. Immutable; re-registration replaces it. */
export interface ToolEntry {
  readonly name: string;
  readonly executablePath: string;
  readonly fixedArgs: readonly string[];
  readonly dialect: ToolDialect;
}

export interface RegisterToolOptions {
  readonly dialect?: ToolDialect;
}

/** Throw {@link InvalidExecutableError} unless `executablePath` is an executable file. */
export function assertExecutable(executablePath: string): void {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(executablePath);
  } catch (err) {
    const code = errnoCode(err);
    throw new InvalidExecutableError(
      executablePath,
      code === "ENOENT" ? "file not found" : `cannot stat (${code ?? String(err)})`,
    );
  }

  if (!stat.isFile()) {
    throw new InvalidExecutableError(executablePath, "not a regular file");
  }

  try {
    fs.accessSync(executablePath, fs.constants.X_OK);
  } catch {
    throw new InvalidExecutableError(executablePath, "file is not executable");
  }
}

/**
 * Named VM tools with their invocation arguments.
 *
 * Listing order is registration order; re-registering a name keeps its slot
 * but replaces the entry wholesale. A run takes a read lock for its whole
 * duration, during which any mutation throws {@link RegistryLockedError}.
 */
export class ToolRegistry {
  #entries = new Map<string, ToolEntry>();
  #readers = 0;

  /**
   * Rebuild a registry from persisted entries.
   *
   * Executability is not checked again: a binary removed since registration
   * fails at spawn time and is reported as a ToolError for its units.
   */
  static fromEntries(entries: Iterable<ToolEntry>): ToolRegistry {
    const registry = new ToolRegistry();
    for (const e of entries) {
      registry.#put(e.name, e.executablePath, e.fixedArgs, e.dialect);
    }
    return registry;
  }

  register(
    name: string,
    executablePath: string,
    args: readonly string[] = [],
    options: RegisterToolOptions = {},
  ): ToolEntry {
    this.#assertWritable("register a tool");
    assertExecutable(executablePath);
    return this.#put(name, executablePath, args, options.dialect ?? "json");
  }

  unregister(name: string): void {
    this.#assertWritable("unregister a tool");
    if (!this.#entries.delete(name)) {
      throw new ToolNotFoundError(name);
    }
  }

  lookup(name: string): ToolEntry {
    const entry = this.#entries.get(name);
    if (entry === undefined) throw new ToolNotFoundError(name);
    return entry;
  }

  has(name: string): boolean {
    return this.#entries.has(name);
  }

  list(): ToolEntry[] {
    return [...this.#entries.values()];
  }

  get size(): number {
    return this.#entries.size;
  }

  get locked(): boolean {
    return this.#readers > 0;
  }

  /**
   * Hold the registry read-only until the returned release function is called.
   * Releasing twice is a no-op.
   */
  acquireReadLock(): () => void {
    this.#readers += 1;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.#readers -= 1;
    };
  }

  #put(name: string, executablePath: string, args: readonly string[], dialect: ToolDialect): ToolEntry {
    if (name.trim().length === 0) {
      throw new TypeError("tool name must be a non-empty string");
    }

    const entry: ToolEntry = Object.freeze({
      name,
      executablePath,
      fixedArgs: Object.freeze([...args]),
      dialect,
    });
    this.#entries.set(name, entry);
    return entry;
  }

  #assertWritable(operation: string): void {
    if (this.#readers > 0) throw new RegistryLockedError(operation);
  }
}
