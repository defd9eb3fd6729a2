import { readdir, readFile, stat } from "node:fs/promises";
import * as path from "node:path";

import { MalformedTestVectorError, NoTestCasesFoundError } from "./errors.js";
import { parseTestVectorDocument } from "./parseDocument.js";
import type { TestCase } from "./types.js";

export const TEST_VECTOR_EXTENSIONS: readonly string[] = [".json", ".yml", ".yaml"];

/** Options for {@link loadTestVectors}. */
export interface LoadTestVectorsOptions {
  /**
   * Basename prefixes skipped during directory discovery (e.g. suites that
   * only exercise input limits). Ignored when a single file is given.
   */
  readonly ignorePrefixes?: readonly string[];

  /** Called once for every source that was skipped as malformed. */
  readonly onMalformed?: (error: MalformedTestVectorError) => void;
}

export interface LoadTestVectorsResult {
  readonly cases: readonly TestCase[];
  readonly skipped: readonly MalformedTestVectorError[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isEligibleFile(filePath: string, ignorePrefixes: readonly string[]): boolean {
  const ext = path.extname(filePath).toLowerCase();
  if (!TEST_VECTOR_EXTENSIONS.includes(ext)) return false;

  const base = path.basename(filePath);
  return !ignorePrefixes.some((prefix) => base.startsWith(prefix));
}

async function discoverFiles(dir: string, ignorePrefixes: readonly string[]): Promise<string[]> {
  const out: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      out.push(...(await discoverFiles(entryPath, ignorePrefixes)));
      continue;
    }
    if (entry.isFile() && isEligibleFile(entryPath, ignorePrefixes)) {
      out.push(entryPath);
    }
  }

  return out;
}

async function parseFile(filePath: string): Promise<TestCase[]> {
  const ext = path.extname(filePath).toLowerCase();
  if (!TEST_VECTOR_EXTENSIONS.includes(ext)) {
    throw new MalformedTestVectorError(
      filePath,
      `unsupported test file format '${ext || "(none)"}' (expected ${TEST_VECTOR_EXTENSIONS.join(", ")})`,
    );
  }

  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    throw new MalformedTestVectorError(filePath, `failed to read file: ${errorMessage(err)}`);
  }

  return parseTestVectorDocument(text, filePath);
}

/**
 * Load test cases from a single definition file or a directory tree.
 *
 * Directories are walked recursively and files are processed in sorted path
 * order. A malformed source is reported and its cases are skipped; loading
 * only fails (with {@link NoTestCasesFoundError}) when nothing usable remains.
 *
 * Ids are unique within a file. When a later file reuses an id, that case is
 * kept under `<path relative to inputPath>@<id>`.
 */
export async function loadTestVectors(
  inputPath: string,
  options: LoadTestVectorsOptions = {},
): Promise<LoadTestVectorsResult> {
  const ignorePrefixes = options.ignorePrefixes ?? [];
  const skipped: MalformedTestVectorError[] = [];
  const cases: TestCase[] = [];
  const definedIn = new Map<string, string>();

  const skip = (error: MalformedTestVectorError): void => {
    skipped.push(error);
    options.onMalformed?.(error);
  };

  let files: string[];
  let root = path.dirname(inputPath);
  try {
    const stats = await stat(inputPath);
    if (stats.isDirectory()) root = inputPath;
    files = stats.isDirectory()
      ? (await discoverFiles(inputPath, ignorePrefixes)).sort()
      : [inputPath];
  } catch (err) {
    skip(new MalformedTestVectorError(inputPath, `cannot access test path: ${errorMessage(err)}`));
    files = [];
  }

  for (const filePath of files) {
    let parsed: TestCase[];
    try {
      parsed = await parseFile(filePath);
    } catch (err) {
      if (err instanceof MalformedTestVectorError) {
        skip(err);
        continue;
      }
      throw err;
    }

    const relPath = path.relative(root, filePath).split(path.sep).join("/");
    for (const c of parsed) {
      const id = definedIn.has(c.id) ? `${relPath}@${c.id}` : c.id;
      if (definedIn.has(id)) {
        skip(
          new MalformedTestVectorError(
            filePath,
            `duplicate test id '${id}' (already defined in ${definedIn.get(id) ?? "an earlier file"})`,
          ),
        );
        continue;
      }
      definedIn.set(id, filePath);
      cases.push(id === c.id ? c : { ...c, id });
    }
  }

  if (cases.length === 0) {
    throw new NoTestCasesFoundError(inputPath, skipped);
  }

  return { cases, skipped };
}
