/** A test-vector source that could not be turned into test cases. */
export class MalformedTestVectorError extends Error {
  override name = "MalformedTestVectorError";
  readonly code = "MalformedTestVector";
  readonly sourcePath: string;
  readonly reason: string;

  constructor(sourcePath: string, reason: string) {
    super(`${sourcePath}: ${reason}`);
    this.sourcePath = sourcePath;
    this.reason = reason;
  }
}

/**
 * Loading finished without a single usable test case.
 *
 * This is the only condition that prevents a run from starting.
 */
export class NoTestCasesFoundError extends Error {
  override name = "NoTestCasesFoundError";
  readonly code = "NoTestCasesFound";
  readonly inputPath: string;
  readonly skipped: readonly MalformedTestVectorError[];

  constructor(inputPath: string, skipped: readonly MalformedTestVectorError[]) {
    const suffix = skipped.length > 0 ? ` (${skipped.length} malformed source(s) skipped)` : "";
    super(`no test cases found in ${inputPath}${suffix}`);
    this.inputPath = inputPath;
    this.skipped = skipped;
  }
}
