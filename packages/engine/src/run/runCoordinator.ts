import {
  loadTestVectors,
  NoTestCasesFoundError,
  type MalformedTestVectorError,
  type TestCase,
} from "@vmparity/vectors";

import { BenchmarkAggregator } from "../aggregate/benchmarkAggregator.js";
import { classifyOutcome } from "../compare/classify.js";
import { formatVerdict } from "../compare/format.js";
import type { Verdict } from "../compare/types.js";
import { getDialect } from "../dialects/index.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { runProcess } from "../process/runProcess.js";
import type { ToolEntry, ToolRegistry } from "../registry/toolRegistry.js";
import { runPool } from "./pool.js";
import type { RunOptions, RunReport, RunState } from "./types.js";

export const DEFAULT_CONCURRENCY = 4;

export interface RunCoordinatorOptions {
  readonly registry: ToolRegistry;
  readonly logger?: Logger;
}

interface Unit {
  readonly testCase: TestCase;
  readonly tool: ToolEntry;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives one run: load vectors, execute every (test × tool) unit through the
 * worker pool, classify each outcome and summarize.
 *
 * State: `idle → loading → executing → summarizing → done`. `failed` is only
 * reachable from `loading`; once execution starts every problem becomes a
 * verdict. A coordinator may run again after finishing; each run starts with
 * a fresh aggregator.
 */
export class RunCoordinator {
  readonly #registry: ToolRegistry;
  readonly #logger: Logger;
  #state: RunState = "idle";
  #aggregator = new BenchmarkAggregator();

  constructor(options: RunCoordinatorOptions) {
    this.#registry = options.registry;
    this.#logger = options.logger ?? silentLogger();
  }

  get state(): RunState {
    return this.#state;
  }

  /** Records of the current (or last) run; readable while it executes and after cancellation. */
  get aggregator(): BenchmarkAggregator {
    return this.#aggregator;
  }

  /**
   * Load `testPath` (file or directory) and run it against every registered tool.
   *
   * Rejects with {@link NoTestCasesFoundError} when nothing loadable was found;
   * otherwise always resolves with a report.
   */
  async run(testPath: string, options: RunOptions = {}): Promise<RunReport> {
    this.#begin();

    let cases: readonly TestCase[];
    let skipped: readonly MalformedTestVectorError[];
    try {
      const loaded = await loadTestVectors(testPath, {
        ...(options.ignorePrefixes === undefined ? {} : { ignorePrefixes: options.ignorePrefixes }),
        onMalformed: (err) => {
          this.#logger.warn({ sourcePath: err.sourcePath, reason: err.reason }, "skipping malformed test vector file");
        },
      });
      cases = loaded.cases;
      skipped = loaded.skipped;
    } catch (err) {
      this.#state = "failed";
      this.#logger.error({ err, testPath }, "run failed to start");
      throw err;
    }

    return await this.#execute(cases, skipped, options);
  }

  /** Run already-loaded test cases. An empty list fails the run like an empty load. */
  async runTestCases(cases: readonly TestCase[], options: RunOptions = {}): Promise<RunReport> {
    this.#begin();

    if (cases.length === 0) {
      this.#state = "failed";
      const err = new NoTestCasesFoundError("<in-memory>", []);
      this.#logger.error({ err }, "run failed to start");
      throw err;
    }

    return await this.#execute(cases, [], options);
  }

  #begin(): void {
    if (this.#state === "loading" || this.#state === "executing" || this.#state === "summarizing") {
      throw new Error(`a run is already in progress (state: ${this.#state})`);
    }
    this.#state = "loading";
    this.#aggregator = new BenchmarkAggregator();
  }

  async #execute(
    cases: readonly TestCase[],
    skipped: readonly MalformedTestVectorError[],
    options: RunOptions,
  ): Promise<RunReport> {
    const aggregator = this.#aggregator;
    const signal = options.signal;
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));

    this.#state = "executing";
    const release = this.#registry.acquireReadLock();
    const tools = this.#registry.list();

    const units: Unit[] = [];
    for (const testCase of cases) {
      for (const tool of tools) units.push({ testCase, tool });
    }

    this.#logger.info(
      { tests: cases.length, tools: tools.length, units: units.length, concurrency },
      "run started",
    );

    const onAbort = () => {
      this.#logger.info({ recorded: aggregator.size, units: units.length }, "run cancelled");
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      await runPool(units, concurrency, (unit) => this.#runUnit(unit, aggregator, options), {
        ...(signal === undefined ? {} : { signal }),
      });
    } finally {
      signal?.removeEventListener("abort", onAbort);
      release();
    }

    this.#state = "summarizing";
    const summaries = aggregator.getSummaries(tools.map((t) => t.name));
    for (const s of summaries.values()) {
      this.#logger.info(
        { tool: s.toolName, count: s.count, passCount: s.passCount, meanDurationNanos: s.meanDurationNanos },
        "tool summary",
      );
    }

    const report: RunReport = {
      state: "done",
      testCount: cases.length,
      testIds: cases.map((c) => c.id),
      toolCount: tools.length,
      records: aggregator.getRecords(),
      summaries,
      skipped,
      cancelled: signal?.aborted ?? false,
    };
    this.#state = "done";
    return report;
  }

  async #runUnit(unit: Unit, aggregator: BenchmarkAggregator, options: RunOptions): Promise<void> {
    const { testCase, tool } = unit;
    const log = this.#logger.child({ tool: tool.name, test: testCase.id });
    log.debug("unit started");
    const start = process.hrtime.bigint();

    try {
      const input = getDialect(tool.dialect).encodeInput(testCase);
      const raw = await runProcess(tool, input, {
        extraArgs: testCase.args,
        ...(options.timeoutMs === undefined ? {} : { timeoutMs: options.timeoutMs }),
        ...(options.maxStdoutBytes === undefined ? {} : { maxStdoutBytes: options.maxStdoutBytes }),
        ...(options.maxStderrBytes === undefined ? {} : { maxStderrBytes: options.maxStderrBytes }),
        ...(options.signal === undefined ? {} : { signal: options.signal }),
      });

      if (raw.kind === "cancelled") {
        log.debug("unit cancelled");
        return;
      }
      if (raw.kind === "failed") log.warn({ reason: raw.reason }, "tool invocation failed");
      if (raw.kind === "timeout") log.warn({ timeoutMs: raw.timeoutMs }, "tool timed out");

      const { verdict, result } = classifyOutcome(tool, raw, testCase, {
        ...(options.logOrder === undefined ? {} : { logOrder: options.logOrder }),
      });

      aggregator.record({
        toolName: tool.name,
        testId: testCase.id,
        verdict,
        durationNanos: raw.durationNanos,
        ...(result?.reportedDurationNanos === undefined
          ? {}
          : { reportedDurationNanos: result.reportedDurationNanos }),
      });
      log.debug({ verdict: verdict.kind }, formatVerdict(verdict));
    } catch (err) {
      const verdict: Verdict = { kind: "toolError", exitCode: null, stderr: `internal error: ${errorMessage(err)}` };
      log.error({ err }, "unit failed unexpectedly");
      aggregator.record({
        toolName: tool.name,
        testId: testCase.id,
        verdict,
        durationNanos: Number(process.hrtime.bigint() - start),
      });
    }
  }
}
