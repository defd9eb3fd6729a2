import { describe, expect, it } from "vitest";

import { BenchmarkAggregator } from "../src/aggregate/benchmarkAggregator.js";
import { quantileSorted } from "../src/aggregate/stats.js";
import type { Verdict } from "../src/compare/types.js";

const PASS: Verdict = { kind: "pass" };
const TIMEOUT: Verdict = { kind: "timeout", timeoutMs: 10 };

describe("quantileSorted", () => {
  it("interpolates between closest ranks", () => {
    expect(quantileSorted([10, 20, 30, 40], 0)).toBe(10);
    expect(quantileSorted([10, 20, 30, 40], 0.5)).toBe(25);
    expect(quantileSorted([10, 20, 30, 40], 1)).toBe(40);
    expect(quantileSorted([10, 20, 30, 40], 0.95)).toBeCloseTo(38.5, 9);
    expect(quantileSorted([7], 0.95)).toBe(7);
  });

  it("rejects empty input and out-of-range quantiles", () => {
    expect(() => quantileSorted([], 0.5)).toThrow(/non-empty/);
    expect(() => quantileSorted([1], 1.5)).toThrow(RangeError);
  });
});

describe("BenchmarkAggregator", () => {
  it("reports passRate as K/N exactly and orders min <= mean <= max", () => {
    const agg = new BenchmarkAggregator();
    const durations = [500, 120, 900, 310, 42, 77, 1000];
    durations.forEach((durationNanos, i) => {
      agg.record({ toolName: "a", testId: `t${i}`, verdict: i < 3 ? PASS : TIMEOUT, durationNanos });
    });
    agg.record({ toolName: "b", testId: "t0", verdict: PASS, durationNanos: 1 });

    const s = agg.summarize("a");
    expect(s.count).toBe(7);
    expect(s.passCount).toBe(3);
    expect(s.passRate).toBe(3 / 7);
    expect(s.minDurationNanos).toBe(42);
    expect(s.maxDurationNanos).toBe(1000);
    expect(s.meanDurationNanos).toBe(2949 / 7);
    expect(s.minDurationNanos).toBeLessThanOrEqual(s.meanDurationNanos);
    expect(s.meanDurationNanos).toBeLessThanOrEqual(s.maxDurationNanos);
    expect(s.p50DurationNanos).toBe(310);
    expect(s.verdictCounts).toEqual({ pass: 3, mismatch: 0, toolError: 0, timeout: 4, loadError: 0 });
  });

  it("summarizes tool-reported VM time over the records that carry it", () => {
    const agg = new BenchmarkAggregator();
    agg.record({ toolName: "a", testId: "t1", verdict: PASS, durationNanos: 9_000, reportedDurationNanos: 300 });
    agg.record({ toolName: "a", testId: "t2", verdict: PASS, durationNanos: 8_000 });
    agg.record({ toolName: "a", testId: "t3", verdict: TIMEOUT, durationNanos: 7_000, reportedDurationNanos: 100 });

    const s = agg.summarize("a");
    expect(s.count).toBe(3);
    expect(s.reportedCount).toBe(2);
    expect(s.meanReportedDurationNanos).toBe(200);
    expect(s.minReportedDurationNanos).toBe(100);
    expect(s.maxReportedDurationNanos).toBe(300);
    expect(s.meanDurationNanos).toBe(8_000);
  });

  it("leaves reported time at zero when no record carries it", () => {
    const agg = new BenchmarkAggregator();
    agg.record({ toolName: "a", testId: "t1", verdict: PASS, durationNanos: 10 });

    expect(agg.summarize("a")).toMatchObject({
      reportedCount: 0,
      meanReportedDurationNanos: 0,
      minReportedDurationNanos: 0,
      maxReportedDurationNanos: 0,
    });
  });

  it("summarizes an unknown tool as zeros", () => {
    const s = new BenchmarkAggregator().summarize("nobody");

    expect(s).toEqual({
      toolName: "nobody",
      count: 0,
      passCount: 0,
      passRate: 0,
      meanDurationNanos: 0,
      minDurationNanos: 0,
      maxDurationNanos: 0,
      p50DurationNanos: 0,
      p95DurationNanos: 0,
      reportedCount: 0,
      meanReportedDurationNanos: 0,
      minReportedDurationNanos: 0,
      maxReportedDurationNanos: 0,
      verdictCounts: { pass: 0, mismatch: 0, toolError: 0, timeout: 0, loadError: 0 },
    });
  });

  it("keys summaries by tool in first-seen order, or in the order asked for", () => {
    const agg = new BenchmarkAggregator();
    agg.record({ toolName: "b", testId: "t1", verdict: PASS, durationNanos: 1 });
    agg.record({ toolName: "a", testId: "t1", verdict: PASS, durationNanos: 1 });
    agg.record({ toolName: "b", testId: "t2", verdict: PASS, durationNanos: 1 });

    expect([...agg.getSummaries().keys()]).toEqual(["b", "a"]);

    const asked = agg.getSummaries(["a", "c"]);
    expect([...asked.keys()]).toEqual(["a", "c"]);
    expect(asked.get("c")?.count).toBe(0);
  });

  it("returns records as an append-ordered copy", () => {
    const agg = new BenchmarkAggregator();
    agg.record({ toolName: "a", testId: "t1", verdict: PASS, durationNanos: 1, reportedDurationNanos: 5 });
    agg.record({ toolName: "a", testId: "t2", verdict: TIMEOUT, durationNanos: 2 });

    const records = agg.getRecords();
    records.pop();

    expect(agg.size).toBe(2);
    expect(agg.getRecords().map((r) => r.testId)).toEqual(["t1", "t2"]);
    expect(agg.getRecords()[0]?.reportedDurationNanos).toBe(5);
  });
});
