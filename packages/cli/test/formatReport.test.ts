import { describe, expect, it } from "vitest";

import { BenchmarkAggregator, type RunReport } from "@vmparity/engine";
import { MalformedTestVectorError } from "@vmparity/vectors";

import { formatJsonReport } from "../src/reporting/formatJson.js";
import { formatPrettyReport } from "../src/reporting/formatPretty.js";
import { formatToolList } from "../src/reporting/formatToolList.js";

function sampleReport(): RunReport {
  const agg = new BenchmarkAggregator();
  agg.record({ toolName: "a", testId: "t1", verdict: { kind: "pass" }, durationNanos: 1_500_000 });
  agg.record({
    toolName: "b",
    testId: "t1",
    verdict: {
      kind: "mismatch",
      detail: { scope: "account", address: "0xaa", field: "balance", expected: "100", actual: "99" },
      divergenceCount: 1,
    },
    durationNanos: 2_000_000,
  });
  agg.record({ toolName: "a", testId: "t2", verdict: { kind: "timeout", timeoutMs: 50 }, durationNanos: 3_500_000 });

  return {
    state: "done",
    testCount: 2,
    testIds: ["t1", "t2"],
    toolCount: 2,
    records: agg.getRecords(),
    summaries: agg.getSummaries(["a", "b"]),
    skipped: [],
    cancelled: false,
  };
}

describe("formatPrettyReport", () => {
  it("renders the timing table, failures and per-tool summary", () => {
    expect(formatPrettyReport(sampleReport())).toBe(
      [
        "Ran 2 test(s) against 2 tool(s)",
        "",
        "Test  a        b",
        "t1    1.50 ms  MISMATCH",
        "t2    TIMEOUT  -",
        "",
        "Failures:",
        "  t1 [b] Mismatch: account 0xaa balance: expected 100, actual 99",
        "  t2 [a] Timeout after 50 ms",
        "",
        "Summary:",
        "  a: 1/2 passed (50.0%), mean 2.50 ms, min 1.50 ms, max 3.50 ms, p50 2.50 ms, p95 3.40 ms",
        "  b: 0/1 passed (0.0%), mean 2.00 ms, min 2.00 ms, max 2.00 ms, p50 2.00 ms, p95 2.00 ms",
      ].join("\n"),
    );
  });

  it("shows tool-reported VM time where present and wall-clock otherwise", () => {
    const agg = new BenchmarkAggregator();
    agg.record({
      toolName: "a",
      testId: "t1",
      verdict: { kind: "pass" },
      durationNanos: 4_000_000,
      reportedDurationNanos: 1_250_000,
    });
    agg.record({ toolName: "a", testId: "t2", verdict: { kind: "pass" }, durationNanos: 2_000_000 });
    const report: RunReport = {
      state: "done",
      testCount: 2,
      testIds: ["t1", "t2"],
      toolCount: 1,
      records: agg.getRecords(),
      summaries: agg.getSummaries(["a"]),
      skipped: [],
      cancelled: false,
    };

    expect(formatPrettyReport(report)).toBe(
      [
        "Ran 2 test(s) against 1 tool(s)",
        "",
        "Test  a",
        "t1    1.25 ms (vm)",
        "t2    2.00 ms",
        "(vm) = time reported by the tool; other times are process wall-clock",
        "",
        "Summary:",
        "  a: 2/2 passed (100.0%), mean 3.00 ms, min 2.00 ms, max 4.00 ms, p50 3.00 ms, p95 3.90 ms, " +
          "vm mean 1.25 ms, vm min 1.25 ms, vm max 1.25 ms, vm reported 1/2",
      ].join("\n"),
    );
  });

  it("mentions cancellation and skipped files", () => {
    const report: RunReport = {
      ...sampleReport(),
      cancelled: true,
      skipped: [new MalformedTestVectorError("/v/bad.yml", "duplicate test id 't1'")],
    };
    const lines = formatPrettyReport(report).split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "Ran 2 test(s) against 2 tool(s)",
      "Run cancelled: results are partial",
      "",
      "Skipped 1 malformed file(s):",
      "  /v/bad.yml: duplicate test id 't1'",
    ]);
  });
});

describe("formatJsonReport", () => {
  it("writes summaries keyed by tool and the records", () => {
    const parsed: unknown = JSON.parse(formatJsonReport(sampleReport()));

    expect(parsed).toMatchObject({
      cancelled: false,
      testCount: 2,
      toolCount: 2,
      skipped: [],
      summaries: {
        a: { toolName: "a", count: 2, passCount: 1, passRate: 0.5 },
        b: { toolName: "b", count: 1, passCount: 0, passRate: 0 },
      },
      records: [
        { toolName: "a", testId: "t1", verdict: { kind: "pass" }, durationNanos: 1_500_000 },
        { toolName: "b", testId: "t1" },
        { toolName: "a", testId: "t2", verdict: { kind: "timeout", timeoutMs: 50 } },
      ],
    });
  });
});

describe("formatToolList", () => {
  const tools = [
    { name: "geth", path: "/opt/evm", args: ["--json"], dialect: "json" as const },
    { name: "alt", path: "/opt/alt", args: [], dialect: "text" as const },
  ];

  it("lists one tool per line", () => {
    expect(formatToolList(tools, "pretty")).toBe("geth (json) /opt/evm --json\nalt (text) /opt/alt");
    expect(formatToolList([], "pretty")).toBe("no tools registered");
  });

  it("writes JSON", () => {
    expect(JSON.parse(formatToolList(tools, "json"))).toEqual({ tools });
  });
});
