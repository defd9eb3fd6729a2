import { describe, expect, it } from "vitest";

import { normalizeOutput } from "../src/dialects/index.js";
import { jsonDialect } from "../src/dialects/jsonDialect.js";
import { textDialect } from "../src/dialects/textDialect.js";
import { UnparsableOutputError } from "../src/errors.js";
import { account, exited, nodeTool, state, testCase } from "./helpers.js";

describe("json dialect", () => {
  it("parses post-state, gas, logs and reported time", () => {
    const stdout = JSON.stringify({
      post: { "0xAA": { balance: "0x64", nonce: 1, storage: { "0x00": "0x2a" } } },
      gasUsed: 21000,
      logs: [{ address: "0xAA", topics: ["0xAB"], data: "0x" }],
      timeNanos: 1500,
    });
    const parsed = jsonDialect.parse(stdout);

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    const aa = parsed.value.postState.get("0xaa");
    expect(aa?.balance).toBe(100n);
    expect(aa?.nonce).toBe(1n);
    expect(aa?.code).toBe("0x");
    expect([...(aa?.storage ?? [])]).toEqual([["0x0", "0x2a"]]);
    expect(parsed.value.resourceUsed).toBe(21000n);
    expect(parsed.value.logs).toEqual([{ address: "0xaa", topics: ["0xab"], data: "0x" }]);
    expect(parsed.value.reportedDurationNanos).toBe(1500);
  });

  it("keeps large balances exact", () => {
    const parsed = jsonDialect.parse('{"post":{"0xaa":{"balance":123456789012345678901234567890,"nonce":0}}}');

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.value.postState.get("0xaa")?.balance).toBe(123456789012345678901234567890n);
  });

  it("falls back to the last line when diagnostics precede the result", () => {
    const parsed = jsonDialect.parse('warming up\n{"post":{"0xaa":{"balance":"7","nonce":"0"}}}\n');

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.value.postState.get("0xaa")?.balance).toBe(7n);
    expect(parsed.value.resourceUsed).toBe(0n);
    expect(parsed.value.reportedDurationNanos).toBeUndefined();
  });

  it("rejects empty output", () => {
    expect(jsonDialect.parse("  \n")).toEqual({ ok: false, reason: "no output" });
  });

  it("rejects output that is not an object", () => {
    expect(jsonDialect.parse("garbage")).toEqual({ ok: false, reason: "expected a JSON object on stdout" });
  });

  it("requires a post-state", () => {
    expect(jsonDialect.parse('{"gasUsed":1}')).toEqual({ ok: false, reason: "missing required field 'post'" });
  });

  it("rejects an invalid gasUsed", () => {
    expect(jsonDialect.parse('{"post":{},"gasUsed":"lots"}')).toEqual({
      ok: false,
      reason: 'invalid gasUsed "lots"',
    });
  });

  it("reports invalid addresses with their path", () => {
    const parsed = jsonDialect.parse('{"post":{"0xzz":{"balance":1,"nonce":0}}}');

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.reason).toMatch(/^\$\.post\['0xzz'\]: Invalid address format/);
  });

  it("encodes a one-line JSON request", () => {
    const tc = testCase("t1", state([["0xaa", account(100n)]]), {
      input: new Uint8Array([0x01, 0xff]),
      args: ["--fork", "london"],
    });
    const text = new TextDecoder().decode(jsonDialect.encodeInput(tc));

    expect(text.endsWith("\n")).toBe(true);
    expect(JSON.parse(text)).toEqual({
      id: "t1",
      pre: { "0xaa": { balance: "100", nonce: "0", code: "0x", storage: {} } },
      input: "0x01ff",
      args: ["--fork", "london"],
    });
  });
});

describe("text dialect", () => {
  const sample = [
    "# produced by a stub",
    "account 0xAA balance=100 nonce=1 code=0x6001",
    "storage 0xAA 0x0=0x1 0x1=0x2",
    "",
    "log 0xaa topics=0x01,0x02 data=0xff",
    "gas 21000",
    "vm took 1.25ms",
  ].join("\n");

  it("parses account, storage, log, gas and timing lines", () => {
    const parsed = textDialect.parse(sample);

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    const aa = parsed.value.postState.get("0xaa");
    expect(aa?.balance).toBe(100n);
    expect(aa?.nonce).toBe(1n);
    expect(aa?.code).toBe("0x6001");
    expect([...(aa?.storage ?? [])]).toEqual([
      ["0x0", "0x1"],
      ["0x1", "0x2"],
    ]);
    expect(parsed.value.logs).toEqual([{ address: "0xaa", topics: ["0x01", "0x02"], data: "0xff" }]);
    expect(parsed.value.resourceUsed).toBe(21000n);
    expect(parsed.value.reportedDurationNanos).toBe(1_250_000);
  });

  it("converts every duration unit to nanoseconds", () => {
    const base = "account 0xaa balance=0 nonce=0\n";
    const nanos = (line: string) => {
      const parsed = textDialect.parse(base + line);
      return parsed.ok ? parsed.value.reportedDurationNanos : undefined;
    };

    expect(nanos("vm took 12ns")).toBe(12);
    expect(nanos("vm took 3us")).toBe(3_000);
    expect(nanos("vm took 3µs")).toBe(3_000);
    expect(nanos("vm took 2s")).toBe(2_000_000_000);
  });

  it("requires an account line", () => {
    expect(textDialect.parse("gas 1\n")).toEqual({ ok: false, reason: "no account lines in output" });
  });

  it("rejects storage for an undeclared account", () => {
    expect(textDialect.parse("storage 0xaa 0x0=0x1")).toEqual({
      ok: false,
      reason: "line 1: storage for undeclared account 0xaa",
    });
  });

  it("matches storage to its account whatever the address case", () => {
    const parsed = textDialect.parse("account 0xAA balance=1 nonce=0\nstorage 0xaa 0x1=0x2\n");

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect([...(parsed.value.postState.get("0xaa")?.storage ?? [])]).toEqual([["0x1", "0x2"]]);
  });

  it("rejects addresses that are not hex", () => {
    expect(textDialect.parse("storage constructor 0x0=0x1\n")).toEqual({
      ok: false,
      reason: "line 1: invalid address constructor",
    });
    expect(textDialect.parse("account 0xaa balance=1 nonce=0\nstorage __proto__ 0x0=0x1\n")).toEqual({
      ok: false,
      reason: "line 2: invalid address __proto__",
    });
    expect(textDialect.parse("account toString balance=1 nonce=0\n")).toEqual({
      ok: false,
      reason: "line 1: invalid address toString",
    });
  });

  it("rejects a storage slot named like an object property", () => {
    expect(textDialect.parse("account 0xaa balance=1 nonce=0\nstorage 0xaa __proto__=0x1\n").ok).toBe(false);
  });

  it("rejects unknown log fields", () => {
    expect(textDialect.parse("account 0xaa balance=1 nonce=0\nlog 0xaa topcs=0x01\n")).toEqual({
      ok: false,
      reason: "line 2: unknown log field 'topcs'",
    });
  });

  it("rejects unknown lines", () => {
    expect(textDialect.parse("account 0xaa balance=1 nonce=0\nhello")).toEqual({
      ok: false,
      reason: 'line 2: unrecognized output "hello"',
    });
  });

  it("rejects a missing balance", () => {
    const parsed = textDialect.parse("account 0xaa nonce=0");

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.reason).toBe("$.post['0xaa']: Missing required field 'balance'.");
  });

  it("passes the raw input bytes to the tool", () => {
    const input = new Uint8Array([0x60, 0x01]);
    const tc = testCase("t1", state([]), { input });

    expect(textDialect.encodeInput(tc)).toBe(input);
  });
});

describe("normalizeOutput", () => {
  it("adds process facts to the parsed output", () => {
    const tool = nodeTool("a", "", "text");
    const result = normalizeOutput(
      tool,
      exited("account 0xaa balance=5 nonce=0\n", { exitCode: 1, stderr: "warn", durationNanos: 777 }),
    );

    expect(result.postState.get("0xaa")?.balance).toBe(5n);
    expect(result.rawDurationNanos).toBe(777);
    expect(result.exitCode).toBe(1);
    expect(result.stderrText).toBe("warn");
  });

  it("throws UnparsableOutputError naming the tool", () => {
    const tool = nodeTool("a", "", "json");

    try {
      normalizeOutput(tool, exited(""));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnparsableOutputError);
      expect(err).toMatchObject({ code: "UnparsableOutput", toolName: "a", reason: "no output", stdout: "" });
    }
  });
});
