import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { MalformedTestVectorError, NoTestCasesFoundError } from "../src/errors.js";
import { loadTestVectors } from "../src/load.js";

function vector(id: string, balance: number): string {
  return JSON.stringify({
    [id]: {
      pre: { "0xaa": { balance: String(balance), nonce: "0" } },
      input: "0x00",
      post: { "0xaa": { balance: String(balance), nonce: "1" } },
    },
  });
}

async function makeTree(files: Record<string, string>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "vmparity-vectors-"));
  for (const [rel, text] of Object.entries(files)) {
    const filePath = path.join(dir, rel);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, text, "utf8");
  }
  return dir;
}

describe("loadTestVectors", () => {
  it("loads a single file", async () => {
    const dir = await makeTree({ "one.json": vector("t1", 100) });

    const result = await loadTestVectors(path.join(dir, "one.json"));

    expect(result.cases.map((c) => c.id)).toEqual(["t1"]);
    expect(result.skipped).toEqual([]);
  });

  it("walks directories recursively in sorted path order", async () => {
    const dir = await makeTree({
      "b/second.yml": vector("t2", 2),
      "a.json": vector("t1", 1),
      "c/d/third.yaml": vector("t3", 3),
      "notes.txt": "not a vector",
    });

    const result = await loadTestVectors(dir);

    expect(result.cases.map((c) => c.id)).toEqual(["t1", "t2", "t3"]);
    expect(result.cases.map((c) => path.relative(dir, c.sourcePath))).toEqual([
      "a.json",
      path.join("b", "second.yml"),
      path.join("c", "d", "third.yaml"),
    ]);
  });

  it("skips malformed files without failing the whole load", async () => {
    const dir = await makeTree({
      "good.json": vector("t1", 1),
      "bad.json": '{"t9": {"pre": {}, "input": "0x"}}',
    });
    const reported: MalformedTestVectorError[] = [];

    const result = await loadTestVectors(dir, { onMalformed: (e) => reported.push(e) });

    expect(result.cases.map((c) => c.id)).toEqual(["t1"]);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0]?.sourcePath).toBe(path.join(dir, "bad.json"));
    expect(result.skipped[0]?.reason).toBe("$.t9: Missing required field 'post'.");
    expect(reported).toEqual(result.skipped);
  });

  it("keeps a later file's reused test id under its relative path", async () => {
    const dir = await makeTree({
      "a.json": vector("t1", 1),
      "sub/b.json": vector("t1", 2),
    });

    const result = await loadTestVectors(dir);

    expect(result.skipped).toEqual([]);
    expect(result.cases.map((c) => [c.id, c.sourcePath])).toEqual([
      ["t1", path.join(dir, "a.json")],
      ["sub/b.json@t1", path.join(dir, "sub", "b.json")],
    ]);
  });

  it("honours ignore prefixes during discovery", async () => {
    const dir = await makeTree({
      "vmInputLimits.json": vector("limits", 1),
      "arith.json": vector("add", 1),
    });

    const result = await loadTestVectors(dir, { ignorePrefixes: ["vmInputLimits"] });

    expect(result.cases.map((c) => c.id)).toEqual(["add"]);
  });

  it("fails with NoTestCasesFound when nothing loads", async () => {
    const dir = await makeTree({ "bad.json": "[]" });

    const err = await loadTestVectors(dir).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NoTestCasesFoundError);
    if (!(err instanceof NoTestCasesFoundError)) return;
    expect(err.code).toBe("NoTestCasesFound");
    expect(err.skipped).toHaveLength(1);
  });

  it("fails with NoTestCasesFound for a missing path", async () => {
    await expect(loadTestVectors(path.join(os.tmpdir(), "vmparity-does-not-exist"))).rejects.toBeInstanceOf(
      NoTestCasesFoundError,
    );
  });

  it("is a pure function of its input", async () => {
    const dir = await makeTree({ "a.json": vector("t1", 1), "b.yml": vector("t2", 5) });

    const first = await loadTestVectors(dir);
    const second = await loadTestVectors(dir);

    expect(second.cases).toEqual(first.cases);
  });
});
