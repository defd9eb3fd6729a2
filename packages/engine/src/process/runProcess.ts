import { spawn, type ChildProcess } from "node:child_process";
import * as os from "node:os";

import { errnoCode } from "../errors.js";
import type { ToolEntry } from "../registry/toolRegistry.js";
import type { RawOutcome, RunProcessOptions } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_STDOUT_BYTES = 16 * 1024 * 1024;
export const DEFAULT_MAX_STDERR_BYTES = 1024 * 1024;

/** How long to wait for stdio to drain after the child has exited. */
const CLOSE_GRACE_MS = 250;

const USE_PROCESS_GROUPS = process.platform !== "win32";

type Termination =
  | { kind: "timeout" }
  | { kind: "cancelled" }
  | { kind: "failed"; reason: string };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal === null) return 0;
  const signo = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
  return 128 + (signo ?? 0);
}

/**
 * Kill the child's whole process group (POSIX) so grandchildren die with it.
 *
 * Returns false when there was nothing left to kill.
 */
function killProcessGroup(child: ChildProcess): boolean {
  const pid = child.pid;
  if (pid === undefined) return false;

  if (!USE_PROCESS_GROUPS) {
    return child.kill("SIGKILL");
  }

  try {
    process.kill(-pid, "SIGKILL");
    return true;
  } catch (err) {
    if (errnoCode(err) === "ESRCH") return false;
    return child.kill("SIGKILL");
  }
}

class CappedBuffer {
  readonly #chunks: Buffer[] = [];
  #size = 0;
  overflowed = false;

  constructor(readonly maxBytes: number) {}

  /** Append a chunk; returns false once the cap has been hit. */
  push(chunk: Buffer): boolean {
    const remaining = this.maxBytes - this.#size;
    if (chunk.length > remaining) {
      if (remaining > 0) this.#chunks.push(chunk.subarray(0, remaining));
      this.#size = this.maxBytes;
      this.overflowed = true;
      return false;
    }
    this.#chunks.push(chunk);
    this.#size += chunk.length;
    return true;
  }

  text(): string {
    return Buffer.concat(this.#chunks).toString("utf8");
  }
}

/**
 * Run one tool invocation: spawn `<executablePath> <fixedArgs...> <extraArgs...>`,
 * write `input` to its stdin and capture stdout/stderr.
 *
 * Never rejects. Timeout, cancellation and output overflow kill the child's
 * process group; in every case the promise settles only after the child has
 * exited (or never started) and its stdio streams are closed. A non-zero exit
 * code is reported, not treated as a failure.
 */
export async function runProcess(
  tool: ToolEntry,
  input: Uint8Array,
  opts: RunProcessOptions = {},
): Promise<RawOutcome> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const signal = opts.signal;

  if (signal?.aborted) {
    return { kind: "cancelled", durationNanos: 0, pid: undefined };
  }

  const args = [...tool.fixedArgs, ...(opts.extraArgs ?? [])];
  const stdout = new CappedBuffer(opts.maxStdoutBytes ?? DEFAULT_MAX_STDOUT_BYTES);
  const stderr = new CappedBuffer(opts.maxStderrBytes ?? DEFAULT_MAX_STDERR_BYTES);
  const start = process.hrtime.bigint();
  const elapsed = (): number => Number(process.hrtime.bigint() - start);

  return await new Promise<RawOutcome>((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(tool.executablePath, args, {
        stdio: ["pipe", "pipe", "pipe"],
        detached: USE_PROCESS_GROUPS,
        windowsHide: true,
        ...(opts.cwd === undefined ? {} : { cwd: opts.cwd }),
        ...(opts.env === undefined ? {} : { env: opts.env }),
      });
    } catch (err) {
      resolve({
        kind: "failed",
        reason: `spawn failed: ${errorMessage(err)}`,
        stdout: "",
        stderr: "",
        durationNanos: elapsed(),
        pid: undefined,
      });
      return;
    }

    let settled = false;
    let termination: Termination | undefined;
    let exitedAt: number | undefined;
    let graceTimer: NodeJS.Timeout | undefined;

    const destroyStdio = (): void => {
      child.stdin?.destroy();
      child.stdout?.destroy();
      child.stderr?.destroy();
    };

    const cleanup = (): void => {
      clearTimeout(timer);
      clearTimeout(graceTimer);
      signal?.removeEventListener("abort", onAbort);
      child.stdout?.removeAllListeners("data");
      child.stderr?.removeAllListeners("data");
      child.removeAllListeners();
      destroyStdio();
    };

    const finish = (outcome: RawOutcome): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(outcome);
    };

    const terminate = (t: Termination): void => {
      if (termination !== undefined || exitedAt !== undefined) return;
      termination = t;
      clearTimeout(timer);
      killProcessGroup(child);
    };

    const onAbort = (): void => terminate({ kind: "cancelled" });

    const timer = setTimeout(() => terminate({ kind: "timeout" }), timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout?.on("data", (chunk: Buffer) => {
      if (!stdout.push(chunk)) {
        terminate({ kind: "failed", reason: `stdout exceeded ${stdout.maxBytes} bytes` });
      }
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      if (!stderr.push(chunk)) {
        terminate({ kind: "failed", reason: `stderr exceeded ${stderr.maxBytes} bytes` });
      }
    });

    child.on("error", (err) => {
      if (child.pid === undefined) {
        // Never started: nothing to reap.
        finish({
          kind: "failed",
          reason: `spawn failed: ${err.message}`,
          stdout: "",
          stderr: "",
          durationNanos: elapsed(),
          pid: undefined,
        });
        return;
      }
      terminate({ kind: "failed", reason: `child process error: ${err.message}` });
    });

    child.on("exit", () => {
      exitedAt = elapsed();
      clearTimeout(timer);
      // Sweep anything the tool left behind in its group.
      if (USE_PROCESS_GROUPS) killProcessGroup(child);
      graceTimer = setTimeout(destroyStdio, CLOSE_GRACE_MS);
    });

    child.on("close", (code, sig) => {
      const durationNanos = exitedAt ?? elapsed();
      const pid = child.pid ?? -1;

      if (termination === undefined && (stdout.overflowed || stderr.overflowed)) {
        termination = {
          kind: "failed",
          reason: stdout.overflowed
            ? `stdout exceeded ${stdout.maxBytes} bytes`
            : `stderr exceeded ${stderr.maxBytes} bytes`,
        };
      }

      if (termination === undefined) {
        finish({
          kind: "exited",
          stdout: stdout.text(),
          stderr: stderr.text(),
          exitCode: code ?? signalExitCode(sig),
          signal: sig,
          durationNanos,
          pid,
        });
        return;
      }

      switch (termination.kind) {
        case "timeout":
          finish({
            kind: "timeout",
            stdout: stdout.text(),
            stderr: stderr.text(),
            timeoutMs,
            durationNanos,
            pid,
          });
          return;
        case "cancelled":
          finish({ kind: "cancelled", durationNanos, pid });
          return;
        case "failed":
          finish({
            kind: "failed",
            reason: termination.reason,
            stdout: stdout.text(),
            stderr: stderr.text(),
            durationNanos,
            pid,
          });
          return;
      }
    });

    // A tool may exit without reading its input; a broken pipe is not an error.
    child.stdin?.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EPIPE" || err.code === "ERR_STREAM_DESTROYED") return;
      terminate({ kind: "failed", reason: `failed to write stdin: ${err.message}` });
    });
    child.stdin?.end(Buffer.from(input.buffer, input.byteOffset, input.byteLength));
  });
}
