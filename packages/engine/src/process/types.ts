/** Options for {@link runProcess}. */
export interface RunProcessOptions {
  /** Hard wall-clock limit for the child (ms). */
  readonly timeoutMs?: number;
  /** Per-test arguments appended after the tool's fixed arguments. */
  readonly extraArgs?: readonly string[];
  /** Cancels the invocation; the child's process group is killed. */
  readonly signal?: AbortSignal;
  readonly maxStdoutBytes?: number;
  readonly maxStderrBytes?: number;
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
}

/** The child ran to completion (any exit code). */
export interface ExitedOutcome {
  readonly kind: "exited";
  readonly stdout: string;
  readonly stderr: string;
  /** Exit status; `128 + signo` when the child died from a signal. */
  readonly exitCode: number;
  readonly signal: NodeJS.Signals | null;
  readonly durationNanos: number;
  readonly pid: number;
}

/** The child exceeded its time limit and was killed. */
export interface TimeoutOutcome {
  readonly kind: "timeout";
  readonly stdout: string;
  readonly stderr: string;
  readonly timeoutMs: number;
  readonly durationNanos: number;
  readonly pid: number;
}

/** The child could not be started or driven (spawn error, output over the cap, broken stdin). */
export interface FailedOutcome {
  readonly kind: "failed";
  readonly reason: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationNanos: number;
  readonly pid: number | undefined;
}

/** The invocation was cancelled by the caller. */
export interface CancelledOutcome {
  readonly kind: "cancelled";
  readonly durationNanos: number;
  readonly pid: number | undefined;
}

export type RawOutcome = ExitedOutcome | TimeoutOutcome | FailedOutcome | CancelledOutcome;
