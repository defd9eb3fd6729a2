import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger } from "pino";

export interface CreateLoggerOptions {
  readonly level?: LevelWithSilent;
  /** Logger name (shows up as `name` on every line). */
  readonly name?: string;
  /** Destination stream; defaults to stderr so stdout stays free for reports. */
  readonly destination?: NodeJS.WritableStream;
}

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

/** Narrow an arbitrary string (e.g. from the environment) to a pino level. */
export function parseLogLevel(value: string | undefined, fallback: LevelWithSilent = "info"): LevelWithSilent {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? "info",
      name: options.name ?? "vmparity",
    },
    options.destination ?? process.stderr,
  );
}

/** Logger that drops everything; the default for library callers. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
