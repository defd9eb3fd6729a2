import {
  validateLogs,
  validateStateMap,
  type LogEntry,
  type StateMap,
  type ValidationError,
} from "@vmparity/vectors";

function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors.map((e) => `${e.path}: ${e.message}`).join("; ");
}

/**
 * Validate a tool-reported post-state and log list with the same rules the
 * test vectors use, so both sides share one canonical form.
 */
export function readStateAndLogs(
  post: unknown,
  logs: unknown,
): { ok: true; postState: StateMap; logs: LogEntry[] } | { ok: false; reason: string } {
  const errors: ValidationError[] = [];
  const postState = validateStateMap(post, errors, ["post"]);
  const parsedLogs = logs === undefined ? [] : validateLogs(logs, errors, ["logs"]);

  if (errors.length > 0) {
    return { ok: false, reason: formatValidationErrors(errors) };
  }
  return { ok: true, postState, logs: parsedLogs };
}
