export type { ClassifiableOutcome, ClassifiedOutcome } from "./classify.js";
export { classifyOutcome } from "./classify.js";
export { compareResult, findDivergences } from "./compare.js";
export { bigintReplacer, formatVerdict } from "./format.js";
export type {
  CompareOptions,
  LogOrder,
  MismatchDetail,
  MismatchScope,
  Verdict,
  VerdictKind,
} from "./types.js";
export { isLogOrder, LOG_ORDERS, VERDICT_KINDS } from "./types.js";
