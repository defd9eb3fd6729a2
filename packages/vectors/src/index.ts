export type {
  AccountState,
  Address,
  Hex,
  LogEntry,
  StateMap,
  TestCase,
  ValidationError,
  ValidationResult,
} from "./types.js";

export { MalformedTestVectorError, NoTestCasesFoundError } from "./errors.js";
export {
  hexToInput,
  inputToHex,
  parseAddress,
  parseHexData,
  parseQuantity,
  quantityToHex,
} from "./hex.js";
export { validateLogs, validateStateMap, validateTestCase } from "./validate.js";
export { parseTestVectorDocument } from "./parseDocument.js";
export type { LoadTestVectorsOptions, LoadTestVectorsResult } from "./load.js";
export { loadTestVectors, TEST_VECTOR_EXTENSIONS } from "./load.js";
export type { PathSegment } from "./utils.js";
export { formatPath, isRecord } from "./utils.js";
