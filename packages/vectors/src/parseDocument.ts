import { isMap, isNode, isScalar, parseDocument } from "yaml";

import { MalformedTestVectorError } from "./errors.js";
import type { TestCase } from "./types.js";
import { validateTestCase } from "./validate.js";

function formatErrors(errors: readonly { path: string; message: string }[]): string {
  return errors.map((e) => `${e.path}: ${e.message}`).join("; ");
}

/**
 * Parse one test-vector document (YAML or JSON text) into test cases.
 *
 * The top level is a mapping of test id to definition. Scalars are read with
 * the YAML failsafe schema, so every value arrives as a string: quantities
 * never lose precision and `0x..` keys are never coerced into integers.
 *
 * Throws {@link MalformedTestVectorError} on the first structural problem;
 * a document either yields all of its cases or none.
 */
export function parseTestVectorDocument(text: string, sourcePath: string): TestCase[] {
  const doc = parseDocument(text, { schema: "failsafe", uniqueKeys: false, prettyErrors: false });

  const firstError = doc.errors[0];
  if (firstError !== undefined) {
    throw new MalformedTestVectorError(sourcePath, `invalid YAML/JSON: ${firstError.message}`);
  }

  const contents = doc.contents;
  if (!isMap(contents)) {
    throw new MalformedTestVectorError(
      sourcePath,
      "top level must be a mapping of test id to test definition",
    );
  }

  const seen = new Set<string>();
  const cases: TestCase[] = [];

  for (const pair of contents.items) {
    if (!isScalar(pair.key)) {
      throw new MalformedTestVectorError(sourcePath, "test ids must be scalar strings");
    }

    const id = String(pair.key.value);
    if (seen.has(id)) {
      throw new MalformedTestVectorError(sourcePath, `duplicate test id '${id}'`);
    }
    seen.add(id);

    const value: unknown = isNode(pair.value) ? pair.value.toJS(doc) : pair.value;
    const result = validateTestCase(id, value, sourcePath);
    if (!result.ok) {
      throw new MalformedTestVectorError(sourcePath, formatErrors(result.errors));
    }
    cases.push(result.value);
  }

  return cases;
}
