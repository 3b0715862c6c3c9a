import { MalformedInputError } from "./errors";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseToken(token: string, position: number): number {
  const trimmed = token.trim();
  if (!DECIMAL.test(trimmed)) {
    throw new MalformedInputError(`Value at position ${position} is not numeric: "${token}"`);
  }
  return Number(trimmed);
}

/**
 * Parse the `q` query parameter, a list rendered as text such as `"[1.2,3.4,5.6]"`.
 *
 * Brackets are stripped from the first and last tokens only and are not required:
 * `"[1.0,2.0"` and `"1,2"` both parse as `[1, 2]`.
 */
export function parseFeatureVector(raw: string, expectedLength?: number): number[] {
  const tokens = raw.split(",");
  const last = tokens.length - 1;

  const values = tokens.map((token, i) => {
    let value = token;
    if (i === 0) value = value.slice(value.lastIndexOf("[") + 1);
    if (i === last) {
      const close = value.indexOf("]");
      if (close !== -1) value = value.slice(0, close);
    }
    return parseToken(value, i);
  });

  if (expectedLength !== undefined && values.length !== expectedLength) {
    throw new MalformedInputError(
      `Expected ${expectedLength} values, received ${values.length}`
    );
  }

  return values;
}
