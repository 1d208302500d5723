/**
 * Canonical JSON serialization: mapping keys sorted by code unit at every level,
 * no insignificant whitespace, array order kept. Two implementations given the
 * same values produce byte-identical output.
 *
 * Objects are written key by key rather than through JSON.stringify, which would
 * move integer-like keys ("10", "9") ahead of the others in numeric order.
 */
export function canonicalSerialize(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (value instanceof ExactNumber) return value.text;

  switch (typeof value) {
    case "number":
      // Infinity, -Infinity, NaN
      return Number.isFinite(value) ? JSON.stringify(value) : JSON.stringify(String(value));
    case "bigint":
      return JSON.stringify(`${value.toString()}n`);
    case "string":
    case "boolean":
      return JSON.stringify(value);
    case "object":
      break;
    default:
      return "null";
  }

  if (value instanceof Date) return JSON.stringify(value.toISOString());
  if (Array.isArray(value)) return `[${value.map(canonicalSerialize).join(",")}]`;
  if (value instanceof Set) return `[${[...value].map(canonicalSerialize).join(",")}]`;

  const entries: Array<[string, unknown]> =
    value instanceof Map ? [...value.entries()].map(([k, v]) => [String(k), v]) : Object.entries(value);

  const members = entries
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalSerialize(v)}`);
  return `{${members.join(",")}}`;
}

/** A number carried as its decimal text, for values a double cannot hold exactly. */
export class ExactNumber {
  constructor(readonly text: string) {}
}

const DECIMAL = /^([-+]?)(\d*)(?:\.(\d*))?(?:[eE]([-+]?\d+))?$/;

/**
 * Canonical text of a decimal literal: one spelling per value, so "100", "1e2"
 * and "100.0" agree while digits past double precision still count.
 * Returns null when the text is not a decimal literal.
 */
export function canonicalDecimal(text: string): string | null {
  const m = DECIMAL.exec(text);
  if (!m) return null;
  const [, sign, intPart = "", fracPart = ""] = m;
  if (intPart === "" && fracPart === "") return null;

  let digits = (intPart + fracPart).replace(/^0+/, "");
  if (digits === "") return "0";
  let exponent = Number(m[4] ?? "0") - fracPart.length;
  const trimmed = digits.replace(/0+$/, "");
  exponent += digits.length - trimmed.length;
  digits = trimmed;

  const neg = sign === "-" ? "-" : "";
  if (exponent >= 0) {
    return exponent <= 21 ? `${neg}${digits}${"0".repeat(exponent)}` : `${neg}${digits}e${exponent}`;
  }
  const point = digits.length + exponent;
  if (point > 0) return `${neg}${digits.slice(0, point)}.${digits.slice(point)}`;
  if (point > -7) return `${neg}0.${"0".repeat(-point)}${digits}`;
  return `${neg}${digits}e${exponent}`;
}
