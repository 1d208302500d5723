/** Narrowing helpers for loosely-typed harness output. */
export function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : {};
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/** Problem-class names allowed in receipts: alphanumeric start, then [A-Za-z0-9_.:-]. */
export function toProblemClass(name: string): string {
  const cleaned = name.trim().replace(/[^A-Za-z0-9_.:-]+/g, "_").replace(/^[^A-Za-z0-9]+/, "");
  return cleaned.length > 0 ? cleaned : "unnamed";
}
