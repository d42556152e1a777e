/**
 * Stable canonical JSON: object keys sorted at every depth, no whitespace.
 * Used for message and envelope hashing.
 */
export function stableCanonicalize(obj: unknown): string {
  if (obj === null || obj === undefined) return "null";
  if (typeof obj === "string" || typeof obj === "number" || typeof obj === "boolean")
    return JSON.stringify(obj);
  if (Array.isArray(obj)) {
    const items = obj.map((item) => stableCanonicalize(item));
    return `[${items.join(",")}]`;
  }
  if (typeof obj === "object") {
    const pairs = Object.entries(obj)
      .filter(([, value]) => value !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => `${JSON.stringify(key)}:${stableCanonicalize(value)}`);
    return `{${pairs.join(",")}}`;
  }
  return JSON.stringify(String(obj));
}
