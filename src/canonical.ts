/**
 * Canonical JSON for capsules: object keys sorted by code point, no
 * whitespace between tokens, minimal string escaping. Two capsules carrying
 * the same data always serialize to the same bytes.
 */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue | undefined };

export function canonicalJson(value: JsonValue): string {
  if (value === null) {
    return "null";
  }

  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new RangeError(`canonicalJson: cannot encode ${value}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }

  if (isJsonArray(value)) {
    return "[" + value.map((item) => canonicalJson(item)).join(",") + "]";
  }

  const pairs: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const member = value[key];
    // Absent optional fields are omitted, as JSON.stringify does.
    if (member === undefined) {
      continue;
    }
    pairs.push(JSON.stringify(key) + ":" + canonicalJson(member));
  }
  return "{" + pairs.join(",") + "}";
}

function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value);
}
