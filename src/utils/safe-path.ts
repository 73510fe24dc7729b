/**
 * Safe-path lookup into parsed JSON
 *
 * Each step must find the container it expects: a string key needs a plain
 * object that owns the key, an integer index needs an array long enough.
 * The first mismatch returns the fallback; nothing here throws.
 */

export type PathSegment = string | number;

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function step(current: unknown, segment: PathSegment): { found: boolean; value: unknown } {
  if (typeof segment === "number") {
    if (
      Array.isArray(current) &&
      Number.isInteger(segment) &&
      segment >= 0 &&
      segment < current.length
    ) {
      return { found: true, value: current[segment] };
    }
    return { found: false, value: undefined };
  }

  if (isObject(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
    return { found: true, value: current[segment] };
  }
  return { found: false, value: undefined };
}

/**
 * Descend through `path`; null and undefined leaves also yield the fallback.
 */
export function safeGet(
  value: unknown,
  path: readonly PathSegment[],
  fallback: unknown = undefined
): unknown {
  let current = value;

  for (const segment of path) {
    const next = step(current, segment);
    if (!next.found) {
      return fallback;
    }
    current = next.value;
  }

  return current ?? fallback;
}

/**
 * Lookup rendered as a table cell: strings pass through, finite numbers and
 * booleans are stringified, anything else is "".
 */
export function safeString(value: unknown, path: readonly PathSegment[] = []): string {
  const found = safeGet(value, path);

  if (typeof found === "string") {
    return found;
  }
  if (typeof found === "number" && Number.isFinite(found)) {
    return String(found);
  }
  if (typeof found === "boolean") {
    return String(found);
  }
  return "";
}

export function safeArray(value: unknown, path: readonly PathSegment[] = []): unknown[] {
  const found = safeGet(value, path);
  return Array.isArray(found) ? found : [];
}

export function safeObject(value: unknown, path: readonly PathSegment[] = []): JsonObject {
  const found = safeGet(value, path);
  return isObject(found) ? found : {};
}
