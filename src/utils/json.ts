import { JsonValue } from "../db/types";

const INDENT = 2;

export type JsonObjectLike = { [key: string]: unknown };

export function isJsonObject(value: unknown): value is JsonObjectLike {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Plain assignment of "__proto__" replaces the prototype instead of adding a
 * field; parsed documents can carry that key as an ordinary member.
 */
export function setOwnProperty<T extends object>(target: T, key: string, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true
  });
}

/** Rebuilds a value with every object's keys sorted, dropping undefined members. */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isJsonObject(value)) {
    const sorted: JsonObjectLike = {};
    for (const key of Object.keys(value).sort()) {
      if (value[key] !== undefined) setOwnProperty(sorted, key, sortKeys(value[key]));
    }
    return sorted;
  }
  return value;
}

/**
 * Serializes a metadata document the way the video repository stores it:
 * sorted keys, two-space indentation, non-ASCII escaped as \uXXXX and a
 * trailing newline. Identical input always yields identical bytes, so git
 * diffs of a re-scraped event only show real changes.
 * @param value The document to serialize
 * @returns The file content
 */
export function serializeJson(value: JsonObjectLike): string {
  const text = JSON.stringify(sortKeys(value), null, INDENT);
  return (
    text.replace(
      /[\u0080-\uffff]/g,
      (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`
    ) + "\n"
  );
}
