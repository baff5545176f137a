import { SerializationError } from "../errors";
import { JsonObject, JsonValue } from "../types";

const reduce = (value: unknown, path: string, ancestors: Set<object>): JsonValue | undefined => {
  if (value === null) return null;

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "bigint":
      return value.toString();
    case "undefined":
    case "function":
    case "symbol":
      return undefined;
    default:
      break;
  }

  if (typeof value !== "object") {
    throw new SerializationError(`Unsupported value of type ${typeof value}`, path);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationError("Invalid date", path);
    }
    return value.toISOString();
  }

  if (ancestors.has(value)) {
    throw new SerializationError("Circular reference", path);
  }

  ancestors.add(value);
  try {
    if (value instanceof Error) {
      const reduced: JsonObject = { name: value.name, message: value.message };
      if (value.stack) reduced.stack = value.stack;
      return reduced;
    }

    if (Array.isArray(value)) {
      return value.map((item, index) => reduce(item, `${path}[${index}]`, ancestors) ?? null);
    }

    if (value instanceof Set) {
      return [...value].map((item, index) => reduce(item, `${path}[${index}]`, ancestors) ?? null);
    }

    if (value instanceof Map) {
      const reduced: JsonObject = {};
      for (const [key, item] of value) {
        const next = reduce(item, `${path}.${String(key)}`, ancestors);
        if (next !== undefined) reduced[String(key)] = next;
      }
      return reduced;
    }

    const reduced: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      const next = reduce(item, `${path}.${key}`, ancestors);
      if (next !== undefined) reduced[key] = next;
    }
    return reduced;
  } finally {
    ancestors.delete(value);
  }
};

/** Reduces any value to JSON data: dates become ISO strings, maps become objects, sets become arrays. Throws on cycles. */
export const toJsonValue = (value: unknown): JsonValue => reduce(value, "$", new Set()) ?? null;

export const toJsonObject = (value: Record<string, unknown>): JsonObject => {
  const reduced = toJsonValue(value);
  if (reduced === null || typeof reduced !== "object" || Array.isArray(reduced)) {
    throw new SerializationError("Expected an object", "$");
  }
  return reduced;
};

export const safeSerialize = <F>(value: unknown, fallback: (error: unknown) => F): JsonValue | F => {
  try {
    return toJsonValue(value);
  } catch (error: unknown) {
    return fallback(error);
  }
};
