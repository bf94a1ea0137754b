import type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from "@shared/telemetry";

export type JsonKind = "null" | "boolean" | "number" | "string" | "array" | "object";

export type TaggedJson =
  | { kind: "null"; value: null }
  | { kind: "boolean"; value: boolean }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "array"; value: JsonArray }
  | { kind: "object"; value: JsonObject };

export const tag = (value: JsonValue): TaggedJson => {
  if (value === null) return { kind: "null", value };
  if (Array.isArray(value)) return { kind: "array", value };
  switch (typeof value) {
    case "boolean":
      return { kind: "boolean", value };
    case "number":
      return { kind: "number", value };
    case "string":
      return { kind: "string", value };
    default:
      return { kind: "object", value };
  }
};

export const kindOf = (value: JsonValue): JsonKind => tag(value).kind;

export const isJsonObject = (value: JsonValue): value is JsonObject => kindOf(value) === "object";

export const isScalar = (value: JsonValue): value is JsonPrimitive => {
  const kind = kindOf(value);
  return kind !== "array" && kind !== "object";
};

/** Upper-cased and trimmed; each inner whitespace character becomes `_`. */
export const normalizeName = (name: string): string => name.trim().replace(/\s/g, "_").toUpperCase();
