import type { JsonObject, JsonValue } from "@shared/telemetry";
import { BadRequestError, NotFoundError } from "../errors";
import { isJsonObject, normalizeName, tag } from "./json-value";
import type { SchemaIndex } from "./schema-index";

const INDEX_PATTERN = /^-?\d+$/;

// `path` is null only for the snapshot root, so an empty-string key still gets its own prefix.
const flattenInto = (path: string | null, value: JsonValue, out: Record<string, JsonValue>): void => {
  const tagged = tag(value);
  switch (tagged.kind) {
    case "object": {
      const entries = Object.entries(tagged.value);
      if (entries.length === 0 && path !== null) {
        out[path] = tagged.value;
        return;
      }
      for (const [key, child] of entries) {
        flattenInto(path === null ? key : `${path}.${key}`, child, out);
      }
      return;
    }
    case "array": {
      const prefix = path ?? "";
      if (tagged.value.length === 0) {
        out[prefix] = tagged.value;
        return;
      }
      tagged.value.forEach((child, index) => flattenInto(`${prefix}[${index}]`, child, out));
      return;
    }
    default:
      out[path ?? ""] = tagged.value;
  }
};

/** `{ a: { b: [1, 2] } }` becomes `{ "a.b[0]": 1, "a.b[1]": 2 }`. */
export const flatten = (data: JsonObject): Record<string, JsonValue> => {
  const out: Record<string, JsonValue> = {};
  flattenInto(null, data, out);
  return out;
};

/**
 * Everything the snapshot holds for `name`: declared members of the schema
 * group, a top-level key equal to the name, and every `<name>_*` top-level key.
 * Scalars are translated through the schema; a matching mapping comes back raw.
 */
export const byGroup = (data: JsonObject, schema: SchemaIndex, name: string): JsonObject => {
  const wanted = normalizeName(name);
  const prefix = `${wanted}_`;
  const members = schema.resolveGroup(name);
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(data)) {
    const normalized = normalizeName(key);
    if (normalized === wanted && isJsonObject(value)) {
      result[key] = value;
    } else if (members?.has(normalized) || normalized === wanted || normalized.startsWith(prefix)) {
      result[key] = schema.translate(name, key, value);
    }
  }
  return result;
};

const resolveKey = (obj: JsonObject, segment: string): string | undefined => {
  if (Object.prototype.hasOwnProperty.call(obj, segment)) return segment;
  const lowered = segment.toLowerCase();
  return Object.keys(obj).find((key) => key.toLowerCase() === lowered);
};

export const byPath = (data: JsonObject, schema: SchemaIndex, segments: string[]): JsonValue => {
  if (segments.length === 0) {
    throw new BadRequestError("Path must contain at least one segment");
  }
  let current: JsonValue = data;
  let leafKey = segments[0];
  const walked: string[] = [];
  for (const segment of segments) {
    walked.push(segment);
    const tagged = tag(current);
    if (tagged.kind === "object") {
      const key = resolveKey(tagged.value, segment);
      if (key === undefined) {
        throw new NotFoundError(`Key not found: ${walked.join("/")}`);
      }
      leafKey = key;
      current = tagged.value[key];
    } else if (tagged.kind === "array") {
      if (!INDEX_PATTERN.test(segment)) {
        throw new BadRequestError(`Sequence index must be an integer: ${walked.join("/")}`);
      }
      const index = Number(segment);
      if (index < 0 || index >= tagged.value.length) {
        throw new NotFoundError(`Index out of range: ${walked.join("/")}`);
      }
      current = tagged.value[index];
    } else {
      throw new NotFoundError(`Cannot descend into a scalar value: ${walked.join("/")}`);
    }
  }
  if (segments.length === 1) {
    return schema.translate(schema.groupOf(leafKey), leafKey, current);
  }
  return current;
};

export type GroupListing = {
  schemaGroups: string[];
  inferredGroups: string[];
};

export const listGroups = (data: JsonObject, schema: SchemaIndex): GroupListing => {
  const inferred = new Set<string>();
  for (const [key, value] of Object.entries(data)) {
    if (isJsonObject(value)) {
      inferred.add(key);
    } else {
      inferred.add(key.split("_")[0]);
    }
  }
  return {
    schemaGroups: schema.groupNames(),
    inferredGroups: Array.from(inferred).sort(),
  };
};
