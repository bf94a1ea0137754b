import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const stateIngestSchema = z.object({
  timestamp: z.string().nullish(),
  data: jsonObjectSchema,
});
export type StateIngest = z.infer<typeof stateIngestSchema>;

export type StateIngestResponse = {
  status: "updated";
  updated_keys: string[];
};

export type StateResponse = {
  last_updated: string | null;
  data: JsonObject;
};

export type GroupStateResponse = StateResponse & {
  group: string;
};

export type KeyStateResponse = {
  last_updated: string | null;
  path: string;
  value: JsonValue;
};

export type GroupListResponse = {
  last_updated: string | null;
  schema_groups: string[];
  inferred_groups: string[];
};
