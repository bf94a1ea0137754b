import fs from "node:fs";
import type { JsonValue } from "@shared/telemetry";
import {
  variableSchemaDocumentSchema,
  type EnumRule,
  type VariableDefinition,
  type VariableSchemaDocument,
} from "@shared/variable-schema";
import { isScalar, normalizeName } from "./json-value";

export const UNKNOWN_VALUE = "Unknown";

export class SchemaLoadError extends Error {
  constructor(message: string, readonly source?: string) {
    super(message);
    this.name = "SchemaLoadError";
  }
}

type IndexedGroup = {
  name: string;
  members: ReadonlySet<string>;
  rules: ReadonlyMap<string, readonly EnumRule[]>;
};

const collectRules = (defs: Record<string, VariableDefinition>): Map<string, readonly EnumRule[]> => {
  const rules = new Map<string, readonly EnumRule[]>();
  for (const [variable, def] of Object.entries(defs)) {
    if (def.oneOf && def.oneOf.length > 0) {
      rules.set(normalizeName(variable), Object.freeze([...def.oneOf]));
    }
  }
  return rules;
};

/**
 * Read-only view over the variable schema file: which variables belong to
 * which group, and how enumerated raw values translate to descriptions.
 *
 * Lookups normalize names (case-insensitive, spaces as underscores) and never
 * throw; construction throws {@link SchemaLoadError} on any inconsistency.
 */
export class SchemaIndex {
  private readonly groups = new Map<string, IndexedGroup>();
  private readonly memberOf = new Map<string, string>();
  private readonly globalRules: ReadonlyMap<string, readonly EnumRule[]>;

  private constructor(doc: VariableSchemaDocument) {
    for (const [name, def] of Object.entries(doc.groups)) {
      const key = normalizeName(name);
      if (this.groups.has(key)) {
        throw new SchemaLoadError(`Duplicate group "${name}"`);
      }
      const names = Array.isArray(def.variables) ? def.variables : Object.keys(def.variables);
      const members = new Set<string>();
      for (const variable of names) {
        const normalized = normalizeName(variable);
        const owner = this.memberOf.get(normalized);
        if (owner && owner !== key) {
          throw new SchemaLoadError(`Variable "${variable}" is declared in both ${owner} and ${key}`);
        }
        this.memberOf.set(normalized, key);
        members.add(normalized);
      }
      const rules = Array.isArray(def.variables) ? new Map<string, readonly EnumRule[]>() : collectRules(def.variables);
      this.groups.set(key, { name, members, rules });
    }
    this.globalRules = collectRules(doc.variables);
  }

  static fromDocument(raw: unknown): SchemaIndex {
    const parsed = variableSchemaDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? issue.path.join(".") : "(root)";
      throw new SchemaLoadError(`Invalid variable schema at ${where}: ${issue?.message ?? "unknown issue"}`);
    }
    return new SchemaIndex(parsed.data);
  }

  static load(filePath: string): SchemaIndex {
    let text: string;
    try {
      text = fs.readFileSync(filePath, "utf8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SchemaLoadError(`Unable to read variable schema: ${message}`, filePath);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SchemaLoadError(`Variable schema is not valid JSON: ${message}`, filePath);
    }
    try {
      return SchemaIndex.fromDocument(raw);
    } catch (error) {
      if (error instanceof SchemaLoadError) {
        throw new SchemaLoadError(error.message, filePath);
      }
      throw error;
    }
  }

  groupNames(): string[] {
    return Array.from(this.groups.values(), (group) => group.name);
  }

  resolveGroup(name: string): ReadonlySet<string> | undefined {
    return this.groups.get(normalizeName(name))?.members;
  }

  groupOf(variable: string): string | undefined {
    const key = this.memberOf.get(normalizeName(variable));
    return key ? this.groups.get(key)?.name : undefined;
  }

  translate(group: string | undefined, variable: string, raw: JsonValue): JsonValue {
    if (!isScalar(raw)) return raw;
    const rules = this.rulesFor(group, variable);
    if (!rules) return raw;
    const exact = rules.find((rule) => rule.const !== undefined && rule.const === raw);
    if (exact) return exact.description ?? UNKNOWN_VALUE;
    const fallback = rules.find((rule) => rule.const === undefined && rule.type !== undefined);
    if (fallback) return fallback.description ?? UNKNOWN_VALUE;
    return UNKNOWN_VALUE;
  }

  private rulesFor(group: string | undefined, variable: string): readonly EnumRule[] | undefined {
    const key = normalizeName(variable);
    if (group) {
      const scoped = this.groups.get(normalizeName(group))?.rules.get(key);
      if (scoped) return scoped;
    }
    const owner = this.memberOf.get(key);
    const owned = owner ? this.groups.get(owner)?.rules.get(key) : undefined;
    return owned ?? this.globalRules.get(key);
  }
}
