import { z } from "zod";

// One entry of a variable's `oneOf` list. `const` makes it an exact-match rule,
// `type` without `const` makes it the fallback for values nothing matched.
export const enumRuleSchema = z
  .object({
    const: z.union([z.string(), z.number(), z.boolean()]).optional(),
    type: z.string().trim().min(1).optional(),
    description: z.string().optional(),
  })
  .refine((rule) => rule.const !== undefined || rule.type !== undefined, {
    message: "rule must declare const or type",
  });
export type EnumRule = z.infer<typeof enumRuleSchema>;

export const variableDefinitionSchema = z.object({
  description: z.string().optional(),
  oneOf: z.array(enumRuleSchema).optional(),
});
export type VariableDefinition = z.infer<typeof variableDefinitionSchema>;

export const groupDefinitionSchema = z.object({
  description: z.string().optional(),
  variables: z.union([
    z.array(z.string().trim().min(1)),
    z.record(variableDefinitionSchema),
  ]),
});

export const variableSchemaDocumentSchema = z.object({
  groups: z.record(groupDefinitionSchema).default({}),
  variables: z.record(variableDefinitionSchema).default({}),
});
export type VariableSchemaDocument = z.infer<typeof variableSchemaDocumentSchema>;
