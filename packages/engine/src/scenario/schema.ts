import { z } from "zod";

// YAML turns `key:` with no value into null; treat that the same as an absent key.
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

export const contextEntryDocumentSchema = z.object({
  ContextKeyName: z.string().min(1),
  ContextKeyValues: optional(z.array(scalar)),
  ContextKeyType: z.string().min(1),
});

export const testCaseDocumentSchema = z.object({
  name: optional(z.string()),
  action: optional(z.string()),
  actions: optional(z.array(z.string())),
  resource: optional(z.string()),
  resources: optional(z.array(z.string())),
  context: optional(z.array(contextEntryDocumentSchema)),
  resource_policy_template: optional(z.string()),
  resource_policy_json: optional(z.string()),
  caller_arn: optional(z.string()),
  resource_owner: optional(z.string()),
  resource_handling_option: optional(z.string()),
  expect: z.string().min(1),
});

export const scenarioDocumentSchema = z.object({
  extends: optional(z.string()),
  vars_file: optional(z.string()),
  vars: optional(z.record(z.unknown())),
  policy_template: optional(z.string()),
  policy_json: optional(z.string()),
  resource_policy_template: optional(z.string()),
  resource_policy_json: optional(z.string()),
  caller_arn: optional(z.string()),
  resource_owner: optional(z.string()),
  resource_handling_option: optional(z.string()),
  scp_paths: optional(z.array(z.string())),
  context: optional(z.array(contextEntryDocumentSchema)),
  actions: optional(z.array(z.string())),
  resources: optional(z.array(z.string())),
  expect: optional(z.record(z.string())),
  tests: optional(z.array(testCaseDocumentSchema)),
});

export type ContextEntryDocument = z.output<typeof contextEntryDocumentSchema>;
export type TestCaseDocument = z.output<typeof testCaseDocumentSchema>;
export type ScenarioDocument = z.output<typeof scenarioDocumentSchema>;

export const describeIssues = (error: z.ZodError): ReadonlyArray<string> =>
  error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(document)";
    return `${where}: ${issue.message}`;
  });
