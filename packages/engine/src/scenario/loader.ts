import { dirname, resolve } from "node:path";

import { parse as parseYaml } from "yaml";

import {
  ErrorCodes,
  type FileSystemPort,
  type IamSpecError,
  type PolicyRef,
  type Result,
  type Scenario,
  type TestCase,
  type VariableBindings,
} from "@iamspec/contracts";
import { silentLogger, type IamSpecLogger } from "@iamspec/telemetry";

import { capture, configurationError, createError, fail, sourceNotFound, unwrap } from "../errors.js";
import { nonEmpty } from "../utils.js";
import { buildVariableBindings } from "../variables/bindings.js";
import { renderStrings, renderTemplate } from "../variables/template.js";
import { renderContextEntries } from "./context.js";
import { mergeScenarioDocuments } from "./merge.js";
import {
  describeIssues,
  scenarioDocumentSchema,
  type ScenarioDocument,
  type TestCaseDocument,
} from "./schema.js";

export interface LoadScenarioOptions {
  readonly fileSystem: FileSystemPort;
  readonly logger?: IamSpecLogger;
}

export interface ResolvedScenarioDocument {
  readonly document: ScenarioDocument;
  /** The requested scenario first, its root ancestor last. */
  readonly chain: ReadonlyArray<string>;
}

const rebase = (baseDir: string, value: string | undefined): string | undefined => {
  const path = nonEmpty(value);
  return path ? resolve(baseDir, path) : undefined;
};

const rebaseTest = (baseDir: string, test: TestCaseDocument): TestCaseDocument => ({
  ...test,
  resource_policy_template: rebase(baseDir, test.resource_policy_template),
  resource_policy_json: rebase(baseDir, test.resource_policy_json),
});

// Paths are made absolute against the declaring document, so inherited paths keep
// pointing where their author meant them to.
const rebaseDocument = (baseDir: string, document: ScenarioDocument): ScenarioDocument => ({
  ...document,
  extends: rebase(baseDir, document.extends),
  vars_file: rebase(baseDir, document.vars_file),
  policy_template: rebase(baseDir, document.policy_template),
  policy_json: rebase(baseDir, document.policy_json),
  resource_policy_template: rebase(baseDir, document.resource_policy_template),
  resource_policy_json: rebase(baseDir, document.resource_policy_json),
  scp_paths: document.scp_paths?.map((pattern) => resolve(baseDir, pattern)),
  tests: document.tests?.map((test) => rebaseTest(baseDir, test)),
});

const assertExclusive = (
  template: string | undefined,
  json: string | undefined,
  fields: readonly [string, string],
  path: string,
): void => {
  if (nonEmpty(template) && nonEmpty(json)) {
    fail(configurationError(`Provide only one of '${fields[1]}' or '${fields[0]}'`, { path, fields }));
  }
};

const validatePairs = (document: ScenarioDocument, path: string): void => {
  assertExclusive(document.policy_template, document.policy_json, ["policy_template", "policy_json"], path);
  assertExclusive(
    document.resource_policy_template,
    document.resource_policy_json,
    ["resource_policy_template", "resource_policy_json"],
    path,
  );
  for (const [index, test] of (document.tests ?? []).entries()) {
    assertExclusive(
      test.resource_policy_template,
      test.resource_policy_json,
      [`tests[${index}].resource_policy_template`, `tests[${index}].resource_policy_json`],
      path,
    );
  }
};

export const parseScenarioDocument = (contents: string, path: string): ScenarioDocument => {
  let data: unknown;
  try {
    data = parseYaml(contents);
  } catch (error) {
    return fail(
      createError(ErrorCodes.CONFIGURATION, `Scenario is not valid YAML: ${path}`, {
        path,
        cause: error instanceof Error ? error.message : String(error),
      }),
    );
  }
  const parsed = scenarioDocumentSchema.safeParse(data ?? {});
  if (!parsed.success) {
    return fail(configurationError(`Invalid scenario document: ${path}`, { path, issues: describeIssues(parsed.error) }));
  }
  validatePairs(parsed.data, path);
  return rebaseDocument(dirname(path), parsed.data);
};

const readScenarioDocument = async (fileSystem: FileSystemPort, path: string): Promise<ScenarioDocument> => {
  if (!(await fileSystem.exists(path))) {
    return fail(sourceNotFound(path, "scenario"));
  }
  return parseScenarioDocument(await fileSystem.readText(path), path);
};

const resolveChain = async (
  fileSystem: FileSystemPort,
  path: string,
  inProgress: ReadonlyArray<string>,
): Promise<ResolvedScenarioDocument> => {
  if (inProgress.includes(path)) {
    const cycle = [...inProgress.slice(inProgress.indexOf(path)), path];
    return fail(
      createError(ErrorCodes.CYCLIC_INHERITANCE, `Scenario inheritance cycle: ${cycle.join(" -> ")}`, {
        path,
        cycle,
      }),
    );
  }
  const document = await readScenarioDocument(fileSystem, path);
  if (!document.extends) {
    return { document, chain: [path] };
  }
  const parent = await resolveChain(fileSystem, document.extends, [...inProgress, path]);
  return {
    document: mergeScenarioDocuments(parent.document, document),
    chain: [path, ...parent.chain],
  };
};

/** Loads a scenario and folds in every ancestor named through `extends`, without rendering anything. */
export const resolveScenarioDocument = (
  path: string,
  options: LoadScenarioOptions,
): Promise<Result<ResolvedScenarioDocument, IamSpecError>> =>
  capture(() => resolveChain(options.fileSystem, resolve(path), []));

const toPolicyRef = (template: string | undefined, json: string | undefined): PolicyRef | undefined => {
  if (template) {
    return { kind: "template", path: template };
  }
  if (json) {
    return { kind: "document", path: json };
  }
  return undefined;
};

const renderOptional = (
  value: string | undefined,
  bindings: VariableBindings,
  source: string,
): string | undefined => {
  const text = nonEmpty(value);
  return text ? unwrap(renderTemplate(text, bindings, { source })) : undefined;
};

const renderOptionalList = (
  values: ReadonlyArray<string> | undefined,
  bindings: VariableBindings,
  source: string,
): ReadonlyArray<string> | undefined => (values ? unwrap(renderStrings(values, bindings, { source })) : undefined);

const toTestCase = (test: TestCaseDocument, index: number, bindings: VariableBindings): TestCase => {
  const field = `tests[${index}]`;
  return {
    name: nonEmpty(test.name),
    action: renderOptional(test.action, bindings, `${field}.action`),
    actions: renderOptionalList(test.actions, bindings, `${field}.actions`),
    resource: renderOptional(test.resource, bindings, `${field}.resource`),
    resources: renderOptionalList(test.resources, bindings, `${field}.resources`),
    context: unwrap(renderContextEntries(test.context, bindings, `${field}.context`)),
    resourcePolicy: toPolicyRef(test.resource_policy_template, test.resource_policy_json),
    callerArn: renderOptional(test.caller_arn, bindings, `${field}.caller_arn`),
    resourceOwner: renderOptional(test.resource_owner, bindings, `${field}.resource_owner`),
    resourceHandlingOption: nonEmpty(test.resource_handling_option),
    expect: nonEmpty(test.expect),
  };
};

/**
 * Top-level `actions` / `resources` / `expect`: one test per (action, resource) pair,
 * so every resource is graded on its own. `expect` keys name rendered actions; a key
 * that matches no action is a configuration error.
 */
const synthesizeLegacyTests = (
  document: ScenarioDocument,
  bindings: VariableBindings,
  path: string,
): ReadonlyArray<TestCase> => {
  const actions = renderOptionalList(document.actions, bindings, "actions") ?? [];
  const resources = renderOptionalList(document.resources, bindings, "resources") ?? [];
  const expectations = new Map(
    Object.entries(document.expect ?? {}).map(([action, decision]): [string, string] => [
      unwrap(renderTemplate(action, bindings, { source: "expect" })),
      decision,
    ]),
  );

  const unmatched = [...expectations.keys()].filter((action) => !actions.includes(action));
  if (unmatched.length > 0) {
    return fail(
      configurationError(`'expect' names action(s) not listed in 'actions': ${unmatched.join(", ")}`, {
        path,
        field: "expect",
        actions: unmatched,
      }),
    );
  }

  const targets: ReadonlyArray<string | undefined> = resources.length > 0 ? resources : [undefined];
  return actions.flatMap((action) =>
    targets.map((resource) => ({
      action,
      resource,
      context: [],
      expect: nonEmpty(expectations.get(action)),
    })),
  );
};

export const buildScenario = (
  resolved: ResolvedScenarioDocument,
  bindings: VariableBindings,
): Scenario => {
  const { document, chain } = resolved;
  const sourcePath = chain[0] ?? "";

  const policy = toPolicyRef(document.policy_template, document.policy_json);
  if (!policy) {
    return fail(
      configurationError("Scenario must include 'policy_json' or 'policy_template'", {
        path: sourcePath,
        fields: ["policy_json", "policy_template"],
      }),
    );
  }

  const tests: ReadonlyArray<TestCase> =
    document.tests && document.tests.length > 0
      ? document.tests.map((test, index) => toTestCase(test, index, bindings))
      : synthesizeLegacyTests(document, bindings, sourcePath);
  if (tests.length === 0) {
    return fail(
      configurationError("Scenario must include a 'tests' array with at least one test case", {
        path: sourcePath,
        field: "tests",
      }),
    );
  }

  return {
    sourcePath,
    inheritanceChain: chain,
    varsFile: document.vars_file,
    variables: bindings,
    policy,
    resourcePolicy: toPolicyRef(document.resource_policy_template, document.resource_policy_json),
    guardrailPatterns: document.scp_paths ?? [],
    context: unwrap(renderContextEntries(document.context, bindings, "context")),
    callerArn: renderOptional(document.caller_arn, bindings, "caller_arn"),
    resourceOwner: renderOptional(document.resource_owner, bindings, "resource_owner"),
    resourceHandlingOption: nonEmpty(document.resource_handling_option),
    tests,
  };
};

/**
 * Loads the effective scenario: inheritance resolved, variables bound (`vars_file`
 * under inline `vars`) and every variable-bearing string field rendered.
 */
export const loadScenario = (path: string, options: LoadScenarioOptions): Promise<Result<Scenario, IamSpecError>> =>
  capture(async () => {
    const logger = options.logger ?? silentLogger;
    const resolved = await resolveChain(options.fileSystem, resolve(path), []);
    logger.debug("scenario resolved", { path: resolved.chain[0], chain: resolved.chain });

    const bindings = await buildVariableBindings(
      options.fileSystem,
      resolved.document.vars_file,
      resolved.document.vars ?? {},
    );
    logger.debug("variables bound", { varsFile: resolved.document.vars_file, names: Object.keys(bindings).sort() });

    return buildScenario(resolved, bindings);
  });
