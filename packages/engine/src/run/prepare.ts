import { dirname, relative } from "node:path";

import type {
  AtomicExecution,
  FileSystemPort,
  IamSpecError,
  PolicySourceMap,
  Result,
  Scenario,
} from "@iamspec/contracts";
import { silentLogger, type IamSpecLogger } from "@iamspec/telemetry";

import { capture, configurationError, fail, unwrap } from "../errors.js";
import { mergeFragmentFiles } from "../policy/fragments.js";
import { enforceIamFields } from "../policy/iam-fields.js";
import { loadPolicy, policyRefKey } from "../policy/load-policy.js";
import { trackPolicy } from "../policy/provenance.js";
import { loadScenario } from "../scenario/loader.js";
import { expandTestCases } from "../tests/expand.js";

export const GUARDRAIL_SIMULATION_WARNING =
  "Guardrail policies are simulated as a permissions boundary. This approximates, " +
  "but does not reproduce, how service and resource control policies are enforced.";

export interface PrepareRunOptions {
  readonly fileSystem: FileSystemPort;
  readonly logger?: IamSpecLogger;
  /** Reject non-IAM policy fields instead of dropping them. */
  readonly strictPolicy?: boolean;
  /** Only keep executions of the tests with these names. */
  readonly testNames?: ReadonlyArray<string>;
  /** Set to false to leave out the guardrail approximation warning. */
  readonly warnOnGuardrails?: boolean;
}

export interface PreparedRun {
  readonly scenario: Scenario;
  readonly sourceMap: PolicySourceMap;
  readonly guardrailFiles: ReadonlyArray<string>;
  /** Rendered resource policy text by policy reference key, scenario default and test overrides alike. */
  readonly resourcePolicies: ReadonlyMap<string, string>;
  readonly executions: ReadonlyArray<AtomicExecution>;
  readonly warnings: ReadonlyArray<string>;
}

const selectTests = (
  executions: ReadonlyArray<AtomicExecution>,
  scenario: Scenario,
  names: ReadonlyArray<string> | undefined,
): ReadonlyArray<AtomicExecution> => {
  if (!names || names.length === 0) {
    return executions;
  }
  const known = new Set(scenario.tests.map((test) => test.name).filter((name) => name !== undefined));
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    return fail(
      configurationError(`Unknown test name(s): ${unknown.join(", ")}`, {
        path: scenario.sourcePath,
        names: unknown,
      }),
    );
  }
  const wanted = new Set(names);
  return executions.filter((execution) => execution.name !== undefined && wanted.has(execution.name));
};

const serialize = (document: unknown): string => JSON.stringify(document);

const prepare = async (scenario: Scenario, options: PrepareRunOptions): Promise<PreparedRun> => {
  const { fileSystem } = options;
  const logger = options.logger ?? silentLogger;
  const strict = { strict: options.strictPolicy ?? false };
  const scenarioDir = dirname(scenario.sourcePath);
  const warnings: string[] = [];

  const identity = await loadPolicy(fileSystem, scenario.policy, scenario.variables, "policy");
  const identityDocument = unwrap(enforceIamFields(identity.document, scenario.policy.path, strict));
  const trackedIdentity = trackPolicy({
    sourceText: identity.sourceText,
    document: identityDocument,
    sourcePath: scenario.policy.path,
    tokenLabel: relative(scenarioDir, scenario.policy.path),
  });
  const statements = new Map(trackedIdentity.sources);
  logger.debug("identity policy tracked", { path: scenario.policy.path, statements: statements.size });

  const guardrailFiles = await fileSystem.expandPatterns(scenarioDir, scenario.guardrailPatterns);
  let permissionsBoundaryText: string | undefined;
  if (guardrailFiles.length > 0) {
    const merged = await mergeFragmentFiles(fileSystem, guardrailFiles, scenarioDir, strict);
    permissionsBoundaryText = serialize(merged.document);
    for (const [token, source] of merged.sources) {
      statements.set(token, source);
    }
    logger.debug("guardrail fragments merged", { files: guardrailFiles, statements: merged.sources.size });
    if (options.warnOnGuardrails ?? true) {
      warnings.push(GUARDRAIL_SIMULATION_WARNING);
    }
  }

  const executions = selectTests(unwrap(expandTestCases(scenario)), scenario, options.testNames);

  const resourcePolicies = new Map<string, string>();
  const referenced = [scenario.resourcePolicy, ...executions.map((execution) => execution.resourcePolicy)];
  for (const ref of referenced) {
    if (!ref || resourcePolicies.has(policyRefKey(ref))) {
      continue;
    }
    const loaded = await loadPolicy(fileSystem, ref, scenario.variables, "resource policy");
    resourcePolicies.set(policyRefKey(ref), serialize(unwrap(enforceIamFields(loaded.document, ref.path, strict))));
  }

  const resourcePolicyText = scenario.resourcePolicy
    ? resourcePolicies.get(policyRefKey(scenario.resourcePolicy))
    : undefined;

  return {
    scenario,
    sourceMap: {
      statements,
      identityPolicyText: serialize(trackedIdentity.document),
      permissionsBoundaryText,
      resourcePolicyText,
      resourcePolicyPath: scenario.resourcePolicy?.path,
    },
    guardrailFiles,
    resourcePolicies,
    executions,
    warnings,
  };
};

/** Every step short of calling the simulator, so configuration errors surface before any request. */
export const prepareScenarioRun = (
  scenario: Scenario,
  options: PrepareRunOptions,
): Promise<Result<PreparedRun, IamSpecError>> => capture(() => prepare(scenario, options));

export const prepareRun = (
  scenarioPath: string,
  options: PrepareRunOptions,
): Promise<Result<PreparedRun, IamSpecError>> =>
  capture(async () => prepare(unwrap(await loadScenario(scenarioPath, options)), options));
