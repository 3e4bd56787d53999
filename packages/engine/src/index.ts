export {
  IamSpecFailure,
  capture,
  configurationError,
  createError,
  createInfraError,
  describeCause,
  fail,
  formatError,
  sourceNotFound,
  unwrap,
} from "./errors.js";
export { isRecord, toPrettyJson } from "./utils.js";

export { canonicalReference, normalizeVariableNotation } from "./variables/notation.js";
export type { RenderOptions } from "./variables/template.js";
export {
  minifyJson,
  renderCanonical,
  renderJsonTemplate,
  renderStrings,
  renderTemplate,
} from "./variables/template.js";
export { buildVariableBindings } from "./variables/bindings.js";

export type { ContextEntryDocument, ScenarioDocument, TestCaseDocument } from "./scenario/schema.js";
export { describeIssues, scenarioDocumentSchema } from "./scenario/schema.js";
export { deepMergeRecords, mergeScenarioDocuments } from "./scenario/merge.js";
export { parseContextKeyType, renderContextEntries } from "./scenario/context.js";
export type { LoadScenarioOptions, ResolvedScenarioDocument } from "./scenario/loader.js";
export { buildScenario, loadScenario, parseScenarioDocument, resolveScenarioDocument } from "./scenario/loader.js";

export type { StatementSpan } from "./policy/statement-spans.js";
export { findStatementAtLine, findStatementSpans, sliceLines } from "./policy/statement-spans.js";
export type { TrackPolicyInput, TrackedPolicy } from "./policy/provenance.js";
export { parsePolicyText, trackPolicy, trackingToken } from "./policy/provenance.js";
export type { MergedPolicy, PolicyEnvelope, PolicyFragment } from "./policy/fragments.js";
export { POLICY_VERSION, mergeFragmentFiles, mergeFragments } from "./policy/fragments.js";
export type { IamFieldOptions } from "./policy/iam-fields.js";
export {
  IAM_DOCUMENT_FIELDS,
  IAM_STATEMENT_FIELDS,
  assertIamFields,
  enforceIamFields,
  findNonIamFields,
  stripNonIamFields,
} from "./policy/iam-fields.js";
export type { LoadedPolicy } from "./policy/load-policy.js";
export { loadPolicy, policyRefKey } from "./policy/load-policy.js";

export { displayNameFor, expandTestCase, expandTestCases } from "./tests/expand.js";

export type { EvaluateExecutionOptions } from "./evaluation/expectations.js";
export {
  decisionsMatch,
  describeMatchedStatements,
  evaluateExecution,
  renderDiagnostic,
  renderMatchedStatements,
} from "./evaluation/expectations.js";

export type { PrepareRunOptions, PreparedRun } from "./run/prepare.js";
export { GUARDRAIL_SIMULATION_WARNING, prepareRun, prepareScenarioRun } from "./run/prepare.js";
export type { ExecuteRunOptions, ExecutionProgress, RunReport } from "./run/execute.js";
export { buildSimulationRequest, executeRun, summarizeOutcomes } from "./run/execute.js";
export type { RunTelemetryContext, RunTelemetryMetrics, RunTelemetryOptions } from "./run/telemetry.js";
export { createRunTelemetry } from "./run/telemetry.js";
export type { SavedResponse } from "./run/save.js";
export { SAVED_RESPONSE_MODE, saveResponses, toSavedResponses } from "./run/save.js";

export { createNodeFileSystem } from "./fs/node-file-system.js";
