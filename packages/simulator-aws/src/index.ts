export type { IamPolicySimulatorOptions, SimulateCustomPolicyClient } from "./iam-policy-simulator.js";
export {
  DEFAULT_REGION,
  IamPolicySimulator,
  buildSimulateCustomPolicyInput,
  createIamPolicySimulator,
  submitPolicies,
} from "./iam-policy-simulator.js";
export type { SubmittedPolicies, SubmittedPolicy } from "./matched-statements.js";
export { resolveMatchedStatements } from "./matched-statements.js";
