import type { Statement } from "@aws-sdk/client-iam";

import { findStatementAtLine, findStatementSpans, isRecord } from "@iamspec/engine";

export interface SubmittedPolicy {
  /** Exactly the text sent to the simulator; positions in the response refer to it. */
  readonly text: string;
  readonly document: unknown;
}

export interface SubmittedPolicies {
  readonly identity: ReadonlyArray<SubmittedPolicy>;
  readonly boundary: ReadonlyArray<SubmittedPolicy>;
  readonly resource?: SubmittedPolicy;
}

const RESOURCE_POLICY_ID = "ResourcePolicy";
const INPUT_LIST_ID = /^(PolicyInputList|PermissionsBoundaryPolicyInputList)\.(\d+)$/;

const statementsOf = (document: unknown): ReadonlyArray<unknown> => {
  if (!isRecord(document)) {
    return [];
  }
  if (!("Statement" in document)) {
    return [document];
  }
  return Array.isArray(document.Statement) ? document.Statement : [document.Statement];
};

const policyFor = (policies: SubmittedPolicies, sourcePolicyId: string): SubmittedPolicy | undefined => {
  if (sourcePolicyId === RESOURCE_POLICY_ID) {
    return policies.resource;
  }
  const match = INPUT_LIST_ID.exec(sourcePolicyId);
  if (!match) {
    return undefined;
  }
  const list = match[1] === "PolicyInputList" ? policies.identity : policies.boundary;
  // Input list positions are 1-based.
  return list[Number(match[2]) - 1];
};

const sidAtLine = (policy: SubmittedPolicy, line: number): string | undefined => {
  const span = findStatementAtLine(findStatementSpans(policy.text), line);
  if (!span) {
    return undefined;
  }
  const statement = statementsOf(policy.document)[span.ordinal];
  return isRecord(statement) && typeof statement.Sid === "string" ? statement.Sid : undefined;
};

/**
 * The simulator reports matched statements by input list position and source line only.
 * Each one is mapped to the `Sid` of the statement containing its start line, which for
 * tracked policies is the tracking token. Anything unresolvable keeps its source policy id.
 */
export const resolveMatchedStatements = (
  matched: ReadonlyArray<Statement> | undefined,
  policies: SubmittedPolicies,
): ReadonlyArray<string> => {
  const tokens: string[] = [];
  for (const statement of matched ?? []) {
    const sourcePolicyId = statement.SourcePolicyId;
    if (!sourcePolicyId) {
      continue;
    }
    const policy = policyFor(policies, sourcePolicyId);
    const line = statement.StartPosition?.Line;
    const sid = policy && line !== undefined ? sidAtLine(policy, line) : undefined;
    tokens.push(sid ?? sourcePolicyId);
  }
  return tokens;
};
