import { isRecord, nonEmpty } from "../utils.js";
import type { ScenarioDocument } from "./schema.js";

const pickScalar = (parent: string | undefined, child: string | undefined): string | undefined =>
  nonEmpty(child) ?? parent;

const pickList = <T>(parent: T[] | undefined, child: T[] | undefined): T[] | undefined =>
  child !== undefined && child.length > 0 ? child : parent;

export const deepMergeRecords = (
  parent: Record<string, unknown> | undefined,
  child: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined => {
  if (!child) {
    return parent;
  }
  if (!parent) {
    return child;
  }
  const merged: Record<string, unknown> = { ...parent };
  for (const [key, value] of Object.entries(child)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? deepMergeRecords(existing, value) : value;
  }
  return merged;
};

interface ExclusivePair {
  readonly template: string | undefined;
  readonly json: string | undefined;
}

// A child that sets one member of the pair clears the member it inherited.
const mergeExclusivePair = (parent: ExclusivePair, child: ExclusivePair): ExclusivePair => {
  if (nonEmpty(child.template)) {
    return { template: child.template, json: undefined };
  }
  if (nonEmpty(child.json)) {
    return { template: undefined, json: child.json };
  }
  return parent;
};

const mergeStringRecords = (
  parent: Record<string, string> | undefined,
  child: Record<string, string> | undefined,
): Record<string, string> | undefined => (child ? { ...(parent ?? {}), ...child } : parent);

/**
 * Merges a parent scenario document into its child. Scalars: non-empty child wins.
 * `vars` / `expect`: merged key by key. Lists: a non-empty child list replaces the
 * parent's wholesale.
 */
export const mergeScenarioDocuments = (parent: ScenarioDocument, child: ScenarioDocument): ScenarioDocument => {
  const policy = mergeExclusivePair(
    { template: parent.policy_template, json: parent.policy_json },
    { template: child.policy_template, json: child.policy_json },
  );
  const resourcePolicy = mergeExclusivePair(
    { template: parent.resource_policy_template, json: parent.resource_policy_json },
    { template: child.resource_policy_template, json: child.resource_policy_json },
  );

  return {
    extends: pickScalar(parent.extends, child.extends),
    vars_file: pickScalar(parent.vars_file, child.vars_file),
    vars: deepMergeRecords(parent.vars, child.vars),
    policy_template: policy.template,
    policy_json: policy.json,
    resource_policy_template: resourcePolicy.template,
    resource_policy_json: resourcePolicy.json,
    caller_arn: pickScalar(parent.caller_arn, child.caller_arn),
    resource_owner: pickScalar(parent.resource_owner, child.resource_owner),
    resource_handling_option: pickScalar(parent.resource_handling_option, child.resource_handling_option),
    scp_paths: pickList(parent.scp_paths, child.scp_paths),
    context: pickList(parent.context, child.context),
    actions: pickList(parent.actions, child.actions),
    resources: pickList(parent.resources, child.resources),
    expect: mergeStringRecords(parent.expect, child.expect),
    tests: pickList(parent.tests, child.tests),
  };
};
