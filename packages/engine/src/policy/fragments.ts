import { relative } from "node:path";

import type { FileSystemPort, PolicySource } from "@iamspec/contracts";

import { fail, sourceNotFound, unwrap } from "../errors.js";
import { dedupeStrings, isRecord } from "../utils.js";
import { assertIamFields, stripNonIamStatementFields, type IamFieldOptions } from "./iam-fields.js";
import { trackPolicy, type TrackedPolicy } from "./provenance.js";

export const POLICY_VERSION = "2012-10-17";

export interface PolicyEnvelope {
  readonly Version: string;
  readonly Statement: ReadonlyArray<unknown>;
}

export interface PolicyFragment {
  readonly path: string;
  readonly sourceText: string;
  readonly tokenLabel: string;
}

export interface MergedPolicy {
  readonly document: PolicyEnvelope;
  readonly sources: ReadonlyMap<string, PolicySource>;
}

// Violations name the fragment file and statement positions within that file.
const checkFragment = (
  fragment: PolicyFragment,
  tracked: TrackedPolicy,
  options: IamFieldOptions,
): ReadonlyArray<unknown> => {
  if (!options.strict) {
    return tracked.statements.map(stripNonIamStatementFields);
  }
  const envelope =
    isRecord(tracked.document) && "Statement" in tracked.document ? tracked.document : { Statement: tracked.statements };
  unwrap(assertIamFields(envelope, fragment.path));
  return tracked.statements;
};

/**
 * Concatenates fragment statements, in the order given, into one envelope. A fragment
 * may carry a `Statement` list, a single `Statement` object, or be a bare statement;
 * anything else is carried over verbatim as one statement. Non-IAM statement fields
 * are dropped, or rejected with `strict`.
 */
export const mergeFragments = (
  fragments: ReadonlyArray<PolicyFragment>,
  options: IamFieldOptions = {},
): MergedPolicy => {
  const statements: unknown[] = [];
  const sources = new Map<string, PolicySource>();
  for (const fragment of fragments) {
    const tracked = trackPolicy({
      sourceText: fragment.sourceText,
      sourcePath: fragment.path,
      tokenLabel: fragment.tokenLabel,
      bareStatement: true,
    });
    statements.push(...checkFragment(fragment, tracked, options));
    for (const [token, source] of tracked.sources) {
      sources.set(token, source);
    }
  }
  return { document: { Version: POLICY_VERSION, Statement: statements }, sources };
};

/** Reads fragment files (deduplicated, sorted by path) and merges them; tokens are labelled relative to `baseDir`. */
export const mergeFragmentFiles = async (
  fileSystem: FileSystemPort,
  paths: ReadonlyArray<string>,
  baseDir: string,
  options: IamFieldOptions = {},
): Promise<MergedPolicy> => {
  const ordered = [...dedupeStrings(paths)].sort();
  const fragments: PolicyFragment[] = [];
  for (const path of ordered) {
    if (!(await fileSystem.exists(path))) {
      return fail(sourceNotFound(path, "guardrail fragment"));
    }
    fragments.push({ path, sourceText: await fileSystem.readText(path), tokenLabel: relative(baseDir, path) });
  }
  return mergeFragments(fragments, options);
};
