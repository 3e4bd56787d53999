import { ErrorCodes, type PolicySource } from "@iamspec/contracts";

import { createError, fail } from "../errors.js";
import { isRecord } from "../utils.js";
import { findStatementSpans } from "./statement-spans.js";

export interface TrackPolicyInput {
  /** Text the line ranges are taken from: the file as authored, template or not. */
  readonly sourceText: string;
  /** Parsed document after rendering; defaults to parsing `sourceText`. */
  readonly document?: unknown;
  readonly sourcePath: string;
  readonly tokenLabel: string;
  /** Treat a top-level object without `Statement` as a single statement. */
  readonly bareStatement?: boolean;
}

export interface TrackedPolicy {
  readonly document: unknown;
  /** Outgoing statements in order, tracked objects carrying their token as `Sid`. */
  readonly statements: ReadonlyArray<unknown>;
  readonly sources: ReadonlyMap<string, PolicySource>;
}

export const trackingToken = (label: string, ordinal: number): string => `${label}#stmt:${ordinal}`;

export const parsePolicyText = (text: string, path: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    return fail(
      createError(ErrorCodes.INVALID_POLICY_DOCUMENT, `Policy is not valid JSON: ${path}`, {
        path,
        cause: error instanceof Error ? error.message : String(error),
      }),
    );
  }
};

type StatementShape =
  | { readonly kind: "list"; readonly statements: ReadonlyArray<unknown> }
  | { readonly kind: "single"; readonly statement: unknown }
  | { readonly kind: "bare"; readonly statement: unknown }
  | { readonly kind: "none" };

const classify = (document: unknown, bareStatement: boolean): StatementShape => {
  if (isRecord(document) && "Statement" in document) {
    const statement = document["Statement"];
    return Array.isArray(statement) ? { kind: "list", statements: statement } : { kind: "single", statement };
  }
  return bareStatement ? { kind: "bare", statement: document } : { kind: "none" };
};

/**
 * Stamps every object statement with a tracking token as its `Sid` and records where
 * it came from. The statement's own `Sid` survives only in the provenance record.
 */
export const trackPolicy = (input: TrackPolicyInput): TrackedPolicy => {
  const document = input.document ?? parsePolicyText(input.sourceText, input.sourcePath);
  const shape = classify(document, input.bareStatement ?? false);
  if (shape.kind === "none") {
    return { document, statements: [], sources: new Map() };
  }

  const spans = new Map(findStatementSpans(input.sourceText).map((span) => [span.ordinal, span]));
  const sources = new Map<string, PolicySource>();

  const stamp = (statement: unknown, ordinal: number): unknown => {
    if (!isRecord(statement)) {
      return statement;
    }
    const token = trackingToken(input.tokenLabel, ordinal);
    const { Sid: label, ...rest } = statement;
    sources.set(token, {
      filePath: input.sourcePath,
      ordinal,
      lineRange: spans.get(ordinal)?.lineRange,
      label: typeof label === "string" && label.length > 0 ? label : undefined,
    });
    return { Sid: token, ...rest };
  };

  switch (shape.kind) {
    case "list": {
      const statements = shape.statements.map(stamp);
      return { document: { ...asRecord(document), Statement: statements }, statements, sources };
    }
    case "single": {
      const statement = stamp(shape.statement, 0);
      return { document: { ...asRecord(document), Statement: statement }, statements: [statement], sources };
    }
    case "bare": {
      const statement = stamp(shape.statement, 0);
      return { document: statement, statements: [statement], sources };
    }
  }
};

const asRecord = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});
