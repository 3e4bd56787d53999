import { ErrorCodes, err, ok, type IamSpecError, type Result } from "@iamspec/contracts";

import { createError } from "../errors.js";
import { isRecord } from "../utils.js";

export const IAM_DOCUMENT_FIELDS: ReadonlySet<string> = new Set(["Version", "Id", "Statement"]);

export const IAM_STATEMENT_FIELDS: ReadonlySet<string> = new Set([
  "Sid",
  "Effect",
  "Principal",
  "NotPrincipal",
  "Action",
  "NotAction",
  "Resource",
  "NotResource",
  "Condition",
]);

const pickFields = (record: Record<string, unknown>, allowed: ReadonlySet<string>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(record).filter(([field]) => allowed.has(field)));

export const stripNonIamStatementFields = (statement: unknown): unknown =>
  isRecord(statement) ? pickFields(statement, IAM_STATEMENT_FIELDS) : statement;

/** Drops every field the IAM policy grammar does not define. Non-object input is returned as is. */
export const stripNonIamFields = (document: unknown): unknown => {
  if (!isRecord(document)) {
    return document;
  }
  const stripped = pickFields(document, IAM_DOCUMENT_FIELDS);
  const statement = stripped["Statement"];
  if (Array.isArray(statement)) {
    stripped["Statement"] = statement.map(stripNonIamStatementFields);
  } else if (statement !== undefined) {
    stripped["Statement"] = stripNonIamStatementFields(statement);
  }
  return stripped;
};

export const findNonIamFields = (document: unknown): ReadonlyArray<string> => {
  if (!isRecord(document)) {
    return [];
  }
  const violations: string[] = [];
  for (const field of Object.keys(document)) {
    if (!IAM_DOCUMENT_FIELDS.has(field)) {
      violations.push(`Top-level: ${field}`);
    }
  }
  const statement = document["Statement"];
  const statements: ReadonlyArray<unknown> = Array.isArray(statement) ? statement : [statement];
  for (const [index, entry] of statements.entries()) {
    if (!isRecord(entry)) {
      continue;
    }
    for (const field of Object.keys(entry)) {
      if (!IAM_STATEMENT_FIELDS.has(field)) {
        violations.push(`Statement[${index}]: ${field}`);
      }
    }
  }
  return violations;
};

export const assertIamFields = (document: unknown, source: string): Result<unknown, IamSpecError> => {
  const violations = findNonIamFields(document);
  if (violations.length > 0) {
    return err(
      createError(
        ErrorCodes.NON_IAM_FIELDS,
        `Policy contains non-IAM fields: ${source}\n${violations.map((line) => `  ${line}`).join("\n")}`,
        { source, violations },
      ),
    );
  }
  return ok(document);
};

export interface IamFieldOptions {
  /** Reject non-IAM fields instead of dropping them. */
  readonly strict?: boolean;
}

export const enforceIamFields = (
  document: unknown,
  source: string,
  options: IamFieldOptions = {},
): Result<unknown, IamSpecError> =>
  options.strict ? assertIamFields(document, source) : ok(stripNonIamFields(document));
