export interface DomainError {
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface InfraError extends DomainError {
  readonly retryable?: boolean;
}

export type IamSpecError = DomainError | InfraError;

/**
 * Error codes raised by the engine and its adapters.
 *
 * Everything except `EXPECTATION_MISMATCH` aborts a run. Mismatches are collected per
 * execution and only decide the exit status.
 */
export const ErrorCodes = {
  CONFIGURATION: "config.invalid",
  CYCLIC_INHERITANCE: "config.cyclic_inheritance",
  MISSING_VARIABLE: "template.missing_variable",
  MALFORMED_OUTPUT: "template.malformed_output",
  INVALID_POLICY_DOCUMENT: "policy.invalid_document",
  NON_IAM_FIELDS: "policy.non_iam_fields",
  SOURCE_NOT_FOUND: "source.not_found",
  SIMULATOR_REQUEST_FAILED: "simulator.request_failed",
  SIMULATOR_EMPTY_RESULT: "simulator.empty_result",
  EXPECTATION_MISMATCH: "expectation.mismatch",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
