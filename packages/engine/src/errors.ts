import { ErrorCodes, err, ok, type IamSpecError, type InfraError, type Result } from "@iamspec/contracts";

export const createError = (
  code: string,
  message: string,
  details?: Record<string, unknown>,
): IamSpecError => ({
  code,
  message,
  details,
});

export const configurationError = (message: string, details?: Record<string, unknown>): IamSpecError =>
  createError(ErrorCodes.CONFIGURATION, message, details);

export const sourceNotFound = (path: string, role: string): IamSpecError =>
  createError(ErrorCodes.SOURCE_NOT_FOUND, `${role} not found: ${path}`, { path, role });

export const createInfraError = (
  code: string,
  message: string,
  cause: unknown,
  details?: Record<string, unknown>,
): InfraError => ({
  code,
  message,
  details: { ...(details ?? {}), cause: describeCause(cause) },
  retryable: false,
});

export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return typeof cause === "string" ? cause : JSON.stringify(cause);
};

/**
 * Thrown inside the engine to unwind a deep call chain. Public entry points catch it
 * and hand the record back as a failed `Result`.
 */
export class IamSpecFailure extends Error {
  constructor(readonly detail: IamSpecError) {
    super(detail.message);
    this.name = "IamSpecFailure";
  }
}

export const fail = (detail: IamSpecError): never => {
  throw new IamSpecFailure(detail);
};

export const unwrap = <T>(result: Result<T, IamSpecError>): T => {
  if (result.ok) {
    return result.value;
  }
  throw new IamSpecFailure(result.error);
};

/** Runs `body`, turning an `IamSpecFailure` into a failed `Result`; anything else is rethrown. */
export const capture = async <T>(body: () => Promise<T>): Promise<Result<Awaited<T>, IamSpecError>> => {
  try {
    return ok(await body());
  } catch (error) {
    if (error instanceof IamSpecFailure) {
      return err(error.detail);
    }
    throw error;
  }
};

export const formatError = (error: IamSpecError): string => {
  const lines = [`${error.message} [${error.code}]`];
  for (const [key, value] of Object.entries(error.details ?? {})) {
    if (value === undefined) {
      continue;
    }
    const rendered = typeof value === "string" ? value : JSON.stringify(value);
    lines.push(`  ${key}: ${rendered}`);
  }
  return lines.join("\n");
};
