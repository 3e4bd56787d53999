import type { ExecutionOutcome, FileSystemPort } from "@iamspec/contracts";

import { toPrettyJson } from "../utils.js";

/** Owner read/write only. */
export const SAVED_RESPONSE_MODE = 0o600;

export interface SavedResponse {
  readonly test: string;
  readonly action: string;
  readonly resources: ReadonlyArray<string>;
  readonly decision: string;
  readonly status: ExecutionOutcome["status"];
  readonly response: unknown;
}

export const toSavedResponses = (outcomes: ReadonlyArray<ExecutionOutcome>): ReadonlyArray<SavedResponse> =>
  outcomes.map((outcome) => ({
    test: outcome.execution.displayName,
    action: outcome.execution.action,
    resources: outcome.execution.resources,
    decision: outcome.decision,
    status: outcome.status,
    response: outcome.raw ?? null,
  }));

export const saveResponses = (
  fileSystem: FileSystemPort,
  path: string,
  outcomes: ReadonlyArray<ExecutionOutcome>,
): Promise<void> =>
  fileSystem.writeText(path, `${toPrettyJson(toSavedResponses(outcomes))}\n`, { mode: SAVED_RESPONSE_MODE });
