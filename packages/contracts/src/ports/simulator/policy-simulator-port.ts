import type { IamSpecError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";
import type { ContextEntry } from "../../types/scenario.js";

export interface SimulationRequest {
  readonly policyDocuments: ReadonlyArray<string>;
  readonly permissionsBoundaryDocuments: ReadonlyArray<string>;
  readonly resourcePolicy?: string;
  readonly action: string;
  readonly resourceArns: ReadonlyArray<string>;
  readonly context: ReadonlyArray<ContextEntry>;
  readonly callerArn?: string;
  readonly resourceOwner?: string;
  readonly resourceHandlingOption?: string;
}

export interface SimulationResponse {
  readonly decision: string;
  /** Identifiers of the statements that decided the request, tracking tokens where recoverable. */
  readonly matchedStatements: ReadonlyArray<string>;
  /** Untouched simulator payload, kept for `--save`. */
  readonly raw?: unknown;
}

export interface PolicySimulatorPort {
  simulate(request: SimulationRequest): Promise<Result<SimulationResponse, IamSpecError>>;
}
