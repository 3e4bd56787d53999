import type { ContextEntry, PolicyRef } from "./scenario.js";
import type { LineRange } from "./provenance.js";

export interface AtomicExecution {
  readonly testIndex: number;
  readonly name?: string;
  readonly displayName: string;
  readonly action: string;
  readonly resources: ReadonlyArray<string>;
  readonly context: ReadonlyArray<ContextEntry>;
  readonly resourcePolicy?: PolicyRef;
  readonly callerArn?: string;
  readonly resourceOwner?: string;
  readonly resourceHandlingOption?: string;
  readonly expect?: string;
}

export type ExecutionStatus = "pass" | "fail" | "observed";

export interface MatchedStatementReport {
  readonly token: string;
  readonly label?: string;
  readonly filePath?: string;
  readonly lineRange?: LineRange;
}

export interface ExecutionOutcome {
  readonly execution: AtomicExecution;
  readonly decision: string;
  readonly status: ExecutionStatus;
  readonly matched: ReadonlyArray<MatchedStatementReport>;
  readonly diagnostic?: string;
  /** The simulator's own response payload. */
  readonly raw?: unknown;
}

export interface RunSummary {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly observed: number;
}
