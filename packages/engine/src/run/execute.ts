import type {
  AtomicExecution,
  ExecutionOutcome,
  FileSystemPort,
  IamSpecError,
  PolicySimulatorPort,
  Result,
  RunSummary,
  SimulationRequest,
} from "@iamspec/contracts";
import { runWithSpan } from "@iamspec/telemetry";

import { capture, unwrap } from "../errors.js";
import { evaluateExecution } from "../evaluation/expectations.js";
import { policyRefKey } from "../policy/load-policy.js";
import type { PreparedRun } from "./prepare.js";
import { createRunTelemetry, type RunTelemetryOptions } from "./telemetry.js";

export interface ExecutionProgress {
  /** 0-based position of the execution in the run. */
  readonly index: number;
  readonly total: number;
}

export interface ExecuteRunOptions extends RunTelemetryOptions {
  readonly simulator: PolicySimulatorPort;
  readonly fileSystem: FileSystemPort;
  readonly onOutcome?: (outcome: ExecutionOutcome, progress: ExecutionProgress) => void | Promise<void>;
}

export interface RunReport {
  readonly outcomes: ReadonlyArray<ExecutionOutcome>;
  readonly summary: RunSummary;
}

export const buildSimulationRequest = (prepared: PreparedRun, execution: AtomicExecution): SimulationRequest => {
  const { sourceMap } = prepared;
  return {
    policyDocuments: [sourceMap.identityPolicyText],
    permissionsBoundaryDocuments: sourceMap.permissionsBoundaryText ? [sourceMap.permissionsBoundaryText] : [],
    resourcePolicy: execution.resourcePolicy
      ? prepared.resourcePolicies.get(policyRefKey(execution.resourcePolicy))
      : undefined,
    action: execution.action,
    resourceArns: execution.resources,
    context: execution.context,
    callerArn: execution.callerArn,
    resourceOwner: execution.resourceOwner,
    resourceHandlingOption: execution.resourceHandlingOption,
  };
};

export const summarizeOutcomes = (outcomes: ReadonlyArray<ExecutionOutcome>): RunSummary => ({
  total: outcomes.length,
  passed: outcomes.filter((outcome) => outcome.status === "pass").length,
  failed: outcomes.filter((outcome) => outcome.status === "fail").length,
  observed: outcomes.filter((outcome) => outcome.status === "observed").length,
});

/**
 * Calls the simulator once per execution, in order, and grades each response. The
 * first simulator error ends the run and is returned as is.
 */
export const executeRun = (
  prepared: PreparedRun,
  options: ExecuteRunOptions,
): Promise<Result<RunReport, IamSpecError>> =>
  capture(async () => {
    const { tracer, logger, metrics } = createRunTelemetry(options);
    const total = prepared.executions.length;
    const outcomes: ExecutionOutcome[] = [];

    for (const [index, execution] of prepared.executions.entries()) {
      const request = buildSimulationRequest(prepared, execution);
      const started = Date.now();
      const response = await runWithSpan(
        tracer,
        "iamspec.simulate",
        async () => {
          const result = await options.simulator.simulate(request);
          if (!result.ok) {
            metrics.simulationCounter.add(1, { status: "error" });
            logger.error("simulation failed", { test: execution.displayName, code: result.error.code });
          }
          return unwrap(result);
        },
        {
          attributes: {
            "iamspec.action": execution.action,
            "iamspec.test": execution.displayName,
            "iamspec.test_index": execution.testIndex,
          },
        },
      ).finally(() => {
        metrics.simulationDuration.record(Date.now() - started, { action: execution.action });
      });

      const outcome = await evaluateExecution(execution, response, {
        fileSystem: options.fileSystem,
        sources: prepared.sourceMap.statements,
      });
      metrics.simulationCounter.add(1, { status: outcome.status });
      logger.debug("execution graded", {
        test: execution.displayName,
        action: execution.action,
        decision: outcome.decision,
        status: outcome.status,
      });

      outcomes.push(outcome);
      await options.onOutcome?.(outcome, { index, total });
    }

    return { outcomes, summary: summarizeOutcomes(outcomes) };
  });
