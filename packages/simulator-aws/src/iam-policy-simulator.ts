import {
  IAMClient,
  SimulateCustomPolicyCommand,
  type ContextEntry as IamContextEntry,
  type SimulateCustomPolicyCommandInput,
  type SimulateCustomPolicyCommandOutput,
} from "@aws-sdk/client-iam";

import {
  ErrorCodes,
  type ContextEntry,
  type IamSpecError,
  type PolicySimulatorPort,
  type Result,
  type SimulationRequest,
  type SimulationResponse,
} from "@iamspec/contracts";
import { capture, createError, createInfraError, fail, parsePolicyText, toPrettyJson } from "@iamspec/engine";
import { silentLogger, type IamSpecLogger } from "@iamspec/telemetry";

import { resolveMatchedStatements, type SubmittedPolicies, type SubmittedPolicy } from "./matched-statements.js";

export const DEFAULT_REGION = "us-east-1";

/** The one call the adapter makes; `IAMClient` satisfies it, tests pass a fake. */
export interface SimulateCustomPolicyClient {
  send(command: SimulateCustomPolicyCommand): Promise<SimulateCustomPolicyCommandOutput>;
}

export interface IamPolicySimulatorOptions {
  readonly region?: string;
  readonly client?: SimulateCustomPolicyClient;
  readonly logger?: IamSpecLogger;
}

const submit = (text: string, role: string): SubmittedPolicy => {
  const document = parsePolicyText(text, role);
  return { text: toPrettyJson(document), document };
};

export const submitPolicies = (request: SimulationRequest): SubmittedPolicies => ({
  identity: request.policyDocuments.map((text) => submit(text, "identity policy")),
  boundary: request.permissionsBoundaryDocuments.map((text) => submit(text, "permissions boundary")),
  resource: request.resourcePolicy === undefined ? undefined : submit(request.resourcePolicy, "resource policy"),
});

const toContextEntry = (entry: ContextEntry): IamContextEntry => ({
  ContextKeyName: entry.key,
  ContextKeyValues: [...entry.values],
  ContextKeyType: entry.type,
});

export const buildSimulateCustomPolicyInput = (
  request: SimulationRequest,
  policies: SubmittedPolicies,
): SimulateCustomPolicyCommandInput => ({
  PolicyInputList: policies.identity.map((policy) => policy.text),
  PermissionsBoundaryPolicyInputList:
    policies.boundary.length > 0 ? policies.boundary.map((policy) => policy.text) : undefined,
  ResourcePolicy: policies.resource?.text,
  ActionNames: [request.action],
  ResourceArns: [...request.resourceArns],
  ContextEntries: request.context.length > 0 ? request.context.map(toContextEntry) : undefined,
  CallerArn: request.callerArn,
  ResourceOwner: request.resourceOwner,
  ResourceHandlingOption: request.resourceHandlingOption,
});

export class IamPolicySimulator implements PolicySimulatorPort {
  private readonly client: SimulateCustomPolicyClient;
  private readonly logger: IamSpecLogger;

  constructor(options: IamPolicySimulatorOptions = {}) {
    this.client = options.client ?? new IAMClient({ region: options.region ?? DEFAULT_REGION });
    this.logger = options.logger ?? silentLogger;
  }

  simulate(request: SimulationRequest): Promise<Result<SimulationResponse, IamSpecError>> {
    return capture(async () => {
      const policies = submitPolicies(request);
      const input = buildSimulateCustomPolicyInput(request, policies);
      this.logger.debug("simulating custom policy", {
        action: request.action,
        resources: request.resourceArns,
        boundaries: policies.boundary.length,
      });

      const output = await this.client.send(new SimulateCustomPolicyCommand(input)).catch((error: unknown) => {
        this.logger.warn("simulator request failed", { action: request.action, error });
        return fail(
          createInfraError(
            ErrorCodes.SIMULATOR_REQUEST_FAILED,
            `Policy simulation failed for ${request.action}`,
            error,
            { action: request.action },
          ),
        );
      });

      const [result] = output.EvaluationResults ?? [];
      if (!result?.EvalDecision) {
        return fail(
          createError(ErrorCodes.SIMULATOR_EMPTY_RESULT, `Simulator returned no evaluation result for ${request.action}`, {
            action: request.action,
          }),
        );
      }

      return {
        decision: result.EvalDecision,
        matchedStatements: resolveMatchedStatements(result.MatchedStatements, policies),
        raw: { EvaluationResults: output.EvaluationResults, IsTruncated: output.IsTruncated },
      };
    });
  }
}

export const createIamPolicySimulator = (options: IamPolicySimulatorOptions = {}): PolicySimulatorPort =>
  new IamPolicySimulator(options);
