import {
  createIamSpecCounter,
  createIamSpecHistogram,
  getIamSpecTracer,
  silentLogger,
  type IamSpecInstrumentationOptions,
  type IamSpecLogger,
  type IamSpecTracer,
} from "@iamspec/telemetry";

export interface RunTelemetryMetrics {
  readonly simulationCounter: ReturnType<typeof createIamSpecCounter>;
  readonly simulationDuration: ReturnType<typeof createIamSpecHistogram>;
}

export interface RunTelemetryOptions {
  readonly instrumentation?: IamSpecInstrumentationOptions;
  readonly tracer?: IamSpecTracer;
  readonly logger?: IamSpecLogger;
  readonly metrics?: Partial<RunTelemetryMetrics>;
}

export interface RunTelemetryContext {
  readonly tracer: IamSpecTracer;
  readonly logger: IamSpecLogger;
  readonly metrics: RunTelemetryMetrics;
}

const DEFAULT_INSTRUMENTATION: IamSpecInstrumentationOptions = { name: "iamspec" };

export const createRunTelemetry = (options: RunTelemetryOptions = {}): RunTelemetryContext => {
  const instrumentation: IamSpecInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const metrics: RunTelemetryMetrics = {
    simulationCounter:
      options.metrics?.simulationCounter ??
      createIamSpecCounter("iamspec_simulations_total", {
        description: "Count of simulator calls by outcome status.",
        instrumentation,
      }),
    simulationDuration:
      options.metrics?.simulationDuration ??
      createIamSpecHistogram("iamspec_simulation_duration_ms", {
        description: "Duration of simulator calls.",
        unit: "ms",
        instrumentation,
      }),
  };

  return {
    tracer: options.tracer ?? getIamSpecTracer(instrumentation),
    logger: options.logger ?? silentLogger,
    metrics,
  } satisfies RunTelemetryContext;
};
