import { metrics } from "@opentelemetry/api";
import type { Counter, Histogram, Meter, MetricOptions } from "@opentelemetry/api";

export interface IamSpecInstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

const DEFAULT_METER_NAME = "iamspec";

export const getIamSpecMeter = (options: IamSpecInstrumentationOptions = {}): Meter => {
  const meterOptions = options.schemaUrl ? { schemaUrl: options.schemaUrl } : undefined;
  return metrics.getMeter(options.name ?? DEFAULT_METER_NAME, options.version, meterOptions);
};

export interface IamSpecCounterOptions extends MetricOptions {
  readonly instrumentation?: IamSpecInstrumentationOptions;
}

export const createIamSpecCounter = (name: string, options: IamSpecCounterOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getIamSpecMeter(instrumentation).createCounter(name, counterOptions);
};

export interface IamSpecHistogramOptions extends MetricOptions {
  readonly instrumentation?: IamSpecInstrumentationOptions;
}

export const createIamSpecHistogram = (name: string, options: IamSpecHistogramOptions = {}): Histogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getIamSpecMeter(instrumentation).createHistogram(name, histogramOptions);
};
