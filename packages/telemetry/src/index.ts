export type {
  IamSpecInstrumentationOptions,
  IamSpecCounterOptions,
  IamSpecHistogramOptions,
} from "./metrics.js";
export { getIamSpecMeter, createIamSpecCounter, createIamSpecHistogram } from "./metrics.js";

export type { IamSpecLogger, IamSpecLoggerOptions, IamSpecLogLevel, LogFields, LogSink } from "./logging.js";
export {
  LOG_LEVELS,
  consoleSink,
  createIamSpecLogger,
  isLogLevel,
  silentLogger,
} from "./logging.js";

export type { IamSpecTracer, RunWithSpanOptions } from "./tracing.js";
export { getIamSpecTracer, runWithSpan } from "./tracing.js";
