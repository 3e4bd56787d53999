import { SpanStatusCode, trace } from "@opentelemetry/api";
import type { Span, SpanAttributes, SpanOptions, Tracer } from "@opentelemetry/api";

import type { IamSpecInstrumentationOptions } from "./metrics.js";

export type IamSpecTracer = Tracer;

export interface RunWithSpanOptions {
  readonly spanOptions?: SpanOptions;
  readonly attributes?: SpanAttributes;
}

export const getIamSpecTracer = (options: IamSpecInstrumentationOptions = {}): Tracer =>
  trace.getTracer(options.name ?? "iamspec", options.version);

export const runWithSpan = async <T>(
  tracer: Tracer,
  name: string,
  callback: (span: Span) => Promise<T>,
  options: RunWithSpanOptions = {},
): Promise<T> =>
  tracer.startActiveSpan(name, options.spanOptions ?? {}, async (span) => {
    span.setAttributes(options.attributes ?? {});
    try {
      const result = await callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      if (error instanceof Error) {
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  });
