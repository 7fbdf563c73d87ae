import { context, trace, SpanStatusCode, type Attributes, type Tracer } from '@opentelemetry/api';
import type { Config } from '@/config';

let tracer: Tracer | null = null;

export const initTracer = (config: Config): Tracer => {
  tracer = trace.getTracer(config.telemetry.serviceName, config.telemetry.serviceVersion);
  return tracer;
};

export const getTracer = (): Tracer => {
  if (tracer) {
    return tracer;
  }
  return trace.getTracer('synapse-fs');
};

/**
 * Run `fn` inside a new active span. The span is ended when the promise settles and marked
 * as failed when it rejects; the rejection is passed on unchanged.
 */
export const withSpan = async <T>(name: string, attributes: Attributes, fn: () => Promise<T>): Promise<T> => {
  const span = getTracer().startSpan(name, { attributes });

  try {
    const result = await context.with(trace.setSpan(context.active(), span), fn);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.recordException(error instanceof Error ? error : new Error(String(error)));
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    span.end();
  }
};
