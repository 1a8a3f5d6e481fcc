import { SpanKind, SpanStatusCode, defaultTextMapGetter, trace } from "@opentelemetry/api"
import type { TextMapPropagator, Tracer } from "@opentelemetry/api"
import { toError } from "@loadsim/obs"
import type { Endpoint, EndpointMiddleware } from "../types"

export const DEFAULT_SPAN_NAME = "BaseRequest"

export type TracingMiddlewareArgs = {
  tracer: Tracer
  propagator: TextMapPropagator
  /** @default "BaseRequest" */
  spanName?: string
}

/**
 * Opens one server span per endpoint call, parented on the trace context found
 * in the inbound carrier. Inner layers see the span through `ctx.otel`.
 */
export const tracingMiddleware =
  (args: TracingMiddlewareArgs): EndpointMiddleware =>
  (next: Endpoint): Endpoint =>
    async (ctx, request) => {
      const parent = args.propagator.extract(ctx.otel, ctx.carrier, defaultTextMapGetter)
      const span = args.tracer.startSpan(args.spanName ?? DEFAULT_SPAN_NAME, { kind: SpanKind.SERVER }, parent)
      const inner = { ...ctx, otel: trace.setSpan(parent, span) }

      try {
        const result = await next(inner, request)
        if (result.err) {
          const e = result.val
          span.setStatus({ code: SpanStatusCode.ERROR, message: e.msg })
          span.setAttribute("workload.error_type", e.type)
          if (e.type !== "decode-error") {
            span.recordException(e.error)
          }
        }
        return result
      } catch (e) {
        const error = toError(e)
        span.recordException(error)
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message })
        throw e
      } finally {
        span.end()
      }
    }
