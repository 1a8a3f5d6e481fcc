import { isSpanContextValid, trace } from "@opentelemetry/api"
import { toError } from "@loadsim/obs"
import type { Logger, LogMeta } from "@loadsim/obs"
import type { CallContext, ServiceMiddleware, WorkloadError, WorkloadResult, WorkloadService } from "../types"

function traceBindings(ctx: CallContext): LogMeta {
  const spanContext = trace.getSpanContext(ctx.otel)
  if (!spanContext || !isSpanContextValid(spanContext)) {
    return {}
  }
  return { trace_id: spanContext.traceId, span_id: spanContext.spanId }
}

function errorMeta(e: WorkloadError): LogMeta {
  if (e.type === "decode-error") {
    return { errorType: e.type }
  }
  return { errorType: e.type, op: e.op, index: e.index }
}

/**
 * Logs entry and completion of every call. Never alters the request, the
 * response or the error.
 */
export const loggingMiddleware =
  (logger: Logger): ServiceMiddleware =>
  (next: WorkloadService): WorkloadService => ({
    async execute(ctx, request) {
      const log = logger.child(traceBindings(ctx))
      const started = Date.now()
      log.info("execute called", { requestId: request.requestId })

      let result: WorkloadResult
      try {
        result = await next.execute(ctx, request)
      } catch (e) {
        log.error(toError(e), { msg: "execute threw", tookMs: Date.now() - started })
        throw e
      }

      const tookMs = Date.now() - started
      if (result.ok) {
        log.info("execute completed", { bytes: result.val.bytes, tookMs })
      } else {
        const e = result.val
        const error = e.type === "decode-error" ? new Error(e.msg) : e.error
        log.error(error, { msg: e.msg, tookMs, ...errorMeta(e) })
      }
      return result
    },
  })
