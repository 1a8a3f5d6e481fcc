import { describe, it, expect, beforeEach } from "vitest"
import { ROOT_CONTEXT, SpanKind, SpanStatusCode, trace } from "@opentelemetry/api"
import { W3CTraceContextPropagator } from "@opentelemetry/core"
import { BasicTracerProvider, InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base"
import { Err, Ok } from "ts-results"
import { tracingMiddleware } from "./tracing"
import type { CallContext, Carrier, Endpoint, WorkloadError } from "../types"

const INBOUND_TRACE_ID = "0af7651916cd43dd8448eb211c80319c"
const INBOUND_SPAN_ID = "b7ad6b7169203331"
const TRACEPARENT = `00-${INBOUND_TRACE_ID}-${INBOUND_SPAN_ID}-01`

const callContext = (carrier: Carrier = {}): CallContext => ({
  otel: ROOT_CONTEXT,
  signal: new AbortController().signal,
  carrier,
})

describe("tracingMiddleware", () => {
  let exporter: InMemorySpanExporter
  let traced: (next: Endpoint) => Endpoint

  beforeEach(() => {
    exporter = new InMemorySpanExporter()
    const provider = new BasicTracerProvider()
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter))
    traced = tracingMiddleware({
      tracer: provider.getTracer("test"),
      propagator: new W3CTraceContextPropagator(),
    })
  })

  it("parents the span on the inbound traceparent", async () => {
    const endpoint = traced(async () => Ok({ success: true }))

    await endpoint(callContext({ traceparent: TRACEPARENT }), {})

    const spans = exporter.getFinishedSpans()
    expect(spans).toHaveLength(1)
    expect(spans[0].name).toBe("BaseRequest")
    expect(spans[0].kind).toBe(SpanKind.SERVER)
    expect(spans[0].parentSpanId).toBe(INBOUND_SPAN_ID)
    expect(spans[0].spanContext().traceId).toBe(INBOUND_TRACE_ID)
    expect(spans[0].spanContext().spanId).not.toBe(INBOUND_SPAN_ID)
  })

  it("starts a root span without a propagated context", async () => {
    const endpoint = traced(async () => Ok({ success: true }))

    await endpoint(callContext(), {})

    const [span] = exporter.getFinishedSpans()
    expect(span.parentSpanId).toBeUndefined()
    expect(span.spanContext().traceId).not.toBe(INBOUND_TRACE_ID)
  })

  it("treats a malformed traceparent as absent", async () => {
    const endpoint = traced(async () => Ok({ success: true }))

    const result = await endpoint(callContext({ traceparent: "not-a-traceparent" }), {})

    expect(result.ok).toBe(true)
    expect(exporter.getFinishedSpans()[0].parentSpanId).toBeUndefined()
  })

  it("hands the span to the wrapped endpoint through the call context", async () => {
    let seen: string | undefined
    const endpoint = traced(async (ctx) => {
      seen = trace.getSpanContext(ctx.otel)?.spanId
      return Ok({ success: true })
    })

    await endpoint(callContext({ traceparent: TRACEPARENT }), {})

    expect(seen).toBe(exporter.getFinishedSpans()[0].spanContext().spanId)
  })

  it("ends the span and marks it failed on an error result", async () => {
    const failure: WorkloadError = {
      type: "workload-store-error",
      op: "read",
      index: 1,
      msg: "read failed: timeout",
      error: new Error("timeout"),
    }
    const endpoint = traced(async () => Err(failure))

    const result = await endpoint(callContext(), {})

    expect(result.err).toBe(true)
    const [span] = exporter.getFinishedSpans()
    expect(span.ended).toBe(true)
    expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: "read failed: timeout" })
    expect(span.attributes["workload.error_type"]).toBe("workload-store-error")
    expect(span.events.map((e) => e.name)).toEqual(["exception"])
  })

  it("ends the span when the wrapped endpoint throws", async () => {
    const endpoint = traced(async () => {
      throw new Error("boom")
    })

    await expect(endpoint(callContext(), {})).rejects.toThrow("boom")

    const [span] = exporter.getFinishedSpans()
    expect(span.ended).toBe(true)
    expect(span.status.code).toBe(SpanStatusCode.ERROR)
  })

  it("ends the span on success with an unset status", async () => {
    const endpoint = traced(async () => Ok({ success: true }))

    await endpoint(callContext(), {})

    const [span] = exporter.getFinishedSpans()
    expect(span.ended).toBe(true)
    expect(span.status.code).toBe(SpanStatusCode.UNSET)
  })

  it("uses the configured span name", async () => {
    const exporterForName = new InMemorySpanExporter()
    const provider = new BasicTracerProvider()
    provider.addSpanProcessor(new SimpleSpanProcessor(exporterForName))
    const endpoint = tracingMiddleware({
      tracer: provider.getTracer("test"),
      propagator: new W3CTraceContextPropagator(),
      spanName: "Workload",
    })(async () => Ok({ success: true }))

    await endpoint(callContext(), {})

    expect(exporterForName.getFinishedSpans()[0].name).toBe("Workload")
  })
})
