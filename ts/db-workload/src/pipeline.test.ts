import { describe, it, expect, beforeEach } from "vitest"
import { ROOT_CONTEXT } from "@opentelemetry/api"
import { W3CTraceContextPropagator } from "@opentelemetry/core"
import { BasicTracerProvider, InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base"
import { createLogger, createWorkloadMetrics } from "@loadsim/obs"
import type { Logger, WorkloadMetrics } from "@loadsim/obs"
import { buildWorkloadEndpoint } from "./pipeline"
import { CaptureTransport, FixedSizeStore, flushLogs } from "./testing"
import type { CallContext, WorkloadConfig } from "./types"

const TRACE_ID = "0af7651916cd43dd8448eb211c80319c"
const PARENT_SPAN_ID = "b7ad6b7169203331"

const callContext = (): CallContext => ({
  otel: ROOT_CONTEXT,
  signal: new AbortController().signal,
  carrier: { traceparent: `00-${TRACE_ID}-${PARENT_SPAN_ID}-01` },
})

const shape = (readOps: number, writeOps: number): WorkloadConfig => ({ readOps, writeOps, keySpace: 1000, payloadBytes: 8 })

describe("buildWorkloadEndpoint", () => {
  let exporter: InMemorySpanExporter
  let provider: BasicTracerProvider
  let metrics: WorkloadMetrics
  let capture: CaptureTransport
  let logger: Logger
  let nowMs: number

  beforeEach(() => {
    exporter = new InMemorySpanExporter()
    provider = new BasicTracerProvider()
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter))
    metrics = createWorkloadMetrics({ subsystem: "test", serviceName: "svc" })
    capture = new CaptureTransport()
    logger = createLogger({ serviceName: "svc", serviceVersion: "test", level: "info", transports: [capture] })
    nowMs = 0
  })

  const build = (store: FixedSizeStore, workload: WorkloadConfig) =>
    buildWorkloadEndpoint({
      store,
      workload,
      seed: 1,
      logger,
      metrics,
      tracer: provider.getTracer("test"),
      propagator: new W3CTraceContextPropagator(),
      // every reading of the clock moves it 5ms forward
      clock: () => (nowMs += 5),
    })

  it("runs the workload once through every layer", async () => {
    const store = new FixedSizeStore(10)
    const endpoint = build(store, shape(3, 2))

    const result = await endpoint(callContext(), { requestId: "r-1" })
    await flushLogs()

    expect(result.val).toEqual({ success: true, bytes: 50, reads: 3, writes: 2, requestId: "r-1" })
    expect(store.calls).toHaveLength(5)

    const count = await metrics.requestCount.get()
    expect(count.values[0].value).toBe(1)
    const latency = await metrics.latencyCounter.get()
    expect(latency.values[0].value).toBe(0.005)

    const spans = exporter.getFinishedSpans()
    expect(spans).toHaveLength(1)
    expect(spans[0].parentSpanId).toBe(PARENT_SPAN_ID)

    const spanId = spans[0].spanContext().spanId
    expect(capture.lines.map((l) => [l.message, l.trace_id, l.span_id])).toEqual([
      ["execute called", TRACE_ID, spanId],
      ["execute completed", TRACE_ID, spanId],
    ])
  })

  it("stops on the failing read and still counts the request", async () => {
    const store = new FixedSizeStore(10, 2)
    const endpoint = build(store, shape(2, 0))

    const result = await endpoint(callContext(), {})

    expect(result.val).toMatchObject({ type: "workload-store-error", op: "read", index: 2 })
    expect(store.calls).toEqual(["read", "read"])
    const count = await metrics.requestCount.get()
    expect(count.values[0].value).toBe(1)
    expect(exporter.getFinishedSpans()[0].status.message).toBe("read failed: connection reset")
  })

  it("traces a payload that fails to narrow without reaching the service", async () => {
    const store = new FixedSizeStore(10)
    const endpoint = build(store, shape(1, 1))

    const result = await endpoint(callContext(), ["not", "an", "object"])

    expect(result.val).toEqual({ type: "decode-error", msg: "request must be a JSON object" })
    expect(store.calls).toEqual([])
    const count = await metrics.requestCount.get()
    expect(count.values[0].value).toBe(0)
    expect(exporter.getFinishedSpans()).toHaveLength(1)
  })
})
