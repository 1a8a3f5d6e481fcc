import { describe, it, expect, vi } from "vitest"
import winston from "winston"
import { defaultTextMapSetter, ROOT_CONTEXT } from "@opentelemetry/api"
import { initTracing } from "./instrumentation"
import { createLogger } from "./log"
import type { Logger } from "./log"

function fakeLogger(): Logger {
  return createLogger({
    serviceName: "svc-a",
    serviceVersion: "test",
    level: "debug",
    transports: [new winston.transports.Console({ silent: true })],
  })
}

describe("initTracing", () => {
  it("falls back to traceless mode when the exporter cannot be built", async () => {
    const logger = fakeLogger()
    const errorSpy = vi.spyOn(logger, "error")
    const handle = initTracing({
      serviceName: "svc-a",
      endpoint: "http://collector:4318/v1/traces",
      logger,
      exporterFactory: () => {
        throw new Error("bad endpoint")
      },
    })

    expect(handle.mode).toBe("traceless")
    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy.mock.calls[0][0].message).toBe("bad endpoint")

    const span = handle.tracer.startSpan("BaseRequest")
    expect(span.isRecording()).toBe(false)
    span.end()

    await expect(handle.shutdown()).resolves.toBeUndefined()
  })

  it("starts traceless when tracing is disabled", () => {
    const exporterFactory = vi.fn()
    const handle = initTracing({
      serviceName: "svc-a",
      endpoint: "http://collector:4318/v1/traces",
      enabled: false,
      logger: fakeLogger(),
      exporterFactory,
    })

    expect(handle.mode).toBe("traceless")
    expect(exporterFactory).not.toHaveBeenCalled()
  })

  it("uses the W3C trace-context propagator in either mode", () => {
    const handle = initTracing({
      serviceName: "svc-a",
      endpoint: "http://collector:4318/v1/traces",
      enabled: false,
      logger: fakeLogger(),
    })

    expect(handle.propagator.fields()).toEqual(["traceparent", "tracestate"])

    const carrier: Record<string, string> = {}
    handle.propagator.inject(ROOT_CONTEXT, carrier, defaultTextMapSetter)
    // Nothing to inject without an active span
    expect(carrier).toEqual({})
  })
})
