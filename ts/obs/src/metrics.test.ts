import { describe, it, expect } from "vitest"
import { Registry } from "prom-client"
import { createWorkloadMetrics, metricName, sanitizeMetricSegment } from "./metrics"

describe("metricName", () => {
  it("joins namespace, subsystem and name", () => {
    expect(metricName("loadsim_base", "orders", "request_count")).toBe("loadsim_base_orders_request_count")
  })

  it("skips empty segments", () => {
    expect(metricName("loadsim_base", "", "throughput")).toBe("loadsim_base_throughput")
  })

  it("sanitizes characters outside the Prometheus charset", () => {
    expect(sanitizeMetricSegment("order-db.v2")).toBe("order_db_v2")
    expect(sanitizeMetricSegment("2nd")).toBe("_2nd")
  })
})

describe("createWorkloadMetrics", () => {
  it("registers the four workload metrics", async () => {
    const registry = new Registry()
    createWorkloadMetrics({ subsystem: "orders", serviceName: "svc-a", registry })

    const names = (await registry.getMetricsAsJSON()).map((m) => m.name).sort()
    expect(names).toEqual([
      "loadsim_base_orders_latency_counter",
      "loadsim_base_orders_latency_histogram",
      "loadsim_base_orders_request_count",
      "loadsim_base_orders_throughput",
    ])
  })

  it("labels exposed samples with the service name", async () => {
    const metrics = createWorkloadMetrics({ subsystem: "orders", serviceName: "svc-a" })
    metrics.requestCount.inc()
    metrics.throughput.inc(42)

    const text = await metrics.registry.metrics()
    expect(text).toContain('loadsim_base_orders_request_count{loadsim_service_name="svc-a"} 1')
    expect(text).toContain('loadsim_base_orders_throughput{loadsim_service_name="svc-a"} 42')
  })

  it("uses the configured latency buckets", async () => {
    const metrics = createWorkloadMetrics({
      subsystem: "orders",
      serviceName: "svc-a",
      latencyBuckets: [0.1, 1],
    })
    metrics.latencyHistogram.observe(0.5)

    const { values } = await metrics.latencyHistogram.get()
    const buckets = values
      .filter((v) => v.metricName === "loadsim_base_orders_latency_histogram_bucket")
      .map((v) => [v.labels.le, v.value])
    expect(buckets).toEqual([
      [0.1, 0],
      [1, 1],
      ["+Inf", 1],
    ])
  })
})
