import { collectDefaultMetrics, Counter, Histogram, Registry } from "prom-client"

export const DEFAULT_METRICS_NAMESPACE = "loadsim_base"
export const SERVICE_NAME_LABEL = "loadsim_service_name"

/** Latency buckets in seconds */
export const DEFAULT_LATENCY_BUCKETS = [0.0002, 0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 15, 25]

export type WorkloadMetricsArgs = {
  /** Subsystem segment of every metric name */
  subsystem: string
  /** Value of the service-name label attached to every metric */
  serviceName: string
  /** @default "loadsim_base" */
  namespace?: string
  /** Registry to register into. A fresh one is created when omitted */
  registry?: Registry
  latencyBuckets?: number[]
  /** Also collect process/runtime metrics into the registry */
  collectProcessMetrics?: boolean
}

export type WorkloadMetrics = {
  registry: Registry
  /** Number of requests received */
  requestCount: Counter<string>
  /** Processing time of requests in seconds, as counter */
  latencyCounter: Counter<string>
  /** Processing time of requests in seconds, as histogram */
  latencyHistogram: Histogram<string>
  /** Size of data transmitted in bytes */
  throughput: Counter<string>
}

/** Replaces anything outside the Prometheus name charset with "_" */
export function sanitizeMetricSegment(segment: string): string {
  const cleaned = segment.replace(/[^a-zA-Z0-9_]/g, "_")
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned
}

export function metricName(namespace: string, subsystem: string, name: string): string {
  return [namespace, subsystem, name]
    .filter((s) => s.length > 0)
    .map(sanitizeMetricSegment)
    .join("_")
}

export function createWorkloadMetrics(args: WorkloadMetricsArgs): WorkloadMetrics {
  const namespace = args.namespace ?? DEFAULT_METRICS_NAMESPACE
  const registry = args.registry ?? new Registry()
  const name = (n: string) => metricName(namespace, args.subsystem, n)

  registry.setDefaultLabels({ [SERVICE_NAME_LABEL]: args.serviceName })

  if (args.collectProcessMetrics) {
    collectDefaultMetrics({ register: registry })
  }

  return {
    registry,
    requestCount: new Counter({
      name: name("request_count"),
      help: "Number of requests received.",
      registers: [registry],
    }),
    latencyCounter: new Counter({
      name: name("latency_counter"),
      help: "Processing time taken of requests in seconds, as counter.",
      registers: [registry],
    }),
    latencyHistogram: new Histogram({
      name: name("latency_histogram"),
      help: "Processing time taken of requests in seconds, as histogram.",
      buckets: args.latencyBuckets ?? DEFAULT_LATENCY_BUCKETS,
      registers: [registry],
    }),
    throughput: new Counter({
      name: name("throughput"),
      help: "Size of data transmitted in bytes.",
      registers: [registry],
    }),
  }
}
