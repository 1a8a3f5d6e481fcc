import type { WorkloadMetrics } from "@loadsim/obs"
import type { ServiceMiddleware, WorkloadService } from "../types"

/** Monotonic clock in milliseconds */
export type Clock = () => number

const monotonicMs: Clock = () => performance.now()

/**
 * Counts every call and records its latency, whatever the outcome.
 * Throughput is recorded by the transport, which knows the encoded size.
 */
export const instrumentingMiddleware =
  (metrics: WorkloadMetrics, now: Clock = monotonicMs): ServiceMiddleware =>
  (next: WorkloadService): WorkloadService => ({
    async execute(ctx, request) {
      const begin = now()
      try {
        return await next.execute(ctx, request)
      } finally {
        const seconds = (now() - begin) / 1000
        metrics.requestCount.inc()
        metrics.latencyCounter.inc(seconds)
        metrics.latencyHistogram.observe(seconds)
      }
    },
  })
