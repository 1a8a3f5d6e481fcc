import type { TextMapPropagator, Tracer } from "@opentelemetry/api"
import type { Logger, WorkloadMetrics } from "@loadsim/obs"
import type { IStoreGateway } from "@loadsim/store-gateway"
import { chain, makeWorkloadEndpoint } from "./endpoint"
import { instrumentingMiddleware } from "./middleware/instrumenting"
import type { Clock } from "./middleware/instrumenting"
import { loggingMiddleware } from "./middleware/logging"
import { tracingMiddleware } from "./middleware/tracing"
import type { RandomSource } from "./random"
import { BaseWorkloadService } from "./service"
import type { Endpoint, WorkloadConfig } from "./types"

export type WorkloadPipelineArgs = {
  store: IStoreGateway
  workload: WorkloadConfig
  seed?: number
  random?: RandomSource
  logger: Logger
  metrics: WorkloadMetrics
  tracer: Tracer
  propagator: TextMapPropagator
  spanName?: string
  clock?: Clock
}

/**
 * Assembles Tracing(Endpoint(Logging(Instrumenting(BaseWorkloadService)))).
 */
export function buildWorkloadEndpoint(args: WorkloadPipelineArgs): Endpoint {
  const base = new BaseWorkloadService({
    store: args.store,
    config: args.workload,
    random: args.random,
    seed: args.seed,
  })

  const service = chain(
    loggingMiddleware(args.logger.child({ component: "workload-service" })),
    instrumentingMiddleware(args.metrics, args.clock),
  )(base)

  return tracingMiddleware({
    tracer: args.tracer,
    propagator: args.propagator,
    spanName: args.spanName,
  })(makeWorkloadEndpoint(service))
}
