import { NodeSDK } from "@opentelemetry/sdk-node"
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { W3CTraceContextPropagator } from "@opentelemetry/core"
import { Resource } from "@opentelemetry/resources"
import { ParentBasedSampler, TraceIdRatioBasedSampler } from "@opentelemetry/sdk-trace-base"
import type { SpanExporter } from "@opentelemetry/sdk-trace-base"
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions"
import { trace } from "@opentelemetry/api"
import type { TextMapPropagator, Tracer } from "@opentelemetry/api"
import { toError } from "./log"
import type { Logger } from "./log"

/**
 * ============================================================================
 * OPENTELEMETRY SETUP
 * ============================================================================
 * USAGE IN CONSUMING APP:
 * 1. const tracing = initTracing({ serviceName, endpoint, logger })
 * 2. hand tracing.tracer / tracing.propagator to the tracing middleware
 * 3. await tracing.shutdown() on SIGTERM
 */

/**
 * "exporting": spans are batched and sent to the collector.
 * "traceless": the exporter could not be built (or tracing is disabled);
 * spans are non-recording and nothing leaves the process.
 */
export type TracingMode = "exporting" | "traceless"

export interface TracingConfig {
  serviceName: string
  serviceVersion?: string
  /** OTLP/HTTP traces endpoint, e.g. http://jaeger-collector:4318/v1/traces */
  endpoint: string
  /** Defaults to true. false starts directly in traceless mode */
  enabled?: boolean
  /** Share of new root traces recorded, 0..1. Inbound sampling decisions are honored. Defaults to 1 */
  samplingRatio?: number
  /** Name given to the tracer handed to middleware */
  tracerName?: string
  logger: Logger
  /** Builds the span exporter. Defaults to OTLP over HTTP */
  exporterFactory?: (endpoint: string) => SpanExporter
}

export interface TracingHandle {
  mode: TracingMode
  tracer: Tracer
  propagator: TextMapPropagator
  shutdown: () => Promise<void>
}

const DEFAULT_TRACER_NAME = "db-workload"

const otlpExporter = (endpoint: string): SpanExporter => new OTLPTraceExporter({ url: endpoint })

export const initTracing = (config: TracingConfig): TracingHandle => {
  const { serviceName, endpoint, logger } = config
  const serviceVersion = config.serviceVersion || "unknown-version"
  const tracerName = config.tracerName ?? DEFAULT_TRACER_NAME
  const samplingRatio = config.samplingRatio ?? 1
  const propagator = new W3CTraceContextPropagator()

  if (config.enabled === false) {
    logger.info("[Observability] Tracing disabled, running traceless", { serviceName })
    return traceless(tracerName, propagator)
  }

  let exporter: SpanExporter
  try {
    exporter = (config.exporterFactory ?? otlpExporter)(endpoint)
  } catch (e) {
    logger.error(toError(e), {
      msg: "[Observability] Failed to build trace exporter, running traceless",
      endpoint,
    })
    return traceless(tracerName, propagator)
  }

  const sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: serviceName,
      [ATTR_SERVICE_VERSION]: serviceVersion,
    }),
    traceExporter: exporter,
    sampler: new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(samplingRatio) }),
    textMapPropagator: propagator,
    // Spans come from the tracing middleware, not from auto-instrumentation
    instrumentations: [],
  })

  sdk.start()

  logger.info("[Observability] Tracing started", { serviceName, serviceVersion, endpoint, samplingRatio })

  return {
    mode: "exporting",
    tracer: trace.getTracer(tracerName),
    propagator,
    shutdown: async () => {
      try {
        await sdk.shutdown()
        logger.info("[Observability] Tracing terminated")
      } catch (e) {
        logger.error(toError(e), { msg: "[Observability] Error terminating tracing" })
      }
    },
  }
}

function traceless(tracerName: string, propagator: TextMapPropagator): TracingHandle {
  return {
    mode: "traceless",
    // No provider is registered, so this resolves to the API's no-op tracer
    tracer: trace.getTracer(tracerName),
    propagator,
    shutdown: async () => {},
  }
}
