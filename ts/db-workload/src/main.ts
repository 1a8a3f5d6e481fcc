import { createLogger, createWorkloadMetrics, initTracing, toError } from "@loadsim/obs"
import { MongoStoreGateway } from "@loadsim/store-gateway"
import { loadConfig, redactConfig } from "./config"
import { buildWorkloadEndpoint } from "./pipeline"
import { WorkloadServer } from "./server"

async function main(): Promise<void> {
  const { config, warnings } = loadConfig()

  const logger = createLogger({
    serviceName: config.serviceName,
    serviceVersion: config.serviceVersion,
    level: config.logLevel,
  })
  for (const warning of warnings) {
    logger.warn("config value rejected", { warning })
  }
  logger.info("starting db-workload", { config: redactConfig(config) })

  const tracing = initTracing({
    serviceName: config.serviceName,
    serviceVersion: config.serviceVersion,
    endpoint: config.tracing.endpoint,
    enabled: config.tracing.enabled,
    samplingRatio: config.tracing.samplingRatio,
    logger,
  })

  const metrics = createWorkloadMetrics({
    subsystem: config.subsystem,
    serviceName: config.serviceName,
    collectProcessMetrics: true,
  })

  let store: MongoStoreGateway
  try {
    store = await MongoStoreGateway.connect(config.store)
  } catch (e) {
    logger.emergency(toError(e), { msg: "could not connect to the store", uri: config.store.uri })
    await tracing.shutdown()
    process.exit(1)
  }
  logger.info("connected to the store", { database: config.store.database, collection: config.store.collection })

  const endpoint = buildWorkloadEndpoint({
    store,
    workload: config.workload,
    seed: config.seed,
    logger,
    metrics,
    tracer: tracing.tracer,
    propagator: tracing.propagator,
  })

  const server = new WorkloadServer({
    listen: config.listen,
    endpoint,
    metrics,
    logger,
    requestTimeoutMs: config.requestTimeoutMs,
  })
  await server.start()

  let stopping = false
  const shutdown = async (signal: string) => {
    if (stopping) return
    stopping = true
    logger.info("shutting down", { signal })
    try {
      await server.stop()
      await store.disconnect()
    } catch (e) {
      logger.error(toError(e), { msg: "error during shutdown" })
      process.exitCode = 1
    } finally {
      await tracing.shutdown()
    }
  }

  process.once("SIGTERM", () => void shutdown("SIGTERM"))
  process.once("SIGINT", () => void shutdown("SIGINT"))
}

main().catch((e: unknown) => {
  console.error(e)
  process.exit(1)
})
