import { isLogLevel } from "@loadsim/obs"
import type { LogLevel } from "@loadsim/obs"
import type { MongoStoreConfig } from "@loadsim/store-gateway"
import type { ListenAddress } from "./server"
import type { WorkloadConfig } from "./types"

export type AppConfig = Readonly<{
  /** Service name, used as metric label and trace resource */
  serviceName: string
  /** Metric subsystem segment */
  subsystem: string
  serviceVersion: string
  logLevel: LogLevel
  listen: ListenAddress
  workload: WorkloadConfig
  /** Seed of the workload random source. Time-derived when undefined */
  seed?: number
  store: MongoStoreConfig
  requestTimeoutMs: number
  tracing: {
    enabled: boolean
    /** OTLP/HTTP traces endpoint */
    endpoint: string
    /** Share of new root traces recorded, 0..1 */
    samplingRatio: number
  }
}>

export type LoadedConfig = {
  config: AppConfig
  /** Values that were rejected and replaced by their default */
  warnings: string[]
}

export const DEFAULT_LISTEN_ADDRESS = ":8080"

/**
 * Parses `host:port` or `:port`. IPv6 hosts are bracketed, e.g. `[::1]:8080`.
 * Returns null when the address is unusable.
 */
export function parseListenAddress(value: string): ListenAddress | null {
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d{1,5})$/.exec(value.trim())
  if (!match) {
    return null
  }
  const port = Number(match[3])
  if (port > 65535) {
    return null
  }
  const host = match[1] ?? match[2]
  return host ? { host, port } : { port }
}

/**
 * Reads configuration from the environment. Malformed values never fail the
 * load: they fall back to their default and are reported in `warnings`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const warnings: string[] = []

  const str = (key: string, fallback: string): string => {
    const value = env[key]?.trim()
    return value ? value : fallback
  }

  const optional = (key: string): string | undefined => {
    const value = env[key]?.trim()
    return value ? value : undefined
  }

  const nonNegativeInt = (key: string, fallback: number, min = 0): number => {
    const raw = env[key]?.trim()
    if (!raw) {
      return fallback
    }
    const value = Number(raw)
    if (!Number.isInteger(value) || value < min) {
      warnings.push(`${key}=${JSON.stringify(raw)} is not an integer >= ${min}, using ${fallback}`)
      return fallback
    }
    return value
  }

  const ratio = (key: string, fallback: number): number => {
    const raw = env[key]?.trim()
    if (!raw) {
      return fallback
    }
    const value = Number(raw)
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      warnings.push(`${key}=${JSON.stringify(raw)} is not a ratio between 0 and 1, using ${fallback}`)
      return fallback
    }
    return value
  }

  const bool = (key: string, fallback: boolean): boolean => {
    const raw = env[key]?.trim().toLowerCase()
    if (!raw) {
      return fallback
    }
    if (["1", "true", "yes", "on"].includes(raw)) return true
    if (["0", "false", "no", "off"].includes(raw)) return false
    warnings.push(`${key}=${JSON.stringify(raw)} is not a boolean, using ${fallback}`)
    return fallback
  }

  let listen = parseListenAddress(str("LOADSIM_LISTEN_ADDRESS", DEFAULT_LISTEN_ADDRESS))
  if (!listen) {
    warnings.push(`LOADSIM_LISTEN_ADDRESS=${JSON.stringify(env.LOADSIM_LISTEN_ADDRESS)} is not host:port, using ${DEFAULT_LISTEN_ADDRESS}`)
    listen = { port: 8080 }
  }

  let logLevel: LogLevel = "info"
  const rawLevel = str("LOG_LEVEL", "info").toLowerCase()
  if (isLogLevel(rawLevel)) {
    logLevel = rawLevel
  } else {
    warnings.push(`LOG_LEVEL=${JSON.stringify(rawLevel)} is not a known level, using info`)
  }

  const seedRaw = optional("LOADSIM_SEED")
  let seed: number | undefined
  if (seedRaw !== undefined) {
    const value = Number(seedRaw)
    if (Number.isInteger(value)) {
      seed = value
    } else {
      warnings.push(`LOADSIM_SEED=${JSON.stringify(seedRaw)} is not an integer, using a time-derived seed`)
    }
  }

  const user = optional("LOADSIM_DB_USER")
  const password = optional("LOADSIM_DB_PASSWORD")

  const config: AppConfig = {
    serviceName: str("LOADSIM_NAME", "name"),
    subsystem: str("LOADSIM_SUBSYSTEM", "subsystem"),
    serviceVersion: str("APP_VERSION", "unknown-version"),
    logLevel,
    listen,
    workload: Object.freeze({
      readOps: nonNegativeInt("LOADSIM_DB_READ_OPS", 0),
      writeOps: nonNegativeInt("LOADSIM_DB_WRITE_OPS", 0),
      keySpace: nonNegativeInt("LOADSIM_DB_KEY_SPACE", 10_000, 1),
      payloadBytes: nonNegativeInt("LOADSIM_DB_PAYLOAD_BYTES", 128),
    }),
    ...(seed !== undefined ? { seed } : {}),
    store: {
      uri: str("LOADSIM_DB_URI", "mongodb://localhost"),
      database: str("LOADSIM_DB_NAME", "data"),
      collection: str("LOADSIM_DB_COLLECTION", "items"),
      connectTimeoutMs: nonNegativeInt("LOADSIM_DB_CONNECT_TIMEOUT_MS", 10_000, 1),
      ...(user !== undefined ? { user } : {}),
      ...(password !== undefined ? { password } : {}),
    },
    requestTimeoutMs: nonNegativeInt("LOADSIM_REQUEST_TIMEOUT_MS", 30_000, 1),
    tracing: {
      enabled: bool("LOADSIM_TRACING_ENABLED", true),
      endpoint: str("OTEL_EXPORTER_OTLP_TRACES_ENDPOINT", "http://jaeger-collector:4318/v1/traces"),
      samplingRatio: ratio("LOADSIM_TRACE_SAMPLING_RATIO", 1),
    },
  }

  return { config: Object.freeze(config), warnings }
}

/** Config as safe to log: credentials removed */
export function redactConfig(config: AppConfig): Record<string, unknown> {
  const { password, ...store } = config.store
  return { ...config, store: { ...store, password: password === undefined ? undefined : "[redacted]" } }
}
