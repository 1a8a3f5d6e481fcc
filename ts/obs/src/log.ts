import winston from "winston"
import { trace, context } from "@opentelemetry/api"

/**
 * Levels ordered by urgency. `emergency` is reserved for failures that end
 * the process.
 */
const levels = {
  emergency: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

export type LogLevel = keyof typeof levels

const severities: Record<LogLevel, string> = {
  emergency: "EMERGENCY",
  error: "ERROR",
  warn: "WARNING",
  info: "INFO",
  debug: "DEBUG",
}

export type LogMeta = Record<string, unknown>

/**
 * Narrow logging surface handed to every component. Errors are always passed
 * as Error objects so their stack reaches the log line.
 */
export interface Logger {
  debug: (message: string, meta?: LogMeta) => void
  info: (message: string, meta?: LogMeta) => void
  warn: (message: string, meta?: LogMeta) => void
  error: (err: Error, meta?: LogMeta) => void
  emergency: (err: Error, meta?: LogMeta) => void
  /** Logger whose lines all carry `bindings` */
  child: (bindings: LogMeta) => Logger
  _root: winston.Logger
}

export type LoggerArgs = {
  serviceName: string
  serviceVersion: string
  level: LogLevel
  /** Merged into every line */
  defaultMeta?: LogMeta
  /** Replaces the JSON console transport */
  transports?: winston.transport[]
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levels, value)
}

function severityOf(level: string): string {
  return isLogLevel(level) ? severities[level] : "INFO"
}

const wrap = (w: winston.Logger): Logger => {
  const failure = (level: "error" | "emergency") => (err: Error, meta?: LogMeta) => {
    w.log(level, err.message, { ...meta, error: err })
  }

  return {
    debug: (message, meta) => w.debug(message, meta),
    info: (message, meta) => w.info(message, meta),
    warn: (message, meta) => w.warn(message, meta),
    error: failure("error"),
    emergency: failure("emergency"),
    child: (bindings) => wrap(w.child(bindings)),
    _root: w,
  }
}

/**
 * JSON logger writing one object per line to stdout.
 *
 * Every line gets a `severity`; error lines also get a `serviceContext` and the
 * stack of the error passed in. Unless a child logger already bound them,
 * `trace_id` and `span_id` are taken from the active OpenTelemetry span.
 */
export const createLogger = (args: LoggerArgs): Logger => {
  const { serviceName, serviceVersion, level, defaultMeta, transports } = args
  const serviceContext = { service: serviceName, version: serviceVersion }

  const enrich = winston.format((info) => {
    const severity = severityOf(info.level)
    info["severity"] = severity

    if (severity === "ERROR" || severity === "EMERGENCY") {
      info["serviceContext"] = serviceContext
    }

    if (info["trace_id"] === undefined) {
      const span = trace.getSpan(context.active())
      if (span) {
        const { traceId, spanId } = span.spanContext()
        info["trace_id"] = traceId
        info["span_id"] = spanId
      }
    }

    const error = info["error"]
    if (error instanceof Error) {
      info["stack"] = error.stack
      if (info.message !== error.message) {
        info.message = `${String(info.message)}: ${error.message}`
      }
    }

    return info
  })

  const w = winston.createLogger({
    levels,
    level,
    defaultMeta: { service: serviceName, version: serviceVersion, ...defaultMeta },
    format: winston.format.combine(enrich(), winston.format.json()),
    transports: transports ?? [new winston.transports.Console()],
  })

  return wrap(w)
}

/** Normalizes anything thrown into an Error */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}
