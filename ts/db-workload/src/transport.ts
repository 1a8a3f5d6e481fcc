import { ROOT_CONTEXT } from "@opentelemetry/api"
import { Err, Ok } from "ts-results"
import type { Result } from "ts-results"
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express"
import { toError } from "@loadsim/obs"
import type { Logger, WorkloadMetrics } from "@loadsim/obs"
import { WorkloadErrors } from "./types"
import type { CallContext, Endpoint, WorkloadError } from "./types"

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000

/** Response as written to the wire */
export type EncodedResponse = {
  status: number
  body: string
  /** Byte length of `body` */
  size: number
}

/** Parses a raw JSON body. An empty body carries no payload */
export function decodeWorkloadRequest(raw: string): Result<unknown, WorkloadError> {
  if (raw.trim() === "") {
    return Ok(undefined)
  }
  try {
    const payload: unknown = JSON.parse(raw)
    return Ok(payload)
  } catch (e) {
    return Err(WorkloadErrors.Decode(`malformed JSON body: ${toError(e).message}`))
  }
}

export function statusForError(e: WorkloadError): number {
  switch (e.type) {
    case "decode-error":
      return 400
    case "workload-cancelled":
      return 503
    case "workload-store-error":
      return 500
  }
}

export function encodeResponse(result: Result<unknown, WorkloadError>): EncodedResponse {
  const status = result.ok ? 200 : statusForError(result.val)
  const body = result.ok
    ? JSON.stringify(result.val)
    : JSON.stringify({ success: false, error: result.val.type, message: result.val.msg })
  return { status, body, size: Buffer.byteLength(body) }
}

const INTERNAL_ERROR_BODY = JSON.stringify({ success: false, error: "internal-error", message: "internal error" })

const INTERNAL_ERROR: EncodedResponse = {
  status: 500,
  body: INTERNAL_ERROR_BODY,
  size: Buffer.byteLength(INTERNAL_ERROR_BODY),
}

/** Writes the encoded response and hands its size to the throughput counter */
function sendEncoded(res: Response, metrics: Pick<WorkloadMetrics, "throughput">, encoded: EncodedResponse): void {
  res.status(encoded.status).type("application/json").send(encoded.body)
  metrics.throughput.inc(encoded.size)
}

/** HTTP status a body reader attached to its error, when it is a client error */
function clientErrorStatus(e: unknown): number | undefined {
  if (typeof e === "object" && e !== null && "status" in e && typeof e.status === "number") {
    return e.status >= 400 && e.status < 500 ? e.status : undefined
  }
  return undefined
}

export type WorkloadHandlerArgs = {
  /** Traced endpoint */
  endpoint: Endpoint
  metrics: Pick<WorkloadMetrics, "throughput">
  logger: Logger
  /** Deadline of one call. @default 30000 */
  requestTimeoutMs?: number
}

/**
 * Express handler running one call through the endpoint. The body must have
 * been read as text beforehand.
 */
export function createWorkloadHandler(args: WorkloadHandlerArgs): RequestHandler {
  const { endpoint, metrics, logger } = args
  const timeoutMs = args.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS

  return async (req: Request, res: Response) => {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(new Error(`request timed out after ${timeoutMs}ms`)), timeoutMs)
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort(new Error("client disconnected"))
      }
    })

    const ctx: CallContext = {
      otel: ROOT_CONTEXT,
      signal: controller.signal,
      carrier: req.headers,
    }

    try {
      const raw: unknown = req.body
      const decoded = decodeWorkloadRequest(typeof raw === "string" ? raw : "")
      const result = decoded.ok ? await endpoint(ctx, decoded.val) : decoded

      if (result.err && result.val.type === "decode-error") {
        logger.warn("rejected request", { path: req.path, method: req.method, reason: result.val.msg })
      }

      sendEncoded(res, metrics, encodeResponse(result))
    } catch (e) {
      logger.error(toError(e), { msg: "unhandled error in workload handler", path: req.path, method: req.method })
      sendEncoded(res, metrics, INTERNAL_ERROR)
    } finally {
      clearTimeout(timer)
    }
  }
}

export type BodyErrorHandlerArgs = Pick<WorkloadHandlerArgs, "metrics" | "logger">

/**
 * Express error handler placed after the body reader. A body it refused
 * (too large, unknown charset or encoding) answers as a decode error with the
 * reader's status; anything else is an internal error.
 */
export function createBodyErrorHandler(args: BodyErrorHandlerArgs): ErrorRequestHandler {
  const { metrics, logger } = args

  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err)
      return
    }

    const error = toError(err)
    const status = clientErrorStatus(err)
    if (status === undefined) {
      logger.error(error, { msg: "unhandled error before workload handler", path: req.path, method: req.method })
      sendEncoded(res, metrics, INTERNAL_ERROR)
      return
    }

    const rejected = WorkloadErrors.Decode(`unreadable body: ${error.message}`)
    logger.warn("rejected request", { path: req.path, method: req.method, reason: rejected.msg, status })
    sendEncoded(res, metrics, { ...encodeResponse(Err(rejected)), status })
  }
}
