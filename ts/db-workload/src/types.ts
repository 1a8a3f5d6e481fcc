import type { Context } from "@opentelemetry/api"
import type { Result } from "ts-results"
import type { StoreError, StoreOpCode } from "@loadsim/store-gateway"

/** Fixed per service instance; changing it means restarting the service */
export type WorkloadConfig = Readonly<{
  /** Reads performed per request */
  readOps: number
  /** Writes performed per request */
  writeOps: number
  /** Keys are drawn from [0, keySpace) */
  keySpace: number
  /** Length of the random payload written per write */
  payloadBytes: number
}>

/** Opaque per-call value; it never changes the workload shape */
export type WorkloadRequest = {
  requestId?: string
}

export type WorkloadResponse = {
  success: true
  /** Total byte size of all store operations */
  bytes: number
  reads: number
  writes: number
  requestId?: string
}

/** Inbound headers, or any header-like map used for trace propagation */
export type Carrier = Record<string, string | string[] | undefined>

/**
 * Everything a call carries through the pipeline, passed explicitly
 * from the transport down to the store gateway.
 */
export type CallContext = {
  /** OpenTelemetry context holding the call's span once tracing has run */
  otel: Context
  /** Fires on deadline or client disconnect */
  signal: AbortSignal
  /** Propagation carrier of the inbound call */
  carrier: Carrier
}

export type WorkloadStoreError = {
  type: "workload-store-error"
  op: StoreOpCode
  /** 1-based position of the failed operation within the request */
  index: number
  msg: string
  /** The error from the store, with stack trace */
  error: Error
}

export type WorkloadCancelledError = {
  type: "workload-cancelled"
  op: StoreOpCode
  index: number
  msg: string
  error: Error
}

export type DecodeError = {
  type: "decode-error"
  msg: string
}

export type WorkloadError = WorkloadStoreError | WorkloadCancelledError | DecodeError

/** Error factories for workload errors */
export const WorkloadErrors = {
  FromStore: (index: number, e: StoreError): WorkloadError =>
    e.type === "store-op-cancelled"
      ? { type: "workload-cancelled", op: e.op, index, msg: e.msg, error: e.error }
      : { type: "workload-store-error", op: e.op, index, msg: e.msg, error: e.error },
  Cancelled: (op: StoreOpCode, index: number, msg: string, error: Error): WorkloadError => ({
    type: "workload-cancelled",
    op,
    index,
    msg,
    error,
  }),
  Decode: (msg: string): WorkloadError => ({ type: "decode-error", msg }),
}

export type WorkloadResult = Result<WorkloadResponse, WorkloadError>

/** The capability every layer of the pipeline implements */
export interface WorkloadService {
  execute(ctx: CallContext, request: WorkloadRequest): Promise<WorkloadResult>
}

/** Wraps a service with one cross-cutting behavior, preserving its interface */
export type ServiceMiddleware = (next: WorkloadService) => WorkloadService

/** Generic callable the transport invokes */
export type Endpoint = (ctx: CallContext, request: unknown) => Promise<Result<unknown, WorkloadError>>

export type EndpointMiddleware = (next: Endpoint) => Endpoint
