import type { Result } from "ts-results"

/** One document of the workload collection */
export type WorkloadItem = {
  key: number
  payload: string
  createdAt: Date
}

export type StoreOpCode = "read" | "write"

export type StoreOpFailedError = {
  type: "store-op-failed"
  op: StoreOpCode
  msg: string
  /** The error from the driver call, with stack trace */
  error: Error
}

export type StoreOpCancelledError = {
  type: "store-op-cancelled"
  op: StoreOpCode
  msg: string
  /** The abort reason */
  error: Error
}

export type StoreError = StoreOpFailedError | StoreOpCancelledError

/** Error factories for store errors */
export const StoreErrors = {
  OpFailed: (op: StoreOpCode, msg: string, error: Error): StoreError => ({ type: "store-op-failed", op, msg, error }),
  OpCancelled: (op: StoreOpCode, msg: string, error: Error): StoreError => ({ type: "store-op-cancelled", op, msg, error }),
}

/** Byte size of the document touched by one operation */
export type StoreOpResult = Result<number, StoreError>

/**
 * Performs single logical operations against the backing store.
 *
 * Implementations must honor the signal: an aborted signal settles the call
 * with a `store-op-cancelled` error.
 */
export interface IStoreGateway {
  /** Reads the document stored under `key`. A missing key reads 0 bytes */
  readOne(key: number, signal?: AbortSignal): Promise<StoreOpResult>

  /** Persists one document */
  writeOne(item: WorkloadItem, signal?: AbortSignal): Promise<StoreOpResult>
}
