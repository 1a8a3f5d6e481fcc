import { Err, Ok } from "ts-results"
import { StoreErrors } from "./gateway"
import type { StoreOpCode, StoreOpResult } from "./gateway"

/** Reason carried by an AbortSignal, as an Error */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason
  if (reason instanceof Error) {
    return reason
  }
  return new Error(reason === undefined ? "operation aborted" : String(reason))
}

/**
 * Settles with the work's outcome, or with the abort reason as soon as the
 * signal fires. The work itself is not interrupted.
 */
export function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return work
  }
  if (signal.aborted) {
    return Promise.reject(abortReason(signal))
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal))
    signal.addEventListener("abort", onAbort, { once: true })

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(error)
      },
    )
  })
}

/**
 * Runs one store operation and maps its outcome to a StoreOpResult.
 * Never calls `fn` when the signal is already aborted.
 */
export async function runStoreOp(
  op: StoreOpCode,
  fn: () => Promise<number>,
  signal?: AbortSignal,
): Promise<StoreOpResult> {
  if (signal?.aborted) {
    return Err(StoreErrors.OpCancelled(op, `${op} cancelled before start`, abortReason(signal)))
  }

  try {
    const bytes = await raceAbort(fn(), signal)
    return Ok(bytes)
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e))
    if (signal?.aborted) {
      return Err(StoreErrors.OpCancelled(op, `${op} cancelled`, error))
    }
    return Err(StoreErrors.OpFailed(op, `${op} failed: ${error.message}`, error))
  }
}
