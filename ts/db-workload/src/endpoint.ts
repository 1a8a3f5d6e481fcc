import { Err, Ok } from "ts-results"
import type { Result } from "ts-results"
import { WorkloadErrors } from "./types"
import type { Endpoint, WorkloadError, WorkloadRequest, WorkloadService } from "./types"

/** Narrows a decoded payload to a WorkloadRequest. A missing payload is an empty request */
export function toWorkloadRequest(payload: unknown): Result<WorkloadRequest, WorkloadError> {
  if (payload === undefined || payload === null) {
    return Ok({})
  }
  if (typeof payload !== "object" || Array.isArray(payload)) {
    return Err(WorkloadErrors.Decode("request must be a JSON object"))
  }

  const requestId = "requestId" in payload ? payload.requestId : undefined
  if (requestId === undefined) {
    return Ok({})
  }
  if (typeof requestId !== "string") {
    return Err(WorkloadErrors.Decode("requestId must be a string"))
  }
  return Ok({ requestId })
}

/** Adapts the wrapped service to the generic callable the transport invokes */
export function makeWorkloadEndpoint(service: WorkloadService): Endpoint {
  return async (ctx, payload) => {
    const request = toWorkloadRequest(payload)
    if (request.err) {
      return request
    }
    return service.execute(ctx, request.val)
  }
}

/** Composes middlewares; the first one given ends up outermost */
export function chain<T>(...middlewares: ((next: T) => T)[]): (next: T) => T {
  return (next) => middlewares.reduceRight((wrapped, mw) => mw(wrapped), next)
}
