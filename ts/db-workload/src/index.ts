export { BaseWorkloadService } from "./service"
export type { BaseWorkloadServiceArgs } from "./service"
export { loggingMiddleware } from "./middleware/logging"
export { instrumentingMiddleware } from "./middleware/instrumenting"
export type { Clock } from "./middleware/instrumenting"
export { tracingMiddleware, DEFAULT_SPAN_NAME } from "./middleware/tracing"
export type { TracingMiddlewareArgs } from "./middleware/tracing"
export { chain, makeWorkloadEndpoint, toWorkloadRequest } from "./endpoint"
export {
  createBodyErrorHandler,
  createWorkloadHandler,
  decodeWorkloadRequest,
  encodeResponse,
  statusForError,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from "./transport"
export type { BodyErrorHandlerArgs, EncodedResponse, WorkloadHandlerArgs } from "./transport"
export { WorkloadServer } from "./server"
export type { ListenAddress, WorkloadServerArgs } from "./server"
export { loadConfig, parseListenAddress, redactConfig, DEFAULT_LISTEN_ADDRESS } from "./config"
export type { AppConfig, LoadedConfig } from "./config"
export { buildWorkloadEndpoint } from "./pipeline"
export type { WorkloadPipelineArgs } from "./pipeline"
export { createSeededRandom, randomInt, randomString, timeSeed } from "./random"
export type { RandomSource } from "./random"
export { WorkloadErrors } from "./types"
export type {
  CallContext,
  Carrier,
  DecodeError,
  Endpoint,
  EndpointMiddleware,
  ServiceMiddleware,
  WorkloadCancelledError,
  WorkloadConfig,
  WorkloadError,
  WorkloadRequest,
  WorkloadResponse,
  WorkloadResult,
  WorkloadService,
  WorkloadStoreError,
} from "./types"
