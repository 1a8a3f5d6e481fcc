export { StoreErrors } from "./gateway"
export type {
  IStoreGateway,
  StoreError,
  StoreOpCancelledError,
  StoreOpCode,
  StoreOpFailedError,
  StoreOpResult,
  WorkloadItem,
} from "./gateway"
export { abortReason, raceAbort, runStoreOp } from "./abort"
export { MongoStoreGateway } from "./impls/mongo"
export type { MongoStoreConfig, ItemCollection, ItemOpOptions } from "./impls/mongo"
export { MemoryStoreGateway, itemSize } from "./impls/memory"
export type { MemoryStoreGatewayOptions } from "./impls/memory"
