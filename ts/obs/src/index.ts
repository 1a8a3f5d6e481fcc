export * from "./instrumentation"
export * from "./log"
export * from "./metrics"
