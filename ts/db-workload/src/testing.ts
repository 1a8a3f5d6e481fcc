import Transport from "winston-transport"
import { Err, Ok } from "ts-results"
import { StoreErrors } from "@loadsim/store-gateway"
import type { IStoreGateway, StoreOpCode, StoreOpResult, WorkloadItem } from "@loadsim/store-gateway"

// --- Test Helpers ---

/**
 * Answers every operation with a fixed byte size. With `failAt` set, the
 * operation with that 1-based sequence number fails with a connection reset.
 */
export class FixedSizeStore implements IStoreGateway {
  readonly calls: StoreOpCode[] = []
  readonly written: WorkloadItem[] = []
  readonly keysRead: number[] = []

  constructor(
    private readonly bytes: number,
    private readonly failAt?: number,
  ) {}

  async readOne(key: number): Promise<StoreOpResult> {
    this.keysRead.push(key)
    return this.answer("read")
  }

  async writeOne(item: WorkloadItem): Promise<StoreOpResult> {
    this.written.push(item)
    return this.answer("write")
  }

  private answer(op: StoreOpCode): StoreOpResult {
    this.calls.push(op)
    if (this.calls.length === this.failAt) {
      return Err(StoreErrors.OpFailed(op, `${op} failed: connection reset`, new Error("connection reset")))
    }
    return Ok(this.bytes)
  }
}

/** Keeps every formatted log line in memory */
export class CaptureTransport extends Transport {
  lines: Record<string, unknown>[] = []

  log(info: Record<string, unknown>, next: () => void): void {
    this.lines.push(info)
    next()
  }
}

/** Lets winston hand queued lines to its transports */
export const flushLogs = () => new Promise((r) => setImmediate(r))
