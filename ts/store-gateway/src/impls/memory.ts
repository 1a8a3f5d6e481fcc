import type { IStoreGateway, StoreOpCode, StoreOpResult, WorkloadItem } from "../gateway"
import { runStoreOp } from "../abort"

export type MemoryStoreGatewayOptions = {
  /** Simulated round-trip per operation */
  latencyMs?: number
  /**
   * Called before every operation with its 1-based sequence number.
   * Throwing from the hook fails that operation.
   */
  beforeOp?: (op: StoreOpCode, seq: number) => void
}

/** Serialized size of an item, close enough to BSON for local runs */
export function itemSize(item: WorkloadItem): number {
  return Buffer.byteLength(JSON.stringify(item))
}

/**
 * In-memory implementation of IStoreGateway for local development and testing.
 */
export class MemoryStoreGateway implements IStoreGateway {
  private readonly store = new Map<number, WorkloadItem>()
  private readonly latencyMs: number
  private readonly beforeOp?: (op: StoreOpCode, seq: number) => void
  private seq = 0

  /** Operations attempted, in order */
  readonly calls: StoreOpCode[] = []

  constructor(options: MemoryStoreGatewayOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0
    this.beforeOp = options.beforeOp
  }

  async readOne(key: number, signal?: AbortSignal): Promise<StoreOpResult> {
    return runStoreOp(
      "read",
      async () => {
        await this.roundTrip("read")
        const item = this.store.get(key)
        return item ? itemSize(item) : 0
      },
      signal,
    )
  }

  async writeOne(item: WorkloadItem, signal?: AbortSignal): Promise<StoreOpResult> {
    return runStoreOp(
      "write",
      async () => {
        await this.roundTrip("write")
        this.store.set(item.key, item)
        return itemSize(item)
      },
      signal,
    )
  }

  private async roundTrip(op: StoreOpCode): Promise<void> {
    this.calls.push(op)
    this.seq++
    this.beforeOp?.(op, this.seq)
    if (this.latencyMs > 0) {
      await new Promise((r) => setTimeout(r, this.latencyMs))
    }
  }

  // --- Test Helpers ---

  /** Clear all data and call history */
  clear(): void {
    this.store.clear()
    this.calls.length = 0
    this.seq = 0
  }

  /** Number of stored items */
  size(): number {
    return this.store.size
  }
}
