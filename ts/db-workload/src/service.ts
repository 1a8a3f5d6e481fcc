import { Err, Ok } from "ts-results"
import type { Result } from "ts-results"
import type { IStoreGateway, StoreOpCode, StoreOpResult, WorkloadItem } from "@loadsim/store-gateway"
import { abortReason } from "@loadsim/store-gateway"
import { createSeededRandom, randomInt, randomString, timeSeed } from "./random"
import type { RandomSource } from "./random"
import { WorkloadErrors } from "./types"
import type { CallContext, WorkloadConfig, WorkloadError, WorkloadRequest, WorkloadResult, WorkloadService } from "./types"

export type BaseWorkloadServiceArgs = {
  store: IStoreGateway
  config: WorkloadConfig
  /** Explicit source; wins over `seed` */
  random?: RandomSource
  /** Seed for the default generator. Derived from the clock when omitted */
  seed?: number
}

/**
 * Performs the configured reads then writes, sequentially, for every call.
 *
 * The first failing operation ends the request; operations already done are
 * not rolled back.
 */
export class BaseWorkloadService implements WorkloadService {
  private readonly store: IStoreGateway
  private readonly config: WorkloadConfig
  private readonly random: RandomSource

  constructor(args: BaseWorkloadServiceArgs) {
    if (!Number.isInteger(args.config.readOps) || args.config.readOps < 0) {
      throw new Error("readOps must be a non-negative integer")
    }
    if (!Number.isInteger(args.config.writeOps) || args.config.writeOps < 0) {
      throw new Error("writeOps must be a non-negative integer")
    }
    if (!Number.isInteger(args.config.keySpace) || args.config.keySpace <= 0) {
      throw new Error("keySpace must be a positive integer")
    }

    this.store = args.store
    this.config = Object.freeze({ ...args.config })
    this.random = args.random ?? createSeededRandom(args.seed ?? timeSeed())
  }

  async execute(ctx: CallContext, request: WorkloadRequest): Promise<WorkloadResult> {
    const { readOps, writeOps } = this.config
    let bytes = 0
    let index = 0

    const step = async (op: StoreOpCode, run: () => Promise<StoreOpResult>): Promise<Result<void, WorkloadError>> => {
      index++
      if (ctx.signal.aborted) {
        return Err(WorkloadErrors.Cancelled(op, index, `${op} cancelled before start`, abortReason(ctx.signal)))
      }
      const result = await run()
      if (result.err) {
        return Err(WorkloadErrors.FromStore(index, result.val))
      }
      bytes += result.val
      return Ok(undefined)
    }

    for (let i = 0; i < readOps; i++) {
      const key = randomInt(this.random, this.config.keySpace)
      const r = await step("read", () => this.store.readOne(key, ctx.signal))
      if (r.err) return r
    }

    for (let i = 0; i < writeOps; i++) {
      const item = this.nextItem()
      const r = await step("write", () => this.store.writeOne(item, ctx.signal))
      if (r.err) return r
    }

    return Ok({
      success: true,
      bytes,
      reads: readOps,
      writes: writeOps,
      ...(request.requestId !== undefined ? { requestId: request.requestId } : {}),
    })
  }

  private nextItem(): WorkloadItem {
    return {
      key: randomInt(this.random, this.config.keySpace),
      payload: randomString(this.random, this.config.payloadBytes),
      createdAt: new Date(),
    }
  }
}
