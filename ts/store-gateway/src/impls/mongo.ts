import { BSON, MongoClient } from "mongodb"
import type { Collection } from "mongodb"
import type { IStoreGateway, StoreOpResult, WorkloadItem } from "../gateway"
import { runStoreOp } from "../abort"

/** Per-call options handed to the driver */
export type ItemOpOptions = {
  /** Aborts the driver operation itself, not only the wait for it */
  signal?: AbortSignal
}

/** The part of a MongoDB collection the gateway needs */
export interface ItemCollection {
  findOne(filter: { key: number }, options?: ItemOpOptions): Promise<WorkloadItem | null>
  insertOne(doc: WorkloadItem, options?: ItemOpOptions): Promise<unknown>
}

export type MongoStoreConfig = {
  uri: string
  database: string
  collection: string
  user?: string
  password?: string
  /** Max time for connect + ping */
  connectTimeoutMs?: number
}

const DEFAULT_CONNECT_TIMEOUT = 10000

export class MongoStoreGateway implements IStoreGateway {
  constructor(
    private readonly items: ItemCollection,
    private readonly client?: MongoClient,
  ) {}

  /**
   * Connects, pings and locates the collection.
   * Rejects when the store is unreachable or the credentials are refused.
   */
  static async connect(config: MongoStoreConfig): Promise<MongoStoreGateway> {
    const timeout = config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT

    const client = new MongoClient(config.uri, {
      auth: config.user ? { username: config.user, password: config.password } : undefined,
      connectTimeoutMS: timeout,
      serverSelectionTimeoutMS: timeout,
    })

    try {
      await client.connect()
      await client.db(config.database).command({ ping: 1 })
    } catch (error) {
      await client.close()
      throw error
    }

    const collection: Collection<WorkloadItem> = client.db(config.database).collection<WorkloadItem>(config.collection)
    return new MongoStoreGateway(collection, client)
  }

  async readOne(key: number, signal?: AbortSignal): Promise<StoreOpResult> {
    return runStoreOp(
      "read",
      async () => {
        const doc = await this.items.findOne({ key }, { signal })
        return doc === null ? 0 : BSON.calculateObjectSize(doc)
      },
      signal,
    )
  }

  async writeOne(item: WorkloadItem, signal?: AbortSignal): Promise<StoreOpResult> {
    return runStoreOp(
      "write",
      async () => {
        // Sized before insert: the driver adds _id to the object it is given
        const size = BSON.calculateObjectSize(item)
        await this.items.insertOne({ ...item }, { signal })
        return size
      },
      signal,
    )
  }

  /**
   * Gracefully closes the MongoDB connection.
   * Should be called on application shutdown.
   */
  async disconnect(): Promise<void> {
    await this.client?.close()
  }
}
