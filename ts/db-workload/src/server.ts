import express from "express"
import type { Express, Request, Response } from "express"
import type { Server } from "node:http"
import type { AddressInfo } from "node:net"
import { toError } from "@loadsim/obs"
import type { Logger, WorkloadMetrics } from "@loadsim/obs"
import { createBodyErrorHandler, createWorkloadHandler } from "./transport"
import type { Endpoint } from "./types"

export type ListenAddress = {
  /** Interface to bind. All interfaces when omitted */
  host?: string
  port: number
}

export type WorkloadServerArgs = {
  listen: ListenAddress
  /** Traced endpoint every workload call goes through */
  endpoint: Endpoint
  metrics: WorkloadMetrics
  logger: Logger
  requestTimeoutMs?: number
  /** Path for Prometheus scraping (default: /metrics) */
  metricsPath?: string
  /** Path for health check endpoint (default: /healthz) */
  healthPath?: string
  /** Largest accepted request body (default: 1mb) */
  bodyLimit?: string
}

export class WorkloadServer {
  readonly app: Express
  private server: Server | null = null
  private listenAddress: ListenAddress
  private logger: Logger
  private metricsPath: string
  private healthPath: string

  constructor(args: WorkloadServerArgs) {
    this.listenAddress = args.listen
    this.logger = args.logger.child({ component: "workload-server" })
    this.metricsPath = args.metricsPath ?? "/metrics"
    this.healthPath = args.healthPath ?? "/healthz"

    this.app = express()
    this.app.disable("x-powered-by")
    this.setupRoutes(args)
  }

  private setupRoutes(args: WorkloadServerArgs): void {
    const { registry } = args.metrics

    this.app.get(this.healthPath, (_req: Request, res: Response) => {
      res.status(200).json({ status: "ok" })
    })

    this.app.get(this.metricsPath, async (_req: Request, res: Response) => {
      try {
        const body = await registry.metrics()
        res.status(200).type(registry.contentType).send(body)
      } catch (e) {
        this.logger.error(toError(e), { msg: "Failed to collect metrics" })
        res.status(500).send("failed to collect metrics")
      }
    })

    // Every other path and method is a workload call
    this.app.use(
      express.text({ type: () => true, limit: args.bodyLimit ?? "1mb" }),
      createWorkloadHandler({
        endpoint: args.endpoint,
        metrics: args.metrics,
        logger: this.logger,
        requestTimeoutMs: args.requestTimeoutMs,
      }),
    )
    this.app.use(createBodyErrorHandler({ metrics: args.metrics, logger: this.logger }))
  }

  async start(): Promise<void> {
    const { host, port } = this.listenAddress
    return new Promise((resolve, reject) => {
      const server = host ? this.app.listen(port, host) : this.app.listen(port)
      server.once("error", reject)
      server.once("listening", () => {
        server.off("error", reject)
        server.on("error", (err) => {
          this.logger.error(err, { msg: "Workload server error" })
        })
        this.server = server
        this.logger.info("Workload server started", {
          address: this.address(),
          metricsPath: this.metricsPath,
          healthPath: this.healthPath,
        })
        resolve()
      })
    })
  }

  /** Bound address once started */
  address(): AddressInfo | null {
    const address = this.server?.address()
    return address && typeof address === "object" ? address : null
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server
      if (!server) {
        resolve()
        return
      }
      server.close((err) => {
        if (err) {
          this.logger.error(err, { msg: "Error stopping server" })
          reject(err)
        } else {
          this.server = null
          this.logger.info("Workload server stopped")
          resolve()
        }
      })
    })
  }
}
