import { Injectable, OnModuleInit, OnModuleDestroy, Logger, OnApplicationShutdown } from "@nestjs/common"
import { Connection, WorkflowClient } from "@temporalio/client"
import { NativeConnection, Worker, bundleWorkflowCode, WorkflowBundleWithSourceMap } from "@temporalio/worker"
import { ConfigService } from "@nestjs/config"
import { v4 as uuidv4 } from "uuid"
import type { dubbingWorkflow, DubbingOptions, DubbingWorkflowResult } from "../workflows"
import { DUBBING_STEPS, completedProgress, completedStepCount, WorkflowProgress } from "../workflows/progress"
import { buildWorkflowId, extractBaseName } from "./workflow-id"
import { describeFailure, WorkflowFailureInfo } from "./workflow-failure"

export interface StartDubbingInput {
  videoUrl: string
  targetLanguage: string
  sourceLanguage?: string
  fileName?: string
  options?: DubbingOptions
}

export interface WorkflowStatus {
  workflowId: string
  status: string
  result?: DubbingWorkflowResult
  error?: WorkflowFailureInfo
}

@Injectable()
export class TemporalClientService implements OnModuleInit, OnModuleDestroy, OnApplicationShutdown {
  private client: WorkflowClient | undefined
  private worker: Worker | null = null
  private workerRun: Promise<void> | null = null
  private static workflowBundle: WorkflowBundleWithSourceMap | undefined

  protected logger = new Logger(TemporalClientService.name)

  constructor(private readonly configService: ConfigService) {}

  private get taskQueue(): string {
    return this.configService.get<string>("TEMPORAL_TASK_QUEUE", "dubbing-queue")
  }

  async onModuleInit() {
    if (this.client) {
      this.logger.warn("TemporalClientService already initialized. Skipping duplicate init.")
      return
    }

    const address = this.configService.get<string>("TEMPORAL_SERVER_ADDRESS", "temporal:7233")
    const namespace = this.configService.get<string>("TEMPORAL_NAMESPACE", "default")

    try {
      this.logger.log(`Connecting to Temporal server at ${address}...`)

      const connection = await Connection.connect({ address, tls: false })
      await connection.workflowService.getSystemInfo({})

      this.client = new WorkflowClient({ connection, namespace })
      this.logger.log(`✅ Temporal client initialized for namespace:address = ${namespace}:${address}`)

      await this.startWorker(address, namespace)
    } catch (error) {
      this.logger.error("❌ Error initializing Temporal client:", error)
      throw error
    }
  }

  async onModuleDestroy() {
    await this.shutdownWorker()

    if (this.client) {
      await this.client.connection.close()
      this.client = undefined
      this.logger.log("Temporal connection closed.")
    }
  }

  async onApplicationShutdown(signal?: string) {
    if (signal) {
      this.logger.log(`Application shutting down due to signal: ${signal}`)
    }
    await this.onModuleDestroy()
  }

  getClient(): WorkflowClient {
    if (!this.client) {
      throw new Error("Temporal client is not initialized.")
    }
    return this.client
  }

  /**
   * Start a dubbing workflow
   */
  async startDubbingWorkflow(input: StartDubbingInput): Promise<{ workflowId: string; status: "started" }> {
    const fileBaseName = extractBaseName(input.videoUrl, input.fileName)
    const workflowId = buildWorkflowId(fileBaseName, input.targetLanguage, uuidv4())

    this.logger.log(`Starting dubbing workflow: ${workflowId}`)

    const handle = await this.getClient().start<typeof dubbingWorkflow>("dubbingWorkflow", {
      args: [
        {
          videoUrl: input.videoUrl,
          targetLanguage: input.targetLanguage,
          sourceLanguage: input.sourceLanguage,
          workflowId,
          fileBaseName,
          options: input.options,
        },
      ],
      workflowId,
      taskQueue: this.taskQueue,
    })

    return { workflowId: handle.workflowId, status: "started" }
  }

  async getWorkflowStatus(workflowId: string): Promise<WorkflowStatus> {
    const handle = this.getClient().getHandle<typeof dubbingWorkflow>(workflowId)
    const description = await handle.describe()
    const status = description.status.name

    if (status === "FAILED") {
      return { workflowId, status, error: await this.readFailure(workflowId) }
    }

    return {
      workflowId,
      status,
      result: status === "COMPLETED" ? await handle.result() : undefined,
    }
  }

  private async readFailure(workflowId: string): Promise<WorkflowFailureInfo> {
    try {
      await this.getClient().getHandle(workflowId).result()
      return { message: "Workflow failed" }
    } catch (error) {
      return describeFailure(error)
    }
  }

  /**
   * Query workflow progress using the getProgress query. Lookup errors (unknown
   * workflow, unreachable server) propagate; only a failed query degrades.
   */
  async queryWorkflowProgress(workflowId: string): Promise<WorkflowProgress> {
    const totalSteps = DUBBING_STEPS.length
    const handle = this.getClient().getHandle<typeof dubbingWorkflow>(workflowId)
    const description = await handle.describe()
    const status = description.status.name

    if (status === "COMPLETED") {
      return completedProgress(completedStepCount(await handle.result()))
    }

    if (status === "CANCELLED" || status === "TERMINATED" || status === "TIMED_OUT") {
      return {
        currentStep: 0,
        totalSteps,
        stepName: status,
        percentComplete: 0,
        status: status === "CANCELLED" ? "cancelled" : "failed",
        error: `Workflow ${status.toLowerCase()}`,
      }
    }

    try {
      return await handle.query<WorkflowProgress>("getProgress")
    } catch (error) {
      this.logger.error(`Error querying workflow progress: ${error}`)

      return {
        currentStep: 0,
        totalSteps,
        stepName: "Unknown",
        percentComplete: 0,
        status: "running",
        error: error instanceof Error ? error.message : "Query failed",
      }
    }
  }

  /**
   * Request cancellation; the workflow still cleans its workspace before it stops
   */
  async cancelWorkflow(workflowId: string): Promise<void> {
    const handle = this.getClient().getHandle(workflowId)
    await handle.cancel()
    this.logger.log(`Cancellation requested for workflow: ${workflowId}`)
  }

  private async startWorker(address: string, namespace: string): Promise<void> {
    try {
      const nativeConnection = await NativeConnection.connect({ address })

      if (!TemporalClientService.workflowBundle) {
        const workflowsPath = require.resolve("../workflows")
        this.logger.log(`Bundling workflows from: ${workflowsPath}`)

        TemporalClientService.workflowBundle = await bundleWorkflowCode({ workflowsPath })
        this.logger.log(`✅ Workflow bundle created`)
      }

      const activities = await import("../activities")

      this.worker = await Worker.create({
        connection: nativeConnection,
        taskQueue: this.taskQueue,
        namespace,
        workflowBundle: TemporalClientService.workflowBundle,
        activities,
      })

      this.logger.log(`✅ Temporal worker started for task queue: ${this.taskQueue}`)

      this.workerRun = this.worker.run().catch((err: unknown) => {
        this.logger.error("❌ Worker error:", err)
      })
    } catch (error) {
      this.logger.warn(`⚠️ Could not start worker: ${error instanceof Error ? error.message : String(error)}`)
    }
  }

  private async shutdownWorker(): Promise<void> {
    if (this.worker) {
      this.worker.shutdown()
      await this.workerRun
      this.logger.log("Temporal worker shut down.")
      this.worker = null
      this.workerRun = null
    }
  }
}
