import { Injectable, Logger } from "@nestjs/common"
import { ConfigService } from "@nestjs/config"
import { TemporalClientService } from "./orchestrator/clients/temporal-client.service"
import { DubVideoDto } from "./dto"
import { WorkflowException, WorkflowNotFoundException, TemporalConnectionException } from "./common/exceptions"

/**
 * Helper function to extract error message from unknown error type
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Helper function to check if error message contains a specific string
 */
function errorContains(error: unknown, ...patterns: string[]): boolean {
  const message = getErrorMessage(error)
  return patterns.some((p) => message.includes(p))
}

@Injectable()
export class DubbingService {
  private readonly logger = new Logger(DubbingService.name)

  constructor(
    private readonly configService: ConfigService,
    private readonly temporalClient: TemporalClientService,
  ) {}

  getHealthStatus() {
    this.logger.log("Health check requested")
    return {
      status: "ok",
      service: this.configService.get<string>("SERVICE_NAME"),
      timestamp: new Date().toISOString(),
    }
  }

  getServiceInfo() {
    return {
      name: this.configService.get<string>("SERVICE_NAME"),
      version: "1.0.0",
      description: "Video Dubbing Microservice",
      environment: this.configService.get<string>("NODE_ENV"),
    }
  }

  /**
   * Start a dubbing workflow via Temporal
   */
  async startDubbing(dto: DubVideoDto) {
    this.logger.log(`Starting dubbing: ${dto.videoUrl} → ${dto.targetLanguage}`)

    try {
      const result = await this.temporalClient.startDubbingWorkflow(dto)
      this.logger.log(`Workflow started: ${result.workflowId}`)
      return result
    } catch (error) {
      throw this.toWorkflowError(error, "Failed to start dubbing")
    }
  }

  /**
   * Get the status of a dubbing workflow
   */
  async getDubbingStatus(workflowId: string) {
    this.logger.log(`Getting status for workflow: ${workflowId}`)

    try {
      return await this.temporalClient.getWorkflowStatus(workflowId)
    } catch (error) {
      throw this.toWorkflowError(error, "Failed to get workflow status", workflowId)
    }
  }

  /**
   * Progress of a workflow; a running workflow that cannot answer reports the query error
   */
  async getDubbingProgress(workflowId: string) {
    try {
      return await this.temporalClient.queryWorkflowProgress(workflowId)
    } catch (error) {
      throw this.toWorkflowError(error, "Failed to get workflow progress", workflowId)
    }
  }

  async cancelDubbing(workflowId: string) {
    this.logger.log(`Cancelling workflow: ${workflowId}`)

    try {
      await this.temporalClient.cancelWorkflow(workflowId)
      return { workflowId, status: "cancelling" as const }
    } catch (error) {
      throw this.toWorkflowError(error, "Failed to cancel workflow", workflowId)
    }
  }

  private toWorkflowError(error: unknown, action: string, workflowId?: string) {
    const errorMsg = getErrorMessage(error)
    this.logger.error(`${action}: ${errorMsg}`, error instanceof Error ? error.stack : undefined)

    if (workflowId && errorContains(error, "not found", "NOT_FOUND")) {
      return new WorkflowNotFoundException(workflowId)
    }

    if (errorContains(error, "connection", "UNAVAILABLE")) {
      return new TemporalConnectionException("Temporal server is unavailable. Please try again later.")
    }

    return new WorkflowException(`${action}: ${errorMsg}`)
  }
}
