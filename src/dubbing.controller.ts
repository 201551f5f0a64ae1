import { Controller, Get, Post, Delete, Body, Param, UseInterceptors, UploadedFile } from "@nestjs/common"
import { FileInterceptor, MulterModuleOptions } from "@nestjs/platform-express"
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiConsumes, ApiBody } from "@nestjs/swagger"
import { diskStorage } from "multer"
import { extname } from "path"
import { v4 as uuidv4 } from "uuid"
import { DubbingService } from "./dubbing.service"
import { ValidationException } from "./common/exceptions"
import { UploadCleanupInterceptor } from "./common/interceptors/upload-cleanup.interceptor"
import { DubVideoDto, DubFileDto, StartWorkflowResponseDto, WorkflowStatusDto, WorkflowProgressDto, CancelWorkflowResponseDto, ErrorResponseDto } from "./dto"

export const ALLOWED_VIDEO_MIMES = ["video/mp4", "video/quicktime", "video/x-msvideo", "video/x-matroska", "video/webm", "video/x-flv", "video/x-ms-wmv"]

export function videoFileFilter(req: Express.Request, file: Express.Multer.File, callback: (error: Error | null, acceptFile: boolean) => void) {
  if (ALLOWED_VIDEO_MIMES.includes(file.mimetype)) {
    callback(null, true)
  } else {
    callback(new ValidationException(`Unsupported file type: ${file.mimetype}`), false)
  }
}

export function uploadFileName(originalName: string): string {
  return `upload-${uuidv4()}${extname(originalName)}`
}

/**
 * Multer options for the upload endpoint, registered through MulterModule with the configured UPLOAD_DIR
 */
export function buildUploadOptions(uploadDir: string): MulterModuleOptions {
  return {
    storage: diskStorage({
      destination: uploadDir,
      filename: (req, file, callback) => {
        callback(null, uploadFileName(file.originalname))
      },
    }),
    limits: {
      fileSize: 500 * 1024 * 1024, // 500MB
    },
    fileFilter: videoFileFilter,
  }
}

const WORKFLOW_ID_EXAMPLE = "product-demo-japanese-3b241101-e2bb-4255-8caf-4136c566a962"

@Controller()
export class DubbingController {
  constructor(private readonly dubbingService: DubbingService) {}

  @Get("health")
  @ApiTags("health")
  @ApiOperation({ summary: "Health check", description: "Check if the service is running" })
  @ApiResponse({ status: 200, description: "Service is healthy" })
  healthCheck() {
    return this.dubbingService.getHealthStatus()
  }

  @Get()
  @ApiTags("health")
  @ApiOperation({ summary: "Service info", description: "Get service information and version" })
  @ApiResponse({ status: 200, description: "Service information" })
  getInfo() {
    return this.dubbingService.getServiceInfo()
  }

  @Post("dub")
  @ApiTags("dubbing")
  @ApiOperation({
    summary: "Start dubbing workflow (URL)",
    description: "Start dubbing a video from a URL or a path the worker can read. The service downloads and processes the file.",
  })
  @ApiResponse({ status: 201, description: "Workflow started successfully", type: StartWorkflowResponseDto })
  @ApiResponse({ status: 400, description: "Invalid request body", type: ErrorResponseDto })
  @ApiResponse({ status: 503, description: "Temporal server unavailable", type: ErrorResponseDto })
  async startDubbing(@Body() dto: DubVideoDto) {
    return this.dubbingService.startDubbing(dto)
  }

  @Post("dub/upload")
  @ApiTags("dubbing")
  @UseInterceptors(FileInterceptor("file"), UploadCleanupInterceptor)
  @ApiConsumes("multipart/form-data")
  @ApiOperation({
    summary: "Start dubbing workflow (File Upload)",
    description: "Upload a video and start dubbing. Max file size: 500MB. Supported formats: mp4, mov, avi, mkv, webm, flv, wmv",
  })
  @ApiBody({
    schema: {
      type: "object",
      required: ["file", "targetLanguage"],
      properties: {
        file: { type: "string", format: "binary", description: "Video file to dub" },
        targetLanguage: { type: "string", example: "Japanese", description: "Language to dub into" },
        sourceLanguage: { type: "string", example: "English", description: "Spoken language (optional, auto-detected if not provided)" },
        subtitleMode: { type: "string", enum: ["none", "soft", "burn"], description: "Subtitle handling (optional)" },
        voice: { type: "string", example: "nova", description: "Text-to-speech voice (optional)" },
        generateVideo: { type: "boolean", default: true, description: "Set to false for the dub track and subtitles only (optional)" },
      },
    },
  })
  @ApiResponse({ status: 201, description: "Workflow started successfully", type: StartWorkflowResponseDto })
  @ApiResponse({ status: 400, description: "Invalid file or request", type: ErrorResponseDto })
  async startDubbingWithFile(@UploadedFile() file: Express.Multer.File | undefined, @Body() dto: DubFileDto) {
    if (!file) {
      throw new ValidationException("No file uploaded")
    }

    const dubDto: DubVideoDto = {
      videoUrl: file.path,
      targetLanguage: dto.targetLanguage,
      sourceLanguage: dto.sourceLanguage,
      fileName: file.originalname,
      options: {
        subtitleMode: dto.subtitleMode,
        voice: dto.voice,
        generateVideo: dto.generateVideo,
      },
    }

    return this.dubbingService.startDubbing(dubDto)
  }

  @Get("dub/:workflowId")
  @ApiTags("dubbing")
  @ApiOperation({ summary: "Get workflow status", description: "Get the current status of a dubbing workflow, with its result once completed" })
  @ApiParam({ name: "workflowId", description: "Unique workflow identifier", example: WORKFLOW_ID_EXAMPLE })
  @ApiResponse({ status: 200, description: "Workflow status retrieved", type: WorkflowStatusDto })
  @ApiResponse({ status: 404, description: "Workflow not found", type: ErrorResponseDto })
  async getDubbingStatus(@Param("workflowId") workflowId: string) {
    return this.dubbingService.getDubbingStatus(workflowId)
  }

  @Get("dub/:workflowId/progress")
  @ApiTags("dubbing")
  @ApiOperation({ summary: "Get workflow progress", description: "Current step and percentage of a dubbing workflow" })
  @ApiParam({ name: "workflowId", description: "Unique workflow identifier", example: WORKFLOW_ID_EXAMPLE })
  @ApiResponse({ status: 200, description: "Workflow progress", type: WorkflowProgressDto })
  async getDubbingProgress(@Param("workflowId") workflowId: string) {
    return this.dubbingService.getDubbingProgress(workflowId)
  }

  @Delete("dub/:workflowId")
  @ApiTags("dubbing")
  @ApiOperation({ summary: "Cancel workflow", description: "Request cancellation; the workflow removes its scratch files before it stops" })
  @ApiParam({ name: "workflowId", description: "Unique workflow identifier", example: WORKFLOW_ID_EXAMPLE })
  @ApiResponse({ status: 200, description: "Cancellation requested", type: CancelWorkflowResponseDto })
  @ApiResponse({ status: 404, description: "Workflow not found", type: ErrorResponseDto })
  async cancelDubbing(@Param("workflowId") workflowId: string) {
    return this.dubbingService.cancelDubbing(workflowId)
  }
}
