import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger"

/**
 * Result of a completed dubbing workflow
 */
export class DubbingResultDto {
  @ApiProperty({ example: true })
  success!: boolean

  @ApiProperty({ description: "Transcript after low-confidence words were dropped", example: "Welcome to the product tour." })
  transcription!: string

  @ApiProperty({ example: 42 })
  translatedSegments!: number

  @ApiProperty({ description: "Segments with nothing to say (fillers, empty translations)", example: 3 })
  blankSegments!: number

  @ApiProperty({ description: "Segments whose translation failed and were left silent", example: 0 })
  failedSegments!: number

  @ApiProperty({ description: "Segments removed by the confidence filter", example: 1 })
  droppedSegments!: number

  @ApiProperty({ description: "Clips that still overran their slot at the maximum tempo", example: 0 })
  overflowingClips!: number

  @ApiProperty({ example: "/output/video-dubber/product-demo-japanese-1f0c/subtitles.srt" })
  subtitlesPath!: string

  @ApiProperty({ example: "/output/video-dubber/product-demo-japanese-1f0c/dub_audio.m4a" })
  dubAudioPath!: string

  @ApiPropertyOptional({ example: "/output/video-dubber/product-demo-japanese-1f0c/product-demo_ja.mp4" })
  outputVideoPath?: string

  @ApiProperty({ example: "/output/video-dubber/product-demo-japanese-1f0c" })
  artifactsDir!: string

  @ApiProperty({ example: 95000 })
  processingTimeMs!: number
}

export class WorkflowFailureDto {
  @ApiPropertyOptional({ example: "TranslationError" })
  type?: string

  @ApiProperty({ example: "All 12 segments failed to translate" })
  message!: string
}

export class WorkflowStatusDto {
  @ApiProperty({ example: "product-demo-japanese-3b241101-e2bb-4255-8caf-4136c566a962" })
  workflowId!: string

  @ApiProperty({ example: "RUNNING", enum: ["RUNNING", "COMPLETED", "FAILED", "CANCELLED", "TERMINATED", "TIMED_OUT"] })
  status!: string

  @ApiPropertyOptional({ type: () => DubbingResultDto })
  result?: DubbingResultDto

  @ApiPropertyOptional({ type: () => WorkflowFailureDto, description: "Why the workflow failed" })
  error?: WorkflowFailureDto
}

export class WorkflowProgressDto {
  @ApiProperty({ example: 3 })
  currentStep!: number

  @ApiProperty({ example: 8 })
  totalSteps!: number

  @ApiProperty({ example: "Translating segments" })
  stepName!: string

  @ApiProperty({ example: 30 })
  percentComplete!: number

  @ApiProperty({ enum: ["running", "completed", "failed", "cancelled"] })
  status!: "running" | "completed" | "failed" | "cancelled"

  @ApiPropertyOptional()
  error?: string
}

export class StartWorkflowResponseDto {
  @ApiProperty({ example: "product-demo-japanese-3b241101-e2bb-4255-8caf-4136c566a962" })
  workflowId!: string

  @ApiProperty({ example: "started" })
  status!: "started"
}

export class CancelWorkflowResponseDto {
  @ApiProperty({ example: "product-demo-japanese-3b241101-e2bb-4255-8caf-4136c566a962" })
  workflowId!: string

  @ApiProperty({ example: "cancelling" })
  status!: "cancelling"
}

export class ErrorResponseDto {
  @ApiProperty({ example: 400 })
  statusCode!: number

  @ApiProperty({ example: "videoUrl is required" })
  message!: string

  @ApiPropertyOptional({ example: "Bad Request" })
  error?: string

  @ApiProperty({ example: "2026-01-29T08:00:00.000Z" })
  timestamp!: string
}
