import { proxyActivities, defineQuery, setHandler, CancellationScope, isCancellation, log } from "@temporalio/workflow"
import type * as activities from "../activities"
import type { SubtitleMode } from "../activities"
import { planSteps, initialProgress, progressAt, completedProgress, WorkflowProgress } from "./progress"

// Proxy activities to use within workflow
const { prepareMedia, transcribeAudio, translateSegments, generateSubtitles, synthesizeSpeech, renderDubTrack, composeVideo, saveArtifacts, cleanupWorkspace } = proxyActivities<typeof activities>({
  startToCloseTimeout: "10 minutes",
  retry: {
    maximumAttempts: 3,
  },
})

export interface DubbingOptions {
  subtitleMode?: SubtitleMode
  generateVideo?: boolean
  voice?: string
  charsPerSecond?: number
  confidenceThreshold?: number
  preserveTerms?: string[]
  maxTempo?: number
}

export interface DubbingWorkflowInput {
  videoUrl: string
  targetLanguage: string
  sourceLanguage?: string
  workflowId: string
  /** Used to name the dubbed video */
  fileBaseName: string
  options?: DubbingOptions
}

export interface DubbingWorkflowResult {
  success: boolean
  transcription: string
  translatedSegments: number
  blankSegments: number
  failedSegments: number
  droppedSegments: number
  overflowingClips: number
  subtitlesPath: string
  dubAudioPath: string
  outputVideoPath?: string
  artifactsDir: string
  processingTimeMs: number
}

export const getProgressQuery = defineQuery<WorkflowProgress>("getProgress")

/**
 * Dubbing Workflow
 *
 * Orchestrates the complete dubbing of a video:
 * 1. Prepare media (download, extract audio, probe duration)
 * 2. Transcribe and drop low-confidence words
 * 3. Translate each segment within its character budget
 * 4. Generate subtitles
 * 5. Synthesize speech per segment
 * 6. Align clips on the timeline and mix the dub track
 * 7. Compose the dubbed video (optional)
 * 8. Save artifacts
 *
 * The scratch workspace, and an uploaded input, are removed however the run ends.
 */
export async function dubbingWorkflow(input: DubbingWorkflowInput): Promise<DubbingWorkflowResult> {
  const startTime = Date.now()
  const options = input.options ?? {}
  const generateVideo = options.generateVideo ?? true
  const subtitleMode = options.subtitleMode ?? "none"
  const steps = planSteps(generateVideo)

  let progress: WorkflowProgress = initialProgress(steps)
  setHandler(getProgressQuery, () => progress)

  try {
    log.info("Starting dubbing workflow", { videoUrl: input.videoUrl, targetLanguage: input.targetLanguage })

    progress = progressAt(steps, "prepare", progress)
    const media = await prepareMedia(input.videoUrl, input.workflowId)

    progress = progressAt(steps, "transcribe", progress)
    const transcription = await transcribeAudio({
      audioPath: media.audioPath,
      sourceLanguage: input.sourceLanguage,
      confidenceThreshold: options.confidenceThreshold,
    })

    progress = progressAt(steps, "translate", progress)
    const translation = await translateSegments({
      segments: transcription.transcript.segments,
      sourceLanguage: input.sourceLanguage ?? transcription.transcript.language,
      targetLanguage: input.targetLanguage,
      charsPerSecond: options.charsPerSecond,
      preserveTerms: options.preserveTerms,
    })

    progress = progressAt(steps, "subtitles", progress)
    const subtitles = await generateSubtitles({ workflowId: input.workflowId, segments: translation.segments })

    progress = progressAt(steps, "synthesize", progress)
    const clips = await synthesizeSpeech({ workflowId: input.workflowId, segments: translation.segments, voice: options.voice })

    progress = progressAt(steps, "mix", progress)
    const dubTrack = await renderDubTrack({
      workflowId: input.workflowId,
      clips,
      videoDuration: media.videoDuration,
      maxTempo: options.maxTempo,
    })

    let outputVideoPath: string | undefined
    if (generateVideo) {
      progress = progressAt(steps, "compose", progress)
      const video = await composeVideo({
        workflowId: input.workflowId,
        videoPath: media.videoPath,
        audioPath: dubTrack.audioPath,
        srtPath: subtitles.srtPath,
        cueCount: subtitles.cueCount,
        subtitleMode,
        targetLanguage: input.targetLanguage,
        fileBaseName: input.fileBaseName,
      })
      outputVideoPath = video.outputPath
    }

    progress = progressAt(steps, "save", progress)
    const artifacts = await saveArtifacts({
      workflowId: input.workflowId,
      sourceLanguage: input.sourceLanguage ?? transcription.transcript.language,
      targetLanguage: input.targetLanguage,
      transcription: transcription.transcript.text,
      segments: translation.segments,
      srtContent: subtitles.srtContent,
      vttContent: subtitles.vttContent,
      dubAudioPath: dubTrack.audioPath,
      outputVideoPath,
      droppedSegments: transcription.droppedSegments,
    })

    const processingTimeMs = Date.now() - startTime
    progress = completedProgress(steps.length)

    log.info("Dubbing workflow completed", { processingTimeMs, failedSegments: translation.failed })

    return {
      success: true,
      transcription: transcription.transcript.text,
      translatedSegments: translation.translated,
      blankSegments: translation.blank,
      failedSegments: translation.failed,
      droppedSegments: transcription.droppedSegments,
      overflowingClips: dubTrack.overflowingClips,
      subtitlesPath: `${artifacts.artifactsDir}/subtitles.srt`,
      dubAudioPath: artifacts.dubAudioPath,
      outputVideoPath,
      artifactsDir: artifacts.artifactsDir,
      processingTimeMs,
    }
  } catch (error) {
    progress = {
      ...progress,
      status: isCancellation(error) ? "cancelled" : "failed",
      error: error instanceof Error ? error.message : "Unknown error",
    }
    throw error
  } finally {
    // Runs even after cancellation, which would otherwise cancel this activity too
    await CancellationScope.nonCancellable(() => cleanupWorkspace(input.workflowId, input.videoUrl))
  }
}
