/**
 * Dubbing Workflow Activities
 *
 * These activities use:
 * - FFmpeg for media preparation, dub mixing and composition
 * - OpenAI Whisper for timed transcription
 * - Chat completions for per-segment translation
 * - OpenAI text-to-speech for the dubbed voice
 */

import { ApplicationFailure } from "@temporalio/common"
import * as fs from "fs"
import * as path from "path"
import { getPipelineSettings, TTS_VOICES, TtsVoice } from "../../config/configuration"
import { languageCode, languageName } from "../../config/languages"
import { getOpenAIClient } from "./openai.client"
import { retryWithBackoff } from "./retry.utils"
import { fromWhisper, filterLowConfidence, summarizeFiltering } from "./transcript.utils"
import { BLANK_TEXT, buildTranslationPrompt, charsPerSecondFor, fallbackTranslation, isFillerOnly, isSpeakable, maxCharactersFor, normalizeTranslation } from "./translation.utils"
import { renderSrt, renderVtt, toCues } from "./subtitle.utils"
import { planClipPlacement } from "./alignment.utils"
import { composeDubbedVideo, ensureOutputDir, ensureWorkspace, isAudioFile, MediaInputError, mixDubTrack, prepareMediaInput, probeDuration, removeUploadedInput, removeWorkspace } from "./ffmpeg.utils"
import type {
  ComposeVideoInput,
  ComposeVideoResult,
  DubSegment,
  GenerateSubtitlesInput,
  PreparedMedia,
  RenderDubTrackInput,
  RenderDubTrackResult,
  SaveArtifactsInput,
  SaveArtifactsResult,
  SubtitleGenerationResult,
  SynthesizedClip,
  SynthesizeSpeechInput,
  TranscriptionInput,
  TranscriptionResult,
  TranslateSegmentsInput,
  TranslateSegmentsResult,
} from "./types"

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function isTtsVoice(voice: string): voice is TtsVoice {
  return TTS_VOICES.some((known) => known === voice)
}

// ==========================================
// Activities
// ==========================================

/**
 * Activity: Bring the source video into the workflow workspace, extract its
 * audio and probe its duration
 */
export async function prepareMedia(videoUrl: string, workflowId: string): Promise<PreparedMedia> {
  console.log(`[Activity] Preparing media: ${videoUrl}`)

  // Nothing to dub without a picture; unknown extensions are left to ffmpeg
  if (isAudioFile(videoUrl)) {
    throw ApplicationFailure.nonRetryable(`Audio-only input cannot be dubbed, a video file is required: ${videoUrl}`, "FileProcessingError")
  }

  const workspaceDir = ensureWorkspace(workflowId)
  let media: Omit<PreparedMedia, "workspaceDir">
  try {
    media = await prepareMediaInput(videoUrl, workspaceDir)
  } catch (error) {
    if (error instanceof MediaInputError && error.permanent) {
      throw ApplicationFailure.nonRetryable(error.message, "FileProcessingError")
    }
    throw ApplicationFailure.retryable(`Failed to prepare media: ${errorMessage(error)}`, "FileProcessingError")
  }

  console.log(`[Activity] Media ready: ${media.videoDuration.toFixed(2)}s of video, audio at ${media.audioPath}`)
  return { ...media, workspaceDir }
}

/**
 * Activity: Transcribe audio with word timestamps and drop low-confidence words
 */
export async function transcribeAudio(input: TranscriptionInput): Promise<TranscriptionResult> {
  console.log(`[Activity] Transcribing audio: ${input.audioPath}`)

  if (!fs.existsSync(input.audioPath)) {
    throw ApplicationFailure.nonRetryable(`Audio file not found: ${input.audioPath}`, "TranscriptionError")
  }

  const settings = getPipelineSettings()
  const openai = getOpenAIClient()
  const threshold = input.confidenceThreshold ?? settings.CONFIDENCE_THRESHOLD
  const language = input.sourceLanguage ? languageCode(input.sourceLanguage) : undefined

  const verbose = await retryWithBackoff(
    () =>
      openai.audio.transcriptions.create({
        // Streams can't be reused, open a fresh one per attempt
        file: fs.createReadStream(input.audioPath),
        model: settings.OPENAI_TRANSCRIPTION_MODEL,
        response_format: "verbose_json",
        timestamp_granularities: ["word", "segment"],
        language,
      }),
    { attempts: 3, delayMs: 2000, operation: "Whisper transcription" },
  )

  const raw = fromWhisper(verbose)
  const transcript = filterLowConfidence(raw, threshold)
  const { droppedItems, droppedSegments } = summarizeFiltering(raw, transcript)

  console.log(`[Activity] Transcribed ${raw.segments.length} segments (${raw.language}), dropped ${droppedItems} words and ${droppedSegments} segments below confidence ${threshold}`)

  if (transcript.segments.length === 0) {
    console.warn("[Activity] No speech left after filtering, the dub track will be silent")
  }

  return { transcript, droppedItems, droppedSegments }
}

/**
 * Activity: Translate each segment on its own, within a character budget that
 * matches the time the segment occupies
 *
 * A failed segment keeps a marker instead of failing the activity, unless every
 * segment that needed the model failed.
 */
export async function translateSegments(input: TranslateSegmentsInput): Promise<TranslateSegmentsResult> {
  // Whisper reports languages in lower case ("english")
  const sourceLanguage = languageName(input.sourceLanguage)
  console.log(`[Activity] Translating ${input.segments.length} segments from ${sourceLanguage} to ${input.targetLanguage}`)

  const settings = getPipelineSettings()
  const openai = getOpenAIClient()
  const charsPerSecond = input.charsPerSecond ?? charsPerSecondFor(input.targetLanguage)
  const preserveTerms = Array.from(new Set([...settings.PRESERVE_TERMS, ...(input.preserveTerms ?? [])]))

  const segments: DubSegment[] = []
  let attempted = 0
  let failed = 0

  for (const [index, seg] of input.segments.entries()) {
    const maxCharacters = maxCharactersFor(seg.start, seg.end, charsPerSecond)
    const base = { index, start: seg.start, end: seg.end, sourceText: seg.transcript, maxCharacters }

    if (isFillerOnly(seg.transcript)) {
      segments.push({ ...base, translatedText: BLANK_TEXT, status: "blank" })
      continue
    }

    attempted++
    const prompt = buildTranslationPrompt({
      text: seg.transcript,
      sourceLanguage,
      targetLanguage: input.targetLanguage,
      maxCharacters,
      preserveTerms,
    })

    try {
      const response = await retryWithBackoff(
        () =>
          openai.chat.completions.create({
            model: settings.OPENAI_MODEL,
            messages: [
              { role: "system", content: prompt.system },
              { role: "user", content: prompt.user },
            ],
            temperature: 0,
          }),
        { operation: `Translation of segment ${index}` },
      )

      const translatedText = normalizeTranslation(response.choices[0]?.message?.content)
      segments.push({ ...base, translatedText, status: translatedText === BLANK_TEXT ? "blank" : "translated" })
    } catch (error) {
      failed++
      console.error(`[Activity] Translation failed for segment ${index} (${JSON.stringify(seg.transcript)}): ${errorMessage(error)}`)
      segments.push({ ...base, translatedText: fallbackTranslation(seg.transcript), status: "failed" })
    }
  }

  if (attempted > 0 && failed === attempted) {
    throw ApplicationFailure.retryable(`All ${attempted} segments failed to translate`, "TranslationError")
  }

  const blank = segments.filter((seg) => seg.status === "blank").length
  console.log(`[Activity] Translation finished: ${segments.length - blank - failed} translated, ${blank} blank, ${failed} failed`)

  return { segments, translated: segments.length - blank - failed, blank, failed }
}

/**
 * Activity: Write SRT and VTT subtitles for the translated segments
 */
export async function generateSubtitles(input: GenerateSubtitlesInput): Promise<SubtitleGenerationResult> {
  const cues = toCues(input.segments)
  console.log(`[Activity] Generating ${cues.length} subtitle cues`)

  const workspaceDir = ensureWorkspace(input.workflowId)
  const srtContent = renderSrt(cues)
  const vttContent = renderVtt(cues)
  const srtPath = path.join(workspaceDir, "subtitles.srt")
  const vttPath = path.join(workspaceDir, "subtitles.vtt")

  fs.writeFileSync(srtPath, srtContent, "utf-8")
  fs.writeFileSync(vttPath, vttContent, "utf-8")

  return { srtPath, vttPath, srtContent, vttContent, cueCount: cues.length }
}

/**
 * Activity: Voice every speakable translated segment
 */
export async function synthesizeSpeech(input: SynthesizeSpeechInput): Promise<SynthesizedClip[]> {
  const settings = getPipelineSettings()
  const openai = getOpenAIClient()
  const voice = input.voice && isTtsVoice(input.voice) ? input.voice : settings.OPENAI_TTS_VOICE
  const workspaceDir = ensureWorkspace(input.workflowId)
  const speakable = input.segments.filter((seg) => seg.status === "translated" && isSpeakable(seg.translatedText))

  console.log(`[Activity] Synthesizing ${speakable.length} clips with voice ${voice}`)

  const clips: SynthesizedClip[] = []
  for (const seg of speakable) {
    const clipPath = path.join(workspaceDir, `clip-${seg.index}.mp3`)

    try {
      const response = await retryWithBackoff(
        () =>
          openai.audio.speech.create({
            model: settings.OPENAI_TTS_MODEL,
            voice,
            input: seg.translatedText,
            response_format: "mp3",
          }),
        { operation: `Speech synthesis of segment ${seg.index}` },
      )
      fs.writeFileSync(clipPath, Buffer.from(await response.arrayBuffer()))
    } catch (error) {
      throw ApplicationFailure.retryable(`Speech synthesis failed for segment ${seg.index}: ${errorMessage(error)}`, "SynthesisError")
    }

    const duration = await probeDuration(clipPath)
    clips.push({ index: seg.index, path: clipPath, start: seg.start, end: seg.end, duration })
  }

  return clips
}

/**
 * Activity: Fit the clips onto the timeline and mix them into one track
 */
export async function renderDubTrack(input: RenderDubTrackInput): Promise<RenderDubTrackResult> {
  const settings = getPipelineSettings()
  const maxTempo = input.maxTempo ?? settings.MAX_TEMPO
  const placements = planClipPlacement(input.clips, { videoDuration: input.videoDuration, maxTempo })

  const overflowing = placements.filter((placement) => placement.overflow > 0)
  for (const placement of overflowing) {
    console.warn(`[Activity] Clip ${placement.index} overruns its slot by ${placement.overflow}s even at tempo ${placement.tempo}`)
  }

  const audioPath = path.join(ensureWorkspace(input.workflowId), "dub.m4a")
  await mixDubTrack(placements, input.videoDuration, audioPath)

  console.log(`[Activity] Dub track mixed from ${placements.length} clips: ${audioPath}`)
  return { audioPath, placements, overflowingClips: overflowing.length }
}

/**
 * Activity: Replace the video's audio with the dub track
 */
export async function composeVideo(input: ComposeVideoInput): Promise<ComposeVideoResult> {
  const outputDir = ensureOutputDir(input.workflowId)
  const suffix = languageCode(input.targetLanguage) ?? input.targetLanguage.toLowerCase().replace(/[^a-z0-9]+/g, "-")
  const outputPath = path.join(outputDir, `${input.fileBaseName}_${suffix}.mp4`)

  // An empty SRT is not a readable subtitle stream
  const subtitleMode = input.cueCount > 0 ? input.subtitleMode : "none"
  if (subtitleMode !== input.subtitleMode) {
    console.warn(`[Activity] No subtitle cues, composing without ${input.subtitleMode} subtitles`)
  }

  await composeDubbedVideo({
    videoPath: input.videoPath,
    audioPath: input.audioPath,
    srtPath: input.srtPath,
    subtitleMode,
    targetLanguage: input.targetLanguage,
    outputPath,
  })

  return { outputPath, subtitleMode }
}

/**
 * Activity: Save all workflow artifacts to the output directory
 */
export async function saveArtifacts(input: SaveArtifactsInput): Promise<SaveArtifactsResult> {
  console.log(`[Activity] Saving artifacts for: ${input.workflowId}`)

  const artifactsDir = ensureOutputDir(input.workflowId)
  const files: string[] = []
  const write = (name: string, content: string) => {
    const filePath = path.join(artifactsDir, name)
    fs.writeFileSync(filePath, content, "utf-8")
    files.push(filePath)
  }

  write("segments.json", JSON.stringify(input.segments, null, 2))
  write("subtitles.srt", input.srtContent)
  write("subtitles.vtt", input.vttContent)
  write("transcription.txt", input.transcription)
  write(
    "translation.txt",
    input.segments
      .filter((seg) => seg.status === "translated")
      .map((seg) => seg.translatedText)
      .join("\n"),
  )

  const dubAudioPath = path.join(artifactsDir, "dub_audio.m4a")
  fs.copyFileSync(input.dubAudioPath, dubAudioPath)
  files.push(dubAudioPath)

  const metadata = {
    workflowId: input.workflowId,
    sourceLanguage: input.sourceLanguage,
    targetLanguage: input.targetLanguage,
    segmentCount: input.segments.length,
    translatedSegments: input.segments.filter((seg) => seg.status === "translated").length,
    blankSegments: input.segments.filter((seg) => seg.status === "blank").length,
    failedSegments: input.segments.filter((seg) => seg.status === "failed").length,
    droppedSegments: input.droppedSegments,
    dubAudioPath,
    outputVideoPath: input.outputVideoPath,
    createdAt: new Date().toISOString(),
  }
  write("metadata.json", JSON.stringify(metadata, null, 2))

  console.log(`[Activity] Saved ${files.length} artifacts to: ${artifactsDir}`)
  return { artifactsDir, files, dubAudioPath }
}

/**
 * Activity: Remove the workflow's scratch workspace, and the input video when
 * it was uploaded through the API
 */
export async function cleanupWorkspace(workflowId: string, inputPath?: string): Promise<void> {
  console.log(`[Activity] Cleaning up workspace for ${workflowId}`)

  try {
    removeWorkspace(workflowId)
  } catch (error) {
    // Cleanup failure shouldn't fail the workflow
    console.error(`[Activity] Cleanup error: ${errorMessage(error)}`)
  }

  if (inputPath) {
    try {
      if (removeUploadedInput(inputPath)) {
        console.log(`[Activity] Removed uploaded input: ${inputPath}`)
      }
    } catch (error) {
      console.error(`[Activity] Upload cleanup error: ${errorMessage(error)}`)
    }
  }
}
