/**
 * Activity Types for the Dubbing Workflow
 *
 * Everything here crosses the Temporal payload boundary, so it must stay plain JSON.
 */

export interface TranscriptItem {
  id: number
  type: "pronunciation" | "punctuation"
  content: string
  start: number
  end: number
  /** 0..1; punctuation carries 1 */
  confidence: number
}

export interface TranscriptSegment {
  id: number
  start: number
  end: number
  transcript: string
  itemIds: number[]
}

export interface Transcript {
  language: string
  text: string
  items: TranscriptItem[]
  segments: TranscriptSegment[]
}

/**
 * Result from media preparation
 */
export interface PreparedMedia {
  videoPath: string
  audioPath: string
  videoDuration: number
  workspaceDir: string
}

export interface TranscriptionInput {
  audioPath: string
  sourceLanguage?: string
  confidenceThreshold?: number
}

export interface TranscriptionResult {
  transcript: Transcript
  droppedItems: number
  droppedSegments: number
}

export type DubSegmentStatus = "translated" | "blank" | "failed"

/**
 * One translated unit of speech on the video timeline
 */
export interface DubSegment {
  index: number
  start: number
  end: number
  sourceText: string
  translatedText: string
  maxCharacters: number
  status: DubSegmentStatus
}

export interface TranslateSegmentsInput {
  segments: TranscriptSegment[]
  sourceLanguage: string
  targetLanguage: string
  charsPerSecond?: number
  preserveTerms?: string[]
}

export interface TranslateSegmentsResult {
  segments: DubSegment[]
  translated: number
  blank: number
  failed: number
}

export interface SubtitleCue {
  start: number
  end: number
  text: string
}

export interface GenerateSubtitlesInput {
  workflowId: string
  segments: DubSegment[]
}

export interface SubtitleGenerationResult {
  srtPath: string
  vttPath: string
  srtContent: string
  vttContent: string
  cueCount: number
}

export interface SynthesizeSpeechInput {
  workflowId: string
  segments: DubSegment[]
  voice?: string
}

/**
 * A synthesized clip and the slot it was written for
 */
export interface SynthesizedClip {
  index: number
  path: string
  start: number
  end: number
  duration: number
}

export interface ClipPlacement {
  index: number
  path: string
  start: number
  delayMs: number
  duration: number
  available: number
  tempo: number
  fittedDuration: number
  overflow: number
}

export interface RenderDubTrackInput {
  workflowId: string
  clips: SynthesizedClip[]
  videoDuration: number
  maxTempo?: number
}

export interface RenderDubTrackResult {
  audioPath: string
  placements: ClipPlacement[]
  overflowingClips: number
}

export type SubtitleMode = "none" | "soft" | "burn"

export interface ComposeVideoInput {
  workflowId: string
  videoPath: string
  audioPath: string
  srtPath: string
  /** Cues in the SRT file; with none, subtitles are left out */
  cueCount: number
  subtitleMode: SubtitleMode
  targetLanguage: string
  fileBaseName: string
}

export interface ComposeVideoResult {
  outputPath: string
  subtitleMode: SubtitleMode
}

export interface SaveArtifactsInput {
  workflowId: string
  sourceLanguage: string
  targetLanguage: string
  transcription: string
  segments: DubSegment[]
  srtContent: string
  vttContent: string
  dubAudioPath: string
  outputVideoPath?: string
  droppedSegments: number
}

export interface SaveArtifactsResult {
  artifactsDir: string
  files: string[]
  dubAudioPath: string
}
