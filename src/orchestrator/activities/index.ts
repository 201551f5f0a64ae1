// Barrel exports only - no class/interface/type definitions allowed in index.ts

// Types
export type {
  Transcript,
  TranscriptItem,
  TranscriptSegment,
  PreparedMedia,
  TranscriptionInput,
  TranscriptionResult,
  DubSegment,
  DubSegmentStatus,
  TranslateSegmentsInput,
  TranslateSegmentsResult,
  SubtitleCue,
  GenerateSubtitlesInput,
  SubtitleGenerationResult,
  SynthesizeSpeechInput,
  SynthesizedClip,
  ClipPlacement,
  RenderDubTrackInput,
  RenderDubTrackResult,
  SubtitleMode,
  ComposeVideoInput,
  ComposeVideoResult,
  SaveArtifactsInput,
  SaveArtifactsResult,
} from "./types"

// Activities
export { prepareMedia, transcribeAudio, translateSegments, generateSubtitles, synthesizeSpeech, renderDubTrack, composeVideo, saveArtifacts, cleanupWorkspace } from "./dubbing.activities"
