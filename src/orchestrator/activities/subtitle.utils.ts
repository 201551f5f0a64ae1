import type { DubSegment, SubtitleCue } from "./types"
import { isSpeakable } from "./translation.utils"

function pad(num: number, size: number = 2): string {
  return num.toString().padStart(size, "0")
}

export function formatTimestamp(seconds: number, format: "srt" | "vtt"): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000))
  const hours = Math.floor(totalMs / 3_600_000)
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000)
  const secs = Math.floor((totalMs % 60_000) / 1000)
  const ms = totalMs % 1000

  // SRT uses a comma before the milliseconds, VTT a dot
  const separator = format === "srt" ? "," : "."
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)}${separator}${pad(ms, 3)}`
}

export function toCues(segments: DubSegment[]): SubtitleCue[] {
  return segments
    .filter((seg) => seg.status === "translated" && isSpeakable(seg.translatedText))
    .map((seg) => ({ start: seg.start, end: seg.end, text: seg.translatedText }))
}

export function renderSrt(cues: SubtitleCue[]): string {
  return cues.map((cue, index) => `${index + 1}\n${formatTimestamp(cue.start, "srt")} --> ${formatTimestamp(cue.end, "srt")}\n${cue.text}\n`).join("\n")
}

export function renderVtt(cues: SubtitleCue[]): string {
  const body = cues.map((cue) => `${formatTimestamp(cue.start, "vtt")} --> ${formatTimestamp(cue.end, "vtt")}\n${cue.text}\n`).join("\n")
  return `WEBVTT\n\n${body}`
}
