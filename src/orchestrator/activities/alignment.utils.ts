/**
 * Timing engine for the dub track
 *
 * Each synthesized clip starts where its source segment started. A clip may run
 * on into the silence before the next clip; past that it is sped up, but never
 * beyond maxTempo. Whatever still does not fit is reported as overflow.
 */

import type { ClipPlacement, SynthesizedClip } from "./types"

export interface PlacementOptions {
  videoDuration: number
  maxTempo: number
}

function round(value: number, digits: number): number {
  const factor = Math.pow(10, digits)
  return Math.round(value * factor) / factor
}

export function planClipPlacement(clips: SynthesizedClip[], options: PlacementOptions): ClipPlacement[] {
  const maxTempo = Math.max(1, options.maxTempo)
  const ordered = clips.filter((clip) => clip.start < options.videoDuration).sort((a, b) => a.start - b.start || a.index - b.index)

  return ordered.map((clip, i) => {
    const next = ordered[i + 1]
    const windowEnd = next ? next.start : options.videoDuration
    const available = Math.max(windowEnd - clip.start, clip.end - clip.start)

    const tempo = available > 0 && clip.duration > available ? round(Math.min(clip.duration / available, maxTempo), 4) : 1
    const fittedDuration = round(clip.duration / tempo, 3)

    return {
      index: clip.index,
      path: clip.path,
      start: clip.start,
      delayMs: Math.round(clip.start * 1000),
      duration: clip.duration,
      available: round(available, 3),
      tempo,
      fittedDuration,
      overflow: round(Math.max(0, fittedDuration - available), 3),
    }
  })
}

/**
 * ffmpeg filter graph that places input i (the i-th placement) on the timeline
 * and mixes everything into a single `[dub]` stream of the video's length
 */
export function buildDubFilterGraph(placements: ClipPlacement[], videoDuration: number): string[] {
  const chains = placements.map((placement, i) => {
    const filters: string[] = []
    if (placement.tempo !== 1) {
      filters.push(`atempo=${placement.tempo}`)
    }
    filters.push(`adelay=${placement.delayMs}:all=1`)
    return `[${i}:a]${filters.join(",")}[a${i}]`
  })

  const labels = placements.map((_, i) => `[a${i}]`).join("")
  chains.push(`${labels}amix=inputs=${placements.length}:duration=longest:dropout_transition=0:normalize=0[mix]`)
  chains.push(`[mix]apad,atrim=end=${round(videoDuration, 3)}[dub]`)

  return chains
}
