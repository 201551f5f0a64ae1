import type { Transcript, TranscriptItem, TranscriptSegment } from "./types"

/**
 * The parts of a Whisper `verbose_json` response the transcript is built from
 */
export interface WhisperVerboseTranscription {
  text: string
  language: string
  segments?: Array<{ start: number; end: number; text: string; avg_logprob?: number }>
  words?: Array<{ word: string; start: number; end: number }>
}

const PUNCTUATION_ONLY = /^[\p{P}]+$/u

function itemType(content: string): TranscriptItem["type"] {
  return PUNCTUATION_ONLY.test(content) ? "punctuation" : "pronunciation"
}

function segmentConfidence(avgLogprob: number | undefined): number {
  if (avgLogprob === undefined || Number.isNaN(avgLogprob)) {
    return 1
  }
  return Math.min(1, Math.max(0, Math.exp(avgLogprob)))
}

/**
 * Index of the segment a word belongs to: the one whose [start, end) holds the
 * word's start, else the last segment that started before it
 */
function owningSegment(segments: Array<{ start: number; end: number }>, wordStart: number): number {
  let fallback = 0
  for (let i = 0; i < segments.length; i++) {
    const seg = segments[i]
    if (wordStart >= seg.start && wordStart < seg.end) {
      return i
    }
    if (seg.start <= wordStart) {
      fallback = i
    }
  }
  return fallback
}

/**
 * Join item contents into a line: words separated by spaces, punctuation glued
 * to the word before it
 */
export function joinItems(items: TranscriptItem[]): string {
  let line = ""
  for (const item of items) {
    if (item.type === "punctuation" && line.length > 0) {
      line += item.content
    } else {
      line += line.length > 0 ? ` ${item.content}` : item.content
    }
  }
  return line
}

/**
 * Convert a Whisper verbose transcription into timed segments of word items
 */
export function fromWhisper(verbose: WhisperVerboseTranscription): Transcript {
  const rawSegments = verbose.segments ?? []
  const rawWords = verbose.words ?? []

  const wordsBySegment: Array<Array<{ word: string; start: number; end: number }>> = rawSegments.map(() => [])
  for (const word of rawWords) {
    if (rawSegments.length === 0 || !word.word.trim()) {
      continue
    }
    wordsBySegment[owningSegment(rawSegments, word.start)].push(word)
  }

  const items: TranscriptItem[] = []
  const segments: TranscriptSegment[] = []

  rawSegments.forEach((seg, segIndex) => {
    const confidence = segmentConfidence(seg.avg_logprob)
    const words = wordsBySegment[segIndex]
    const itemIds: number[] = []

    const pieces = words.length > 0 ? words.map((w) => ({ content: w.word.trim(), start: w.start, end: w.end })) : [{ content: seg.text.trim(), start: seg.start, end: seg.end }]

    for (const piece of pieces) {
      if (!piece.content) {
        continue
      }
      const type = itemType(piece.content)
      const item: TranscriptItem = {
        id: items.length,
        type,
        content: piece.content,
        start: piece.start,
        end: piece.end,
        confidence: type === "punctuation" ? 1 : confidence,
      }
      items.push(item)
      itemIds.push(item.id)
    }

    segments.push({
      id: segIndex,
      start: seg.start,
      end: seg.end,
      transcript: seg.text.trim(),
      itemIds,
    })
  })

  return {
    language: verbose.language,
    text: verbose.text.trim(),
    items,
    segments,
  }
}

/**
 * Drop pronunciation items under the confidence threshold and rebuild each
 * segment's transcript from what is left. Segments left without a spoken word
 * are removed.
 * The input transcript is not modified.
 */
export function filterLowConfidence(transcript: Transcript, threshold: number): Transcript {
  const itemsById = new Map<number, TranscriptItem>()
  for (const item of transcript.items) {
    itemsById.set(item.id, item)
  }

  const lowConfidence = new Set<number>()
  for (const item of transcript.items) {
    if (item.type === "pronunciation" && item.confidence < threshold) {
      lowConfidence.add(item.id)
    }
  }

  const segments: TranscriptSegment[] = []
  for (const seg of transcript.segments) {
    const kept: TranscriptItem[] = []
    for (const id of seg.itemIds) {
      const item = itemsById.get(id)
      if (item && !lowConfidence.has(id)) {
        kept.push(item)
      }
    }

    // Punctuation alone is nothing to say
    if (!kept.some((item) => item.type === "pronunciation")) {
      continue
    }
    const line = joinItems(kept)

    segments.push({
      ...seg,
      itemIds: kept.map((item) => item.id),
      transcript: line,
    })
  }

  const keptIds = new Set(segments.flatMap((seg) => seg.itemIds))

  return {
    language: transcript.language,
    text: segments.map((seg) => seg.transcript).join(" "),
    items: transcript.items.filter((item) => keptIds.has(item.id)),
    segments,
  }
}

export function summarizeFiltering(before: Transcript, after: Transcript): { droppedItems: number; droppedSegments: number } {
  return {
    droppedItems: before.items.length - after.items.length,
    droppedSegments: before.segments.length - after.segments.length,
  }
}
