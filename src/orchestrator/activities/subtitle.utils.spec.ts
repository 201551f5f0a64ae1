import { formatTimestamp, renderSrt, renderVtt, toCues } from "./subtitle.utils"
import { BLANK_TEXT } from "./translation.utils"
import type { DubSegment, SubtitleCue } from "./types"

describe("subtitle utils", () => {
  describe("formatTimestamp", () => {
    it("should use a comma for SRT and a dot for VTT", () => {
      expect(formatTimestamp(3661.5, "srt")).toBe("01:01:01,500")
      expect(formatTimestamp(3661.5, "vtt")).toBe("01:01:01.500")
    })

    it("should round to whole milliseconds", () => {
      expect(formatTimestamp(1.9996, "srt")).toBe("00:00:02,000")
      expect(formatTimestamp(0.0004, "vtt")).toBe("00:00:00.000")
    })

    it("should clamp negative times to zero", () => {
      expect(formatTimestamp(-1, "srt")).toBe("00:00:00,000")
    })
  })

  describe("toCues", () => {
    const segment = (index: number, translatedText: string, status: DubSegment["status"]): DubSegment => ({
      index,
      start: index * 2,
      end: index * 2 + 1.5,
      sourceText: "source",
      translatedText,
      maxCharacters: 21,
      status,
    })

    it("should keep only segments that were translated into speech", () => {
      const cues = toCues([segment(0, "Hola", "translated"), segment(1, BLANK_TEXT, "blank"), segment(2, "[TRANSLATION_ERROR] source", "failed"), segment(3, "Adiós", "translated")])

      expect(cues).toEqual([
        { start: 0, end: 1.5, text: "Hola" },
        { start: 6, end: 7.5, text: "Adiós" },
      ])
    })
  })

  describe("rendering", () => {
    const cues: SubtitleCue[] = [
      { start: 0, end: 1.5, text: "Hola" },
      { start: 2, end: 3.25, text: "Adiós" },
    ]

    it("should render numbered SRT blocks", () => {
      expect(renderSrt(cues)).toBe("1\n00:00:00,000 --> 00:00:01,500\nHola\n\n2\n00:00:02,000 --> 00:00:03,250\nAdiós\n")
    })

    it("should render a WEBVTT document", () => {
      expect(renderVtt(cues)).toBe("WEBVTT\n\n00:00:00.000 --> 00:00:01.500\nHola\n\n00:00:02.000 --> 00:00:03.250\nAdiós\n")
    })

    it("should render empty documents without cues", () => {
      expect(renderSrt([])).toBe("")
      expect(renderVtt([])).toBe("WEBVTT\n\n")
    })
  })
})
