import { buildDubFilterGraph, planClipPlacement } from "./alignment.utils"
import type { SynthesizedClip } from "./types"

const clip = (index: number, start: number, end: number, duration: number): SynthesizedClip => ({
  index,
  path: `/work/clip-${index}.mp3`,
  start,
  end,
  duration,
})

describe("alignment utils", () => {
  const clips = [clip(2, 6, 7, 0.5), clip(0, 1, 3, 1.5), clip(1, 3.5, 5, 4), clip(3, 9, 10, 1)]

  describe("planClipPlacement", () => {
    it("should order clips on the timeline and drop those past the video end", () => {
      const placements = planClipPlacement(clips, { videoDuration: 8, maxTempo: 1.5 })

      expect(placements.map((p) => p.index)).toEqual([0, 1, 2])
      expect(placements.map((p) => p.delayMs)).toEqual([1000, 3500, 6000])
    })

    it("should let a clip run into the silence before the next one", () => {
      const [first] = planClipPlacement(clips, { videoDuration: 8, maxTempo: 1.5 })

      expect(first).toEqual({
        index: 0,
        path: "/work/clip-0.mp3",
        start: 1,
        delayMs: 1000,
        duration: 1.5,
        available: 2.5,
        tempo: 1,
        fittedDuration: 1.5,
        overflow: 0,
      })
    })

    it("should cap the speed-up and report what still overflows", () => {
      const second = planClipPlacement(clips, { videoDuration: 8, maxTempo: 1.5 })[1]

      expect(second.available).toBe(2.5)
      expect(second.tempo).toBe(1.5)
      expect(second.fittedDuration).toBe(2.667)
      expect(second.overflow).toBe(0.167)
    })

    it("should speed up just enough when the cap allows it", () => {
      const [only] = planClipPlacement([clip(0, 0, 1, 1.2)], { videoDuration: 1, maxTempo: 1.5 })

      expect(only.tempo).toBe(1.2)
      expect(only.fittedDuration).toBe(1)
      expect(only.overflow).toBe(0)
    })

    it("should give the last clip the rest of the video", () => {
      const third = planClipPlacement(clips, { videoDuration: 8, maxTempo: 1.5 })[2]

      expect(third.available).toBe(2)
      expect(third.tempo).toBe(1)
    })

    it("should never slow a clip down when maxTempo is below 1", () => {
      const [only] = planClipPlacement([clip(0, 0, 1, 2)], { videoDuration: 1, maxTempo: 0.5 })

      expect(only.tempo).toBe(1)
      expect(only.overflow).toBe(1)
    })
  })

  describe("buildDubFilterGraph", () => {
    it("should delay every clip, speed up those that overrun and mix to the video length", () => {
      const placements = planClipPlacement(clips, { videoDuration: 8, maxTempo: 1.5 })

      expect(buildDubFilterGraph(placements, 8)).toEqual([
        "[0:a]adelay=1000:all=1[a0]",
        "[1:a]atempo=1.5,adelay=3500:all=1[a1]",
        "[2:a]adelay=6000:all=1[a2]",
        "[a0][a1][a2]amix=inputs=3:duration=longest:dropout_transition=0:normalize=0[mix]",
        "[mix]apad,atrim=end=8[dub]",
      ])
    })

    it("should round the track length to milliseconds", () => {
      const placements = planClipPlacement([clip(0, 0.25, 1, 0.5)], { videoDuration: 12.34567, maxTempo: 1.5 })

      expect(buildDubFilterGraph(placements, 12.34567)).toEqual(["[0:a]adelay=250:all=1[a0]", "[a0]amix=inputs=1:duration=longest:dropout_transition=0:normalize=0[mix]", "[mix]apad,atrim=end=12.346[dub]"])
    })
  })
})
