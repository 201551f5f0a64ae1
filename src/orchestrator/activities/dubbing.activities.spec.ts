import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import type OpenAI from "openai"
import { getOpenAIClient } from "./openai.client"
import { composeDubbedVideo, ensureOutputDir, ensureWorkspace, MediaInputError, mixDubTrack, prepareMediaInput, probeDuration, removeWorkspace } from "./ffmpeg.utils"
import { cleanupWorkspace, composeVideo, generateSubtitles, prepareMedia, renderDubTrack, saveArtifacts, synthesizeSpeech, transcribeAudio, translateSegments } from "./dubbing.activities"
import { BLANK_TEXT } from "./translation.utils"
import type { DubSegment, TranscriptSegment } from "./types"

jest.mock("./openai.client", () => ({ getOpenAIClient: jest.fn() }))

jest.mock("./ffmpeg.utils", () => ({
  ...jest.requireActual<typeof import("./ffmpeg.utils")>("./ffmpeg.utils"),
  ensureWorkspace: jest.fn(),
  ensureOutputDir: jest.fn(),
  prepareMediaInput: jest.fn(),
  probeDuration: jest.fn(),
  mixDubTrack: jest.fn(),
  composeDubbedVideo: jest.fn(),
  removeWorkspace: jest.fn(),
}))

class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message)
  }
}

describe("dubbing activities", () => {
  const openai = {
    audio: {
      transcriptions: { create: jest.fn() },
      speech: { create: jest.fn() },
    },
    chat: {
      completions: { create: jest.fn() },
    },
  }

  let workspaceDir: string
  let outputDir: string

  const chatReply = (content: string | null) => ({ choices: [{ message: { content } }] })

  beforeEach(() => {
    workspaceDir = fs.mkdtempSync(path.join(os.tmpdir(), "dub-work-"))
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "dub-out-"))

    jest.mocked(getOpenAIClient).mockReturnValue(openai as unknown as OpenAI)
    jest.mocked(ensureWorkspace).mockReturnValue(workspaceDir)
    jest.mocked(ensureOutputDir).mockReturnValue(outputDir)

    jest.spyOn(console, "log").mockImplementation(() => undefined)
    jest.spyOn(console, "warn").mockImplementation(() => undefined)
    jest.spyOn(console, "error").mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
    fs.rmSync(workspaceDir, { recursive: true, force: true })
    fs.rmSync(outputDir, { recursive: true, force: true })
  })

  describe("prepareMedia", () => {
    it("should refuse audio-only input without retrying", async () => {
      await expect(prepareMedia("https://example.com/podcast.mp3", "wf-1")).rejects.toMatchObject({ nonRetryable: true, type: "FileProcessingError" })
      expect(prepareMediaInput).not.toHaveBeenCalled()
    })

    it("should return the prepared media with its workspace", async () => {
      jest.mocked(prepareMediaInput).mockResolvedValue({ videoPath: "/in/demo.mp4", audioPath: `${workspaceDir}/source-audio.mp3`, videoDuration: 12.5 })

      await expect(prepareMedia("/in/demo.mp4", "wf-1")).resolves.toEqual({
        videoPath: "/in/demo.mp4",
        audioPath: `${workspaceDir}/source-audio.mp3`,
        videoDuration: 12.5,
        workspaceDir,
      })
      expect(prepareMediaInput).toHaveBeenCalledWith("/in/demo.mp4", workspaceDir)
    })

    it("should not retry an input that does not exist", async () => {
      jest.mocked(prepareMediaInput).mockRejectedValue(new MediaInputError("Input file not found: /nonexistent/talk.mp4", true))

      await expect(prepareMedia("/nonexistent/talk.mp4", "wf-1")).rejects.toMatchObject({
        nonRetryable: true,
        type: "FileProcessingError",
        message: "Input file not found: /nonexistent/talk.mp4",
      })
    })

    it("should not retry a download the server refuses", async () => {
      jest.mocked(prepareMediaInput).mockRejectedValue(new MediaInputError("Failed to download file: HTTP 404", true))

      await expect(prepareMedia("https://example.com/gone.mp4", "wf-1")).rejects.toMatchObject({ nonRetryable: true, type: "FileProcessingError" })
    })

    it("should retry server and network failures", async () => {
      jest.mocked(prepareMediaInput).mockRejectedValueOnce(new MediaInputError("Failed to download file: HTTP 503", false)).mockRejectedValueOnce(new Error("socket hang up"))

      await expect(prepareMedia("https://example.com/demo.mp4", "wf-1")).rejects.toMatchObject({
        nonRetryable: false,
        type: "FileProcessingError",
        message: "Failed to prepare media: Failed to download file: HTTP 503",
      })
      await expect(prepareMedia("https://example.com/demo.mp4", "wf-1")).rejects.toMatchObject({
        nonRetryable: false,
        type: "FileProcessingError",
        message: "Failed to prepare media: socket hang up",
      })
    })
  })

  describe("transcribeAudio", () => {
    it("should fail without retrying when the audio is missing", async () => {
      await expect(transcribeAudio({ audioPath: path.join(workspaceDir, "missing.mp3") })).rejects.toMatchObject({ nonRetryable: true, type: "TranscriptionError" })
    })

    it("should request word timings and drop low confidence speech", async () => {
      const audioPath = path.join(workspaceDir, "source-audio.mp3")
      fs.writeFileSync(audioPath, "audio")

      const verbose = {
        text: "Welcome back. Um.",
        language: "english",
        segments: [
          { start: 0, end: 2, text: " Welcome back.", avg_logprob: -0.2 },
          { start: 2, end: 3, text: " Um.", avg_logprob: -2.5 },
        ],
        words: [
          { word: "Welcome", start: 0, end: 0.6 },
          { word: "back", start: 0.6, end: 1.2 },
          { word: "Um", start: 2, end: 2.5 },
        ],
      }
      // Close the upload stream before the workspace is removed
      openai.audio.transcriptions.create.mockImplementation(
        (body: { file: fs.ReadStream }) =>
          new Promise((resolve) => {
            body.file.once("open", () => {
              body.file.destroy()
              resolve(verbose)
            })
          }),
      )

      const result = await transcribeAudio({ audioPath, sourceLanguage: "English", confidenceThreshold: 0.25 })

      expect(openai.audio.transcriptions.create).toHaveBeenCalledWith(
        expect.objectContaining({
          model: "whisper-1",
          response_format: "verbose_json",
          timestamp_granularities: ["word", "segment"],
          language: "en",
        }),
      )
      expect(result.droppedItems).toBe(1)
      expect(result.droppedSegments).toBe(1)
      expect(result.transcript.segments).toEqual([{ id: 0, start: 0, end: 2, transcript: "Welcome back", itemIds: [0, 1] }])
    })
  })

  describe("translateSegments", () => {
    const segment = (id: number, start: number, end: number, transcript: string): TranscriptSegment => ({ id, start, end, transcript, itemIds: [] })

    it("should translate each segment within its character budget", async () => {
      openai.chat.completions.create.mockResolvedValue(chatReply("ようこそ"))

      const result = await translateSegments({
        segments: [segment(0, 0, 2, "Welcome to the tour")],
        sourceLanguage: "english",
        targetLanguage: "Japanese",
      })

      expect(result).toEqual({
        segments: [{ index: 0, start: 0, end: 2, sourceText: "Welcome to the tour", translatedText: "ようこそ", maxCharacters: 11, status: "translated" }],
        translated: 1,
        blank: 0,
        failed: 0,
      })

      const request = openai.chat.completions.create.mock.calls[0][0]
      expect(request.model).toBe("gpt-4o")
      expect(request.temperature).toBe(0)
      expect(request.messages[0].content).toContain("converting English speech into Japanese lines")
      expect(request.messages[0].content).toContain("within 11 characters")
      expect(request.messages[1]).toEqual({ role: "user", content: "Welcome to the tour" })
    })

    it("should blank filler without asking the model", async () => {
      openai.chat.completions.create.mockResolvedValue(chatReply("Hola"))

      const result = await translateSegments({
        segments: [segment(0, 0, 1, "Um, you know."), segment(1, 1, 3, "Hello")],
        sourceLanguage: "English",
        targetLanguage: "Spanish",
      })

      expect(openai.chat.completions.create).toHaveBeenCalledTimes(1)
      expect(result.segments.map((s) => [s.status, s.translatedText])).toEqual([
        ["blank", BLANK_TEXT],
        ["translated", "Hola"],
      ])
      expect(result.blank).toBe(1)
    })

    it("should treat an empty reply as a blank segment", async () => {
      openai.chat.completions.create.mockResolvedValue(chatReply(""))

      const result = await translateSegments({ segments: [segment(0, 0, 1, "Right")], sourceLanguage: "English", targetLanguage: "French" })

      expect(result.segments[0].status).toBe("blank")
      expect(result).toMatchObject({ translated: 0, blank: 1, failed: 0 })
    })

    it("should mark a failed segment and keep going", async () => {
      openai.chat.completions.create.mockResolvedValueOnce(chatReply("Hallo")).mockRejectedValueOnce(new ApiError("content rejected", 400))

      const result = await translateSegments({
        segments: [segment(0, 0, 1, "Hello"), segment(1, 1, 2, "Goodbye")],
        sourceLanguage: "English",
        targetLanguage: "German",
        charsPerSecond: 10,
      })

      expect(result.segments[1]).toEqual({ index: 1, start: 1, end: 2, sourceText: "Goodbye", translatedText: "[TRANSLATION_ERROR] Goodbye", maxCharacters: 10, status: "failed" })
      expect(result).toMatchObject({ translated: 1, blank: 0, failed: 1 })
    })

    it("should fail the activity when every segment fails", async () => {
      openai.chat.completions.create.mockRejectedValue(new ApiError("invalid model", 404))

      await expect(translateSegments({ segments: [segment(0, 0, 1, "Hello"), segment(1, 1, 2, "Goodbye")], sourceLanguage: "English", targetLanguage: "German" })).rejects.toMatchObject({ type: "TranslationError", message: "All 2 segments failed to translate" })
    })

    it("should pass requested terms through to the prompt", async () => {
      openai.chat.completions.create.mockResolvedValue(chatReply("Acme es genial"))

      await translateSegments({ segments: [segment(0, 0, 2, "Acme is great")], sourceLanguage: "English", targetLanguage: "Spanish", preserveTerms: ["Acme"] })

      expect(openai.chat.completions.create.mock.calls[0][0].messages[0].content).toContain('do not translate them: "Acme".')
    })
  })

  const dubSegment = (index: number, translatedText: string, status: DubSegment["status"]): DubSegment => ({
    index,
    start: index * 2,
    end: index * 2 + 1.5,
    sourceText: `line ${index}`,
    translatedText,
    maxCharacters: 21,
    status,
  })

  describe("generateSubtitles", () => {
    it("should write SRT and VTT files for the translated segments", async () => {
      const result = await generateSubtitles({ workflowId: "wf-1", segments: [dubSegment(0, "Hola", "translated"), dubSegment(1, BLANK_TEXT, "blank")] })

      expect(result.cueCount).toBe(1)
      expect(result.srtPath).toBe(path.join(workspaceDir, "subtitles.srt"))
      expect(fs.readFileSync(result.srtPath, "utf-8")).toBe("1\n00:00:00,000 --> 00:00:01,500\nHola\n")
      expect(fs.readFileSync(result.vttPath, "utf-8")).toBe("WEBVTT\n\n00:00:00.000 --> 00:00:01.500\nHola\n")
    })
  })

  describe("synthesizeSpeech", () => {
    it("should voice only speakable segments and measure each clip", async () => {
      openai.audio.speech.create.mockResolvedValue({ arrayBuffer: async () => new TextEncoder().encode("mp3-bytes").buffer })
      jest.mocked(probeDuration).mockResolvedValue(1.25)

      const clips = await synthesizeSpeech({
        workflowId: "wf-1",
        voice: "robot",
        segments: [dubSegment(0, "Hola", "translated"), dubSegment(1, BLANK_TEXT, "blank"), dubSegment(2, "[TRANSLATION_ERROR] line 2", "failed")],
      })

      const clipPath = path.join(workspaceDir, "clip-0.mp3")
      expect(clips).toEqual([{ index: 0, path: clipPath, start: 0, end: 1.5, duration: 1.25 }])
      expect(fs.readFileSync(clipPath, "utf-8")).toBe("mp3-bytes")
      expect(openai.audio.speech.create).toHaveBeenCalledTimes(1)
      expect(openai.audio.speech.create).toHaveBeenCalledWith({ model: "tts-1", voice: "alloy", input: "Hola", response_format: "mp3" })
    })

    it("should name the segment that could not be voiced", async () => {
      openai.audio.speech.create.mockRejectedValue(new ApiError("input too long", 400))

      await expect(synthesizeSpeech({ workflowId: "wf-1", voice: "nova", segments: [dubSegment(3, "Hola", "translated")] })).rejects.toThrow("Speech synthesis failed for segment 3: input too long")
    })
  })

  describe("renderDubTrack", () => {
    it("should mix placed clips and count those that still overrun", async () => {
      jest.mocked(mixDubTrack).mockImplementation(async (_placements, _duration, outputPath) => outputPath)

      const result = await renderDubTrack({
        workflowId: "wf-1",
        videoDuration: 10,
        maxTempo: 1.5,
        clips: [
          { index: 0, path: "/work/clip-0.mp3", start: 0, end: 1, duration: 3 },
          { index: 1, path: "/work/clip-1.mp3", start: 1, end: 2, duration: 0.5 },
        ],
      })

      expect(result.audioPath).toBe(path.join(workspaceDir, "dub.m4a"))
      expect(result.overflowingClips).toBe(1)
      expect(result.placements[0]).toMatchObject({ tempo: 1.5, fittedDuration: 2, overflow: 1 })
      expect(mixDubTrack).toHaveBeenCalledWith(result.placements, 10, path.join(workspaceDir, "dub.m4a"))
    })
  })

  describe("composeVideo", () => {
    it("should name the output after the file and language code", async () => {
      jest.mocked(composeDubbedVideo).mockImplementation(async (options) => options.outputPath)

      const result = await composeVideo({
        workflowId: "wf-1",
        videoPath: "/in/demo.mp4",
        audioPath: "/work/dub.m4a",
        srtPath: "/work/subtitles.srt",
        cueCount: 3,
        subtitleMode: "soft",
        targetLanguage: "Japanese",
        fileBaseName: "demo",
      })

      expect(result).toEqual({ outputPath: path.join(outputDir, "demo_ja.mp4"), subtitleMode: "soft" })
    })

    it.each(["soft", "burn"] as const)("should leave out %s subtitles when there are no cues", async (subtitleMode) => {
      jest.mocked(composeDubbedVideo).mockImplementation(async (options) => options.outputPath)

      const result = await composeVideo({
        workflowId: "wf-1",
        videoPath: "/in/music.mp4",
        audioPath: "/work/dub.m4a",
        srtPath: "/work/subtitles.srt",
        cueCount: 0,
        subtitleMode,
        targetLanguage: "French",
        fileBaseName: "music",
      })

      expect(result).toEqual({ outputPath: path.join(outputDir, "music_fr.mp4"), subtitleMode: "none" })
      expect(composeDubbedVideo).toHaveBeenCalledWith(expect.objectContaining({ subtitleMode: "none" }))
    })
  })

  describe("saveArtifacts", () => {
    it("should write every artifact and the metadata", async () => {
      const dubAudio = path.join(workspaceDir, "dub.m4a")
      fs.writeFileSync(dubAudio, "aac")

      const result = await saveArtifacts({
        workflowId: "wf-1",
        sourceLanguage: "English",
        targetLanguage: "Spanish",
        transcription: "line 0 line 1",
        segments: [dubSegment(0, "Hola", "translated"), dubSegment(1, BLANK_TEXT, "blank")],
        srtContent: "srt",
        vttContent: "vtt",
        dubAudioPath: dubAudio,
        droppedSegments: 2,
      })

      expect(result.artifactsDir).toBe(outputDir)
      expect(result.files.map((f) => path.basename(f))).toEqual(["segments.json", "subtitles.srt", "subtitles.vtt", "transcription.txt", "translation.txt", "dub_audio.m4a", "metadata.json"])
      expect(fs.readFileSync(path.join(outputDir, "translation.txt"), "utf-8")).toBe("Hola")
      expect(fs.readFileSync(result.dubAudioPath, "utf-8")).toBe("aac")

      const metadata = JSON.parse(fs.readFileSync(path.join(outputDir, "metadata.json"), "utf-8"))
      expect(metadata).toMatchObject({ workflowId: "wf-1", segmentCount: 2, translatedSegments: 1, blankSegments: 1, failedSegments: 0, droppedSegments: 2 })
    })
  })

  describe("cleanupWorkspace", () => {
    it("should not fail the workflow when cleanup fails", async () => {
      jest.mocked(removeWorkspace).mockImplementation(() => {
        throw new Error("busy")
      })

      await expect(cleanupWorkspace("wf-1")).resolves.toBeUndefined()
      expect(removeWorkspace).toHaveBeenCalledWith("wf-1")
    })

    describe("uploaded inputs", () => {
      const originalUploadDir = process.env.UPLOAD_DIR
      let uploadDir: string

      beforeEach(() => {
        uploadDir = fs.mkdtempSync(path.join(os.tmpdir(), "dub-uploads-"))
        process.env.UPLOAD_DIR = uploadDir
      })

      afterEach(() => {
        if (originalUploadDir === undefined) {
          delete process.env.UPLOAD_DIR
        } else {
          process.env.UPLOAD_DIR = originalUploadDir
        }
        fs.rmSync(uploadDir, { recursive: true, force: true })
      })

      it("should remove an input stored by the upload endpoint", async () => {
        const upload = path.join(uploadDir, "upload-1.mp4")
        fs.writeFileSync(upload, "video")

        await cleanupWorkspace("wf-1", upload)

        expect(fs.existsSync(upload)).toBe(false)
      })

      it("should keep inputs outside the upload directory", async () => {
        const own = path.join(workspaceDir, "talk.mp4")
        fs.writeFileSync(own, "video")

        await cleanupWorkspace("wf-1", own)
        await cleanupWorkspace("wf-1", "https://example.com/talk.mp4")

        expect(fs.existsSync(own)).toBe(true)
      })
    })
  })
})
