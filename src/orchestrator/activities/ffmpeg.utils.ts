/**
 * FFmpeg Utilities for media preparation, dub mixing and final composition
 *
 * Provides utilities for:
 * - Downloading inputs and extracting their audio track
 * - Probing durations
 * - Mixing timed speech clips into a single dub track
 * - Swapping a video's audio for the dub track, with optional subtitles
 * - Managing per-workflow workspace and output directories
 */

import ffmpeg from "fluent-ffmpeg"
import * as fs from "fs"
import * as path from "path"
import * as https from "https"
import * as http from "http"
import { pipeline } from "stream/promises"
import { getPipelineSettings } from "../../config/configuration"
import { buildDubFilterGraph } from "./alignment.utils"
import type { ClipPlacement, SubtitleMode } from "./types"

const SUPPORTED_VIDEO_EXTENSIONS = [".mp4", ".mov", ".avi", ".mkv", ".webm", ".flv", ".wmv"]
const SUPPORTED_AUDIO_EXTENSIONS = [".mp3", ".wav", ".m4a", ".ogg", ".flac", ".aac"]
const MAX_REDIRECTS = 5

// ==========================================
// Directory Management
// ==========================================

export function getWorkspaceDir(workflowId: string): string {
  return path.join(getPipelineSettings().TEMP_DIR, workflowId)
}

/**
 * Scratch directory for one workflow; everything in it is disposable
 */
export function ensureWorkspace(workflowId: string): string {
  const dir = getWorkspaceDir(workflowId)
  fs.mkdirSync(dir, { recursive: true })
  return dir
}

export function ensureOutputDir(workflowId: string): string {
  const dir = path.join(getPipelineSettings().OUTPUT_DIR, workflowId)
  fs.mkdirSync(dir, { recursive: true })
  return dir
}

export function removeWorkspace(workflowId: string): void {
  fs.rmSync(getWorkspaceDir(workflowId), { recursive: true, force: true })
}

/**
 * Delete an input the API stored under UPLOAD_DIR. Anything else belongs to the caller.
 */
export function removeUploadedInput(inputPath: string): boolean {
  if (isRemoteUrl(inputPath)) {
    return false
  }
  const relative = path.relative(path.resolve(getPipelineSettings().UPLOAD_DIR), path.resolve(inputPath))
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return false
  }
  fs.rmSync(inputPath, { force: true })
  return true
}

// ==========================================
// File Type Detection
// ==========================================

export function isRemoteUrl(input: string): boolean {
  return input.startsWith("http://") || input.startsWith("https://")
}

function getFileExtension(urlOrPath: string): string {
  if (isRemoteUrl(urlOrPath)) {
    try {
      return path.extname(new URL(urlOrPath).pathname).toLowerCase()
    } catch {
      // Fall through and treat it as a path
    }
  }
  return path.extname(urlOrPath).toLowerCase()
}

export function isVideoFile(urlOrPath: string): boolean {
  return SUPPORTED_VIDEO_EXTENSIONS.includes(getFileExtension(urlOrPath))
}

export function isAudioFile(urlOrPath: string): boolean {
  return SUPPORTED_AUDIO_EXTENSIONS.includes(getFileExtension(urlOrPath))
}

// ==========================================
// File Download
// ==========================================

/**
 * A problem with the input itself. `permanent` inputs fail the same way on every attempt.
 */
export class MediaInputError extends Error {
  constructor(
    message: string,
    readonly permanent: boolean,
  ) {
    super(message)
    this.name = "MediaInputError"
  }
}

/**
 * Download a file from URL to local path, following redirects
 */
export function downloadFile(url: string, outputPath: string, redirectsLeft: number = MAX_REDIRECTS): Promise<string> {
  return new Promise((resolve, reject) => {
    const protocol = url.startsWith("https") ? https : http

    console.log(`[FFmpeg] Downloading file from: ${url}`)

    const request = protocol.get(url, (response) => {
      const status = response.statusCode ?? 0

      if ([301, 302, 303, 307, 308].includes(status) && response.headers.location) {
        response.resume()
        if (redirectsLeft <= 0) {
          reject(new MediaInputError(`Too many redirects while downloading ${url}`, true))
          return
        }
        const redirectUrl = new URL(response.headers.location, url).toString()
        downloadFile(redirectUrl, outputPath, redirectsLeft - 1).then(resolve, reject)
        return
      }

      if (status !== 200) {
        response.resume()
        reject(new MediaInputError(`Failed to download file: HTTP ${status}`, status >= 400 && status < 500))
        return
      }

      // Rejects when the connection drops before the body is complete
      pipeline(response, fs.createWriteStream(outputPath)).then(
        () => {
          console.log(`[FFmpeg] Downloaded to: ${outputPath}`)
          resolve(outputPath)
        },
        (err: unknown) => {
          fs.rmSync(outputPath, { force: true })
          reject(err)
        },
      )
    })

    request.on("error", (err) => {
      fs.rmSync(outputPath, { force: true })
      reject(err)
    })
  })
}

// ==========================================
// Probing & Audio Extraction
// ==========================================

export function probeDuration(filePath: string): Promise<number> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err, data) => {
      if (err) {
        reject(err instanceof Error ? err : new Error(String(err)))
        return
      }
      const duration = data.format.duration
      if (duration === undefined || !Number.isFinite(duration)) {
        reject(new Error(`Could not determine duration of ${filePath}`))
        return
      }
      resolve(duration)
    })
  })
}

export function extractAudioFromVideo(inputPath: string, outputPath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    console.log(`[FFmpeg] Extracting audio from: ${inputPath}`)

    ffmpeg(inputPath)
      .noVideo()
      .audioCodec("libmp3lame")
      .audioBitrate("192k")
      .audioChannels(2)
      .audioFrequency(44100)
      .output(outputPath)
      .on("start", (commandLine: string) => {
        console.log(`[FFmpeg] Command: ${commandLine}`)
      })
      .on("end", () => {
        console.log(`[FFmpeg] Audio extracted to: ${outputPath}`)
        resolve(outputPath)
      })
      .on("error", (err: Error) => {
        console.error(`[FFmpeg] Error: ${err.message}`)
        reject(err)
      })
      .run()
  })
}

/**
 * Bring the input into the workspace (downloading URLs) and extract its audio
 */
export async function prepareMediaInput(input: string, workspaceDir: string): Promise<{ videoPath: string; audioPath: string; videoDuration: number }> {
  let videoPath = input

  if (isRemoteUrl(input)) {
    const ext = getFileExtension(input) || ".mp4"
    videoPath = await downloadFile(input, path.join(workspaceDir, `source${ext}`))
  } else if (!fs.existsSync(input)) {
    throw new MediaInputError(`Input file not found: ${input}`, true)
  }

  const audioPath = await extractAudioFromVideo(videoPath, path.join(workspaceDir, "source-audio.mp3"))
  const videoDuration = await probeDuration(videoPath)

  return { videoPath, audioPath, videoDuration }
}

// ==========================================
// Dub Track
// ==========================================

function runCommand(command: ffmpeg.FfmpegCommand, outputPath: string, label: string): Promise<string> {
  return new Promise((resolve, reject) => {
    command
      .output(outputPath)
      .on("start", (commandLine: string) => {
        console.log(`[FFmpeg] Command: ${commandLine}`)
      })
      .on("progress", (progress: { percent?: number }) => {
        if (progress.percent) {
          console.log(`[FFmpeg] ${label} progress: ${Math.round(progress.percent)}%`)
        }
      })
      .on("end", () => {
        console.log(`[FFmpeg] ${label} written to: ${outputPath}`)
        resolve(outputPath)
      })
      .on("error", (err: Error) => {
        console.error(`[FFmpeg] ${label} error: ${err.message}`)
        reject(err)
      })
      .run()
  })
}

/**
 * Mix the placed clips into one AAC track exactly as long as the video
 */
export function mixDubTrack(placements: ClipPlacement[], videoDuration: number, outputPath: string): Promise<string> {
  if (placements.length === 0) {
    return renderSilence(videoDuration, outputPath)
  }

  const command = ffmpeg()
  for (const placement of placements) {
    command.input(placement.path)
  }

  command.complexFilter(buildDubFilterGraph(placements, videoDuration), "dub").audioCodec("aac").audioBitrate("192k").audioFrequency(44100).audioChannels(2)

  return runCommand(command, outputPath, "Dub track")
}

export function renderSilence(duration: number, outputPath: string): Promise<string> {
  const command = ffmpeg().input("anullsrc=r=44100:cl=stereo").inputFormat("lavfi").duration(duration).audioCodec("aac").audioBitrate("192k")
  return runCommand(command, outputPath, "Silent track")
}

// ==========================================
// Composition
// ==========================================

/**
 * Escape a path for use inside the `subtitles` filter
 */
export function subtitleFilter(srtPath: string): string {
  const escaped = srtPath.replace(/\\/g, "/").replace(/:/g, "\\:").replace(/'/g, "\\'")
  return `subtitles='${escaped}'`
}

/**
 * Output options for the final video. Input 0 is the original video, input 1
 * the dub track, input 2 the SRT file when subtitles are muxed as a track.
 */
export function buildComposeOptions(mode: SubtitleMode, targetLanguage: string): string[] {
  const options = ["-map 0:v:0", "-map 1:a:0"]

  if (mode === "soft") {
    options.push("-map 2:s:0", "-c:v copy", "-c:s mov_text", `-metadata:s:s:0 title=${targetLanguage.replace(/\s+/g, "_")}`)
  } else if (mode === "burn") {
    // Burning subtitles requires re-encoding the picture
    options.push("-c:v libx264", "-preset veryfast", "-crf 20")
  } else {
    options.push("-c:v copy")
  }

  options.push("-c:a aac", "-b:a 192k", "-movflags +faststart")
  return options
}

export interface ComposeOptions {
  videoPath: string
  audioPath: string
  srtPath: string
  subtitleMode: SubtitleMode
  targetLanguage: string
  outputPath: string
}

/**
 * Keep the original picture, replace the audio with the dub track
 */
export function composeDubbedVideo(options: ComposeOptions): Promise<string> {
  console.log(`[FFmpeg] Composing dubbed video from: ${options.videoPath} (subtitles: ${options.subtitleMode})`)

  const command = ffmpeg(options.videoPath).input(options.audioPath)

  if (options.subtitleMode === "soft") {
    command.input(options.srtPath)
  } else if (options.subtitleMode === "burn") {
    command.videoFilters(subtitleFilter(options.srtPath))
  }

  command.outputOptions(buildComposeOptions(options.subtitleMode, options.targetLanguage))

  return runCommand(command, options.outputPath, "Dubbed video")
}
