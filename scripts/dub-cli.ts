#!/usr/bin/env ts-node

/**
 * Video Dubber CLI
 *
 * Starts a dubbing job through the HTTP API and follows its progress.
 *
 * Usage:
 *   npm run dub -- --url https://example.com/video.mp4 --target Japanese
 *   npm run dub -- --file ./video.mp4 --target French --subtitles soft
 *   npm run dub -- --url https://example.com/video.mp4 --target German --subtitles burn --voice nova
 */

import { Command } from "commander"
import chalk from "chalk"
import * as cliProgress from "cli-progress"
import { Connection, WorkflowClient } from "@temporalio/client"
import * as fs from "fs"
import * as path from "path"
import * as http from "http"
import type { dubbingWorkflow, DubbingOptions } from "../src/orchestrator/workflows"
import { DUBBING_STEPS, completedProgress, completedStepCount, WorkflowProgress } from "../src/orchestrator/workflows/progress"
import type { SubtitleMode } from "../src/orchestrator/activities/types"

const API_URL = process.env.API_URL || "http://localhost:3001"
const TEMPORAL_ADDRESS = process.env.TEMPORAL_SERVER_ADDRESS || "localhost:7233"
const TEMPORAL_NAMESPACE = process.env.TEMPORAL_NAMESPACE || "default"
const POLL_INTERVAL_MS = 2000

const SUBTITLE_MODES: readonly SubtitleMode[] = ["none", "soft", "burn"]

interface DubCliOptions {
  url?: string
  file?: string
  target?: string
  source?: string
  subtitles: string
  voice?: string
  audioOnly?: boolean
}

function isSubtitleMode(value: string): value is SubtitleMode {
  return SUBTITLE_MODES.some((mode) => mode === value)
}

async function createTemporalClient(): Promise<WorkflowClient> {
  console.log(chalk.gray(`Connecting to Temporal at ${TEMPORAL_ADDRESS}...`))

  const connection = await Connection.connect({
    address: TEMPORAL_ADDRESS,
    tls: false,
  })

  return new WorkflowClient({
    connection,
    namespace: TEMPORAL_NAMESPACE,
  })
}

/**
 * Pull the workflow id out of the API response, or the error message it carries
 */
function readStartResponse(data: string): string {
  let parsed: unknown
  try {
    parsed = JSON.parse(data)
  } catch {
    throw new Error(`Invalid response: ${data}`)
  }

  if (typeof parsed === "object" && parsed !== null) {
    if ("workflowId" in parsed && typeof parsed.workflowId === "string") {
      return parsed.workflowId
    }
    if ("message" in parsed && parsed.message) {
      throw new Error(String(parsed.message))
    }
  }
  throw new Error("Failed to start workflow")
}

function postToApi(pathname: string, body: Buffer, contentType: string): Promise<string> {
  const url = new URL(pathname, API_URL)

  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        hostname: url.hostname,
        port: url.port || 3001,
        path: url.pathname,
        method: "POST",
        headers: {
          "Content-Type": contentType,
          "Content-Length": body.length,
        },
      },
      (res) => {
        let data = ""
        res.on("data", (chunk) => (data += chunk))
        res.on("end", () => {
          try {
            resolve(readStartResponse(data))
          } catch (error) {
            reject(error)
          }
        })
      },
    )

    req.on("error", reject)
    req.write(body)
    req.end()
  })
}

function formField(boundary: string, name: string, value: string | undefined): Buffer {
  if (value === undefined) {
    return Buffer.from("")
  }
  return Buffer.from(`--${boundary}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`)
}

async function startDubbing(options: DubCliOptions, target: string, subtitleMode: SubtitleMode): Promise<string> {
  if (options.file) {
    const filePath = path.resolve(options.file)
    if (!fs.existsSync(filePath)) {
      throw new Error(`File not found: ${filePath}`)
    }

    const boundary = "----FormBoundary" + Math.random().toString(36).substring(2)
    const fileName = path.basename(filePath)
    const mimeType = path.extname(fileName).toLowerCase() === ".mov" ? "video/quicktime" : "video/mp4"

    const body = Buffer.concat([
      Buffer.from(`--${boundary}\r\nContent-Disposition: form-data; name="file"; filename="${fileName}"\r\nContent-Type: ${mimeType}\r\n\r\n`),
      fs.readFileSync(filePath),
      Buffer.from("\r\n"),
      formField(boundary, "targetLanguage", target),
      formField(boundary, "sourceLanguage", options.source),
      formField(boundary, "subtitleMode", subtitleMode),
      formField(boundary, "voice", options.voice),
      formField(boundary, "generateVideo", options.audioOnly ? "false" : undefined),
      Buffer.from(`--${boundary}--\r\n`),
    ])

    return postToApi("/dub/upload", body, `multipart/form-data; boundary=${boundary}`)
  }

  if (options.url) {
    const dubOptions: DubbingOptions = {
      subtitleMode,
      generateVideo: !options.audioOnly,
      voice: options.voice,
    }
    const body = JSON.stringify({
      videoUrl: options.url,
      targetLanguage: target,
      sourceLanguage: options.source,
      options: dubOptions,
    })

    return postToApi("/dub", Buffer.from(body), "application/json")
  }

  throw new Error("Either --url or --file must be provided")
}

async function queryProgress(client: WorkflowClient, workflowId: string): Promise<WorkflowProgress> {
  const totalSteps = DUBBING_STEPS.length

  try {
    const handle = client.getHandle<typeof dubbingWorkflow>(workflowId)
    const description = await handle.describe()
    const status = description.status.name

    if (status === "COMPLETED") {
      return completedProgress(completedStepCount(await handle.result()))
    }

    if (status === "TIMED_OUT" || status === "CANCELLED" || status === "TERMINATED" || status === "FAILED") {
      return {
        currentStep: 0,
        totalSteps,
        stepName: status,
        percentComplete: 0,
        status: status === "CANCELLED" ? "cancelled" : "failed",
        error: `Workflow ${status.toLowerCase()}`,
      }
    }

    try {
      return await handle.query<WorkflowProgress>("getProgress")
    } catch {
      // The first workflow task may not have run yet
      return {
        currentStep: 0,
        totalSteps,
        stepName: "Initializing...",
        percentComplete: 0,
        status: "running",
      }
    }
  } catch (error) {
    return {
      currentStep: 0,
      totalSteps,
      stepName: "Error",
      percentComplete: 0,
      status: "failed",
      error: error instanceof Error ? error.message : "Unknown error",
    }
  }
}

async function waitForCompletion(client: WorkflowClient, workflowId: string): Promise<boolean> {
  console.log(chalk.cyan("\n⏳ Dubbing Progress\n"))

  const progressBar = new cliProgress.SingleBar(
    {
      format: `${chalk.cyan("{bar}")} ${chalk.yellow("{percentage}%")} | Step {currentStep}/{totalSteps}: ${chalk.white("{stepName}")}`,
      barCompleteChar: "█",
      barIncompleteChar: "░",
      hideCursor: true,
    },
    cliProgress.Presets.shades_classic,
  )

  progressBar.start(100, 0, {
    currentStep: 0,
    totalSteps: DUBBING_STEPS.length,
    stepName: "Starting...",
  })

  for (;;) {
    const progress = await queryProgress(client, workflowId)

    progressBar.update(progress.percentComplete, {
      currentStep: progress.currentStep,
      totalSteps: progress.totalSteps,
      stepName: progress.stepName,
    })

    if (progress.status === "completed") {
      progressBar.stop()
      console.log(chalk.green("\n✅ Dubbing completed successfully!\n"))
      break
    }

    if (progress.status === "failed" || progress.status === "cancelled") {
      progressBar.stop()
      console.log(chalk.red(`\n❌ Dubbing ${progress.status}: ${progress.error ?? "unknown reason"}\n`))
      return false
    }

    await sleep(POLL_INTERVAL_MS)
  }

  const result = await client.getHandle<typeof dubbingWorkflow>(workflowId).result()

  console.log(chalk.bold("Results:"))
  console.log(chalk.gray("─".repeat(50)))
  console.log(chalk.white(`Workflow ID: ${chalk.cyan(workflowId)}`))
  console.log(chalk.white(`Output Directory: ${chalk.cyan(result.artifactsDir)}`))
  if (result.outputVideoPath) {
    console.log(chalk.white(`Dubbed Video: ${chalk.cyan(result.outputVideoPath)}`))
  }
  console.log(chalk.white(`Dub Track: ${chalk.cyan(result.dubAudioPath)}`))
  console.log(chalk.white(`Subtitles: ${chalk.cyan(result.subtitlesPath)}`))
  console.log(chalk.white(`Processing Time: ${chalk.cyan(formatDuration(result.processingTimeMs))}`))
  console.log(chalk.gray("─".repeat(50)))

  console.log(chalk.bold("\nSegments:"))
  console.log(chalk.gray(`  translated ${result.translatedSegments}, blank ${result.blankSegments}, failed ${result.failedSegments}, dropped ${result.droppedSegments}`))
  if (result.overflowingClips > 0) {
    console.log(chalk.yellow(`  ${result.overflowingClips} clips still run past their slot at the maximum speed-up`))
  }
  console.log("")

  return true
}

function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000)
  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = seconds % 60

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`
  }
  return `${seconds}s`
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

// ==========================================
// Main Program
// ==========================================

const program = new Command()

program.name("dub").description("Video Dubber CLI - Dub videos into another language with real-time progress tracking").version("1.0.0")

program
  .option("-u, --url <url>", "URL to video file")
  .option("-f, --file <path>", "Path to local video file")
  .option("-t, --target <language>", "Target language (e.g., Japanese, Spanish, German)")
  .option("-s, --source <language>", "Source language (optional, auto-detected)")
  .option("--subtitles <mode>", "Subtitle mode: none, soft or burn", "none")
  .option("--voice <voice>", "Text-to-speech voice (alloy, echo, fable, onyx, nova, shimmer)")
  .option("--audio-only", "Produce the dub track and subtitles without composing a video")
  .action(async (options: DubCliOptions) => {
    if (!options.url && !options.file) {
      console.log(chalk.red("Error: Either --url or --file must be provided"))
      program.help()
      return
    }

    const target = options.target
    if (!target) {
      console.log(chalk.red("Error: --target language is required"))
      program.help()
      return
    }

    if (!isSubtitleMode(options.subtitles)) {
      console.log(chalk.red(`Error: --subtitles must be one of ${SUBTITLE_MODES.join(", ")}`))
      process.exit(1)
    }
    const subtitleMode = options.subtitles

    try {
      console.log(chalk.bold.cyan("\n🎬 Video Dubber CLI\n"))
      console.log(chalk.gray("─".repeat(50)))

      if (options.url) {
        console.log(chalk.white(`Source: ${chalk.cyan(options.url)}`))
      } else if (options.file) {
        console.log(chalk.white(`Source: ${chalk.cyan(path.resolve(options.file))}`))
      }

      console.log(chalk.white(`Target Language: ${chalk.cyan(target)}`))
      if (options.source) {
        console.log(chalk.white(`Source Language: ${chalk.cyan(options.source)}`))
      }
      console.log(chalk.white(`Subtitle Mode: ${chalk.cyan(subtitleMode)}`))
      console.log(chalk.gray("─".repeat(50)))

      console.log(chalk.gray("\nStarting dubbing workflow..."))
      const workflowId = await startDubbing(options, target, subtitleMode)
      console.log(chalk.green(`Workflow started: ${chalk.cyan(workflowId)}`))

      const client = await createTemporalClient()
      const succeeded = await waitForCompletion(client, workflowId)
      await client.connection.close()

      if (!succeeded) {
        process.exit(1)
      }
    } catch (error) {
      console.log(chalk.red(`\n❌ Error: ${error instanceof Error ? error.message : String(error)}`))
      process.exit(1)
    }
  })

program.parseAsync().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
