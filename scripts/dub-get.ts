#!/usr/bin/env ts-node

/**
 * Video Dubber Output Retrieval CLI
 *
 * Copies the artifacts of a finished dubbing workflow out of the output volume.
 *
 * Usage:
 *   npm run dub:get -- <workflowId> --output ./my-dubs/
 *   npm run dub:get -- <workflowId> -f .srt dub_audio
 */

import { Command } from "commander"
import chalk from "chalk"
import * as fs from "fs"
import * as path from "path"

const OUTPUT_DIR = process.env.OUTPUT_DIR || "/output/video-dubber"

interface GetOptions {
  output: string
  files?: string[]
}

interface ArtifactMetadata {
  sourceLanguage?: string
  targetLanguage?: string
  createdAt?: string
  segmentCount?: number
}

function listOutputFiles(workflowId: string): string[] {
  const workflowDir = path.join(OUTPUT_DIR, workflowId)

  if (!fs.existsSync(workflowDir)) {
    throw new Error(`Workflow output directory not found: ${workflowDir}`)
  }

  return fs.readdirSync(workflowDir).map((f) => path.join(workflowDir, f))
}

function copyFiles(sourceFiles: string[], targetDir: string): string[] {
  fs.mkdirSync(targetDir, { recursive: true })

  const copiedFiles: string[] = []

  for (const sourceFile of sourceFiles) {
    const targetPath = path.join(targetDir, path.basename(sourceFile))

    if (fs.existsSync(sourceFile)) {
      fs.copyFileSync(sourceFile, targetPath)
      copiedFiles.push(targetPath)
    }
  }

  return copiedFiles
}

function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}

function printFileInfo(filePath: string): void {
  const stats = fs.statSync(filePath)
  const fileName = path.basename(filePath)
  const size = formatFileSize(stats.size)

  let coloredName = fileName
  if (fileName.endsWith(".srt") || fileName.endsWith(".vtt")) {
    coloredName = chalk.yellow(fileName)
  } else if (fileName.endsWith(".mp4") || fileName.endsWith(".m4a")) {
    coloredName = chalk.cyan(fileName)
  } else if (fileName.endsWith(".json")) {
    coloredName = chalk.magenta(fileName)
  } else if (fileName.endsWith(".txt")) {
    coloredName = chalk.gray(fileName)
  }

  console.log(`  ${coloredName} (${chalk.dim(size)})`)
}

function readMetadata(metadataPath: string): ArtifactMetadata | null {
  if (!fs.existsSync(metadataPath)) {
    return null
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(metadataPath, "utf-8"))
    if (typeof parsed !== "object" || parsed === null) {
      return null
    }
    const read = (key: string) => {
      const value: unknown = Reflect.get(parsed, key)
      return typeof value === "string" ? value : undefined
    }
    const segments: unknown = Reflect.get(parsed, "segmentCount")
    return {
      sourceLanguage: read("sourceLanguage"),
      targetLanguage: read("targetLanguage"),
      createdAt: read("createdAt"),
      segmentCount: typeof segments === "number" ? segments : undefined,
    }
  } catch (error) {
    console.log(chalk.yellow(`⚠️  Could not read metadata.json: ${error instanceof Error ? error.message : String(error)}`))
    return null
  }
}

// ==========================================
// Main Program
// ==========================================

const program = new Command()

program
  .name("dub:get")
  .description("Retrieve dubbed video outputs from a completed workflow")
  .version("1.0.0")
  .argument("<workflowId>", "Workflow ID to retrieve outputs from")
  .option("-o, --output <dir>", "Output directory for downloaded files", "./dubbing-output")
  .option("-f, --files <files...>", "Specific files to retrieve (default: all)")
  .action((workflowId: string, options: GetOptions) => {
    try {
      console.log(chalk.bold.cyan("\n📦 Video Dubber - Output Retrieval\n"))
      console.log(chalk.gray("─".repeat(50)))
      console.log(chalk.white(`Workflow ID: ${chalk.cyan(workflowId)}`))
      console.log(chalk.white(`Output Directory: ${chalk.cyan(path.resolve(options.output))}`))
      console.log(chalk.gray("─".repeat(50)))

      console.log(chalk.gray("\nFinding workflow outputs..."))
      let files: string[]

      try {
        files = listOutputFiles(workflowId)
      } catch (error) {
        console.log(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}`))
        console.log(chalk.gray("\nPossible reasons:"))
        console.log(chalk.gray("  • Workflow has not completed yet"))
        console.log(chalk.gray("  • Output directory is not mounted (set OUTPUT_DIR)"))
        console.log(chalk.gray("  • Workflow ID is incorrect"))
        process.exit(1)
      }

      const patterns = options.files ?? []
      if (patterns.length > 0) {
        files = files.filter((f) => {
          const fileName = path.basename(f)
          return patterns.some((pattern) => fileName.includes(pattern))
        })
      }

      if (files.length === 0) {
        console.log(chalk.yellow("\n⚠️  No output files found for this workflow."))
        process.exit(1)
      }

      console.log(chalk.green(`\n✅ Found ${files.length} files:`))
      for (const file of files) {
        printFileInfo(file)
      }

      console.log(chalk.gray(`\nCopying to ${path.resolve(options.output)}...`))
      const copiedFiles = copyFiles(files, options.output)

      console.log(chalk.green(`\n✅ Copied ${copiedFiles.length} files to ${path.resolve(options.output)}`))
      console.log(chalk.gray("─".repeat(50)))

      const metadata = readMetadata(path.join(options.output, "metadata.json"))
      if (metadata) {
        console.log(chalk.bold("\nDubbing Info:"))
        console.log(chalk.gray("─".repeat(50)))
        if (metadata.sourceLanguage) {
          console.log(chalk.white(`  Source Language: ${chalk.cyan(metadata.sourceLanguage)}`))
        }
        if (metadata.targetLanguage) {
          console.log(chalk.white(`  Target Language: ${chalk.cyan(metadata.targetLanguage)}`))
        }
        if (metadata.segmentCount !== undefined) {
          console.log(chalk.white(`  Segments: ${chalk.cyan(String(metadata.segmentCount))}`))
        }
        if (metadata.createdAt) {
          console.log(chalk.white(`  Created At: ${chalk.cyan(new Date(metadata.createdAt).toLocaleString())}`))
        }
      }

      console.log("")
    } catch (error) {
      console.log(chalk.red(`\n❌ Error: ${error instanceof Error ? error.message : String(error)}`))
      process.exit(1)
    }
  })

program.parse()
