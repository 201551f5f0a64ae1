/**
 * Step bookkeeping shared by the workflow and the clients that read its progress.
 * Must stay free of Node imports: it is bundled into the workflow sandbox.
 */

export type DubbingStepKey = "prepare" | "transcribe" | "translate" | "subtitles" | "synthesize" | "mix" | "compose" | "save"

export interface DubbingStep {
  key: DubbingStepKey
  name: string
  /** Percent complete when the step starts */
  percent: number
}

export const DUBBING_STEPS: readonly DubbingStep[] = [
  { key: "prepare", name: "Preparing media", percent: 2 },
  { key: "transcribe", name: "Transcribing audio", percent: 10 },
  { key: "translate", name: "Translating segments", percent: 30 },
  { key: "subtitles", name: "Generating subtitles", percent: 50 },
  { key: "synthesize", name: "Synthesizing speech", percent: 55 },
  { key: "mix", name: "Aligning and mixing dub track", percent: 75 },
  { key: "compose", name: "Composing dubbed video", percent: 85 },
  { key: "save", name: "Saving artifacts", percent: 95 },
]

export type WorkflowRunStatus = "running" | "completed" | "failed" | "cancelled"

export interface WorkflowProgress {
  currentStep: number
  totalSteps: number
  stepName: string
  percentComplete: number
  status: WorkflowRunStatus
  error?: string
}

export function planSteps(generateVideo: boolean): DubbingStep[] {
  return DUBBING_STEPS.filter((step) => generateVideo || step.key !== "compose")
}

export function initialProgress(steps: DubbingStep[]): WorkflowProgress {
  return {
    currentStep: 0,
    totalSteps: steps.length,
    stepName: "Starting",
    percentComplete: 0,
    status: "running",
  }
}

/**
 * Progress at the start of a step; unknown keys leave progress unchanged
 */
export function progressAt(steps: DubbingStep[], key: DubbingStepKey, previous: WorkflowProgress): WorkflowProgress {
  const index = steps.findIndex((step) => step.key === key)
  if (index < 0) {
    return previous
  }
  const step = steps[index]
  return {
    ...previous,
    currentStep: index + 1,
    stepName: step.name,
    percentComplete: step.percent,
  }
}

export function completedProgress(totalSteps: number): WorkflowProgress {
  return {
    currentStep: totalSteps,
    totalSteps,
    stepName: "Completed",
    percentComplete: 100,
    status: "completed",
  }
}

/**
 * Steps a finished run went through; only runs that composed a video have an output video
 */
export function completedStepCount(result: { outputVideoPath?: string }): number {
  return planSteps(result.outputVideoPath !== undefined).length
}
