import { ApplicationFailure } from "@temporalio/common"

export interface WorkflowFailureInfo {
  /** Failure type set by the activity that gave up, e.g. "TranslationError" */
  type?: string
  message: string
}

/**
 * Innermost cause of a failed workflow result. Temporal wraps activity errors
 * as WorkflowFailedError → ActivityFailure → ApplicationFailure.
 */
export function describeFailure(error: unknown): WorkflowFailureInfo {
  let current: unknown = error
  while (current instanceof Error && current.cause instanceof Error) {
    current = current.cause
  }

  if (current instanceof ApplicationFailure) {
    return { type: current.type ?? undefined, message: current.message }
  }
  return { message: current instanceof Error ? current.message : String(current) }
}
