// Entry point bundled into the Temporal workflow sandbox
export { dubbingWorkflow, getProgressQuery } from "./dubbing.workflow"
export type { DubbingWorkflowInput, DubbingWorkflowResult, DubbingOptions } from "./dubbing.workflow"
