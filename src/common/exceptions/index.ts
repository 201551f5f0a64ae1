export { DubbingException } from "./dubbing.exception"
export type { DubbingErrorBody } from "./dubbing.exception"
export { WorkflowException, WorkflowNotFoundException } from "./workflow.exception"
export { TemporalConnectionException } from "./temporal.exception"
export { ValidationException } from "./validation.exception"
