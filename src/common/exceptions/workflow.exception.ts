import { HttpStatus } from "@nestjs/common"
import { DubbingException } from "./dubbing.exception"

/**
 * Exception for failures starting, reading or cancelling a dubbing workflow
 */
export class WorkflowException extends DubbingException {
  constructor(message: string, status: HttpStatus = HttpStatus.BAD_REQUEST) {
    super(message, status, "WorkflowError")
  }
}

/**
 * Exception when no dubbing workflow exists for the given id
 */
export class WorkflowNotFoundException extends DubbingException {
  constructor(workflowId: string) {
    super(`Workflow not found: ${workflowId}`, HttpStatus.NOT_FOUND, "WorkflowNotFound")
  }
}
