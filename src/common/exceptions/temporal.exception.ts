import { HttpStatus } from "@nestjs/common"
import { DubbingException } from "./dubbing.exception"

export class TemporalConnectionException extends DubbingException {
  constructor(message: string = "Failed to connect to Temporal server") {
    super(message, HttpStatus.SERVICE_UNAVAILABLE, "TemporalConnectionError")
  }
}
