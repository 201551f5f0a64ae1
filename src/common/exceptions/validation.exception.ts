import { HttpStatus } from "@nestjs/common"
import { DubbingException } from "./dubbing.exception"

/**
 * Exception for requests the DTO validation cannot catch, such as uploads
 */
export class ValidationException extends DubbingException {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST, "ValidationError")
  }
}
