import { HttpException, HttpStatus } from "@nestjs/common"

/**
 * Body shared by every exception the dubbing service raises
 */
export interface DubbingErrorBody {
  statusCode: number
  message: string
  error: string
  timestamp: string
}

/**
 * Base exception for the video dubbing service
 */
export class DubbingException extends HttpException {
  constructor(
    message: string,
    status: HttpStatus = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly code: string = "DubbingError",
  ) {
    const body: DubbingErrorBody = {
      statusCode: status,
      message,
      error: code,
      timestamp: new Date().toISOString(),
    }
    super(body, status)
  }
}
