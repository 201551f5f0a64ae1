import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Logger } from "@nestjs/common"
import { Request, Response } from "express"
import { DubbingException } from "../exceptions"

interface ErrorResponse {
  statusCode: number
  message: string | string[]
  error: string
  timestamp: string
  path: string
  method: string
  requestId?: string
}

const STATUS_NAMES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: "Bad Request",
  [HttpStatus.UNAUTHORIZED]: "Unauthorized",
  [HttpStatus.FORBIDDEN]: "Forbidden",
  [HttpStatus.NOT_FOUND]: "Not Found",
  [HttpStatus.METHOD_NOT_ALLOWED]: "Method Not Allowed",
  [HttpStatus.CONFLICT]: "Conflict",
  [HttpStatus.PAYLOAD_TOO_LARGE]: "Payload Too Large",
  [HttpStatus.UNPROCESSABLE_ENTITY]: "Unprocessable Entity",
  [HttpStatus.TOO_MANY_REQUESTS]: "Too Many Requests",
  [HttpStatus.INTERNAL_SERVER_ERROR]: "Internal Server Error",
  [HttpStatus.BAD_GATEWAY]: "Bad Gateway",
  [HttpStatus.SERVICE_UNAVAILABLE]: "Service Unavailable",
  [HttpStatus.GATEWAY_TIMEOUT]: "Gateway Timeout",
}

function readMessage(body: object): string | string[] | undefined {
  if (!("message" in body)) {
    return undefined
  }
  const { message } = body
  if (typeof message === "string") {
    return message
  }
  if (Array.isArray(message) && message.every((m) => typeof m === "string")) {
    return message
  }
  return undefined
}

function readError(body: object): string | undefined {
  return "error" in body && typeof body.error === "string" ? body.error : undefined
}

/**
 * Global exception filter that catches all exceptions and formats them consistently
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name)

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp()
    const response = ctx.getResponse<Response>()
    const request = ctx.getRequest<Request>()

    let status: number
    let message: string | string[]
    let error: string

    if (exception instanceof DubbingException) {
      status = exception.getStatus()
      message = exception.message
      error = exception.code
    } else if (exception instanceof HttpException) {
      status = exception.getStatus()
      const exceptionResponse = exception.getResponse()

      if (typeof exceptionResponse === "object" && exceptionResponse !== null) {
        // ValidationPipe puts one message per failed constraint in an array
        message = readMessage(exceptionResponse) ?? exception.message
        error = readError(exceptionResponse) ?? this.getErrorName(status)
      } else {
        message = exceptionResponse
        error = this.getErrorName(status)
      }
    } else if (exception instanceof Error) {
      status = HttpStatus.INTERNAL_SERVER_ERROR
      message = exception.message || "Internal server error"
      error = "InternalServerError"

      this.logger.error(`Unexpected error: ${exception.message}`, exception.stack)
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR
      message = "An unexpected error occurred"
      error = "UnknownError"

      this.logger.error(`Unknown error type: ${JSON.stringify(exception)}`)
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
    }

    const requestId = request.headers["x-request-id"]
    if (typeof requestId === "string" && requestId) {
      errorResponse.requestId = requestId
    }

    if (status >= 500) {
      this.logger.error(`${request.method} ${request.url} - ${status} - ${JSON.stringify(message)}`)
    } else {
      this.logger.warn(`${request.method} ${request.url} - ${status} - ${JSON.stringify(message)}`)
    }

    response.status(status).json(errorResponse)
  }

  private getErrorName(status: number): string {
    return STATUS_NAMES[status] || "Unknown Error"
  }
}
