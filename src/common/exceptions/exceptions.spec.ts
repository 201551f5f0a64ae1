import { HttpStatus } from "@nestjs/common"
import { DubbingException, WorkflowException, WorkflowNotFoundException, TemporalConnectionException, ValidationException } from "./index"

describe("Custom Exceptions", () => {
  describe("DubbingException", () => {
    it("should default to INTERNAL_SERVER_ERROR and DubbingError", () => {
      const exception = new DubbingException("Test error")

      expect(exception.getStatus()).toBe(HttpStatus.INTERNAL_SERVER_ERROR)
      expect(exception.code).toBe("DubbingError")
      expect(exception.getResponse()).toMatchObject({
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: "Test error",
        error: "DubbingError",
      })
    })

    it("should carry a custom status and code", () => {
      const exception = new DubbingException("Custom error", HttpStatus.BAD_REQUEST, "CustomCode")

      expect(exception.getStatus()).toBe(HttpStatus.BAD_REQUEST)
      expect(exception.code).toBe("CustomCode")
      expect(exception.getResponse()).toMatchObject({
        statusCode: HttpStatus.BAD_REQUEST,
        error: "CustomCode",
      })
    })

    it("should stamp the response with an ISO timestamp", () => {
      jest.useFakeTimers()
      jest.setSystemTime(new Date("2026-03-02T09:30:00.000Z"))

      const exception = new DubbingException("Test")

      expect(exception.getResponse()).toMatchObject({ timestamp: "2026-03-02T09:30:00.000Z" })
      jest.useRealTimers()
    })
  })

  describe("WorkflowException", () => {
    it("should default to BAD_REQUEST", () => {
      const exception = new WorkflowException("Workflow error")

      expect(exception.getStatus()).toBe(HttpStatus.BAD_REQUEST)
      expect(exception.getResponse()).toMatchObject({ error: "WorkflowError" })
    })

    it("should allow a custom status", () => {
      expect(new WorkflowException("Already finished", HttpStatus.CONFLICT).getStatus()).toBe(HttpStatus.CONFLICT)
    })
  })

  describe("WorkflowNotFoundException", () => {
    it("should name the missing workflow", () => {
      const exception = new WorkflowNotFoundException("intro-japanese-1")

      expect(exception.getStatus()).toBe(HttpStatus.NOT_FOUND)
      expect(exception.getResponse()).toMatchObject({
        message: "Workflow not found: intro-japanese-1",
        error: "WorkflowNotFound",
      })
    })
  })

  describe("TemporalConnectionException", () => {
    it("should use SERVICE_UNAVAILABLE with a default message", () => {
      const exception = new TemporalConnectionException()

      expect(exception.getStatus()).toBe(HttpStatus.SERVICE_UNAVAILABLE)
      expect(exception.getResponse()).toMatchObject({
        message: "Failed to connect to Temporal server",
        error: "TemporalConnectionError",
      })
    })
  })

  describe("ValidationException", () => {
    it("should use BAD_REQUEST", () => {
      const exception = new ValidationException("Invalid input")

      expect(exception.getStatus()).toBe(HttpStatus.BAD_REQUEST)
      expect(exception.getResponse()).toMatchObject({
        message: "Invalid input",
        error: "ValidationError",
      })
    })
  })
})
