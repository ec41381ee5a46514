import { describe, it, expect } from "vitest"
import {
  AppError,
  ValidationError,
  NetworkError,
  RetriesExhaustedError,
  IoError,
  InternalError,
  isAppError,
  toAppError,
  errorMessage,
} from "./errors"

describe("Error Classes", () => {
  describe("AppError", () => {
    it("creates error with all properties", () => {
      const error = new AppError("VALIDATION_ERROR", "Something went wrong", [
        { field: "datasetId", message: "Required" },
      ])

      expect(error.code).toBe("VALIDATION_ERROR")
      expect(error.message).toBe("Something went wrong")
      expect(error.details).toEqual([{ field: "datasetId", message: "Required" }])
      expect(error.name).toBe("AppError")
    })

    it("serializes to JSON correctly", () => {
      const error = new AppError("IO_ERROR", "File not found")

      expect(error.toJSON()).toEqual({
        code: "IO_ERROR",
        message: "File not found",
      })
    })

    it("includes details in JSON when present", () => {
      const error = new AppError("VALIDATION_ERROR", "Invalid", [
        { field: "name", message: "Required" },
      ])

      expect(error.toJSON().details).toEqual([{ field: "name", message: "Required" }])
    })
  })

  describe("Specialized Error Classes", () => {
    it("ValidationError has correct defaults", () => {
      const error = new ValidationError()
      expect(error.code).toBe("VALIDATION_ERROR")
      expect(error.message).toBe("Validation failed")
      expect(error.name).toBe("ValidationError")
    })

    it("ValidationError.fromZodError converts Zod issues", () => {
      const zodError = {
        issues: [
          { path: ["resources", 0, "url"], message: "Invalid input" },
          { path: [], message: "Expected object" },
        ],
      }

      const error = ValidationError.fromZodError(zodError, "Bad payload")

      expect(error.message).toBe("Bad payload")
      expect(error.details).toEqual([
        { field: "resources.0.url", message: "Invalid input" },
        { field: "", message: "Expected object" },
      ])
    })

    it("NetworkError carries url and status", () => {
      const error = new NetworkError("HTTP 503", {
        url: "https://example.org/a.csv",
        status: 503,
      })
      expect(error.code).toBe("NETWORK_ERROR")
      expect(error.url).toBe("https://example.org/a.csv")
      expect(error.status).toBe(503)
    })

    it("RetriesExhaustedError keeps attempts and last cause", () => {
      const last = new NetworkError("HTTP 500", { status: 500 })
      const error = new RetriesExhaustedError("Gave up", 3, last)
      expect(error.code).toBe("RETRIES_EXHAUSTED")
      expect(error.attempts).toBe(3)
      expect(error.cause).toBe(last)
    })

    it("IoError carries the path", () => {
      const cause = new Error("ENOENT")
      const error = new IoError("Cannot read", "/tmp/missing.xls", { cause })
      expect(error.code).toBe("IO_ERROR")
      expect(error.path).toBe("/tmp/missing.xls")
      expect(error.cause).toBe(cause)
    })

    it("InternalError has correct defaults", () => {
      const error = new InternalError()
      expect(error.code).toBe("INTERNAL_ERROR")
      expect(error.message).toBe("An unexpected error occurred")
    })
  })

  describe("isAppError", () => {
    it("returns true for AppError instances", () => {
      expect(isAppError(new AppError("IO_ERROR", "test"))).toBe(true)
      expect(isAppError(new NetworkError())).toBe(true)
      expect(isAppError(new ValidationError())).toBe(true)
    })

    it("returns false for non-AppError values", () => {
      expect(isAppError(new Error("test"))).toBe(false)
      expect(isAppError("string")).toBe(false)
      expect(isAppError(null)).toBe(false)
      expect(isAppError(undefined)).toBe(false)
      expect(isAppError({ code: "ERROR" })).toBe(false)
    })
  })

  describe("toAppError", () => {
    it("returns AppError unchanged", () => {
      const original = new IoError("Test", "/tmp/x")
      expect(toAppError(original)).toBe(original)
    })

    it("wraps regular Error in InternalError", () => {
      const original = new Error("Something broke")
      const result = toAppError(original)
      expect(result).toBeInstanceOf(InternalError)
      expect(result.message).toBe("Something broke")
      expect(result.cause).toBe(original)
    })

    it("wraps non-Error values in InternalError", () => {
      expect(toAppError("string error")).toBeInstanceOf(InternalError)
      expect(toAppError(null)).toBeInstanceOf(InternalError)
      expect(toAppError({ custom: "error" })).toBeInstanceOf(InternalError)
    })
  })

  describe("errorMessage", () => {
    it("reads the message of an Error", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom")
    })

    it("stringifies other values", () => {
      expect(errorMessage(42)).toBe("42")
    })
  })
})
