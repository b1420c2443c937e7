/**
 * Shared error classes unit tests
 */

import {
  ApiError,
  AppError,
  ConflictError,
  NotFoundError,
  ValidationError,
  errorMessage,
  isNotFoundError,
} from "../../../src/shared/errors"

describe("errors", () => {
  describe("NotFoundError", () => {
    it("should build its message from the resource name", () => {
      const error = new NotFoundError("Organization")

      expect(error.message).toBe("Organization not found")
      expect(error.statusCode).toBe(404)
      expect(error.code).toBe("NOT_FOUND")
      expect(error.name).toBe("NotFoundError")
    })

    it("should prefer an explicit message", () => {
      const error = new NotFoundError("Organization", "organization 'acme' not found")

      expect(error.message).toBe("organization 'acme' not found")
    })
  })

  describe("ApiError", () => {
    it("should keep the backend error code", () => {
      const error = new ApiError("boom", 500, "internal error")

      expect(error.statusCode).toBe(500)
      expect(error.code).toBe("internal error")
    })

    it("should default the code", () => {
      expect(new ApiError("boom", 502).code).toBe("API_ERROR")
    })
  })

  describe("isNotFoundError", () => {
    it("should classify NotFoundError by type", () => {
      expect(isNotFoundError(new NotFoundError("Organization", "gone"))).toBe(true)
    })

    it("should not classify other typed errors by their message", () => {
      expect(isNotFoundError(new ConflictError("parent not found"))).toBe(false)
      expect(isNotFoundError(new AppError("not found"))).toBe(false)
    })

    it("should accept a plain Error whose message says not found", () => {
      expect(isNotFoundError(new Error("organization not found"))).toBe(true)
    })

    it("should reject anything else", () => {
      expect(isNotFoundError(new Error("connection refused"))).toBe(false)
      expect(isNotFoundError("not found")).toBe(false)
      expect(isNotFoundError(undefined)).toBe(false)
    })
  })

  describe("errorMessage", () => {
    it("should return the message of an Error", () => {
      expect(errorMessage(new ValidationError("bad name"))).toBe("bad name")
    })

    it("should stringify anything else", () => {
      expect(errorMessage("plain")).toBe("plain")
      expect(errorMessage(42)).toBe("42")
    })
  })
})
