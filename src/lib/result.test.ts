// src/lib/result.test.ts
import { describe, it, expect } from "vitest"
import { Ok, Err, tryCatch } from "./result"

describe("Result Type", () => {
  describe("Ok", () => {
    it("creates a success result", () => {
      const result = Ok(42)
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value).toBe(42)
      }
    })
  })

  describe("Err", () => {
    it("creates a failure result", () => {
      const result = Err(new Error("failed"))
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe("failed")
      }
    })
  })

  describe("tryCatch", () => {
    it("wraps successful async function", async () => {
      const result = await tryCatch(async () => 42)
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value).toBe(42)
      }
    })

    it("wraps throwing async function", async () => {
      const result = await tryCatch(async () => {
        throw new Error("async fail")
      })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe("async fail")
      }
    })

    it("converts non-Error throws to Error", async () => {
      const result = await tryCatch(async () => {
        throw "string error"
      })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(Error)
        expect(result.error.message).toBe("string error")
      }
    })
  })
})
