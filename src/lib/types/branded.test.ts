// src/lib/types/branded.test.ts
import { describe, it, expect } from "vitest"
import { asDatasetId, toIsoDate, type DatasetId, type IsoDate } from "./branded"

describe("Branded Types", () => {
  describe("asDatasetId", () => {
    it("creates a DatasetId from string", () => {
      const id = asDatasetId("consommation-2025")
      expect(id).toBe("consommation-2025")
    })

    it("returns a value that satisfies DatasetId type", () => {
      const id: DatasetId = asDatasetId("consommation-2025")
      expect(typeof id).toBe("string")
    })
  })

  describe("toIsoDate", () => {
    it("zero-pads month and day", () => {
      const day: IsoDate | null = toIsoDate(2025, 1, 5)
      expect(day).toBe("2025-01-05")
    })

    it("accepts 29 February in a leap year", () => {
      expect(toIsoDate(2024, 2, 29)).toBe("2024-02-29")
    })

    it("rejects days that do not exist", () => {
      expect(toIsoDate(2025, 2, 29)).toBeNull()
      expect(toIsoDate(2025, 2, 31)).toBeNull()
      expect(toIsoDate(2025, 13, 1)).toBeNull()
      expect(toIsoDate(2025, 0, 10)).toBeNull()
      expect(toIsoDate(2025, 4, 0)).toBeNull()
    })
  })
})
