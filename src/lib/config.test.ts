import { describe, it, expect } from "vitest"
import { loadConfig, DEFAULT_PORTAL_BASE_URL } from "./config"
import { ValidationError } from "./errors"

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      portalBaseUrl: DEFAULT_PORTAL_BASE_URL,
      timeoutSeconds: 30,
      maxRetries: 3,
      retryDelaySeconds: 2,
      downloadDir: "./data",
      sentryDsn: undefined,
    })
  })

  it("coerces numeric variables", () => {
    const config = loadConfig({
      PORTAL_TIMEOUT_SECONDS: "12.5",
      PORTAL_MAX_RETRIES: "5",
      PORTAL_RETRY_DELAY_SECONDS: "0.25",
      DOWNLOAD_DIR: "/tmp/rte",
    })

    expect(config.timeoutSeconds).toBe(12.5)
    expect(config.maxRetries).toBe(5)
    expect(config.retryDelaySeconds).toBe(0.25)
    expect(config.downloadDir).toBe("/tmp/rte")
  })

  it("treats empty strings as unset", () => {
    const config = loadConfig({ PORTAL_MAX_RETRIES: "", SENTRY_DSN: "" })
    expect(config.maxRetries).toBe(3)
    expect(config.sentryDsn).toBeUndefined()
  })

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/root" }).maxRetries).toBe(3)
  })

  it("rejects a retry count below one", () => {
    expect(() => loadConfig({ PORTAL_MAX_RETRIES: "0" })).toThrow(ValidationError)
  })

  it("names every offending variable", () => {
    try {
      loadConfig({ PORTAL_BASE_URL: "not a url", PORTAL_TIMEOUT_SECONDS: "abc" })
      expect.fail("loadConfig should have thrown")
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        const fields = error.details?.map((d) => d.field)
        expect(fields).toContain("PORTAL_BASE_URL")
        expect(fields).toContain("PORTAL_TIMEOUT_SECONDS")
      }
    }
  })
})
