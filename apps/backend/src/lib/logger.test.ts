import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest"
import { AccessErrors } from "@/errors/access.errors"
import { ErrorCode, HTTPError } from "@/errors/http.errors"
import {
  configureLogging,
  createLogger,
  DrizzleLogger,
  LogLevel,
} from "./logger"

describe("Logger", () => {
  let originalNodeEnv: string | undefined
  let originalLogging: string | undefined
  let consoleLogSpy: MockInstance<typeof console.log>
  let consoleErrorSpy: MockInstance<typeof console.error>
  let consoleWarnSpy: MockInstance<typeof console.warn>

  function loggedEntry(spy: MockInstance<typeof console.log>, call = 0) {
    return JSON.parse(String(spy.mock.calls[call][0]))
  }

  beforeEach(() => {
    originalNodeEnv = process.env.NODE_ENV
    originalLogging = process.env.LOGGING

    // Set NODE_ENV to production so logs aren't silenced
    process.env.NODE_ENV = "production"
    delete process.env.LOGGING

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {})
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {})
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {})
  })

  afterEach(() => {
    configureLogging(undefined)
    vi.restoreAllMocks()
    process.env.NODE_ENV = originalNodeEnv
    if (originalLogging === undefined) {
      delete process.env.LOGGING
    } else {
      process.env.LOGGING = originalLogging
    }
  })

  describe("error() method", () => {
    it("logs regular Error with message and stack", () => {
      const logger = createLogger("test.module")

      logger.error("Operation failed", new Error("Test error message"))

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1)
      const entry = loggedEntry(consoleErrorSpy)
      expect(entry.level).toBe(LogLevel.ERROR)
      expect(entry.message).toBe("Operation failed")
      expect(entry.module).toBe("test.module")
      expect(entry.data.error).toBe("Test error message")
      expect(entry.data.stack).toContain("Test error message")
    })

    it("extracts HTTPError code and details", () => {
      const logger = createLogger("test.module")
      const httpError = new HTTPError(409, ErrorCode.CONFLICT, "Busy", {
        userId: "user-1",
        retryable: true,
      })

      logger.error("Request failed", httpError)

      const entry = loggedEntry(consoleErrorSpy)
      expect(entry.data.error).toBe("Busy")
      expect(entry.data.errorCode).toBe(ErrorCode.CONFLICT)
      expect(entry.data.details).toEqual({ userId: "user-1", retryable: true })
    })

    it("extracts AccessError code and cause message", () => {
      const logger = createLogger("audit.service")
      const conflict = AccessErrors.activationInProgress(
        "user-1",
        "pkg-1",
        new Error("lock timeout"),
      )

      logger.error("Activation failed", conflict)

      const entry = loggedEntry(consoleErrorSpy)
      expect(entry.data.errorCode).toBe("CONFLICT")
      expect(entry.data.cause).toBe("lock timeout")
    })

    it("handles non-Error objects", () => {
      createLogger("test.module").error("Unknown error", "string error")

      const entry = loggedEntry(consoleErrorSpy)
      expect(entry.data.error).toBe("string error")
      expect(entry.data.stack).toBeUndefined()
      expect(entry.data.errorCode).toBeUndefined()
    })

    it("handles a missing error", () => {
      createLogger("test.module").error("No error provided")

      expect(loggedEntry(consoleErrorSpy).data.error).toBe("undefined")
    })
  })

  describe("info/warn/debug methods", () => {
    it("logs info messages to stdout", () => {
      createLogger("test.module").info("Test info message", { key: "value" })

      expect(consoleLogSpy).toHaveBeenCalledTimes(1)
      const entry = loggedEntry(consoleLogSpy)
      expect(entry.level).toBe(LogLevel.INFO)
      expect(entry.data).toEqual({ key: "value" })
    })

    it("logs warnings to stderr via console.warn", () => {
      createLogger("test.module").warn("Test warning", { count: 5 })

      expect(consoleWarnSpy).toHaveBeenCalledTimes(1)
      expect(loggedEntry(consoleWarnSpy).level).toBe(LogLevel.WARN)
    })

    it("drops debug output when logging is minimal", () => {
      process.env.LOGGING = "minimal"
      const logger = createLogger("test.module")

      logger.debug("noisy")
      logger.info("kept")

      expect(consoleLogSpy).toHaveBeenCalledTimes(1)
      expect(loggedEntry(consoleLogSpy).message).toBe("kept")
    })

    it("takes the configured level over the environment", () => {
      process.env.LOGGING = "verbose"
      configureLogging("minimal")
      const logger = createLogger("test.module")

      logger.debug("noisy")
      logger.info("kept")

      expect(consoleLogSpy).toHaveBeenCalledTimes(1)
      expect(loggedEntry(consoleLogSpy).message).toBe("kept")
    })

    it("stays silent under NODE_ENV=test", () => {
      process.env.NODE_ENV = "test"

      createLogger("test.module").error("hidden", new Error("x"))

      expect(consoleErrorSpy).not.toHaveBeenCalled()
    })
  })

  describe("with() context chaining", () => {
    it("chains context correctly", () => {
      createLogger("test.module")
        .with({ userId: "user123" })
        .with({ packageId: "pkg-arbeidsrett" })
        .info("Test message")

      const entry = loggedEntry(consoleLogSpy)
      expect(entry.module).toBe("test.module")
      expect(entry.userId).toBe("user123")
      expect(entry.packageId).toBe("pkg-arbeidsrett")
    })
  })

  describe("operation() helper", () => {
    it("logs operation lifecycle", () => {
      const op = createLogger("test.module").operation("activate")

      op.start({ step: 1 })
      op.success({ result: "done" })

      expect(loggedEntry(consoleLogSpy, 0).message).toBe("activate started")
      expect(loggedEntry(consoleLogSpy, 1).message).toBe("activate completed")
      expect(loggedEntry(consoleLogSpy, 1).data).toEqual({ result: "done" })
    })
  })

  describe("DrizzleLogger", () => {
    it("logs queries at debug level with params", () => {
      new DrizzleLogger("subscription.repository").logQuery(
        "select 1 where id = ?",
        ["sub-1"],
      )

      const entry = loggedEntry(consoleLogSpy)
      expect(entry.level).toBe(LogLevel.DEBUG)
      expect(entry.module).toBe("subscription.repository")
      expect(entry.data).toEqual({ sql: "select 1 where id = ?", params: ["sub-1"] })
    })
  })
})
