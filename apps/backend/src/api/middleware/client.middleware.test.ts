import { describe, expect, it } from "vitest"
import { resolveClientAddress } from "./client.middleware"

describe("resolveClientAddress", () => {
  it("takes the first X-Forwarded-For entry", () => {
    expect(resolveClientAddress("203.0.113.9, 10.0.0.1", "10.0.0.2")).toBe(
      "203.0.113.9",
    )
  })

  it("falls back to X-Real-IP", () => {
    expect(resolveClientAddress(undefined, " 10.0.0.2 ")).toBe("10.0.0.2")
    expect(resolveClientAddress(" , 10.0.0.1", "10.0.0.2")).toBe("10.0.0.2")
  })

  it("returns null without either header", () => {
    expect(resolveClientAddress(undefined, undefined)).toBeNull()
    expect(resolveClientAddress("", "")).toBeNull()
  })
})
