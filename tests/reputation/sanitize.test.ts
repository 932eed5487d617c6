// tests/reputation/sanitize.test.ts — Vouch message redaction and truncation

import { describe, it, expect } from "vitest"
import * as fc from "fast-check"
import { BANNED_WORDS, MAX_MESSAGE_LENGTH, sanitizeMessage } from "../../src/reputation/sanitize.js"

describe("sanitizeMessage", () => {
  it("redacts denylisted terms case-insensitively", () => {
    expect(sanitizeMessage("This is a SCAM")).toBe("This is a [redacted]")
    expect(sanitizeMessage("Fraud and fake")).toBe("[redacted] and [redacted]")
  })

  it("matches terms inside longer words", () => {
    expect(sanitizeMessage("hackers")).toBe("[redacted]ers")
  })

  it("leaves clean text untouched", () => {
    expect(sanitizeMessage("Reliable trader, fast replies")).toBe("Reliable trader, fast replies")
  })

  it("truncates to the message limit", () => {
    expect(sanitizeMessage("a".repeat(200))).toHaveLength(MAX_MESSAGE_LENGTH)
  })

  it("redacts before truncating", () => {
    const text = "x".repeat(115) + "scam"
    expect(sanitizeMessage(text)).toBe("x".repeat(115) + "[reda")
  })

  it("never emits a denylisted term or exceeds the limit", () => {
    const word = fc.constantFrom(...BANNED_WORDS, "ok", "Legit", " ")
    fc.assert(
      fc.property(fc.array(fc.oneof(word, fc.string({ maxLength: 8 })), { maxLength: 40 }), (parts) => {
        const out = sanitizeMessage(parts.join(""))
        expect(out.length).toBeLessThanOrEqual(MAX_MESSAGE_LENGTH)
        for (const banned of BANNED_WORDS) {
          expect(out.toLowerCase()).not.toContain(banned)
        }
      }),
    )
  })

  it("maps absent text to an empty message", () => {
    expect(sanitizeMessage("")).toBe("")
    expect(sanitizeMessage(null)).toBe("")
    expect(sanitizeMessage(undefined)).toBe("")
  })
})
