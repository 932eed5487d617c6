// tests/reputation/username.test.ts — Username normalization

import { describe, it, expect } from "vitest"
import * as fc from "fast-check"
import { normalizeUsername, sameUsername } from "../../src/reputation/username.js"

describe("normalizeUsername", () => {
  it("strips the mention prefix and lowercases", () => {
    expect(normalizeUsername("@Alice")).toBe("alice")
    expect(normalizeUsername("@@Bob")).toBe("bob")
    expect(normalizeUsername("  @Carol ")).toBe("carol")
    expect(normalizeUsername("dave")).toBe("dave")
  })

  it("returns null when nothing identifying is left", () => {
    expect(normalizeUsername("")).toBeNull()
    expect(normalizeUsername("@")).toBeNull()
    expect(normalizeUsername("   ")).toBeNull()
    expect(normalizeUsername(null)).toBeNull()
    expect(normalizeUsername(undefined)).toBeNull()
  })

  it("is idempotent", () => {
    expect(normalizeUsername("@MiXeD_Case")).toBe("mixed_case")
    fc.assert(
      fc.property(fc.string(), (raw) => {
        const once = normalizeUsername(raw)
        expect(normalizeUsername(once)).toBe(once)
      }),
    )
  })
})

describe("sameUsername", () => {
  it("compares normalized forms", () => {
    expect(sameUsername("@Dave", "dave")).toBe(true)
    expect(sameUsername("dave", "david")).toBe(false)
  })

  it("never matches two absent usernames", () => {
    expect(sameUsername(null, null)).toBe(false)
    expect(sameUsername("@", "")).toBe(false)
  })
})
