// tests/reputation/rank.test.ts — Rank tiers, display names and progress

import { describe, it, expect } from "vitest"
import * as fc from "fast-check"
import {
  RANK_KEYS,
  calculateRank,
  describeRank,
  getRankEmoji,
  getRankName,
  isRankKey,
  rankProgress,
} from "../../src/reputation/rank.js"

describe("calculateRank", () => {
  it.each<[number, string]>([
    [0, "unverified"],
    [2, "unverified"],
    [3, "verified"],
    [5, "verified"],
    [6, "trusted"],
    [10, "trusted"],
    [11, "endorsed"],
    [15, "endorsed"],
    [16, "top_tier"],
    [250, "top_tier"],
  ])("%i vouches → %s", (total, rank) => {
    expect(calculateRank(total)).toBe(rank)
  })

  it("is monotonic in the vouch count", () => {
    fc.assert(
      fc.property(fc.nat({ max: 1_000 }), fc.nat({ max: 1_000 }), (a, b) => {
        const [lo, hi] = a <= b ? [a, b] : [b, a]
        expect(RANK_KEYS.indexOf(calculateRank(lo))).toBeLessThanOrEqual(RANK_KEYS.indexOf(calculateRank(hi)))
      }),
    )
  })
})

describe("display", () => {
  it("maps known ranks to name and emoji", () => {
    expect(getRankName("verified")).toBe("Verified")
    expect(getRankEmoji("top_tier")).toBe("👑")
    expect(describeRank("trusted")).toEqual({ rank: "trusted", rank_name: "Trusted", rank_emoji: "🔷" })
  })

  it("falls back for unrecognized ranks", () => {
    expect(getRankName("legend")).toBe("Unknown")
    expect(getRankEmoji("legend")).toBe("❓")
  })

  it("isRankKey accepts only known keys", () => {
    expect(isRankKey("endorsed")).toBe(true)
    expect(isRankKey("Endorsed")).toBe(false)
  })
})

describe("rankProgress", () => {
  it("starts at zero toward Verified", () => {
    expect(rankProgress(0)).toEqual({ nextThreshold: 3, progressPercentage: 0 })
  })

  it("measures progress within the current tier", () => {
    const trusted = rankProgress(8)
    expect(trusted.nextThreshold).toBe(11)
    expect(trusted.progressPercentage).toBeCloseTo(40, 6)

    const p = rankProgress(4)
    expect(p.nextThreshold).toBe(6)
    expect(p.progressPercentage).toBeCloseTo(33.33, 2)
  })

  it("always reports a percentage between 0 and 100", () => {
    fc.assert(
      fc.property(fc.nat({ max: 1_000 }), (total) => {
        const { nextThreshold, progressPercentage } = rankProgress(total)
        expect(progressPercentage).toBeGreaterThanOrEqual(0)
        expect(progressPercentage).toBeLessThanOrEqual(100)
        expect(nextThreshold).toBeGreaterThanOrEqual(total)
      }),
    )
  })

  it("reports 100% at the top tier", () => {
    expect(rankProgress(16)).toEqual({ nextThreshold: 16, progressPercentage: 100 })
    expect(rankProgress(40)).toEqual({ nextThreshold: 40, progressPercentage: 100 })
  })
})
