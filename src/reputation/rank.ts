// src/reputation/rank.ts — Rank Calculator
//
// Pure mapping from a confirmed vouch count to a rank tier. Thresholds are
// inclusive lower bounds; the highest matching tier wins.

// ---------------------------------------------------------------------------
// Tiers
// ---------------------------------------------------------------------------

export const RANK_KEYS = ["unverified", "verified", "trusted", "endorsed", "top_tier"] as const

export type RankKey = (typeof RANK_KEYS)[number]

export interface RankTier {
  key: RankKey
  /** Inclusive lower bound on total vouches */
  minVouches: number
  name: string
  emoji: string
}

/** Ordered from highest to lowest threshold. */
export const RANK_TIERS: readonly RankTier[] = [
  { key: "top_tier", minVouches: 16, name: "Top-Tier Verified", emoji: "👑" },
  { key: "endorsed", minVouches: 11, name: "Endorsed", emoji: "🛡" },
  { key: "trusted", minVouches: 6, name: "Trusted", emoji: "🔷" },
  { key: "verified", minVouches: 3, name: "Verified", emoji: "✅" },
  { key: "unverified", minVouches: 0, name: "Unverified", emoji: "🚫" },
]

export const UNKNOWN_RANK_NAME = "Unknown"
export const UNKNOWN_RANK_EMOJI = "❓"

export const DEFAULT_RANK: RankKey = "unverified"

export function isRankKey(value: string): value is RankKey {
  return RANK_KEYS.some((key) => key === value)
}

// ---------------------------------------------------------------------------
// Calculation
// ---------------------------------------------------------------------------

export function calculateRank(totalVouches: number): RankKey {
  for (const tier of RANK_TIERS) {
    if (totalVouches >= tier.minVouches) return tier.key
  }
  return DEFAULT_RANK
}

function tierFor(rank: string): RankTier | undefined {
  return RANK_TIERS.find((tier) => tier.key === rank)
}

export function getRankName(rank: string): string {
  return tierFor(rank)?.name ?? UNKNOWN_RANK_NAME
}

export function getRankEmoji(rank: string): string {
  return tierFor(rank)?.emoji ?? UNKNOWN_RANK_EMOJI
}

export interface RankDisplay {
  rank: string
  rank_name: string
  rank_emoji: string
}

export function describeRank(rank: string): RankDisplay {
  return { rank, rank_name: getRankName(rank), rank_emoji: getRankEmoji(rank) }
}

// ---------------------------------------------------------------------------
// Progress toward the next tier
// ---------------------------------------------------------------------------

export interface RankProgress {
  /** Vouch count at which the next tier starts; equals the total at the top tier */
  nextThreshold: number
  /** Percentage of the current tier completed, 0–100 */
  progressPercentage: number
}

export function rankProgress(totalVouches: number): RankProgress {
  const current = calculateRank(totalVouches)
  const index = RANK_TIERS.findIndex((tier) => tier.key === current)
  const next = index > 0 ? RANK_TIERS[index - 1] : undefined

  if (!next) {
    return { nextThreshold: totalVouches, progressPercentage: 100 }
  }

  const start = RANK_TIERS[index].minVouches
  const pct = ((totalVouches - start) / (next.minVouches - start)) * 100
  return {
    nextThreshold: next.minVouches,
    progressPercentage: Math.min(100, Math.max(0, pct)),
  }
}
