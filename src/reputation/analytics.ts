// src/reputation/analytics.ts — Analytics Aggregator
//
// Read-only rollups over users, vouches and the event log. Trailing windows
// are measured from the injected clock at query time, never cached.

import { RANK_KEYS } from "./rank.js"
import type { GiverCount, RecentVouch, ReputationStore } from "./store.js"
import { reject, type Rejection, type ReputationEvent, type User, type UserSummary } from "./types.js"
import { DAY_MS, defaultTimeProvider, windowStart, type TimeProvider } from "../shared/time-provider.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const TOP_LIST_SIZE = 10
export const MAX_ACTIVITY_LIMIT = 100

export const LEADERBOARD_TYPES = ["most_vouched", "top_givers"] as const
export type LeaderboardType = (typeof LEADERBOARD_TYPES)[number]

export function isLeaderboardType(value: string): value is LeaderboardType {
  return LEADERBOARD_TYPES.some((type) => type === value)
}

export interface ActiveUsers {
  last24h: number
  last7d: number
  last30d: number
}

export interface AnalyticsSummary {
  totalUsers: number
  activeUsers: ActiveUsers
  newSignups7d: number
  /** Every vouch row, pending included */
  totalVouches: number
  /** Users per rank key; every known rank is present, unknown stored ranks are kept as-is */
  rankDistribution: Record<string, number>
  /** Most vouches given in the trailing 7 days */
  topHelpers: GiverCount[]
  mostVouched: User[]
  mutualVouchCount: number
}

export interface LeaderboardEntry extends UserSummary {
  score: number
}

export type LeaderboardResult =
  | { status: "ok"; type: LeaderboardType; entries: LeaderboardEntry[] }
  | Rejection

export interface ReferralStats {
  userId: number
  totalReferrals: number
  recentReferrals: User[]
}

export interface ViralSummary {
  /** Vouches created in the trailing 24 hours */
  vouchesToday: number
  referralSignups: number
  recentVouches: RecentVouch[]
}

function clamp(limit: number, max: number): number {
  if (!Number.isFinite(limit)) return max
  return Math.min(Math.max(Math.trunc(limit), 1), max)
}

// ---------------------------------------------------------------------------
// Aggregator
// ---------------------------------------------------------------------------

export class AnalyticsAggregator {
  private readonly store: ReputationStore
  private readonly clock: TimeProvider

  constructor(store: ReputationStore, clock: TimeProvider = defaultTimeProvider) {
    this.store = store
    this.clock = clock
  }

  async summary(): Promise<AnalyticsSummary> {
    const dayAgo = windowStart(this.clock, DAY_MS)
    const weekAgo = windowStart(this.clock, 7 * DAY_MS)
    const monthAgo = windowStart(this.clock, 30 * DAY_MS)

    const [
      totalUsers,
      last24h,
      last7d,
      last30d,
      newSignups7d,
      totalVouches,
      ranks,
      topHelpers,
      mostVouched,
      mutualVouchCount,
    ] = await Promise.all([
      this.store.countUsers(),
      this.store.countUsersActiveSince(dayAgo),
      this.store.countUsersActiveSince(weekAgo),
      this.store.countUsersActiveSince(monthAgo),
      this.store.countUsersSeenSince(weekAgo),
      this.store.countVouches(),
      this.store.rankDistribution(),
      this.store.topGivers(TOP_LIST_SIZE, weekAgo),
      this.store.mostVouched(TOP_LIST_SIZE),
      this.store.countEvents("mutual_vouch"),
    ])

    const rankDistribution: Record<string, number> = {}
    for (const key of RANK_KEYS) rankDistribution[key] = 0
    for (const { rank, count } of ranks) {
      rankDistribution[rank] = (rankDistribution[rank] ?? 0) + count
    }

    return {
      totalUsers,
      activeUsers: { last24h, last7d, last30d },
      newSignups7d,
      totalVouches,
      rankDistribution,
      topHelpers,
      mostVouched,
      mutualVouchCount,
    }
  }

  async leaderboard(type: string, limit = TOP_LIST_SIZE): Promise<LeaderboardResult> {
    if (!isLeaderboardType(type)) {
      return reject("INVALID_REQUEST", `Unknown leaderboard: ${type}`)
    }
    const n = clamp(limit, MAX_ACTIVITY_LIMIT)

    if (type === "most_vouched") {
      const users = await this.store.mostVouched(n)
      return {
        status: "ok",
        type,
        entries: users.map((u) => ({
          id: u.id,
          username: u.username,
          firstName: u.firstName,
          rank: u.rank,
          score: u.totalVouches,
        })),
      }
    }

    const givers = await this.store.topGivers(n)
    return {
      status: "ok",
      type,
      entries: givers.map(({ vouchCount, ...summary }) => ({ ...summary, score: vouchCount })),
    }
  }

  async referralStats(userId: number): Promise<ReferralStats> {
    const [totalReferrals, recentReferrals] = await Promise.all([
      this.store.countReferralsOf(userId),
      this.store.referralsOf(userId, TOP_LIST_SIZE),
    ])
    return { userId, totalReferrals, recentReferrals }
  }

  async viralSummary(): Promise<ViralSummary> {
    const [vouchesToday, referralSignups, recentVouches] = await Promise.all([
      this.store.countVouchesSince(windowStart(this.clock, DAY_MS)),
      this.store.countUsersWithReferrer(),
      this.store.recentConfirmedVouches(TOP_LIST_SIZE),
    ])
    return { vouchesToday, referralSignups, recentVouches }
  }

  recentActivity(limit = 20): Promise<ReputationEvent[]> {
    return this.store.recentEvents(clamp(limit, MAX_ACTIVITY_LIMIT))
  }
}
