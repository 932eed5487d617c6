// src/gateway/views.ts — JSON wire shapes (snake_case) for reputation records

import type { LeaderboardEntry } from "../reputation/analytics.js"
import { describeRank, type RankDisplay } from "../reputation/rank.js"
import type { GiverCount, RecentVouch } from "../reputation/store.js"
import type {
  BotConfigEntry,
  GivenVouch,
  RankChange,
  ReceivedVouch,
  ReputationEvent,
  User,
  UserSummary,
  Vouch,
} from "../reputation/types.js"

export interface UserView extends RankDisplay {
  id: number
  username: string | null
  first_name: string | null
  last_name: string | null
  bio: string | null
  profile_picture_url: string | null
  location: string | null
  first_seen_at: string
  last_active_at: string
  total_vouches: number
  referrer_id: number | null
}

export function userView(user: User): UserView {
  return {
    id: user.id,
    username: user.username,
    first_name: user.firstName,
    last_name: user.lastName,
    bio: user.bio,
    profile_picture_url: user.profilePictureUrl,
    location: user.location,
    first_seen_at: user.firstSeenAt.toISOString(),
    last_active_at: user.lastActiveAt.toISOString(),
    total_vouches: user.totalVouches,
    referrer_id: user.referrerId,
    ...describeRank(user.rank),
  }
}

function summaryFields(user: UserSummary) {
  return { id: user.id, username: user.username, first_name: user.firstName, ...describeRank(user.rank) }
}

export function summaryView(user: UserSummary | null) {
  return user ? summaryFields(user) : null
}

export function vouchView(vouch: Vouch) {
  return {
    id: vouch.id,
    from_user_id: vouch.fromUserId,
    to_user_id: vouch.toUserId,
    to_username: vouch.toUsername,
    message: vouch.message,
    created_at: vouch.createdAt.toISOString(),
    is_pending: vouch.isPending,
  }
}

export function receivedView(vouch: ReceivedVouch) {
  return { ...vouchView(vouch), from: summaryView(vouch.from) }
}

export function givenView(vouch: GivenVouch) {
  return { ...vouchView(vouch), to: summaryView(vouch.to) }
}

export function rankChangeView(change: RankChange | null) {
  return change ? { old_rank: change.oldRank, new_rank: change.newRank } : null
}

export function giverView(giver: GiverCount) {
  return { ...summaryFields(giver), vouch_count: giver.vouchCount }
}

export function leaderboardView(entry: LeaderboardEntry) {
  return { ...summaryFields(entry), score: entry.score }
}

export function recentVouchView(vouch: RecentVouch) {
  return {
    id: vouch.id,
    from_user_id: vouch.fromUserId,
    from_username: vouch.fromUsername,
    to_user_id: vouch.toUserId,
    to_username: vouch.toUsername,
    message: vouch.message,
    created_at: vouch.createdAt.toISOString(),
  }
}

export function eventView(event: ReputationEvent) {
  return {
    id: event.id,
    event_type: event.eventType,
    user_id: event.userId,
    metadata: event.metadata,
    created_at: event.createdAt.toISOString(),
  }
}

export function configView(entry: BotConfigEntry) {
  return { key: entry.key, value: entry.value, updated_at: entry.updatedAt.toISOString() }
}
