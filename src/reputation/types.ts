// src/reputation/types.ts — Reputation domain types, outcomes and errors

import type { RankKey } from "./rank.js"

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface User {
  /** Platform-assigned identity */
  id: number
  /** Display username, case-preserving; matched case-insensitively */
  username: string | null
  firstName: string | null
  lastName: string | null
  bio: string | null
  profilePictureUrl: string | null
  location: string | null
  firstSeenAt: Date
  lastActiveAt: Date
  totalVouches: number
  rank: RankKey
  referrerId: number | null
  streakDays: number
  /** ISO date (YYYY-MM-DD) */
  lastStreakDate: string | null
}

/** Compact view of a user attached to vouch listings and leaderboards. */
export interface UserSummary {
  id: number
  username: string | null
  firstName: string | null
  rank: RankKey
}

interface VouchBase {
  id: number
  fromUserId: number
  /** Sanitized, at most 120 characters */
  message: string
  createdAt: Date
}

export interface ConfirmedVouch extends VouchBase {
  isPending: false
  toUserId: number
  /** Normalized username snapshot when the vouch was created by username */
  toUsername: string | null
}

export interface PendingVouch extends VouchBase {
  isPending: true
  toUserId: null
  /** Normalized username of a target who has not joined yet */
  toUsername: string
}

export type Vouch = ConfirmedVouch | PendingVouch

export type ReceivedVouch = ConfirmedVouch & { from: UserSummary | null }

/** `to` is null while the vouch is pending. */
export type GivenVouch = Vouch & { to: UserSummary | null }

export interface RankEvent {
  id: number
  userId: number
  oldRank: string | null
  newRank: string
  createdAt: Date
}

export interface ReputationEvent {
  id: number
  eventType: string
  userId: number | null
  metadata: unknown
  createdAt: Date
}

export interface Invite {
  id: number
  fromUserId: number
  toUsername: string
  sentAt: Date
}

export interface BotConfigEntry {
  key: string
  value: string
  updatedAt: Date
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export interface RankChange {
  oldRank: RankKey
  newRank: RankKey
}

export type VouchErrorCode =
  | "INVALID_REQUEST"
  | "DUPLICATE_VOUCH"
  | "SELF_VOUCH"
  | "NOT_FOUND"
  | "PERMISSION_DENIED"
  | "RATE_LIMITED"

export interface Rejection {
  status: "rejected"
  code: VouchErrorCode
  message: string
}

export function reject(code: VouchErrorCode, message: string): Rejection {
  return { status: "rejected", code, message }
}

export type CreateVouchResult =
  | {
      status: "confirmed"
      vouch: ConfirmedVouch
      /** Target's total after the increment */
      total: number
      rankChange: RankChange | null
      /** True when the target had already vouched for the source */
      mutual: boolean
    }
  | { status: "pending"; vouch: PendingVouch }
  | Rejection

export type UpdateVouchResult =
  | { status: "updated"; vouch: Vouch }
  | Rejection

export type PendingResolution =
  | { status: "noop" }
  | { status: "resolved"; count: number; total: number; rankChange: RankChange | null }

export const NO_RESOLUTION: PendingResolution = { status: "noop" }

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export type VouchErrorStatus = 400 | 403 | 404 | 409 | 429

const CODE_TO_STATUS: Record<VouchErrorCode, VouchErrorStatus> = {
  INVALID_REQUEST: 400,
  DUPLICATE_VOUCH: 409,
  SELF_VOUCH: 400,
  NOT_FOUND: 404,
  PERMISSION_DENIED: 403,
  RATE_LIMITED: 429,
}

export function statusForCode(code: VouchErrorCode): VouchErrorStatus {
  return CODE_TO_STATUS[code]
}

/** Carries a rejected outcome across a boundary that only speaks exceptions. */
export class VouchError extends Error {
  public readonly httpStatus: VouchErrorStatus

  constructor(
    public readonly code: VouchErrorCode,
    message: string,
  ) {
    super(message)
    this.name = "VouchError"
    this.httpStatus = statusForCode(code)
  }

  static from(rejection: Rejection): VouchError {
    return new VouchError(rejection.code, rejection.message)
  }
}

/**
 * Thrown inside a transaction when the storage uniqueness backstop rejects a
 * vouch that passed the application-level duplicate check (concurrent insert).
 * The ledger maps it to a DUPLICATE_VOUCH outcome after rollback.
 */
export class VouchConflictError extends Error {
  constructor(fromUserId: number, target: number | string) {
    super(`Concurrent duplicate vouch from ${fromUserId} to ${target}`)
    this.name = "VouchConflictError"
  }
}
