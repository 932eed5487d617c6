// src/reputation/directory.ts — User Directory
//
// Owns user identity records: first contact, last-active tracking, username
// changes, profile fields and administrative rank correction. Totals and
// derived ranks belong to the ledger; a signup or username change calls back
// into VouchLedger.resolvePendingVouches inside the same transaction.

import { isRankKey } from "./rank.js"
import { normalizeUsername } from "./username.js"
import { EventLog } from "./events.js"
import type { VouchLedger } from "./ledger.js"
import type { ProfileFields, ReputationStore } from "./store.js"
import {
  NO_RESOLUTION,
  reject,
  type PendingResolution,
  type RankChange,
  type Rejection,
  type User,
} from "./types.js"
import { defaultTimeProvider, type TimeProvider } from "../shared/time-provider.js"

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MAX_BIO_LENGTH = 500
export const MAX_LOCATION_LENGTH = 100
export const MAX_PAGE_SIZE = 100

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GetOrCreateInput {
  id: number
  username?: string | null
  firstName?: string | null
  lastName?: string | null
  referrerId?: number | null
}

export interface GetOrCreateResult {
  user: User
  created: boolean
  resolution: PendingResolution
}

export type UpdateRankResult =
  | { status: "updated"; user: User; change: RankChange }
  | Rejection

export type UpdateProfileResult =
  | { status: "updated"; user: User }
  | Rejection

export interface UserDirectoryDeps {
  store: ReputationStore
  ledger: VouchLedger
  clock?: TimeProvider
  events?: EventLog
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return MAX_PAGE_SIZE
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_PAGE_SIZE)
}

// ---------------------------------------------------------------------------
// Directory
// ---------------------------------------------------------------------------

export class UserDirectory {
  private readonly store: ReputationStore
  private readonly ledger: VouchLedger
  private readonly clock: TimeProvider
  private readonly events: EventLog

  constructor(deps: UserDirectoryDeps) {
    this.store = deps.store
    this.ledger = deps.ledger
    this.clock = deps.clock ?? defaultTimeProvider
    this.events = deps.events ?? new EventLog(this.clock)
  }

  /**
   * Idempotent first contact. The insert is conflict-tolerant, so two
   * simultaneous first contacts from the same identity produce one record;
   * the loser takes the "existing user" branch.
   */
  async getOrCreate(input: GetOrCreateInput): Promise<GetOrCreateResult> {
    const username = input.username ? input.username : null
    const at = this.clock.date()

    return this.store.transaction<GetOrCreateResult>(async (tx) => {
      const inserted = await tx.insertUserIfAbsent({
        id: input.id,
        username,
        firstName: input.firstName ?? null,
        lastName: input.lastName ?? null,
        referrerId: input.referrerId ?? null,
        at,
      })

      if (inserted) {
        await this.events.record(tx, "user_signup", inserted.id, {
          referrer_id: inserted.referrerId,
          username,
        })
        const resolution = username
          ? await this.ledger.resolvePendingVouches(inserted.id, username, tx)
          : NO_RESOLUTION
        const user = resolution.status === "resolved" ? await this.reread(tx, inserted.id) : inserted
        return { user, created: true, resolution }
      }

      const existing = await tx.getUserForUpdate(input.id)
      if (!existing) {
        throw new Error(`User ${input.id} vanished between insert and read`)
      }

      // A case-only or "@"-only edit updates the display name; resolution
      // runs only when the lookup key moves.
      const usernameChanged = username !== null && username !== existing.username
      const keyChanged = usernameChanged && normalizeUsername(username) !== normalizeUsername(existing.username)
      await tx.touchUser(input.id, at, usernameChanged ? username : undefined)

      const resolution = keyChanged
        ? await this.ledger.resolvePendingVouches(input.id, username, tx)
        : NO_RESOLUTION

      return { user: await this.reread(tx, input.id), created: false, resolution }
    })
  }

  /** Absence is not an error: callers treat it as "needs onboarding". */
  get(id: number): Promise<User | null> {
    return this.store.getUser(id)
  }

  /**
   * Administrative rank correction. Records a RankEvent and a `rank_up`
   * event unconditionally, even when the rank is unchanged; the ledger's own
   * recompute path never routes through here.
   */
  async updateRank(id: number, newRank: string): Promise<UpdateRankResult> {
    if (!isRankKey(newRank)) {
      return reject("INVALID_REQUEST", `Unknown rank: ${newRank}`)
    }

    return this.store.transaction<UpdateRankResult>(async (tx) => {
      const user = await tx.getUserForUpdate(id)
      if (!user) return reject("NOT_FOUND", `User ${id} not found`)

      await tx.setUserRank(id, newRank)
      await this.events.recordRankTransition(tx, id, user.rank, newRank)

      return {
        status: "updated",
        user: { ...user, rank: newRank },
        change: { oldRank: user.rank, newRank },
      }
    })
  }

  async updateProfile(id: number, fields: ProfileFields): Promise<UpdateProfileResult> {
    const update: ProfileFields = {}
    if (fields.bio !== undefined) update.bio = fields.bio.slice(0, MAX_BIO_LENGTH)
    if (fields.location !== undefined) update.location = fields.location.slice(0, MAX_LOCATION_LENGTH)
    if (fields.profilePictureUrl !== undefined) update.profilePictureUrl = fields.profilePictureUrl

    if (Object.keys(update).length === 0) {
      return reject("INVALID_REQUEST", "No fields to update")
    }

    const user = await this.store.updateProfile(id, update)
    if (!user) return reject("NOT_FOUND", `User ${id} not found`)
    return { status: "updated", user }
  }

  list(limit = MAX_PAGE_SIZE, offset = 0): Promise<User[]> {
    return this.store.listUsers(clampLimit(limit), Math.max(0, Math.trunc(offset) || 0))
  }

  async search(query: string, limit = 20): Promise<User[]> {
    const q = query.trim()
    if (q.length === 0) return []
    return this.store.searchUsers(q, clampLimit(limit))
  }

  private async reread(tx: ReputationStore, id: number): Promise<User> {
    const user = await tx.getUser(id)
    if (!user) throw new Error(`User ${id} not found after write`)
    return user
  }
}
