// src/reputation/ledger.ts — Vouch Ledger
//
// Owns vouch creation, deduplication, pending-vouch resolution and the
// per-user total/rank mutation. Every operation validates before it mutates
// and runs inside one store transaction; the partial unique indexes on the
// vouches table remain the backstop for concurrent duplicates.
//
// State machine per vouch:  pending --(target identified)--> confirmed
// The transition is one-way. A confirmed vouch always has a target id.

import { calculateRank } from "./rank.js"
import { normalizeUsername } from "./username.js"
import { sanitizeMessage } from "./sanitize.js"
import { EventLog, describeRankChange } from "./events.js"
import type { ReputationStore } from "./store.js"
import {
  NO_RESOLUTION,
  VouchConflictError,
  reject,
  type CreateVouchResult,
  type GivenVouch,
  type PendingResolution,
  type PendingVouch,
  type RankChange,
  type ReceivedVouch,
  type UpdateVouchResult,
  type User,
} from "./types.js"
import { defaultTimeProvider, type TimeProvider } from "../shared/time-provider.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface VouchTarget {
  toUserId?: number | null
  toUsername?: string | null
}

export interface VouchLedgerDeps {
  store: ReputationStore
  clock?: TimeProvider
  events?: EventLog
}

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export class VouchLedger {
  private readonly store: ReputationStore
  private readonly clock: TimeProvider
  private readonly events: EventLog

  constructor(deps: VouchLedgerDeps) {
    this.store = deps.store
    this.clock = deps.clock ?? defaultTimeProvider
    this.events = deps.events ?? new EventLog(this.clock)
  }

  /**
   * Create a vouch from `fromUserId` to a target given by id or username.
   *
   * A username that matches a known user (case-insensitively) takes the
   * confirmed path; an unknown username records a pending vouch that
   * resolvePendingVouches() settles when that user appears.
   */
  async createVouch(
    fromUserId: number,
    target: VouchTarget,
    message?: string | null,
  ): Promise<CreateVouchResult> {
    const toUsername = normalizeUsername(target.toUsername)
    const requestedId = target.toUserId ?? null

    if (requestedId === null && toUsername === null) {
      return reject("INVALID_REQUEST", "Must provide either a target user id or a username")
    }

    const cleanMessage = sanitizeMessage(message)

    try {
      return await this.store.transaction<CreateVouchResult>(async (tx) => {
        if (!(await tx.getUser(fromUserId))) {
          return reject("NOT_FOUND", `User ${fromUserId} not found`)
        }

        let toUserId = requestedId
        if (toUserId === null && toUsername !== null) {
          const found = await tx.findUserByUsername(toUsername)
          if (found) toUserId = found.id
        }

        if (toUserId !== null) {
          if (await tx.findVouch(fromUserId, toUserId)) {
            return reject("DUPLICATE_VOUCH", "You already vouched for this user")
          }
          if (toUserId === fromUserId) {
            return reject("SELF_VOUCH", "You cannot vouch for yourself")
          }
          return this.createConfirmed(tx, fromUserId, toUserId, toUsername, cleanMessage)
        }

        if (toUsername !== null) {
          if (await tx.findPendingVouch(fromUserId, toUsername)) {
            return reject("DUPLICATE_VOUCH", "You already vouched for this user")
          }
          return this.createPending(tx, fromUserId, toUsername, cleanMessage)
        }

        return reject("INVALID_REQUEST", "Must provide either a target user id or a username")
      })
    } catch (err) {
      if (err instanceof VouchConflictError) {
        return reject("DUPLICATE_VOUCH", "You already vouched for this user")
      }
      throw err
    }
  }

  /**
   * Settle pending vouches addressed to `username` now that `userId` owns it.
   *
   * Matches are confirmed in one batch, the total is incremented once by the
   * batch size and the rank recomputed once against the final total. Pending
   * vouches that would become a self vouch or a duplicate of an existing
   * confirmed vouch stay pending. Re-invocation with nothing new is a no-op.
   *
   * Pass `tx` to join the caller's transaction (signup, username change).
   */
  async resolvePendingVouches(
    userId: number,
    username: string | null | undefined,
    tx?: ReputationStore,
  ): Promise<PendingResolution> {
    const normalized = normalizeUsername(username)
    if (normalized === null) return NO_RESOLUTION

    if (tx) return this.resolveWithin(tx, userId, normalized)
    return this.store.transaction((t) => this.resolveWithin(t, userId, normalized))
  }

  /** Replace a vouch's message. Only the vouch's source may edit it. */
  async updateVouch(
    vouchId: number,
    requestingUserId: number,
    newMessage: string | null | undefined,
  ): Promise<UpdateVouchResult> {
    return this.store.transaction<UpdateVouchResult>(async (tx) => {
      const vouch = await tx.getVouch(vouchId)
      if (!vouch) {
        return reject("NOT_FOUND", `Vouch ${vouchId} not found`)
      }
      if (vouch.fromUserId !== requestingUserId) {
        return reject("PERMISSION_DENIED", "Only the author of a vouch can edit it")
      }

      const updated = await tx.updateVouchMessage(vouchId, sanitizeMessage(newMessage))
      if (!updated) {
        return reject("NOT_FOUND", `Vouch ${vouchId} not found`)
      }

      await this.events.record(tx, "vouch_updated", requestingUserId, { vouch_id: vouchId })
      return { status: "updated", vouch: updated }
    })
  }

  vouchesFor(userId: number): Promise<ReceivedVouch[]> {
    return this.store.vouchesReceived(userId)
  }

  vouchesBy(userId: number): Promise<GivenVouch[]> {
    return this.store.vouchesGiven(userId)
  }

  // =========================================================================
  // Internals
  // =========================================================================

  private async createConfirmed(
    tx: ReputationStore,
    fromUserId: number,
    toUserId: number,
    toUsername: string | null,
    message: string,
  ): Promise<CreateVouchResult> {
    const target = await tx.getUserForUpdate(toUserId)
    if (!target) {
      return reject("NOT_FOUND", `User ${toUserId} not found`)
    }

    const vouch = await tx.insertConfirmedVouch({
      fromUserId,
      toUserId,
      toUsername,
      message,
      createdAt: this.clock.date(),
    })
    if (!vouch) throw new VouchConflictError(fromUserId, toUserId)

    const total = await tx.incrementVouchTotal(toUserId, 1)
    const rankChange = await this.recomputeRank(tx, target, total)

    const reverse = await tx.findVouch(toUserId, fromUserId)
    const mutual = reverse !== null
    if (mutual) {
      await this.events.record(tx, "mutual_vouch", fromUserId, { other_user: toUserId })
    }

    await this.events.record(tx, "vouch_created", fromUserId, {
      to_user: toUserId,
      vouch_count: total,
    })

    return { status: "confirmed", vouch, total, rankChange, mutual }
  }

  private async createPending(
    tx: ReputationStore,
    fromUserId: number,
    toUsername: string,
    message: string,
  ): Promise<CreateVouchResult> {
    const vouch = await tx.insertPendingVouch({
      fromUserId,
      toUsername,
      message,
      createdAt: this.clock.date(),
    })
    if (!vouch) throw new VouchConflictError(fromUserId, toUsername)

    await this.events.record(tx, "pending_vouch_created", fromUserId, { to_username: toUsername })
    return { status: "pending", vouch }
  }

  private async resolveWithin(
    tx: ReputationStore,
    userId: number,
    normalized: string,
  ): Promise<PendingResolution> {
    const pending = await tx.pendingVouchesFor(normalized)
    if (pending.length === 0) return NO_RESOLUTION

    const eligible: PendingVouch[] = []
    for (const vouch of pending) {
      if (vouch.fromUserId === userId) continue
      if (await tx.findVouch(vouch.fromUserId, userId)) continue
      eligible.push(vouch)
    }
    if (eligible.length === 0) return NO_RESOLUTION

    const user = await tx.getUserForUpdate(userId)
    if (!user) {
      throw new Error(`Cannot resolve pending vouches for unknown user ${userId}`)
    }

    const confirmed = await tx.confirmVouches(eligible.map((v) => v.id), userId)
    if (confirmed.length === 0) return NO_RESOLUTION

    const total = await tx.incrementVouchTotal(userId, confirmed.length)
    const rankChange = await this.recomputeRank(tx, user, total)

    // A confirmed vouch the new owner already gave back completes a pair;
    // the resolved vouch is the second half.
    for (const vouch of confirmed) {
      if (await tx.findVouch(userId, vouch.fromUserId)) {
        await this.events.record(tx, "mutual_vouch", vouch.fromUserId, { other_user: userId })
      }
    }

    await this.events.record(tx, "pending_vouches_processed", userId, {
      username: normalized,
      vouches_processed: confirmed.length,
      new_rank: calculateRank(total),
    })

    console.log(
      `[ledger] resolved ${confirmed.length} pending vouches for @${normalized} (user=${userId}, total=${total}, rank ${describeRankChange(rankChange)})`,
    )

    return { status: "resolved", count: confirmed.length, total, rankChange }
  }

  /**
   * Single recompute path: compare the rank derived from `newTotal` with the
   * rank held before the mutation and record the transition when it moves.
   */
  private async recomputeRank(
    tx: ReputationStore,
    before: User,
    newTotal: number,
  ): Promise<RankChange | null> {
    const newRank = calculateRank(newTotal)
    if (newRank === before.rank) return null

    await tx.setUserRank(before.id, newRank)
    await this.events.recordRankTransition(tx, before.id, before.rank, newRank)
    return { oldRank: before.rank, newRank }
  }
}
