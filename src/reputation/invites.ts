// src/reputation/invites.ts — Invite Tracker
//
// One invite per (source, normalized username) per trailing 7 days. Invites
// are recorded only; no message is delivered to the invitee.

import { normalizeUsername } from "./username.js"
import { EventLog } from "./events.js"
import type { ReputationStore } from "./store.js"
import { reject, type Rejection } from "./types.js"
import { DAY_MS, defaultTimeProvider, windowStart, type TimeProvider } from "../shared/time-provider.js"

export const INVITE_WINDOW_MS = 7 * DAY_MS

export type SendInviteResult =
  | {
      status: "sent"
      toUsername: string
      /** Whether the invitee already has a user record */
      targetKnown: boolean
    }
  | Rejection

export interface InviteTrackerDeps {
  store: ReputationStore
  clock?: TimeProvider
  events?: EventLog
}

export class InviteTracker {
  private readonly store: ReputationStore
  private readonly clock: TimeProvider
  private readonly events: EventLog

  constructor(deps: InviteTrackerDeps) {
    this.store = deps.store
    this.clock = deps.clock ?? defaultTimeProvider
    this.events = deps.events ?? new EventLog(this.clock)
  }

  async canSendInvite(fromUserId: number, toUsername: string | null | undefined): Promise<boolean> {
    const normalized = normalizeUsername(toUsername)
    if (normalized === null) return false
    const recent = await this.store.hasInviteSince(
      fromUserId,
      normalized,
      windowStart(this.clock, INVITE_WINDOW_MS),
    )
    return !recent
  }

  async sendInvite(fromUserId: number, toUsername: string | null | undefined): Promise<SendInviteResult> {
    const normalized = normalizeUsername(toUsername)
    if (normalized === null) {
      return reject("INVALID_REQUEST", "A username to invite is required")
    }

    return this.store.transaction<SendInviteResult>(async (tx) => {
      if (!(await tx.getUser(fromUserId))) {
        return reject("NOT_FOUND", `User ${fromUserId} not found`)
      }

      const since = windowStart(this.clock, INVITE_WINDOW_MS)
      if (await tx.hasInviteSince(fromUserId, normalized, since)) {
        return reject("RATE_LIMITED", "You can only invite this user once per week")
      }

      await tx.insertInvite(fromUserId, normalized, this.clock.date())
      const target = await tx.findUserByUsername(normalized)
      await this.events.record(tx, "invite_logged", fromUserId, { to_username: normalized })

      return { status: "sent", toUsername: normalized, targetKnown: target !== null }
    })
  }
}
