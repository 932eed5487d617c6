// src/reputation/events.ts — Event Log (append-only audit trail)
//
// Domain events are written through whichever store the caller holds, so an
// event emitted inside a ledger transaction commits or rolls back with the
// mutation that caused it. Events are never read back for control decisions.

import type { RankKey } from "./rank.js"
import type { AuditRepository } from "./store.js"
import type { RankChange, ReputationEvent } from "./types.js"
import { defaultTimeProvider, type TimeProvider } from "../shared/time-provider.js"

// ---------------------------------------------------------------------------
// Event registry
// ---------------------------------------------------------------------------

export type EventMetadata = {
  user_signup: { referrer_id: number | null; username: string | null }
  vouch_created: { to_user: number; vouch_count: number }
  pending_vouch_created: { to_username: string }
  pending_vouches_processed: { username: string; vouches_processed: number; new_rank: RankKey }
  rank_up: { old_rank: string | null; new_rank: string }
  mutual_vouch: { other_user: number }
  vouch_updated: { vouch_id: number }
  invite_logged: { to_username: string }
  share_clicked: { platform: string }
  config_updated: { key: string }
}

export type EventType = keyof EventMetadata

export type EventSink = Pick<AuditRepository, "appendEvent" | "insertRankEvent">

// ---------------------------------------------------------------------------
// EventLog
// ---------------------------------------------------------------------------

export class EventLog {
  private readonly clock: TimeProvider

  constructor(clock: TimeProvider = defaultTimeProvider) {
    this.clock = clock
  }

  record<K extends EventType>(
    sink: EventSink,
    eventType: K,
    userId: number | null,
    metadata: EventMetadata[K],
  ): Promise<ReputationEvent> {
    return sink.appendEvent(eventType, userId, metadata, this.clock.date())
  }

  /**
   * The one place a rank transition is written: a RankEvent row plus a
   * `rank_up` event. Used by the ledger's recompute path and by
   * administrative correction alike.
   */
  async recordRankTransition(
    sink: EventSink,
    userId: number,
    oldRank: string | null,
    newRank: string,
  ): Promise<void> {
    await sink.insertRankEvent(userId, oldRank, newRank, this.clock.date())
    await this.record(sink, "rank_up", userId, { old_rank: oldRank, new_rank: newRank })
  }
}

export function describeRankChange(change: RankChange | null): string {
  return change ? `${change.oldRank} -> ${change.newRank}` : "unchanged"
}
