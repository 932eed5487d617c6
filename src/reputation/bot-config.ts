// src/reputation/bot-config.ts — Admin key/value configuration
//
// The whole authorization model is one comparison against the configured
// admin id. An admin id of 0 means "no admin": every request is denied.

import { EventLog } from "./events.js"
import type { ReputationStore } from "./store.js"
import { reject, type BotConfigEntry, type Rejection } from "./types.js"
import { defaultTimeProvider, type TimeProvider } from "../shared/time-provider.js"

export const MAX_CONFIG_KEY_LENGTH = 64

export type ListConfigResult = { status: "ok"; entries: BotConfigEntry[] } | Rejection
export type SetConfigResult = { status: "updated"; entry: BotConfigEntry } | Rejection

export interface BotConfigDeps {
  store: ReputationStore
  adminId: number
  clock?: TimeProvider
  events?: EventLog
}

export class BotConfigService {
  private readonly store: ReputationStore
  private readonly adminId: number
  private readonly clock: TimeProvider
  private readonly events: EventLog

  constructor(deps: BotConfigDeps) {
    this.store = deps.store
    this.adminId = deps.adminId
    this.clock = deps.clock ?? defaultTimeProvider
    this.events = deps.events ?? new EventLog(this.clock)
  }

  isAdmin(userId: number): boolean {
    return this.adminId !== 0 && userId === this.adminId
  }

  async list(requesterId: number): Promise<ListConfigResult> {
    if (!this.isAdmin(requesterId)) return reject("PERMISSION_DENIED", "Unauthorized")
    return { status: "ok", entries: await this.store.listConfig() }
  }

  async set(requesterId: number, key: string, value: string): Promise<SetConfigResult> {
    if (!this.isAdmin(requesterId)) return reject("PERMISSION_DENIED", "Unauthorized")

    const trimmed = key.trim()
    if (trimmed.length === 0 || trimmed.length > MAX_CONFIG_KEY_LENGTH) {
      return reject("INVALID_REQUEST", `Config key must be 1-${MAX_CONFIG_KEY_LENGTH} characters`)
    }

    return this.store.transaction<SetConfigResult>(async (tx) => {
      const entry = await tx.upsertConfig(trimmed, value, this.clock.date())
      await this.events.record(tx, "config_updated", requesterId, { key: trimmed })
      return { status: "updated", entry }
    })
  }
}
