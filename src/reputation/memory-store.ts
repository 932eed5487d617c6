// src/reputation/memory-store.ts — In-memory ReputationStore (non-durable fallback)
//
// Used when postgres is disabled and as the in-process stand-in for tests.
// Transactions are serialized through a promise-chain mutex; a failed
// callback restores the snapshot taken when it started. Reads outside a
// transaction see committed state only, since writers hold the lock.

import { DEFAULT_RANK, type RankKey } from "./rank.js"
import type {
  GiverCount,
  NewConfirmedVouch,
  NewPendingVouch,
  NewUser,
  ProfileFields,
  RankCount,
  RecentVouch,
  ReputationStore,
  StoreKind,
} from "./store.js"
import { normalizeUsername } from "./username.js"
import type {
  BotConfigEntry,
  ConfirmedVouch,
  GivenVouch,
  Invite,
  PendingVouch,
  RankEvent,
  ReceivedVouch,
  ReputationEvent,
  User,
  UserSummary,
  Vouch,
} from "./types.js"

// ---------------------------------------------------------------------------
// Async mutex (promise-chain lock)
// ---------------------------------------------------------------------------

export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve()

  /** Acquire the lock, execute fn, then release. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => { release = resolve })

    // Enqueue behind current chain
    const prev = this.chain
    this.chain = gate

    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

interface MemoryState {
  users: Map<number, User>
  vouches: Map<number, Vouch>
  rankEvents: RankEvent[]
  events: ReputationEvent[]
  invites: Invite[]
  config: Map<string, BotConfigEntry>
  nextVouchId: number
  nextRankEventId: number
  nextEventId: number
  nextInviteId: number
}

function emptyState(): MemoryState {
  return {
    users: new Map(),
    vouches: new Map(),
    rankEvents: [],
    events: [],
    invites: [],
    config: new Map(),
    nextVouchId: 1,
    nextRankEventId: 1,
    nextEventId: 1,
    nextInviteId: 1,
  }
}

interface SharedState {
  state: MemoryState
  mutex: AsyncMutex
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function summarize(user: User | undefined): UserSummary | null {
  if (!user) return null
  return { id: user.id, username: user.username, firstName: user.firstName, rank: user.rank }
}

/** Total vouches desc, then id asc. */
function byStanding(a: User, b: User): number {
  return b.totalVouches - a.totalVouches || a.id - b.id
}

/** Newest first; id breaks ties between rows written in the same millisecond. */
function newestFirst<T extends { id: number; createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id
}

function isConfirmed(vouch: Vouch): vouch is ConfirmedVouch {
  return !vouch.isPending
}

function isPending(vouch: Vouch): vouch is PendingVouch {
  return vouch.isPending
}

// ---------------------------------------------------------------------------
// MemoryReputationStore
// ---------------------------------------------------------------------------

export class MemoryReputationStore implements ReputationStore {
  readonly kind: StoreKind = "memory"
  readonly durable = false

  private readonly shared: SharedState
  private readonly inTransaction: boolean

  constructor(shared?: SharedState, inTransaction = false) {
    this.shared = shared ?? { state: emptyState(), mutex: new AsyncMutex() }
    this.inTransaction = inTransaction
  }

  async transaction<T>(fn: (tx: ReputationStore) => Promise<T>): Promise<T> {
    // Nested scopes join the outer transaction.
    if (this.inTransaction) return fn(this)

    return this.shared.mutex.runExclusive(async () => {
      const snapshot = structuredClone(this.shared.state)
      try {
        return await fn(new MemoryReputationStore(this.shared, true))
      } catch (err) {
        this.shared.state = snapshot
        throw err
      }
    })
  }

  private get s(): MemoryState {
    return this.shared.state
  }

  /** Single-statement writes outside a transaction still take the lock. */
  private async write<T>(fn: (state: MemoryState) => T): Promise<T> {
    if (this.inTransaction) return fn(this.s)
    return this.shared.mutex.runExclusive(async () => fn(this.s))
  }

  // =========================================================================
  // Users
  // =========================================================================

  async getUser(id: number): Promise<User | null> {
    const user = this.s.users.get(id)
    return user ? { ...user } : null
  }

  getUserForUpdate(id: number): Promise<User | null> {
    return this.getUser(id)
  }

  async findUserByUsername(normalized: string): Promise<User | null> {
    const matches = [...this.s.users.values()]
      .filter((u) => normalizeUsername(u.username) === normalized)
      .sort((a, b) => a.id - b.id)
    return matches.length > 0 ? { ...matches[0] } : null
  }

  insertUserIfAbsent(input: NewUser): Promise<User | null> {
    return this.write((state) => {
      if (state.users.has(input.id)) return null
      const user: User = {
        id: input.id,
        username: input.username,
        firstName: input.firstName,
        lastName: input.lastName,
        bio: null,
        profilePictureUrl: null,
        location: null,
        firstSeenAt: input.at,
        lastActiveAt: input.at,
        totalVouches: 0,
        rank: DEFAULT_RANK,
        referrerId: input.referrerId,
        streakDays: 0,
        lastStreakDate: null,
      }
      state.users.set(user.id, user)
      return { ...user }
    })
  }

  touchUser(id: number, at: Date, username?: string): Promise<void> {
    return this.write((state) => {
      const user = state.users.get(id)
      if (!user) return
      user.lastActiveAt = at
      if (username !== undefined) user.username = username
    })
  }

  incrementVouchTotal(id: number, by: number): Promise<number> {
    return this.write((state) => {
      const user = state.users.get(id)
      if (!user) throw new Error(`Cannot increment total for unknown user ${id}`)
      user.totalVouches += by
      return user.totalVouches
    })
  }

  setUserRank(id: number, rank: RankKey): Promise<void> {
    return this.write((state) => {
      const user = state.users.get(id)
      if (user) user.rank = rank
    })
  }

  updateProfile(id: number, fields: ProfileFields): Promise<User | null> {
    return this.write((state) => {
      const user = state.users.get(id)
      if (!user) return null
      if (fields.bio !== undefined) user.bio = fields.bio
      if (fields.location !== undefined) user.location = fields.location
      if (fields.profilePictureUrl !== undefined) user.profilePictureUrl = fields.profilePictureUrl
      return { ...user }
    })
  }

  async listUsers(limit: number, offset: number): Promise<User[]> {
    return [...this.s.users.values()]
      .sort(byStanding)
      .slice(offset, offset + limit)
      .map((u) => ({ ...u }))
  }

  async searchUsers(query: string, limit: number): Promise<User[]> {
    const q = query.toLowerCase()
    const hit = (value: string | null) => value !== null && value.toLowerCase().includes(q)
    return [...this.s.users.values()]
      .filter((u) => hit(u.username) || hit(u.firstName) || hit(u.lastName))
      .sort(byStanding)
      .slice(0, limit)
      .map((u) => ({ ...u }))
  }

  // =========================================================================
  // Vouches
  // =========================================================================

  async getVouch(id: number): Promise<Vouch | null> {
    const vouch = this.s.vouches.get(id)
    return vouch ? { ...vouch } : null
  }

  async findVouch(fromUserId: number, toUserId: number): Promise<ConfirmedVouch | null> {
    for (const vouch of this.s.vouches.values()) {
      if (isConfirmed(vouch) && vouch.fromUserId === fromUserId && vouch.toUserId === toUserId) {
        return { ...vouch }
      }
    }
    return null
  }

  async findPendingVouch(fromUserId: number, normalizedUsername: string): Promise<PendingVouch | null> {
    for (const vouch of this.s.vouches.values()) {
      if (isPending(vouch) && vouch.fromUserId === fromUserId && vouch.toUsername === normalizedUsername) {
        return { ...vouch }
      }
    }
    return null
  }

  async insertConfirmedVouch(input: NewConfirmedVouch): Promise<ConfirmedVouch | null> {
    if (await this.findVouch(input.fromUserId, input.toUserId)) return null
    return this.write((state) => {
      const vouch: ConfirmedVouch = {
        id: state.nextVouchId++,
        fromUserId: input.fromUserId,
        toUserId: input.toUserId,
        toUsername: input.toUsername,
        message: input.message,
        createdAt: input.createdAt,
        isPending: false,
      }
      state.vouches.set(vouch.id, vouch)
      return { ...vouch }
    })
  }

  async insertPendingVouch(input: NewPendingVouch): Promise<PendingVouch | null> {
    if (await this.findPendingVouch(input.fromUserId, input.toUsername)) return null
    return this.write((state) => {
      const vouch: PendingVouch = {
        id: state.nextVouchId++,
        fromUserId: input.fromUserId,
        toUserId: null,
        toUsername: input.toUsername,
        message: input.message,
        createdAt: input.createdAt,
        isPending: true,
      }
      state.vouches.set(vouch.id, vouch)
      return { ...vouch }
    })
  }

  async pendingVouchesFor(normalizedUsername: string): Promise<PendingVouch[]> {
    return [...this.s.vouches.values()]
      .filter(isPending)
      .filter((v) => v.toUsername === normalizedUsername)
      .map((v) => ({ ...v }))
  }

  confirmVouches(ids: number[], toUserId: number): Promise<ConfirmedVouch[]> {
    return this.write((state) => {
      const changed: ConfirmedVouch[] = []
      for (const id of ids) {
        const vouch = state.vouches.get(id)
        if (!vouch || !isPending(vouch)) continue
        const taken = [...state.vouches.values()].some(
          (other) => isConfirmed(other) && other.fromUserId === vouch.fromUserId && other.toUserId === toUserId,
        )
        if (taken) continue
        const confirmed: ConfirmedVouch = { ...vouch, isPending: false, toUserId }
        state.vouches.set(id, confirmed)
        changed.push({ ...confirmed })
      }
      return changed
    })
  }

  updateVouchMessage(id: number, message: string): Promise<Vouch | null> {
    return this.write((state) => {
      const vouch = state.vouches.get(id)
      if (!vouch) return null
      vouch.message = message
      return { ...vouch }
    })
  }

  async vouchesReceived(userId: number): Promise<ReceivedVouch[]> {
    return [...this.s.vouches.values()]
      .filter(isConfirmed)
      .filter((v) => v.toUserId === userId)
      .sort(newestFirst)
      .map((v) => ({ ...v, from: summarize(this.s.users.get(v.fromUserId)) }))
  }

  async vouchesGiven(userId: number): Promise<GivenVouch[]> {
    return [...this.s.vouches.values()]
      .filter((v) => v.fromUserId === userId)
      .sort(newestFirst)
      .map((v): GivenVouch => {
        if (v.isPending) return { ...v, to: null }
        return { ...v, to: summarize(this.s.users.get(v.toUserId)) }
      })
  }

  // =========================================================================
  // Audit
  // =========================================================================

  insertRankEvent(userId: number, oldRank: string | null, newRank: string, at: Date): Promise<RankEvent> {
    return this.write((state) => {
      const event: RankEvent = { id: state.nextRankEventId++, userId, oldRank, newRank, createdAt: at }
      state.rankEvents.push(event)
      return { ...event }
    })
  }

  appendEvent(eventType: string, userId: number | null, metadata: unknown, at: Date): Promise<ReputationEvent> {
    return this.write((state) => {
      const event: ReputationEvent = {
        id: state.nextEventId++,
        eventType,
        userId,
        metadata: structuredClone(metadata),
        createdAt: at,
      }
      state.events.push(event)
      return { ...event }
    })
  }

  async recentEvents(limit: number): Promise<ReputationEvent[]> {
    return [...this.s.events].sort(newestFirst).slice(0, limit).map((e) => ({ ...e }))
  }

  async countEvents(eventType: string): Promise<number> {
    return this.s.events.filter((e) => e.eventType === eventType).length
  }

  async rankEventsFor(userId: number): Promise<RankEvent[]> {
    return this.s.rankEvents.filter((e) => e.userId === userId).map((e) => ({ ...e }))
  }

  // =========================================================================
  // Analytics
  // =========================================================================

  async countUsers(): Promise<number> {
    return this.s.users.size
  }

  async countUsersActiveSince(since: Date): Promise<number> {
    return [...this.s.users.values()].filter((u) => u.lastActiveAt > since).length
  }

  async countUsersSeenSince(since: Date): Promise<number> {
    return [...this.s.users.values()].filter((u) => u.firstSeenAt > since).length
  }

  async countUsersWithReferrer(): Promise<number> {
    return [...this.s.users.values()].filter((u) => u.referrerId !== null).length
  }

  async countVouches(): Promise<number> {
    return this.s.vouches.size
  }

  async countVouchesSince(since: Date): Promise<number> {
    return [...this.s.vouches.values()].filter((v) => v.createdAt > since).length
  }

  async rankDistribution(): Promise<RankCount[]> {
    const counts = new Map<string, number>()
    for (const user of this.s.users.values()) {
      counts.set(user.rank, (counts.get(user.rank) ?? 0) + 1)
    }
    return [...counts].map(([rank, count]) => ({ rank, count }))
  }

  async topGivers(limit: number, since?: Date): Promise<GiverCount[]> {
    const counts = new Map<number, number>()
    for (const vouch of this.s.vouches.values()) {
      if (since && !(vouch.createdAt > since)) continue
      counts.set(vouch.fromUserId, (counts.get(vouch.fromUserId) ?? 0) + 1)
    }

    const givers: GiverCount[] = []
    for (const [userId, vouchCount] of counts) {
      const summary = summarize(this.s.users.get(userId))
      if (summary) givers.push({ ...summary, vouchCount })
    }
    return givers.sort((a, b) => b.vouchCount - a.vouchCount || a.id - b.id).slice(0, limit)
  }

  async mostVouched(limit: number): Promise<User[]> {
    return [...this.s.users.values()].sort(byStanding).slice(0, limit).map((u) => ({ ...u }))
  }

  async referralsOf(referrerId: number, limit: number): Promise<User[]> {
    return [...this.s.users.values()]
      .filter((u) => u.referrerId === referrerId)
      .sort((a, b) => b.firstSeenAt.getTime() - a.firstSeenAt.getTime() || b.id - a.id)
      .slice(0, limit)
      .map((u) => ({ ...u }))
  }

  async countReferralsOf(referrerId: number): Promise<number> {
    return [...this.s.users.values()].filter((u) => u.referrerId === referrerId).length
  }

  async recentConfirmedVouches(limit: number): Promise<RecentVouch[]> {
    const recent: RecentVouch[] = []
    for (const vouch of [...this.s.vouches.values()].filter(isConfirmed).sort(newestFirst)) {
      const from = this.s.users.get(vouch.fromUserId)
      const to = this.s.users.get(vouch.toUserId)
      if (!from || !to) continue
      recent.push({
        id: vouch.id,
        fromUserId: vouch.fromUserId,
        fromUsername: from.username,
        toUserId: vouch.toUserId,
        toUsername: to.username,
        message: vouch.message,
        createdAt: vouch.createdAt,
      })
      if (recent.length >= limit) break
    }
    return recent
  }

  // =========================================================================
  // Invites
  // =========================================================================

  async hasInviteSince(fromUserId: number, normalizedUsername: string, since: Date): Promise<boolean> {
    return this.s.invites.some(
      (i) => i.fromUserId === fromUserId && i.toUsername === normalizedUsername && i.sentAt > since,
    )
  }

  insertInvite(fromUserId: number, normalizedUsername: string, at: Date): Promise<void> {
    return this.write((state) => {
      state.invites.push({ id: state.nextInviteId++, fromUserId, toUsername: normalizedUsername, sentAt: at })
    })
  }

  // =========================================================================
  // Bot config
  // =========================================================================

  async listConfig(): Promise<BotConfigEntry[]> {
    return [...this.s.config.values()]
      .sort((a, b) => a.key.localeCompare(b.key))
      .map((e) => ({ ...e }))
  }

  upsertConfig(key: string, value: string, at: Date): Promise<BotConfigEntry> {
    return this.write((state) => {
      const entry: BotConfigEntry = { key, value, updatedAt: at }
      state.config.set(key, entry)
      return { ...entry }
    })
  }
}
