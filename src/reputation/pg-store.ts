// src/reputation/pg-store.ts — Postgres-backed ReputationStore
//
// Implements the ReputationStore port with drizzle over postgres.js:
// - Row locks (SELECT … FOR UPDATE) for read-modify-write on user counters
// - Conflict-tolerant inserts: ON CONFLICT DO NOTHING … RETURNING, where an
//   empty result means the uniqueness backstop fired
// - Atomic counter increment in a single UPDATE … RETURNING

import { and, asc, count, desc, eq, gt, ilike, inArray, isNotNull, or, sql } from "drizzle-orm"
import { alias } from "drizzle-orm/pg-core"
import type { PgExecutor } from "../drizzle/db.js"
import { botConfig, events, invites, rankEvents, users, vouches } from "../drizzle/schema.js"
import { DEFAULT_RANK, isRankKey, type RankKey } from "./rank.js"
import { normalizeUsername } from "./username.js"
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
import type {
  BotConfigEntry,
  ConfirmedVouch,
  GivenVouch,
  PendingVouch,
  RankEvent,
  ReceivedVouch,
  ReputationEvent,
  User,
  UserSummary,
  Vouch,
} from "./types.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type UserRow = typeof users.$inferSelect
type VouchRow = typeof vouches.$inferSelect

interface SummaryRow {
  id: number
  username: string | null
  firstName: string | null
  rank: string
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toRank(value: string): RankKey {
  return isRankKey(value) ? value : DEFAULT_RANK
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    firstName: row.firstName,
    lastName: row.lastName,
    bio: row.bio,
    profilePictureUrl: row.profilePictureUrl,
    location: row.location,
    firstSeenAt: row.firstSeenAt,
    lastActiveAt: row.lastActiveAt,
    totalVouches: row.totalVouches,
    rank: toRank(row.rank),
    referrerId: row.referrerId,
    streakDays: row.streakDays,
    lastStreakDate: row.lastStreakDate,
  }
}

function toSummary(row: SummaryRow | null): UserSummary | null {
  if (!row) return null
  return { id: row.id, username: row.username, firstName: row.firstName, rank: toRank(row.rank) }
}

function toVouch(row: VouchRow): Vouch {
  const base = { id: row.id, fromUserId: row.fromUserId, message: row.message, createdAt: row.createdAt }
  if (row.isPending && row.toUsername !== null) {
    return { ...base, isPending: true, toUserId: null, toUsername: row.toUsername }
  }
  if (!row.isPending && row.toUserId !== null) {
    return { ...base, isPending: false, toUserId: row.toUserId, toUsername: row.toUsername }
  }
  throw new Error(`Malformed vouch row ${row.id}: pending=${row.isPending} to_user_id=${row.toUserId}`)
}

function toConfirmed(row: VouchRow): ConfirmedVouch {
  const vouch = toVouch(row)
  if (vouch.isPending) throw new Error(`Vouch ${row.id} is pending, expected confirmed`)
  return vouch
}

function toPending(row: VouchRow): PendingVouch {
  const vouch = toVouch(row)
  if (!vouch.isPending) throw new Error(`Vouch ${row.id} is confirmed, expected pending`)
  return vouch
}

/** Escape LIKE metacharacters so user input matches literally. */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, "\\$&")
}

const summaryColumns = {
  id: users.id,
  username: users.username,
  firstName: users.firstName,
  rank: users.rank,
}

// ---------------------------------------------------------------------------
// PgReputationStore
// ---------------------------------------------------------------------------

export class PgReputationStore implements ReputationStore {
  readonly kind: StoreKind = "postgres"
  readonly durable = true

  private readonly db: PgExecutor
  private readonly inTransaction: boolean

  constructor(db: PgExecutor, inTransaction = false) {
    this.db = db
    this.inTransaction = inTransaction
  }

  async transaction<T>(fn: (tx: ReputationStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) return fn(this)
    return this.db.transaction((tx) => fn(new PgReputationStore(tx, true)))
  }

  // =========================================================================
  // Users
  // =========================================================================

  async getUser(id: number): Promise<User | null> {
    const rows = await this.db.select().from(users).where(eq(users.id, id)).limit(1)
    return rows.length > 0 ? toUser(rows[0]) : null
  }

  async getUserForUpdate(id: number): Promise<User | null> {
    const rows = await this.db.select().from(users).where(eq(users.id, id)).limit(1).for("update")
    return rows.length > 0 ? toUser(rows[0]) : null
  }

  async findUserByUsername(normalized: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(eq(users.usernameKey, normalized))
      .orderBy(asc(users.id))
      .limit(1)
    return rows.length > 0 ? toUser(rows[0]) : null
  }

  async insertUserIfAbsent(user: NewUser): Promise<User | null> {
    const rows = await this.db
      .insert(users)
      .values({
        id: user.id,
        username: user.username,
        usernameKey: normalizeUsername(user.username),
        firstName: user.firstName,
        lastName: user.lastName,
        referrerId: user.referrerId,
        firstSeenAt: user.at,
        lastActiveAt: user.at,
      })
      .onConflictDoNothing({ target: users.id })
      .returning()
    return rows.length > 0 ? toUser(rows[0]) : null
  }

  async touchUser(id: number, at: Date, username?: string): Promise<void> {
    await this.db
      .update(users)
      .set(username === undefined
        ? { lastActiveAt: at }
        : { lastActiveAt: at, username, usernameKey: normalizeUsername(username) })
      .where(eq(users.id, id))
  }

  async incrementVouchTotal(id: number, by: number): Promise<number> {
    const rows = await this.db
      .update(users)
      .set({ totalVouches: sql`${users.totalVouches} + ${by}` })
      .where(eq(users.id, id))
      .returning({ total: users.totalVouches })
    if (rows.length === 0) throw new Error(`Cannot increment total for unknown user ${id}`)
    return rows[0].total
  }

  async setUserRank(id: number, rank: RankKey): Promise<void> {
    await this.db.update(users).set({ rank }).where(eq(users.id, id))
  }

  async updateProfile(id: number, fields: ProfileFields): Promise<User | null> {
    const rows = await this.db
      .update(users)
      .set({
        bio: fields.bio,
        location: fields.location,
        profilePictureUrl: fields.profilePictureUrl,
      })
      .where(eq(users.id, id))
      .returning()
    return rows.length > 0 ? toUser(rows[0]) : null
  }

  async listUsers(limit: number, offset: number): Promise<User[]> {
    const rows = await this.db
      .select()
      .from(users)
      .orderBy(desc(users.totalVouches), asc(users.id))
      .limit(limit)
      .offset(offset)
    return rows.map(toUser)
  }

  async searchUsers(query: string, limit: number): Promise<User[]> {
    const pattern = `%${escapeLike(query)}%`
    const rows = await this.db
      .select()
      .from(users)
      .where(or(ilike(users.username, pattern), ilike(users.firstName, pattern), ilike(users.lastName, pattern)))
      .orderBy(desc(users.totalVouches), asc(users.id))
      .limit(limit)
    return rows.map(toUser)
  }

  // =========================================================================
  // Vouches
  // =========================================================================

  async getVouch(id: number): Promise<Vouch | null> {
    const rows = await this.db.select().from(vouches).where(eq(vouches.id, id)).limit(1)
    return rows.length > 0 ? toVouch(rows[0]) : null
  }

  async findVouch(fromUserId: number, toUserId: number): Promise<ConfirmedVouch | null> {
    const rows = await this.db
      .select()
      .from(vouches)
      .where(and(
        eq(vouches.fromUserId, fromUserId),
        eq(vouches.toUserId, toUserId),
        eq(vouches.isPending, false),
      ))
      .limit(1)
    return rows.length > 0 ? toConfirmed(rows[0]) : null
  }

  async findPendingVouch(fromUserId: number, normalizedUsername: string): Promise<PendingVouch | null> {
    const rows = await this.db
      .select()
      .from(vouches)
      .where(and(
        eq(vouches.fromUserId, fromUserId),
        eq(vouches.toUsername, normalizedUsername),
        eq(vouches.isPending, true),
      ))
      .limit(1)
    return rows.length > 0 ? toPending(rows[0]) : null
  }

  async insertConfirmedVouch(vouch: NewConfirmedVouch): Promise<ConfirmedVouch | null> {
    const rows = await this.db
      .insert(vouches)
      .values({
        fromUserId: vouch.fromUserId,
        toUserId: vouch.toUserId,
        toUsername: vouch.toUsername,
        message: vouch.message,
        createdAt: vouch.createdAt,
        isPending: false,
      })
      .onConflictDoNothing()
      .returning()
    return rows.length > 0 ? toConfirmed(rows[0]) : null
  }

  async insertPendingVouch(vouch: NewPendingVouch): Promise<PendingVouch | null> {
    const rows = await this.db
      .insert(vouches)
      .values({
        fromUserId: vouch.fromUserId,
        toUserId: null,
        toUsername: vouch.toUsername,
        message: vouch.message,
        createdAt: vouch.createdAt,
        isPending: true,
      })
      .onConflictDoNothing()
      .returning()
    return rows.length > 0 ? toPending(rows[0]) : null
  }

  async pendingVouchesFor(normalizedUsername: string): Promise<PendingVouch[]> {
    const rows = await this.db
      .select()
      .from(vouches)
      .where(and(eq(vouches.toUsername, normalizedUsername), eq(vouches.isPending, true)))
      .orderBy(asc(vouches.id))
    return rows.map(toPending)
  }

  async confirmVouches(ids: number[], toUserId: number): Promise<ConfirmedVouch[]> {
    if (ids.length === 0) return []
    // Rows whose source already holds a confirmed vouch for the target stay
    // pending, so a concurrent createVouch never trips idx_vouches_pair here.
    const existing = alias(vouches, "existing")
    const rows = await this.db
      .update(vouches)
      .set({ toUserId, isPending: false })
      .where(and(
        inArray(vouches.id, ids),
        eq(vouches.isPending, true),
        sql`NOT EXISTS (SELECT 1 FROM ${existing} WHERE ${existing.fromUserId} = ${vouches.fromUserId} AND ${existing.toUserId} = ${toUserId})`,
      ))
      .returning()
    return rows.map(toConfirmed)
  }

  async updateVouchMessage(id: number, message: string): Promise<Vouch | null> {
    const rows = await this.db
      .update(vouches)
      .set({ message })
      .where(eq(vouches.id, id))
      .returning()
    return rows.length > 0 ? toVouch(rows[0]) : null
  }

  async vouchesReceived(userId: number): Promise<ReceivedVouch[]> {
    const rows = await this.db
      .select({ vouch: vouches, from: summaryColumns })
      .from(vouches)
      .leftJoin(users, eq(users.id, vouches.fromUserId))
      .where(and(eq(vouches.toUserId, userId), eq(vouches.isPending, false)))
      .orderBy(desc(vouches.createdAt), desc(vouches.id))
    return rows.map((row) => ({ ...toConfirmed(row.vouch), from: toSummary(row.from) }))
  }

  async vouchesGiven(userId: number): Promise<GivenVouch[]> {
    const rows = await this.db
      .select({ vouch: vouches, to: summaryColumns })
      .from(vouches)
      .leftJoin(users, eq(users.id, vouches.toUserId))
      .where(eq(vouches.fromUserId, userId))
      .orderBy(desc(vouches.createdAt), desc(vouches.id))
    return rows.map((row) => ({ ...toVouch(row.vouch), to: toSummary(row.to) }))
  }

  // =========================================================================
  // Audit
  // =========================================================================

  async insertRankEvent(userId: number, oldRank: string | null, newRank: string, at: Date): Promise<RankEvent> {
    const rows = await this.db
      .insert(rankEvents)
      .values({ userId, oldRank, newRank, createdAt: at })
      .returning()
    return rows[0]
  }

  async appendEvent(eventType: string, userId: number | null, metadata: unknown, at: Date): Promise<ReputationEvent> {
    const rows = await this.db
      .insert(events)
      .values({ eventType, userId, metadata, createdAt: at })
      .returning()
    return rows[0]
  }

  async recentEvents(limit: number): Promise<ReputationEvent[]> {
    return this.db
      .select()
      .from(events)
      .orderBy(desc(events.createdAt), desc(events.id))
      .limit(limit)
  }

  async countEvents(eventType: string): Promise<number> {
    const rows = await this.db.select({ n: count() }).from(events).where(eq(events.eventType, eventType))
    return rows[0]?.n ?? 0
  }

  async rankEventsFor(userId: number): Promise<RankEvent[]> {
    return this.db
      .select()
      .from(rankEvents)
      .where(eq(rankEvents.userId, userId))
      .orderBy(asc(rankEvents.id))
  }

  // =========================================================================
  // Analytics
  // =========================================================================

  async countUsers(): Promise<number> {
    const rows = await this.db.select({ n: count() }).from(users)
    return rows[0]?.n ?? 0
  }

  async countUsersActiveSince(since: Date): Promise<number> {
    const rows = await this.db.select({ n: count() }).from(users).where(gt(users.lastActiveAt, since))
    return rows[0]?.n ?? 0
  }

  async countUsersSeenSince(since: Date): Promise<number> {
    const rows = await this.db.select({ n: count() }).from(users).where(gt(users.firstSeenAt, since))
    return rows[0]?.n ?? 0
  }

  async countUsersWithReferrer(): Promise<number> {
    const rows = await this.db.select({ n: count() }).from(users).where(isNotNull(users.referrerId))
    return rows[0]?.n ?? 0
  }

  async countVouches(): Promise<number> {
    const rows = await this.db.select({ n: count() }).from(vouches)
    return rows[0]?.n ?? 0
  }

  async countVouchesSince(since: Date): Promise<number> {
    const rows = await this.db.select({ n: count() }).from(vouches).where(gt(vouches.createdAt, since))
    return rows[0]?.n ?? 0
  }

  async rankDistribution(): Promise<RankCount[]> {
    return this.db
      .select({ rank: users.rank, count: count() })
      .from(users)
      .groupBy(users.rank)
  }

  async topGivers(limit: number, since?: Date): Promise<GiverCount[]> {
    const vouchCount = count(vouches.id)
    const rows = await this.db
      .select({ ...summaryColumns, vouchCount })
      .from(vouches)
      .innerJoin(users, eq(users.id, vouches.fromUserId))
      .where(since ? gt(vouches.createdAt, since) : undefined)
      .groupBy(users.id)
      .orderBy(desc(vouchCount), asc(users.id))
      .limit(limit)
    return rows.map((row) => ({ ...row, rank: toRank(row.rank) }))
  }

  async mostVouched(limit: number): Promise<User[]> {
    const rows = await this.db
      .select()
      .from(users)
      .orderBy(desc(users.totalVouches), asc(users.id))
      .limit(limit)
    return rows.map(toUser)
  }

  async referralsOf(referrerId: number, limit: number): Promise<User[]> {
    const rows = await this.db
      .select()
      .from(users)
      .where(eq(users.referrerId, referrerId))
      .orderBy(desc(users.firstSeenAt), desc(users.id))
      .limit(limit)
    return rows.map(toUser)
  }

  async countReferralsOf(referrerId: number): Promise<number> {
    const rows = await this.db.select({ n: count() }).from(users).where(eq(users.referrerId, referrerId))
    return rows[0]?.n ?? 0
  }

  async recentConfirmedVouches(limit: number): Promise<RecentVouch[]> {
    const fromUser = alias(users, "from_user")
    const toUser = alias(users, "to_user")
    return this.db
      .select({
        id: vouches.id,
        fromUserId: fromUser.id,
        fromUsername: fromUser.username,
        toUserId: toUser.id,
        toUsername: toUser.username,
        message: vouches.message,
        createdAt: vouches.createdAt,
      })
      .from(vouches)
      .innerJoin(fromUser, eq(fromUser.id, vouches.fromUserId))
      .innerJoin(toUser, eq(toUser.id, vouches.toUserId))
      .where(eq(vouches.isPending, false))
      .orderBy(desc(vouches.createdAt), desc(vouches.id))
      .limit(limit)
  }

  // =========================================================================
  // Invites
  // =========================================================================

  async hasInviteSince(fromUserId: number, normalizedUsername: string, since: Date): Promise<boolean> {
    const rows = await this.db
      .select({ id: invites.id })
      .from(invites)
      .where(and(
        eq(invites.fromUserId, fromUserId),
        eq(invites.toUsername, normalizedUsername),
        gt(invites.sentAt, since),
      ))
      .limit(1)
    return rows.length > 0
  }

  async insertInvite(fromUserId: number, normalizedUsername: string, at: Date): Promise<void> {
    await this.db.insert(invites).values({ fromUserId, toUsername: normalizedUsername, sentAt: at })
  }

  // =========================================================================
  // Bot config
  // =========================================================================

  async listConfig(): Promise<BotConfigEntry[]> {
    return this.db.select().from(botConfig).orderBy(asc(botConfig.key))
  }

  async upsertConfig(key: string, value: string, at: Date): Promise<BotConfigEntry> {
    const rows = await this.db
      .insert(botConfig)
      .values({ key, value, updatedAt: at })
      .onConflictDoUpdate({ target: botConfig.key, set: { value, updatedAt: at } })
      .returning()
    return rows[0]
  }
}
