// src/reputation/store.ts — ReputationStore port interface
//
// The seam between the reputation services and persistence. Two adapters:
// PgReputationStore (postgres.js + drizzle, durable) and MemoryReputationStore
// (in-process, non-durable fallback and test stand-in). Services never mutate
// state outside transaction(); the adapters guarantee that a callback either
// commits fully or leaves no trace.

import type { RankKey } from "./rank.js"
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
// Inputs
// ---------------------------------------------------------------------------

export interface NewUser {
  id: number
  username: string | null
  firstName: string | null
  lastName: string | null
  referrerId: number | null
  at: Date
}

export interface ProfileFields {
  bio?: string
  location?: string
  profilePictureUrl?: string
}

export interface NewConfirmedVouch {
  fromUserId: number
  toUserId: number
  toUsername: string | null
  message: string
  createdAt: Date
}

export interface NewPendingVouch {
  fromUserId: number
  toUsername: string
  message: string
  createdAt: Date
}

export interface RankCount {
  rank: string
  count: number
}

export interface GiverCount extends UserSummary {
  vouchCount: number
}

export interface RecentVouch {
  id: number
  fromUserId: number
  fromUsername: string | null
  toUserId: number
  toUsername: string | null
  message: string
  createdAt: Date
}

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

export interface UserRepository {
  getUser(id: number): Promise<User | null>
  /** Row-locking read for read-modify-write inside a transaction. */
  getUserForUpdate(id: number): Promise<User | null>
  /** Lookup on the normalized username key (see normalizeUsername). Lowest id wins. */
  findUserByUsername(normalized: string): Promise<User | null>
  /** Insert-or-nothing on the identity key. Returns null when the user already existed. */
  insertUserIfAbsent(user: NewUser): Promise<User | null>
  /** Stamp last activity; also replaces the username when one is given. */
  touchUser(id: number, at: Date, username?: string): Promise<void>
  /** Atomic counter increment; returns the new total. */
  incrementVouchTotal(id: number, by: number): Promise<number>
  setUserRank(id: number, rank: RankKey): Promise<void>
  updateProfile(id: number, fields: ProfileFields): Promise<User | null>
  /** Ordered by total vouches desc, then id asc. */
  listUsers(limit: number, offset: number): Promise<User[]>
  /** Case-insensitive substring match on username, first or last name. */
  searchUsers(query: string, limit: number): Promise<User[]>
}

export interface VouchRepository {
  getVouch(id: number): Promise<Vouch | null>
  /** Vouch from `fromUserId` to the resolved identity `toUserId`. */
  findVouch(fromUserId: number, toUserId: number): Promise<ConfirmedVouch | null>
  findPendingVouch(fromUserId: number, normalizedUsername: string): Promise<PendingVouch | null>
  /** Returns null when the uniqueness backstop rejects the row. */
  insertConfirmedVouch(vouch: NewConfirmedVouch): Promise<ConfirmedVouch | null>
  /** Returns null when the uniqueness backstop rejects the row. */
  insertPendingVouch(vouch: NewPendingVouch): Promise<PendingVouch | null>
  /** Pending vouches for a normalized username, oldest first. */
  pendingVouchesFor(normalizedUsername: string): Promise<PendingVouch[]>
  /**
   * Pending → confirmed for the given ids. Skips any row whose source already
   * has a confirmed vouch for `toUserId`. Returns the rows actually confirmed.
   */
  confirmVouches(ids: number[], toUserId: number): Promise<ConfirmedVouch[]>
  updateVouchMessage(id: number, message: string): Promise<Vouch | null>
  /** Newest first. */
  vouchesReceived(userId: number): Promise<ReceivedVouch[]>
  /** Newest first, pending included. */
  vouchesGiven(userId: number): Promise<GivenVouch[]>
}

export interface AuditRepository {
  insertRankEvent(userId: number, oldRank: string | null, newRank: string, at: Date): Promise<RankEvent>
  appendEvent(eventType: string, userId: number | null, metadata: unknown, at: Date): Promise<ReputationEvent>
  /** Newest first. */
  recentEvents(limit: number): Promise<ReputationEvent[]>
  countEvents(eventType: string): Promise<number>
  rankEventsFor(userId: number): Promise<RankEvent[]>
}

export interface AnalyticsQueries {
  countUsers(): Promise<number>
  countUsersActiveSince(since: Date): Promise<number>
  countUsersSeenSince(since: Date): Promise<number>
  countUsersWithReferrer(): Promise<number>
  countVouches(): Promise<number>
  countVouchesSince(since: Date): Promise<number>
  rankDistribution(): Promise<RankCount[]>
  /** Most vouches given (optionally since a cutoff); ties by user id asc. */
  topGivers(limit: number, since?: Date): Promise<GiverCount[]>
  /** Ties by user id asc. */
  mostVouched(limit: number): Promise<User[]>
  /** Users referred by `referrerId`, newest first. */
  referralsOf(referrerId: number, limit: number): Promise<User[]>
  countReferralsOf(referrerId: number): Promise<number>
  recentConfirmedVouches(limit: number): Promise<RecentVouch[]>
}

export interface InviteRepository {
  hasInviteSince(fromUserId: number, normalizedUsername: string, since: Date): Promise<boolean>
  insertInvite(fromUserId: number, normalizedUsername: string, at: Date): Promise<void>
}

export interface ConfigRepository {
  listConfig(): Promise<BotConfigEntry[]>
  upsertConfig(key: string, value: string, at: Date): Promise<BotConfigEntry>
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export type StoreKind = "postgres" | "memory"

export interface ReputationStore
  extends UserRepository,
    VouchRepository,
    AuditRepository,
    AnalyticsQueries,
    InviteRepository,
    ConfigRepository {
  readonly kind: StoreKind
  /** Whether committed state survives a restart */
  readonly durable: boolean
  /**
   * Run `fn` in a single transactional scope. The callback receives a store
   * bound to the transaction; a thrown error rolls everything back.
   */
  transaction<T>(fn: (tx: ReputationStore) => Promise<T>): Promise<T>
}
