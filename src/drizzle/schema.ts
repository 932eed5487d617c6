// src/drizzle/schema.ts — Vouch database schema
// All tables live in the `vouch` schema. DDL is owned by src/drizzle/migrations.ts;
// these definitions are the query-builder view of the same tables.

import { sql } from "drizzle-orm"
import { pgSchema, text, timestamp, bigint, integer, jsonb, boolean, date, index, uniqueIndex, serial } from "drizzle-orm/pg-core"

export const vouchSchema = pgSchema("vouch")

// --- users ---
// One row per platform identity. Created on first contact, never deleted.
export const users = vouchSchema.table("users", {
  id: bigint("id", { mode: "number" }).primaryKey(),        // platform user id
  username: text("username"),                                // case-preserving, as given
  usernameKey: text("username_key"),                         // normalizeUsername(username); lookup key
  firstName: text("first_name"),
  lastName: text("last_name"),
  bio: text("bio"),
  profilePictureUrl: text("profile_picture_url"),
  location: text("location"),
  firstSeenAt: timestamp("first_seen_at", { withTimezone: true }).notNull().defaultNow(),
  lastActiveAt: timestamp("last_active_at", { withTimezone: true }).notNull().defaultNow(),
  totalVouches: integer("total_vouches").notNull().default(0),
  rank: text("rank").notNull().default("unverified"),
  referrerId: bigint("referrer_id", { mode: "number" }),
  streakDays: integer("streak_days").notNull().default(0),
  lastStreakDate: date("last_streak_date", { mode: "string" }),
}, (table) => [
  index("idx_users_username_key").on(table.usernameKey),
  index("idx_users_referrer").on(table.referrerId),
  index("idx_users_total_vouches").on(table.totalVouches),
])

// --- vouches ---
// Confirmed vouches carry to_user_id; pending ones only the normalized to_username.
export const vouches = vouchSchema.table("vouches", {
  id: serial("id").primaryKey(),
  fromUserId: bigint("from_user_id", { mode: "number" }).notNull(),   // FK to users
  toUserId: bigint("to_user_id", { mode: "number" }),                 // FK to users; null while pending
  toUsername: text("to_username"),                                     // normalized snapshot
  message: text("message").notNull().default(""),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  isPending: boolean("is_pending").notNull().default(false),
}, (table) => [
  uniqueIndex("idx_vouches_pair").on(table.fromUserId, table.toUserId).where(sql`${table.toUserId} IS NOT NULL`),
  uniqueIndex("idx_vouches_pending_pair").on(table.fromUserId, table.toUsername).where(sql`${table.isPending}`),
  index("idx_vouches_to_user").on(table.toUserId),
  index("idx_vouches_from_user").on(table.fromUserId),
  index("idx_vouches_created").on(table.createdAt),
])

// --- rank_events ---
// Append-only rank transitions
export const rankEvents = vouchSchema.table("rank_events", {
  id: serial("id").primaryKey(),
  userId: bigint("user_id", { mode: "number" }).notNull(),  // FK to users
  oldRank: text("old_rank"),
  newRank: text("new_rank").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index("idx_rank_events_user").on(table.userId),
])

// --- events ---
// Append-only analytics trail; never read back for control decisions
export const events = vouchSchema.table("events", {
  id: serial("id").primaryKey(),
  eventType: text("event_type").notNull(),
  userId: bigint("user_id", { mode: "number" }),
  metadata: jsonb("metadata"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index("idx_events_type").on(table.eventType),
  index("idx_events_created").on(table.createdAt),
])

// --- invites ---
export const invites = vouchSchema.table("invites", {
  id: serial("id").primaryKey(),
  fromUserId: bigint("from_user_id", { mode: "number" }).notNull(),  // FK to users
  toUsername: text("to_username").notNull(),                          // normalized
  sentAt: timestamp("sent_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index("idx_invites_pair_sent").on(table.fromUserId, table.toUsername, table.sentAt),
])

// --- bot_config ---
export const botConfig = vouchSchema.table("bot_config", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
})

// --- schema_migrations ---
// One row per applied migration version
export const schemaMigrations = vouchSchema.table("schema_migrations", {
  version: integer("version").primaryKey(),
  name: text("name").notNull(),
  appliedAt: timestamp("applied_at", { withTimezone: true }).notNull().defaultNow(),
})
