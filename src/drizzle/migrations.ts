// src/drizzle/migrations.ts — Versioned schema migrations
//
// Applied in version order at startup by runMigrations(). Every statement is
// idempotent (IF NOT EXISTS), so a migration interrupted between its DDL and
// its schema_migrations row can be replayed safely.

export interface Migration {
  version: number
  name: string
  statements: readonly string[]
}

export const BOOTSTRAP_STATEMENTS: readonly string[] = [
  `CREATE SCHEMA IF NOT EXISTS vouch`,
  `CREATE TABLE IF NOT EXISTS vouch.schema_migrations (
    version INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
]

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: "core_tables",
    statements: [
      `CREATE TABLE IF NOT EXISTS vouch.users (
        id BIGINT PRIMARY KEY,
        username TEXT,
        first_name TEXT,
        last_name TEXT,
        bio TEXT,
        profile_picture_url TEXT,
        location TEXT,
        first_seen_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        last_active_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        total_vouches INTEGER NOT NULL DEFAULT 0 CHECK (total_vouches >= 0),
        rank TEXT NOT NULL DEFAULT 'unverified',
        referrer_id BIGINT,
        streak_days INTEGER NOT NULL DEFAULT 0,
        last_streak_date DATE
      )`,
      `CREATE TABLE IF NOT EXISTS vouch.vouches (
        id SERIAL PRIMARY KEY,
        from_user_id BIGINT NOT NULL REFERENCES vouch.users(id),
        to_user_id BIGINT REFERENCES vouch.users(id),
        to_username TEXT,
        message TEXT NOT NULL DEFAULT '',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        is_pending BOOLEAN NOT NULL DEFAULT FALSE,
        CHECK (is_pending OR to_user_id IS NOT NULL),
        CHECK (NOT is_pending OR (to_user_id IS NULL AND to_username IS NOT NULL))
      )`,
      `CREATE TABLE IF NOT EXISTS vouch.rank_events (
        id SERIAL PRIMARY KEY,
        user_id BIGINT NOT NULL REFERENCES vouch.users(id),
        old_rank TEXT,
        new_rank TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      `CREATE TABLE IF NOT EXISTS vouch.events (
        id SERIAL PRIMARY KEY,
        event_type TEXT NOT NULL,
        user_id BIGINT,
        metadata JSONB,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      `CREATE INDEX IF NOT EXISTS idx_vouches_to_user ON vouch.vouches (to_user_id)`,
      `CREATE INDEX IF NOT EXISTS idx_vouches_from_user ON vouch.vouches (from_user_id)`,
      `CREATE INDEX IF NOT EXISTS idx_vouches_created ON vouch.vouches (created_at)`,
      `CREATE INDEX IF NOT EXISTS idx_rank_events_user ON vouch.rank_events (user_id)`,
      `CREATE INDEX IF NOT EXISTS idx_events_type ON vouch.events (event_type)`,
      `CREATE INDEX IF NOT EXISTS idx_events_created ON vouch.events (created_at)`,
    ],
  },
  {
    version: 2,
    name: "invites_and_bot_config",
    statements: [
      `CREATE TABLE IF NOT EXISTS vouch.invites (
        id SERIAL PRIMARY KEY,
        from_user_id BIGINT NOT NULL REFERENCES vouch.users(id),
        to_username TEXT NOT NULL,
        sent_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      `CREATE INDEX IF NOT EXISTS idx_invites_pair_sent ON vouch.invites (from_user_id, to_username, sent_at)`,
      `CREATE TABLE IF NOT EXISTS vouch.bot_config (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    ],
  },
  {
    version: 3,
    name: "vouch_uniqueness_and_lookup_indexes",
    statements: [
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_vouches_pair
        ON vouch.vouches (from_user_id, to_user_id) WHERE to_user_id IS NOT NULL`,
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_vouches_pending_pair
        ON vouch.vouches (from_user_id, to_username) WHERE is_pending`,
      `CREATE INDEX IF NOT EXISTS idx_users_username_lower ON vouch.users (lower(username))`,
      `CREATE INDEX IF NOT EXISTS idx_users_referrer ON vouch.users (referrer_id)`,
      `CREATE INDEX IF NOT EXISTS idx_users_total_vouches ON vouch.users (total_vouches)`,
    ],
  },
  {
    version: 4,
    name: "normalized_username_key",
    statements: [
      `ALTER TABLE vouch.users ADD COLUMN IF NOT EXISTS username_key TEXT`,
      // Same rule as normalizeUsername(): drop leading whitespace and @, trim the end, lowercase.
      `UPDATE vouch.users
        SET username_key = NULLIF(lower(regexp_replace(regexp_replace(username, '^[[:space:]@]+', ''), '[[:space:]]+$', '')), '')
        WHERE username IS NOT NULL AND username_key IS NULL`,
      `DROP INDEX IF EXISTS vouch.idx_users_username_lower`,
      `CREATE INDEX IF NOT EXISTS idx_users_username_key ON vouch.users (username_key)`,
    ],
  },
]

/** Tables startup validation expects once every migration has run. */
export const REQUIRED_TABLES = [
  "users",
  "vouches",
  "rank_events",
  "events",
  "invites",
  "bot_config",
  "schema_migrations",
] as const
