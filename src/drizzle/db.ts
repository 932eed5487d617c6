// src/drizzle/db.ts — Database connection factory

import { drizzle } from "drizzle-orm/postgres-js"
import type { PostgresJsDatabase, PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js"
import type { PgDatabase } from "drizzle-orm/pg-core"
import postgres from "postgres"

export interface DbOptions {
  connectionString: string
  /** Maximum connections in pool (default: 10) */
  maxConnections?: number
  /** Per-statement timeout in milliseconds (default: 60000) */
  statementTimeoutMs?: number
}

export type Db = PostgresJsDatabase<Record<string, never>>

/** Either the pooled database or a transaction handle; both share the query API. */
export type PgExecutor = PgDatabase<PostgresJsQueryResultHKT>

/**
 * Create a Drizzle ORM database instance connected to PostgreSQL.
 * Returns both the drizzle db instance and the underlying sql client
 * (needed for validation and graceful shutdown).
 */
export function createDb(options: DbOptions) {
  const sql = postgres(options.connectionString, {
    max: options.maxConnections ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: "vouch-portal",
      statement_timeout: options.statementTimeoutMs ?? 60_000,
    },
  })

  const db: Db = drizzle(sql)

  return { db, sql }
}
