// src/drizzle/migrate.ts — Migration runner
// Invoked once at startup (src/index.ts) before the database is validated.
// Each pending migration runs in its own transaction together with the
// schema_migrations row that records it.

import { sql } from "drizzle-orm"
import type { PgExecutor } from "./db.js"
import { schemaMigrations } from "./schema.js"
import { BOOTSTRAP_STATEMENTS, MIGRATIONS, type Migration } from "./migrations.js"

// ---------------------------------------------------------------------------
// Executor port
// ---------------------------------------------------------------------------

export interface MigrationExecutor {
  execute(statement: string): Promise<void>
  appliedVersions(): Promise<number[]>
  record(version: number, name: string): Promise<void>
  transaction<T>(fn: (exec: MigrationExecutor) => Promise<T>): Promise<T>
}

export class PgMigrationExecutor implements MigrationExecutor {
  constructor(private readonly db: PgExecutor) {}

  async execute(statement: string): Promise<void> {
    await this.db.execute(sql.raw(statement))
  }

  async appliedVersions(): Promise<number[]> {
    const rows = await this.db.select({ version: schemaMigrations.version }).from(schemaMigrations)
    return rows.map((row) => row.version)
  }

  async record(version: number, name: string): Promise<void> {
    await this.db.insert(schemaMigrations).values({ version, name }).onConflictDoNothing()
  }

  transaction<T>(fn: (exec: MigrationExecutor) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new PgMigrationExecutor(tx)))
  }
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/** Throws unless versions are unique and strictly increasing. */
export function assertOrdered(migrations: readonly Migration[]): void {
  for (let i = 1; i < migrations.length; i++) {
    if (migrations[i].version <= migrations[i - 1].version) {
      throw new Error(
        `Migration versions must be strictly increasing: v${migrations[i - 1].version} then v${migrations[i].version}`,
      )
    }
  }
}

/**
 * Apply every migration not yet recorded. Returns the versions applied by
 * this call (empty when the schema was already current).
 */
export async function runMigrations(
  executor: MigrationExecutor,
  migrations: readonly Migration[] = MIGRATIONS,
): Promise<number[]> {
  assertOrdered(migrations)

  for (const statement of BOOTSTRAP_STATEMENTS) {
    await executor.execute(statement)
  }

  const applied = new Set(await executor.appliedVersions())
  const pending = migrations.filter((m) => !applied.has(m.version))

  if (pending.length === 0) {
    console.log(`[migrate] schema current at v${migrations.at(-1)?.version ?? 0}`)
    return []
  }

  const done: number[] = []
  for (const migration of pending) {
    await executor.transaction(async (tx) => {
      for (const statement of migration.statements) {
        await tx.execute(statement)
      }
      await tx.record(migration.version, migration.name)
    })
    console.log(`[migrate] applied v${migration.version} ${migration.name}`)
    done.push(migration.version)
  }

  return done
}
