// src/drizzle/validate.ts — Database startup validation gate
// After migrations, verify required tables exist in the vouch schema.
// If any are missing, exit with code 1 and a clear error message.

import type { Sql } from "postgres"
import { REQUIRED_TABLES } from "./migrations.js"

/** Required tables absent from `existing`, in declaration order. */
export function missingTables(existing: Iterable<string>): string[] {
  const present = new Set(existing)
  return REQUIRED_TABLES.filter((t) => !present.has(t))
}

/**
 * Validate that all required tables exist in the vouch schema.
 * Exits process with code 1 if any table is missing.
 */
export async function validateDatabase(sql: Sql): Promise<void> {
  const result = await sql<{ table_name: string }[]>`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'vouch'
      AND table_type = 'BASE TABLE'
  `

  const missing = missingTables(result.map((row) => row.table_name))

  if (missing.length > 0) {
    console.error(`[vouch] FATAL: Required tables missing from vouch schema: ${missing.join(", ")}`)
    console.error("[vouch] Migrations did not complete; check the [migrate] log above")
    process.exit(1)
  }

  console.log(`[vouch] database validated: ${REQUIRED_TABLES.length} tables present in vouch schema`)
}
