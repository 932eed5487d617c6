// src/index.ts — Vouch portal entry point
// Boot sequence: config → store (migrate → validate) → services → gateway → serve

import { serve } from "@hono/node-server"
import { loadConfig, type VouchConfig } from "./config.js"
import { createDb } from "./drizzle/db.js"
import { PgMigrationExecutor, runMigrations } from "./drizzle/migrate.js"
import { validateDatabase } from "./drizzle/validate.js"
import { createApp } from "./gateway/server.js"
import { RateLimiter } from "./gateway/rate-limit.js"
import { MemoryReputationStore } from "./reputation/memory-store.js"
import { PgReputationStore } from "./reputation/pg-store.js"
import { createReputationServices } from "./reputation/services.js"
import type { ReputationStore } from "./reputation/store.js"

interface OpenedStore {
  store: ReputationStore
  close: () => Promise<void>
}

async function openStore(config: VouchConfig): Promise<OpenedStore> {
  if (!config.postgres.enabled) {
    console.warn("[vouch] VOUCH_POSTGRES_ENABLED is not set: using in-memory store, state is lost on restart")
    return { store: new MemoryReputationStore(), close: async () => {} }
  }

  const { db, sql } = createDb({
    connectionString: config.postgres.connectionString,
    maxConnections: config.postgres.maxConnections,
    statementTimeoutMs: config.postgres.statementTimeoutMs,
  })

  await runMigrations(new PgMigrationExecutor(db))
  await validateDatabase(sql)

  return {
    store: new PgReputationStore(db),
    close: () => sql.end({ timeout: 5 }),
  }
}

async function main() {
  const bootStart = Date.now()
  console.log("[vouch] booting vouch portal...")

  // 1. Load config
  const config = loadConfig()
  console.log(`[vouch] config loaded: port=${config.port}, postgres=${config.postgres.enabled}`)

  // 2. Open store (migrations + validation when postgres is enabled)
  const { store, close } = await openStore(config)
  console.log(`[vouch] store ready: kind=${store.kind}, durable=${store.durable}`)

  // 3. Services + gateway
  const services = createReputationServices({ store, adminId: config.adminId })
  const limiter = new RateLimiter(
    config.auth.rateLimiting.windowMs,
    config.auth.rateLimiting.maxRequestsPerWindow,
  )
  const cleanupTimer = setInterval(() => limiter.cleanup(), 300_000)
  cleanupTimer.unref()

  const app = createApp(services, config, { rateLimiter: limiter })
  if (config.adminId === 0) {
    console.warn("[vouch] ADMIN_ID not set: admin endpoints will deny every request")
  }

  // 4. Start HTTP server
  const bootDuration = Date.now() - bootStart
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[vouch] ready on :${info.port} (boot: ${bootDuration}ms)`)
  })

  // 5. Graceful shutdown: stop accepting requests, then release the pool
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    console.log(`[vouch] ${signal} received, shutting down gracefully...`)

    clearInterval(cleanupTimer)
    await new Promise<void>((resolve) => server.close(() => resolve()))

    try {
      await close()
    } catch (err) {
      console.error("[vouch] store close failed:", err)
    }

    console.log(`[vouch] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    // Start force-exit timer on first signal
    setTimeout(() => {
      console.error("[vouch] forced shutdown after 30s timeout")
      process.exit(1)
    }, 30_000).unref()

    gracefulShutdown(signal).catch((err) => {
      console.error("[vouch] shutdown error:", err)
      process.exit(1)
    })
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[vouch] fatal:", err)
  process.exit(1)
})
