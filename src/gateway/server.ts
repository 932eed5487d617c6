// src/gateway/server.ts — Hono HTTP app: middleware, routes and error mapping

import { Hono } from "hono"
import type { VouchConfig } from "../config.js"
import type { ReputationServices } from "../reputation/services.js"
import { VouchError } from "../reputation/types.js"
import { corsMiddleware } from "./cors.js"
import { RateLimiter, rateLimitMiddleware } from "./rate-limit.js"
import { createAdminRoutes } from "./routes/admin.js"
import { createAnalyticsRoutes } from "./routes/analytics.js"
import { createOutreachRoutes } from "./routes/outreach.js"
import { createUserRoutes } from "./routes/users.js"
import { createVouchRoutes } from "./routes/vouches.js"

export interface AppOptions {
  /** Shared limiter; defaults to one built from config.auth.rateLimiting */
  rateLimiter?: RateLimiter
}

export function createApp(
  services: ReputationServices,
  config: Pick<VouchConfig, "auth">,
  options: AppOptions = {},
) {
  const app = new Hono()
  const limiter = options.rateLimiter ?? new RateLimiter(
    config.auth.rateLimiting.windowMs,
    config.auth.rateLimiting.maxRequestsPerWindow,
  )

  // Global middleware
  app.use("*", corsMiddleware(config.auth.corsOrigins))
  app.use("/api/*", rateLimitMiddleware(limiter))

  // Health endpoint (not rate limited)
  app.get("/health", (c) => {
    return c.json({
      status: "healthy",
      uptime: process.uptime(),
      store: { kind: services.store.kind, durable: services.store.durable },
    })
  })

  app.route("/api", createUserRoutes({ directory: services.directory, ledger: services.ledger }))
  app.route("/api", createVouchRoutes({ ledger: services.ledger }))
  app.route("/api", createOutreachRoutes({
    invites: services.invites,
    events: services.events,
    store: services.store,
  }))
  app.route("/api", createAnalyticsRoutes({ analytics: services.analytics }))
  app.route("/api", createAdminRoutes({ botConfig: services.botConfig, directory: services.directory }))

  app.notFound((c) => c.json({ error: "Not Found", code: "NOT_FOUND" }, 404))

  app.onError((err, c) => {
    if (err instanceof VouchError) {
      return c.json({ error: err.message, code: err.code }, err.httpStatus)
    }
    console.error(`[api] ${c.req.method} ${c.req.path} failed:`, err)
    return c.json({ error: "Internal Server Error", code: "INTERNAL_ERROR" }, 500)
  })

  return app
}
