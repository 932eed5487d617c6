// src/gateway/rate-limit.ts — In-memory token-bucket rate limiting for /api/*

import type { Context, Next } from "hono"
import { getConnInfo } from "@hono/node-server/conninfo"
import { defaultTimeProvider, type TimeProvider } from "../shared/time-provider.js"

interface TokenBucket {
  tokens: number
  lastRefill: number
}

export interface RateLimitDecision {
  allowed: boolean
  retryAfterMs: number
}

/** Floor for the Retry-After hint. */
export const MIN_RETRY_AFTER_MS = 1000

const ALLOW: RateLimitDecision = { allowed: true, retryAfterMs: 0 }

/**
 * Token bucket per key: `maxTokens` requests per `windowMs`, refilled in
 * whole tokens as time passes. A new key starts with a full bucket.
 */
export class RateLimiter {
  private buckets = new Map<string, TokenBucket>()
  private readonly windowMs: number
  private readonly maxTokens: number
  private readonly clock: TimeProvider

  constructor(windowMs: number, maxTokens: number, clock: TimeProvider = defaultTimeProvider) {
    this.windowMs = windowMs
    this.maxTokens = maxTokens
    this.clock = clock
  }

  check(key: string): RateLimitDecision {
    const now = this.clock.now()
    const bucket = this.buckets.get(key)
    if (bucket === undefined) {
      this.buckets.set(key, { tokens: this.maxTokens - 1, lastRefill: now })
      return ALLOW
    }

    this.refill(bucket, now)
    if (bucket.tokens <= 0) {
      const untilRefill = this.windowMs - (now - bucket.lastRefill)
      return { allowed: false, retryAfterMs: Math.max(untilRefill, MIN_RETRY_AFTER_MS) }
    }

    bucket.tokens -= 1
    return ALLOW
  }

  private refill(bucket: TokenBucket, now: number): void {
    const earned = Math.floor(((now - bucket.lastRefill) * this.maxTokens) / this.windowMs)
    if (earned <= 0) return
    bucket.tokens = Math.min(this.maxTokens, bucket.tokens + earned)
    bucket.lastRefill = now
  }

  /** Drop buckets idle for two windows. */
  cleanup(): void {
    const staleThreshold = this.clock.now() - this.windowMs * 2
    for (const [key, bucket] of this.buckets) {
      if (bucket.lastRefill < staleThreshold) {
        this.buckets.delete(key)
      }
    }
  }

  get size(): number {
    return this.buckets.size
  }
}

/**
 * Client key for rate limiting: the socket address when served by
 * @hono/node-server, else X-Real-IP, else a shared "unknown" bucket.
 */
export function getClientIp(c: Context): string {
  let remote: string | undefined
  try {
    remote = getConnInfo(c).remote.address
  } catch {
    remote = undefined // no node socket (app.request in tests)
  }
  return remote ?? c.req.header("X-Real-IP") ?? "unknown"
}

/**
 * Route group of a request path: the first segment under /api, so that a
 * burst of vouches does not starve profile or analytics reads.
 * "/api/vouch/12" -> "vouch", "/health" -> "health".
 */
export function routeGroup(path: string): string {
  const segments = path.split("/").filter((s) => s.length > 0)
  const rest = segments[0] === "api" ? segments.slice(1) : segments
  return rest[0] ?? "root"
}

export function rateLimitMiddleware(limiter: RateLimiter) {
  return async (c: Context, next: Next) => {
    const key = `${routeGroup(c.req.path)}:${getClientIp(c)}`
    const { allowed, retryAfterMs } = limiter.check(key)

    if (!allowed) {
      c.header("Retry-After", String(Math.ceil(retryAfterMs / 1000)))
      return c.json({ error: "Too Many Requests", code: "RATE_LIMITED" }, 429)
    }

    return next()
  }
}
