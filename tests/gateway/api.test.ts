// tests/gateway/api.test.ts — HTTP API over the in-memory store

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { createApp } from "../../src/gateway/server.js"
import { RateLimiter } from "../../src/gateway/rate-limit.js"
import { ADMIN_ID, createFixture, type Fixture } from "../helpers/reputation.js"

const config = {
  auth: {
    corsOrigins: ["http://localhost:*"],
    rateLimiting: { windowMs: 60_000, maxRequestsPerWindow: 1_000 },
  },
}

let fx: Fixture
let app: ReturnType<typeof createApp>

function post(path: string, body: unknown) {
  return app.request(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  })
}

function patch(path: string, body: unknown) {
  return app.request(path, {
    method: "PATCH",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  })
}

beforeEach(() => {
  fx = createFixture()
  app = createApp(fx.services, config)
  vi.spyOn(console, "log").mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Health and fallbacks
// ---------------------------------------------------------------------------

describe("health", () => {
  it("reports the store kind", async () => {
    const res = await app.request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ status: "healthy", store: { kind: "memory", durable: false } })
  })

  it("returns JSON 404 for unknown routes", async () => {
    const res = await app.request("/api/nope")

    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: "Not Found", code: "NOT_FOUND" })
  })

  it("maps unexpected failures to 500 without leaking the cause", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {})
    vi.spyOn(fx.services.analytics, "summary").mockRejectedValue(new Error("db down"))

    const res = await app.request("/api/analytics")

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: "Internal Server Error", code: "INTERNAL_ERROR" })
  })
})

// ---------------------------------------------------------------------------
// Users and profiles
// ---------------------------------------------------------------------------

describe("users", () => {
  it("creates on first contact and returns 200 afterwards", async () => {
    const first = await post("/api/users", { id: 1, username: "Alice", first_name: "Alice" })
    expect(first.status).toBe(201)
    expect(await first.json()).toMatchObject({
      created: true,
      pending_vouches_resolved: 0,
      user: {
        id: 1,
        username: "Alice",
        first_name: "Alice",
        total_vouches: 0,
        rank: "unverified",
        rank_name: "Unverified",
        rank_emoji: "🚫",
        first_seen_at: "2026-01-01T00:00:00.000Z",
      },
    })

    const again = await post("/api/users", { id: 1, username: "Alice" })
    expect(again.status).toBe(200)
    expect(await again.json()).toMatchObject({ created: false })
  })

  it("rejects an invalid body", async () => {
    const res = await post("/api/users", { id: 0 })

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ code: "INVALID_REQUEST" })
  })

  it("rejects a body that is not JSON", async () => {
    const res = await app.request("/api/users", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{",
    })

    expect(await res.json()).toEqual({ error: "Request body must be valid JSON", code: "INVALID_REQUEST" })
  })

  it("lists and searches", async () => {
    await post("/api/users", { id: 1, username: "alice" })
    await post("/api/users", { id: 2, username: "bob" })

    const list = await app.request("/api/users?limit=1")
    expect(await list.json()).toMatchObject({ users: [{ id: 1 }] })

    const search = await app.request("/api/users/search?q=BO")
    expect(await search.json()).toMatchObject({ users: [{ id: 2, username: "bob" }] })

    const missing = await app.request("/api/users/search")
    expect(missing.status).toBe(400)
    expect(await missing.json()).toEqual({ error: "q is required", code: "INVALID_REQUEST" })

    const badLimit = await app.request("/api/users?limit=ten")
    expect(await badLimit.json()).toEqual({ error: "limit must be an integer", code: "INVALID_REQUEST" })
  })

  it("serves a profile with rank progress", async () => {
    await post("/api/users", { id: 1, username: "alice" })
    await post("/api/users", { id: 2, username: "bob" })
    await post("/api/vouch", { from_user_id: 2, to_user_id: 1, message: "solid" })

    const res = await app.request("/api/profile/1")

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      user: { id: 1, total_vouches: 1 },
      vouches_received: [{ from_user_id: 2, message: "solid", from: { id: 2, username: "bob" } }],
      vouches_given: [],
      next_rank_threshold: 3,
      progress_percentage: expect.closeTo(33.33, 2),
    })
  })

  it("404s an unknown profile and 400s a malformed id", async () => {
    expect((await app.request("/api/profile/999")).status).toBe(404)
    expect(await (await app.request("/api/profile/abc")).json()).toEqual({
      error: "id must be a positive integer",
      code: "INVALID_REQUEST",
    })
  })

  it("updates profile fields", async () => {
    await post("/api/users", { id: 1, username: "alice" })
    const res = await post("/api/profile/update", { user_id: 1, bio: "hello", location: "Porto" })

    expect(await res.json()).toMatchObject({ success: true, user: { bio: "hello", location: "Porto" } })
  })
})

// ---------------------------------------------------------------------------
// Vouches
// ---------------------------------------------------------------------------

describe("vouches", () => {
  beforeEach(async () => {
    await post("/api/users", { id: 1, username: "Alice" })
    await post("/api/users", { id: 2, username: "bob" })
  })

  it("confirms a vouch to a known username", async () => {
    const res = await post("/api/vouch", { from_user_id: 2, to_username: "@ALICE", message: "legit, not a scam" })

    expect(res.status).toBe(201)
    expect(await res.json()).toMatchObject({
      success: true,
      pending: false,
      total_vouches: 1,
      rank_change: null,
      mutual: false,
      vouch: { id: 1, from_user_id: 2, to_user_id: 1, to_username: "alice", message: "legit, not a [redacted]" },
    })
  })

  it("maps duplicates to 409 and self vouches to 400", async () => {
    await post("/api/vouch", { from_user_id: 2, to_user_id: 1 })

    const dup = await post("/api/vouch", { from_user_id: 2, to_user_id: 1 })
    expect(dup.status).toBe(409)
    expect(await dup.json()).toEqual({ error: "You already vouched for this user", code: "DUPLICATE_VOUCH" })

    const self = await post("/api/vouch", { from_user_id: 2, to_user_id: 2 })
    expect(self.status).toBe(400)
    expect(await self.json()).toMatchObject({ code: "SELF_VOUCH" })
  })

  it("validates field types", async () => {
    const res = await post("/api/vouch", { from_user_id: "two", to_user_id: 1 })
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ code: "INVALID_REQUEST" })
  })

  it("records pending vouches and settles them on signup", async () => {
    const pending = await post("/api/vouch", { from_user_id: 2, to_username: "@Dave" })
    expect(pending.status).toBe(201)
    expect(await pending.json()).toMatchObject({
      pending: true,
      vouch: { to_user_id: null, to_username: "dave", is_pending: true },
      message: "Vouch recorded for @dave. They'll receive it when they join!",
    })

    const joined = await post("/api/users", { id: 4, username: "Dave" })
    expect(joined.status).toBe(201)
    expect(await joined.json()).toMatchObject({ pending_vouches_resolved: 1, user: { total_vouches: 1 } })
  })

  it("lets only the author edit", async () => {
    await post("/api/vouch", { from_user_id: 2, to_user_id: 1, message: "ok" })

    const denied = await patch("/api/vouch/1", { user_id: 1, message: "mine now" })
    expect(denied.status).toBe(403)
    expect(await denied.json()).toMatchObject({ code: "PERMISSION_DENIED" })

    const edited = await patch("/api/vouch/1", { user_id: 2, message: "great" })
    expect(edited.status).toBe(200)
    expect(await edited.json()).toMatchObject({ success: true, vouch: { id: 1, message: "great" } })

    expect((await patch("/api/vouch/9", { user_id: 2, message: "x" })).status).toBe(404)
  })
})

// ---------------------------------------------------------------------------
// Outreach, analytics, admin
// ---------------------------------------------------------------------------

describe("outreach", () => {
  beforeEach(async () => {
    await post("/api/users", { id: 1, username: "alice" })
  })

  it("limits invites per week", async () => {
    const first = await post("/api/invite", { from_user_id: 1, to_username: "@Erin" })
    expect(await first.json()).toEqual({
      success: true,
      message: "Invite recorded",
      to_username: "erin",
      target_known: false,
    })

    const second = await post("/api/invite", { from_user_id: 1, to_username: "erin" })
    expect(second.status).toBe(429)
    expect(await second.json()).toEqual({
      error: "You can only invite this user once per week",
      code: "RATE_LIMITED",
    })
  })

  it("logs share clicks into the activity feed", async () => {
    const res = await post("/api/share", { user_id: 1, platform: "telegram" })
    expect(await res.json()).toEqual({ success: true })

    const feed = await app.request("/api/activity?limit=1")
    expect(await feed.json()).toMatchObject({
      events: [{ event_type: "share_clicked", user_id: 1, metadata: { platform: "telegram" } }],
    })
  })
})

describe("analytics", () => {
  beforeEach(async () => {
    await post("/api/users", { id: 1, username: "alice" })
    await post("/api/users", { id: 2, username: "bob", referrer_id: 1 })
    await post("/api/vouch", { from_user_id: 2, to_user_id: 1 })
  })

  it("summarizes", async () => {
    const res = await app.request("/api/analytics")
    expect(await res.json()).toMatchObject({
      total_users: 2,
      total_vouches: 1,
      active_users: { last_24h: 2, last_7d: 2, last_30d: 2 },
      rank_distribution: { unverified: 2, verified: 0 },
      top_helpers: [{ id: 2, vouch_count: 1 }],
      mutual_vouch_count: 0,
    })
  })

  it("serves leaderboards and rejects unknown ones", async () => {
    const board = await app.request("/api/leaderboards/most_vouched?limit=1")
    expect(await board.json()).toEqual({
      type: "most_vouched",
      entries: [{
        id: 1,
        username: "alice",
        first_name: null,
        rank: "unverified",
        rank_name: "Unverified",
        rank_emoji: "🚫",
        score: 1,
      }],
    })

    const unknown = await app.request("/api/leaderboards/richest")
    expect(unknown.status).toBe(400)
  })

  it("serves referral and viral stats", async () => {
    const referrals = await app.request("/api/referrals/1")
    expect(await referrals.json()).toMatchObject({ user_id: 1, total_referrals: 1, recent_referrals: [{ id: 2 }] })

    const viral = await app.request("/api/viral/summary")
    expect(await viral.json()).toMatchObject({
      vouches_today: 1,
      referral_signups: 1,
      recent_activity: [{ from_username: "bob", to_username: "alice" }],
    })
  })
})

describe("admin", () => {
  beforeEach(async () => {
    await post("/api/users", { id: 1, username: "alice" })
  })

  it("denies config access to anyone but the admin", async () => {
    const res = await app.request("/api/admin/config?admin_id=1")
    expect(res.status).toBe(403)
    expect(await res.json()).toEqual({ error: "Unauthorized", code: "PERMISSION_DENIED" })
  })

  it("writes and reads config", async () => {
    const write = await post("/api/admin/config", { admin_id: ADMIN_ID, key: "welcome", value: "hi" })
    expect(await write.json()).toEqual({
      success: true,
      entry: { key: "welcome", value: "hi", updated_at: "2026-01-01T00:00:00.000Z" },
    })

    const read = await app.request(`/api/admin/config?admin_id=${ADMIN_ID}`)
    expect(await read.json()).toEqual({
      config: [{ key: "welcome", value: "hi", updated_at: "2026-01-01T00:00:00.000Z" }],
    })
  })

  it("corrects a rank", async () => {
    const denied = await post("/api/admin/rank", { admin_id: 1, user_id: 1, rank: "trusted" })
    expect(denied.status).toBe(403)

    const res = await post("/api/admin/rank", { admin_id: ADMIN_ID, user_id: 1, rank: "trusted" })
    expect(await res.json()).toMatchObject({
      success: true,
      user: { id: 1, rank: "trusted", rank_name: "Trusted" },
      rank_change: { old_rank: "unverified", new_rank: "trusted" },
    })
  })
})

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

describe("guards", () => {
  it("rate limits /api but not /health", async () => {
    const limited = createApp(fx.services, config, {
      rateLimiter: new RateLimiter(60_000, 2, fx.clock),
    })

    await limited.request("/api/users")
    await limited.request("/api/users")
    const third = await limited.request("/api/users")

    expect(third.status).toBe(429)
    expect(third.headers.get("Retry-After")).toBe("60")
    expect((await limited.request("/health")).status).toBe(200)
  })

  it("answers CORS preflight for allowed origins", async () => {
    const res = await app.request("/api/vouch", {
      method: "OPTIONS",
      headers: { Origin: "http://localhost:5173" },
    })

    expect(res.status).toBe(204)
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("http://localhost:5173")
  })
})
