// tests/reputation/directory.test.ts — User Directory: first contact, rank correction, profiles, listing

import { describe, it, expect, beforeEach } from "vitest"
import { HOUR_MS } from "../../src/shared/time-provider.js"
import { createFixture, T0, type Fixture } from "../helpers/reputation.js"

let fx: Fixture

beforeEach(() => {
  fx = createFixture()
})

// ---------------------------------------------------------------------------
// getOrCreate
// ---------------------------------------------------------------------------

describe("getOrCreate", () => {
  it("creates a user on first contact", async () => {
    const { user, created, resolution } = await fx.services.directory.getOrCreate({
      id: 1,
      username: "alice",
      firstName: "Alice",
    })

    expect(created).toBe(true)
    expect(resolution).toEqual({ status: "noop" })
    expect(user).toMatchObject({
      id: 1,
      username: "alice",
      firstName: "Alice",
      lastName: null,
      firstSeenAt: new Date(T0),
      lastActiveAt: new Date(T0),
      totalVouches: 0,
      rank: "unverified",
      referrerId: null,
    })

    const [signup] = await fx.store.recentEvents(1)
    expect(signup.eventType).toBe("user_signup")
    expect(signup.metadata).toEqual({ referrer_id: null, username: "alice" })
  })

  it("touches last-active on later contact and keeps first-seen", async () => {
    await fx.join(1, "alice")
    fx.clock.advance(HOUR_MS)

    const { user, created } = await fx.join(1, "alice")

    expect(created).toBe(false)
    expect(user.firstSeenAt).toEqual(new Date(T0))
    expect(user.lastActiveAt).toEqual(new Date(T0 + HOUR_MS))
  })

  it("keeps the original referrer", async () => {
    await fx.join(1, "alice")
    await fx.join(3, "carol")
    await fx.join(2, "bob", 1)

    const { user } = await fx.join(2, "bob", 3)
    expect(user.referrerId).toBe(1)
  })

  it("keeps the username when a later contact carries none", async () => {
    await fx.join(1, "alice")
    const { user } = await fx.join(1)
    expect(user.username).toBe("alice")
  })

  it("updates the display name on a case-only edit without resolving", async () => {
    await fx.join(1, "Zoe")
    const { user, resolution } = await fx.join(1, "@zoe")

    expect(user.username).toBe("@zoe")
    expect(resolution).toEqual({ status: "noop" })
    expect((await fx.store.findUserByUsername("zoe"))?.id).toBe(1)
  })

  it("produces a single record for simultaneous first contacts", async () => {
    const results = await Promise.all([fx.join(7, "twin"), fx.join(7, "twin")])

    expect(results.map((r) => r.created).sort()).toEqual([false, true])
    expect(await fx.store.countUsers()).toBe(1)
    expect(await fx.store.countEvents("user_signup")).toBe(1)
  })

  it("returns null from get() for an unknown user", async () => {
    expect(await fx.services.directory.get(404)).toBeNull()
  })
})

// ---------------------------------------------------------------------------
// updateRank
// ---------------------------------------------------------------------------

describe("updateRank", () => {
  beforeEach(async () => {
    await fx.join(1, "alice")
  })

  it("rejects an unknown rank key", async () => {
    const result = await fx.services.directory.updateRank(1, "legend")
    expect(result).toEqual({ status: "rejected", code: "INVALID_REQUEST", message: "Unknown rank: legend" })
  })

  it("rejects an unknown user", async () => {
    const result = await fx.services.directory.updateRank(42, "trusted")
    expect(result.status === "rejected" && result.code).toBe("NOT_FOUND")
  })

  it("sets the rank without touching the total", async () => {
    const result = await fx.services.directory.updateRank(1, "trusted")

    expect(result.status).toBe("updated")
    if (result.status === "updated") {
      expect(result.change).toEqual({ oldRank: "unverified", newRank: "trusted" })
      expect(result.user.rank).toBe("trusted")
    }
    const stored = await fx.store.getUser(1)
    expect(stored?.rank).toBe("trusted")
    expect(stored?.totalVouches).toBe(0)
  })

  it("records a transition even when the rank is unchanged", async () => {
    await fx.services.directory.updateRank(1, "trusted")
    await fx.services.directory.updateRank(1, "trusted")

    const transitions = await fx.store.rankEventsFor(1)
    expect(transitions.map((t) => [t.oldRank, t.newRank])).toEqual([
      ["unverified", "trusted"],
      ["trusted", "trusted"],
    ])
    expect(await fx.store.countEvents("rank_up")).toBe(2)
  })
})

// ---------------------------------------------------------------------------
// updateProfile
// ---------------------------------------------------------------------------

describe("updateProfile", () => {
  beforeEach(async () => {
    await fx.join(1, "alice")
  })

  it("truncates bio and location", async () => {
    const result = await fx.services.directory.updateProfile(1, {
      bio: "b".repeat(600),
      location: "l".repeat(150),
      profilePictureUrl: "https://example.test/a.png",
    })

    expect(result.status).toBe("updated")
    if (result.status === "updated") {
      expect(result.user.bio).toHaveLength(500)
      expect(result.user.location).toHaveLength(100)
      expect(result.user.profilePictureUrl).toBe("https://example.test/a.png")
    }
  })

  it("updates only the fields given", async () => {
    await fx.services.directory.updateProfile(1, { bio: "hello" })
    await fx.services.directory.updateProfile(1, { location: "Lisbon" })

    const user = await fx.store.getUser(1)
    expect(user?.bio).toBe("hello")
    expect(user?.location).toBe("Lisbon")
  })

  it("rejects an empty update and an unknown user", async () => {
    expect(await fx.services.directory.updateProfile(1, {})).toEqual({
      status: "rejected",
      code: "INVALID_REQUEST",
      message: "No fields to update",
    })
    const missing = await fx.services.directory.updateProfile(42, { bio: "x" })
    expect(missing.status === "rejected" && missing.code).toBe("NOT_FOUND")
  })
})

// ---------------------------------------------------------------------------
// list / search
// ---------------------------------------------------------------------------

describe("list", () => {
  beforeEach(async () => {
    for (const id of [1, 2, 3, 4, 5]) await fx.join(id)
    await fx.services.ledger.createVouch(4, { toUserId: 3 })
    await fx.services.ledger.createVouch(5, { toUserId: 3 })
    await fx.services.ledger.createVouch(4, { toUserId: 2 })
  })

  it("orders by total vouches, then id", async () => {
    const page = await fx.services.directory.list(3, 0)
    expect(page.map((u) => u.id)).toEqual([3, 2, 1])
  })

  it("pages with offset", async () => {
    const page = await fx.services.directory.list(10, 3)
    expect(page.map((u) => u.id)).toEqual([4, 5])
  })

  it("clamps the page size to at least one", async () => {
    const page = await fx.services.directory.list(0)
    expect(page.map((u) => u.id)).toEqual([3])
  })
})

describe("search", () => {
  beforeEach(async () => {
    await fx.services.directory.getOrCreate({ id: 1, username: "alice" })
    await fx.services.directory.getOrCreate({ id: 2, username: "bob", firstName: "Albert" })
    await fx.services.directory.getOrCreate({ id: 3, username: "carol", lastName: "Hall" })
  })

  it("matches username, first and last name case-insensitively", async () => {
    const hits = await fx.services.directory.search("AL")
    expect(hits.map((u) => u.id)).toEqual([1, 2, 3])
  })

  it("narrows on a longer query", async () => {
    const hits = await fx.services.directory.search("alb")
    expect(hits.map((u) => u.id)).toEqual([2])
  })

  it("returns nothing for a blank query", async () => {
    expect(await fx.services.directory.search("   ")).toEqual([])
  })
})
