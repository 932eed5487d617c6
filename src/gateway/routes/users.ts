// src/gateway/routes/users.ts — User directory and profile endpoints
//
// - POST /users                → get-or-create on first contact
// - GET  /users                → list by standing (limit, offset)
// - GET  /users/search         → case-insensitive name search (q, limit)
// - GET  /profile/:id          → profile with vouches and rank progress
// - POST /profile/update       → bio / location / picture

import { Hono } from "hono"
import { Type } from "@sinclair/typebox"
import { rankProgress } from "../../reputation/rank.js"
import { VouchError } from "../../reputation/types.js"
import type { UserDirectory } from "../../reputation/directory.js"
import type { VouchLedger } from "../../reputation/ledger.js"
import { Nullable, UserId, paramId, queryInt, readJson } from "../validate.js"
import { givenView, receivedView, userView } from "../views.js"

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const CreateUserBody = Type.Object({
  id: UserId,
  username: Nullable(Type.String({ maxLength: 64 })),
  first_name: Nullable(Type.String({ maxLength: 256 })),
  last_name: Nullable(Type.String({ maxLength: 256 })),
  referrer_id: Nullable(UserId),
})

const UpdateProfileBody = Type.Object({
  user_id: UserId,
  bio: Type.Optional(Type.String()),
  location: Type.Optional(Type.String()),
  profile_picture_url: Type.Optional(Type.String({ maxLength: 2048 })),
})

// ---------------------------------------------------------------------------
// Route Factory
// ---------------------------------------------------------------------------

export interface UserRouteDeps {
  directory: UserDirectory
  ledger: VouchLedger
}

export function createUserRoutes(deps: UserRouteDeps): Hono {
  const app = new Hono()

  app.post("/users", async (c) => {
    const body = await readJson(c, CreateUserBody)
    const { user, created, resolution } = await deps.directory.getOrCreate({
      id: body.id,
      username: body.username,
      firstName: body.first_name,
      lastName: body.last_name,
      referrerId: body.referrer_id,
    })

    return c.json({
      user: userView(user),
      created,
      pending_vouches_resolved: resolution.status === "resolved" ? resolution.count : 0,
    }, created ? 201 : 200)
  })

  app.get("/users", async (c) => {
    const users = await deps.directory.list(queryInt(c, "limit", 100), queryInt(c, "offset", 0))
    return c.json({ users: users.map(userView) })
  })

  app.get("/users/search", async (c) => {
    const q = c.req.query("q")
    if (!q || q.trim().length === 0) {
      throw new VouchError("INVALID_REQUEST", "q is required")
    }
    const users = await deps.directory.search(q, queryInt(c, "limit", 20))
    return c.json({ users: users.map(userView) })
  })

  app.get("/profile/:id", async (c) => {
    const id = paramId(c, "id")
    const user = await deps.directory.get(id)
    if (!user) throw new VouchError("NOT_FOUND", `User ${id} not found`)

    const [received, given] = await Promise.all([deps.ledger.vouchesFor(id), deps.ledger.vouchesBy(id)])
    const progress = rankProgress(user.totalVouches)

    return c.json({
      user: userView(user),
      vouches_received: received.map(receivedView),
      vouches_given: given.map(givenView),
      next_rank_threshold: progress.nextThreshold,
      progress_percentage: progress.progressPercentage,
    })
  })

  app.post("/profile/update", async (c) => {
    const body = await readJson(c, UpdateProfileBody)
    const result = await deps.directory.updateProfile(body.user_id, {
      bio: body.bio,
      location: body.location,
      profilePictureUrl: body.profile_picture_url,
    })
    if (result.status === "rejected") throw VouchError.from(result)
    return c.json({ success: true, user: userView(result.user) })
  })

  return app
}
