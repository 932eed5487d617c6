// src/gateway/routes/outreach.ts — Invite and share tracking
//
// - POST /invite → record an invite (once per source/username per week)
// - POST /share  → log a share click

import { Hono } from "hono"
import { Type } from "@sinclair/typebox"
import { VouchError } from "../../reputation/types.js"
import type { EventLog } from "../../reputation/events.js"
import type { InviteTracker } from "../../reputation/invites.js"
import type { ReputationStore } from "../../reputation/store.js"
import { UserId, readJson } from "../validate.js"

const InviteBody = Type.Object({
  from_user_id: UserId,
  to_username: Type.String({ minLength: 1, maxLength: 64 }),
})

const ShareBody = Type.Object({
  user_id: UserId,
  platform: Type.String({ minLength: 1, maxLength: 32 }),
})

export interface OutreachRouteDeps {
  invites: InviteTracker
  events: EventLog
  store: ReputationStore
}

export function createOutreachRoutes(deps: OutreachRouteDeps): Hono {
  const app = new Hono()

  app.post("/invite", async (c) => {
    const body = await readJson(c, InviteBody)
    const result = await deps.invites.sendInvite(body.from_user_id, body.to_username)
    if (result.status === "rejected") throw VouchError.from(result)
    return c.json({
      success: true,
      message: "Invite recorded",
      to_username: result.toUsername,
      target_known: result.targetKnown,
    })
  })

  app.post("/share", async (c) => {
    const body = await readJson(c, ShareBody)
    await deps.events.record(deps.store, "share_clicked", body.user_id, { platform: body.platform })
    return c.json({ success: true })
  })

  return app
}
