// src/gateway/routes/vouches.ts — Vouch endpoints
//
// - POST  /vouch      → create (by target id or username; unknown usernames go pending)
// - PATCH /vouch/:id  → edit message (author only)

import { Hono } from "hono"
import { Type } from "@sinclair/typebox"
import { VouchError } from "../../reputation/types.js"
import type { VouchLedger } from "../../reputation/ledger.js"
import { MAX_MESSAGE_LENGTH } from "../../reputation/sanitize.js"
import { Nullable, UserId, paramId, readJson } from "../validate.js"
import { rankChangeView, vouchView } from "../views.js"

// Raw messages may run long; the ledger truncates after redaction.
const RAW_MESSAGE_LIMIT = MAX_MESSAGE_LENGTH * 20

const CreateVouchBody = Type.Object({
  from_user_id: UserId,
  to_user_id: Nullable(UserId),
  to_username: Nullable(Type.String({ maxLength: 64 })),
  message: Nullable(Type.String({ maxLength: RAW_MESSAGE_LIMIT })),
})

const UpdateVouchBody = Type.Object({
  user_id: UserId,
  message: Type.String({ maxLength: RAW_MESSAGE_LIMIT }),
})

export interface VouchRouteDeps {
  ledger: VouchLedger
}

export function createVouchRoutes(deps: VouchRouteDeps): Hono {
  const app = new Hono()

  app.post("/vouch", async (c) => {
    const body = await readJson(c, CreateVouchBody)
    const result = await deps.ledger.createVouch(
      body.from_user_id,
      { toUserId: body.to_user_id, toUsername: body.to_username },
      body.message,
    )

    switch (result.status) {
      case "rejected":
        throw VouchError.from(result)
      case "pending":
        return c.json({
          success: true,
          pending: true,
          vouch: vouchView(result.vouch),
          message: `Vouch recorded for @${result.vouch.toUsername}. They'll receive it when they join!`,
        }, 201)
      case "confirmed":
        return c.json({
          success: true,
          pending: false,
          vouch: vouchView(result.vouch),
          total_vouches: result.total,
          rank_change: rankChangeView(result.rankChange),
          mutual: result.mutual,
        }, 201)
    }
  })

  app.patch("/vouch/:id", async (c) => {
    const vouchId = paramId(c, "id")
    const body = await readJson(c, UpdateVouchBody)
    const result = await deps.ledger.updateVouch(vouchId, body.user_id, body.message)
    if (result.status === "rejected") throw VouchError.from(result)
    return c.json({ success: true, vouch: vouchView(result.vouch) })
  })

  return app
}
