// src/gateway/routes/admin.ts — Admin endpoints (single admin id comparison)
//
// - GET  /admin/config?admin_id  → list bot config
// - POST /admin/config           → upsert one key
// - POST /admin/rank             → administrative rank correction

import { Hono } from "hono"
import { Type } from "@sinclair/typebox"
import { VouchError } from "../../reputation/types.js"
import type { BotConfigService } from "../../reputation/bot-config.js"
import type { UserDirectory } from "../../reputation/directory.js"
import { UserId, queryInt, readJson } from "../validate.js"
import { configView, rankChangeView, userView } from "../views.js"

const SetConfigBody = Type.Object({
  admin_id: Type.Integer(),
  key: Type.String(),
  value: Type.String({ maxLength: 4096 }),
})

const UpdateRankBody = Type.Object({
  admin_id: Type.Integer(),
  user_id: UserId,
  rank: Type.String(),
})

export interface AdminRouteDeps {
  botConfig: BotConfigService
  directory: UserDirectory
}

export function createAdminRoutes(deps: AdminRouteDeps): Hono {
  const app = new Hono()

  app.get("/admin/config", async (c) => {
    const result = await deps.botConfig.list(queryInt(c, "admin_id", 0))
    if (result.status === "rejected") throw VouchError.from(result)
    return c.json({ config: result.entries.map(configView) })
  })

  app.post("/admin/config", async (c) => {
    const body = await readJson(c, SetConfigBody)
    const result = await deps.botConfig.set(body.admin_id, body.key, body.value)
    if (result.status === "rejected") throw VouchError.from(result)
    return c.json({ success: true, entry: configView(result.entry) })
  })

  app.post("/admin/rank", async (c) => {
    const body = await readJson(c, UpdateRankBody)
    if (!deps.botConfig.isAdmin(body.admin_id)) {
      throw new VouchError("PERMISSION_DENIED", "Unauthorized")
    }
    const result = await deps.directory.updateRank(body.user_id, body.rank)
    if (result.status === "rejected") throw VouchError.from(result)
    return c.json({ success: true, user: userView(result.user), rank_change: rankChangeView(result.change) })
  })

  return app
}
