// src/gateway/routes/analytics.ts — Read-only analytics endpoints

import { Hono } from "hono"
import { TOP_LIST_SIZE, type AnalyticsAggregator } from "../../reputation/analytics.js"
import { VouchError } from "../../reputation/types.js"
import { paramId, queryInt } from "../validate.js"
import { eventView, giverView, leaderboardView, recentVouchView, userView } from "../views.js"

export interface AnalyticsRouteDeps {
  analytics: AnalyticsAggregator
}

export function createAnalyticsRoutes(deps: AnalyticsRouteDeps): Hono {
  const app = new Hono()

  app.get("/analytics", async (c) => {
    const s = await deps.analytics.summary()
    return c.json({
      total_users: s.totalUsers,
      active_users: {
        last_24h: s.activeUsers.last24h,
        last_7d: s.activeUsers.last7d,
        last_30d: s.activeUsers.last30d,
      },
      new_signups_7d: s.newSignups7d,
      total_vouches: s.totalVouches,
      rank_distribution: s.rankDistribution,
      top_helpers: s.topHelpers.map(giverView),
      most_vouched: s.mostVouched.map(userView),
      mutual_vouch_count: s.mutualVouchCount,
    })
  })

  app.get("/leaderboards/:type", async (c) => {
    const result = await deps.analytics.leaderboard(c.req.param("type"), queryInt(c, "limit", TOP_LIST_SIZE))
    if (result.status === "rejected") throw VouchError.from(result)
    return c.json({
      type: result.type,
      entries: result.entries.map(leaderboardView),
    })
  })

  app.get("/referrals/:id", async (c) => {
    const stats = await deps.analytics.referralStats(paramId(c, "id"))
    return c.json({
      user_id: stats.userId,
      total_referrals: stats.totalReferrals,
      recent_referrals: stats.recentReferrals.map(userView),
    })
  })

  app.get("/viral/summary", async (c) => {
    const v = await deps.analytics.viralSummary()
    return c.json({
      vouches_today: v.vouchesToday,
      referral_signups: v.referralSignups,
      recent_activity: v.recentVouches.map(recentVouchView),
    })
  })

  app.get("/activity", async (c) => {
    const events = await deps.analytics.recentActivity(queryInt(c, "limit", 20))
    return c.json({ events: events.map(eventView) })
  })

  return app
}
