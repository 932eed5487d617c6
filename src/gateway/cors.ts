// src/gateway/cors.ts — CORS middleware

import type { Context, Next } from "hono"

export function corsMiddleware(allowedOrigins: string[]) {
  return async (c: Context, next: Next) => {
    const origin = c.req.header("Origin")

    if (origin && isOriginAllowed(origin, allowedOrigins)) {
      c.header("Access-Control-Allow-Origin", origin)
      c.header("Access-Control-Allow-Methods", "GET, POST, PATCH, OPTIONS")
      c.header("Access-Control-Allow-Headers", "Content-Type")
      c.header("Vary", "Origin")
    }

    if (c.req.method === "OPTIONS") {
      return c.body(null, 204)
    }

    return next()
  }
}

export function isOriginAllowed(origin: string, patterns: string[]): boolean {
  try {
    new URL(origin)
  } catch {
    return false // Reject malformed origins
  }

  for (const pattern of patterns) {
    if (pattern === "*") return true
    if (pattern.includes("*")) {
      // Escape regex special chars except *, then widen * to host/port characters
      const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&").replace(/\*/g, "[a-zA-Z0-9.:-]*")
      if (new RegExp("^" + escaped + "$").test(origin)) return true
    } else if (origin === pattern) {
      // Exact match only; no suffix matching
      return true
    }
  }
  return false
}
