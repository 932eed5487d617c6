// src/config.ts — Configuration loader from environment variables

export interface VouchConfig {
  // Gateway
  port: number
  host: string

  /** Platform id allowed to read and write bot config; 0 disables admin access */
  adminId: number

  // Gateway guards
  auth: {
    corsOrigins: string[]
    rateLimiting: {
      windowMs: number
      maxRequestsPerWindow: number
    }
  }

  /** PostgreSQL database (vouch schema). Disabled → non-durable in-memory store */
  postgres: {
    enabled: boolean
    connectionString: string
    maxConnections: number
    statementTimeoutMs: number
  }
}

/** Parse an integer from an environment variable, failing fast on NaN. */
export function parseIntEnv(envKey: string, fallback: string): number {
  const raw = process.env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function parseList(value: string | undefined, fallback: string): string[] {
  return (value ?? fallback).split(",").map((s) => s.trim()).filter(Boolean)
}

export function loadConfig(): VouchConfig {
  const postgresEnabled = process.env.VOUCH_POSTGRES_ENABLED === "true"
  const connectionString = process.env.DATABASE_URL ?? ""
  if (postgresEnabled && !connectionString) {
    throw new Error("DATABASE_URL is required when VOUCH_POSTGRES_ENABLED=true")
  }

  return {
    port: parseIntEnv("PORT", "5000"),
    host: process.env.HOST ?? "0.0.0.0",

    adminId: parseIntEnv("ADMIN_ID", "0"),

    auth: {
      corsOrigins: parseList(process.env.VOUCH_CORS_ORIGINS, "http://localhost:*"),
      rateLimiting: {
        windowMs: parseIntEnv("VOUCH_RATE_LIMIT_WINDOW_MS", "60000"),
        maxRequestsPerWindow: parseIntEnv("VOUCH_RATE_LIMIT_MAX", "60"),
      },
    },

    postgres: {
      enabled: postgresEnabled,
      connectionString,
      maxConnections: parseIntEnv("VOUCH_PG_MAX_CONNECTIONS", "10"),
      statementTimeoutMs: parseIntEnv("VOUCH_PG_STATEMENT_TIMEOUT_MS", "60000"),
    },
  }
}
