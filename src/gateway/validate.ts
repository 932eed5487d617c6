// src/gateway/validate.ts — Request parsing with TypeBox schemas
//
// Every failure surfaces as a VouchError("INVALID_REQUEST"), which the app's
// error handler turns into a 400 JSON body.

import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { Context } from "hono"
import { VouchError } from "../reputation/types.js"

/** `T | null`, optional on the enclosing object. */
export const Nullable = <T extends TSchema>(schema: T) => Type.Optional(Type.Union([schema, Type.Null()]))

export const UserId = Type.Integer({ minimum: 1 })

export function check<S extends TSchema>(schema: S, value: unknown): Static<S> {
  if (!Value.Check(schema, value)) {
    const first = Value.Errors(schema, value).First()
    const where = first?.path ? first.path : "body"
    throw new VouchError("INVALID_REQUEST", first ? `${where}: ${first.message}` : "Invalid request")
  }
  return value
}

export async function readJson<S extends TSchema>(c: Context, schema: S): Promise<Static<S>> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    throw new VouchError("INVALID_REQUEST", "Request body must be valid JSON")
  }
  return check(schema, body)
}

/** Integer query parameter; absent → fallback, malformed → INVALID_REQUEST. */
export function queryInt(c: Context, name: string, fallback: number): number {
  const raw = c.req.query(name)
  if (raw === undefined || raw === "") return fallback
  if (!/^-?\d+$/.test(raw)) {
    throw new VouchError("INVALID_REQUEST", `${name} must be an integer`)
  }
  return parseInt(raw, 10)
}

/** Positive integer path parameter. */
export function paramId(c: Context, name: string): number {
  const raw = c.req.param(name)
  if (raw === undefined || !/^\d+$/.test(raw) || parseInt(raw, 10) < 1) {
    throw new VouchError("INVALID_REQUEST", `${name} must be a positive integer`)
  }
  return parseInt(raw, 10)
}
