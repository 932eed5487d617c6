// src/reputation/username.ts — Username Normalizer
//
// Identity matching on usernames is case-insensitive and ignores the "@"
// mention prefix. A null result means "no username": callers treat it as a
// no-op, never as an error.

export function normalizeUsername(username: string | null | undefined): string | null {
  if (!username) return null
  const stripped = username.replace(/^[\s@]+/, "").trimEnd()
  if (stripped.length === 0) return null
  return stripped.toLowerCase()
}

/** True when both usernames normalize to the same non-null identity key. */
export function sameUsername(a: string | null | undefined, b: string | null | undefined): boolean {
  const left = normalizeUsername(a)
  return left !== null && left === normalizeUsername(b)
}
