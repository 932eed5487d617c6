// src/reputation/sanitize.ts — Text Sanitizer for vouch messages
//
// Pure transform: denylisted terms (case-insensitive, anywhere in the text)
// are replaced by a redaction marker, then the result is cut to the message
// length limit. Knows nothing about ledger state.

export const MAX_MESSAGE_LENGTH = 120
export const REDACTION_MARKER = "[redacted]"

export const BANNED_WORDS: readonly string[] = [
  "scam", "fraud", "fake", "cheat", "steal", "hack",
  "phishing", "ponzi", "pyramid",
]

function escapeRegExp(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

const BANNED_PATTERN = new RegExp(BANNED_WORDS.map(escapeRegExp).join("|"), "gi")

export function sanitizeMessage(text: string | null | undefined): string {
  if (!text) return ""
  return text.replace(BANNED_PATTERN, REDACTION_MARKER).slice(0, MAX_MESSAGE_LENGTH)
}
