// src/shared/time-provider.ts — Injectable clock for stores, services and tests
//
// Every timestamp the reputation core writes (first seen, last active, vouch
// creation, event log) and every trailing analytics window reads from one
// TimeProvider, so tests can pin and advance time deterministically.

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface TimeProvider {
  /** Current time in Unix milliseconds */
  now(): number
  /** Current time as a Date */
  date(): Date
}

// ---------------------------------------------------------------------------
// System clock
// ---------------------------------------------------------------------------

export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now()
  }

  date(): Date {
    return new Date()
  }
}

// ---------------------------------------------------------------------------
// Mock clock (deterministic testing)
// ---------------------------------------------------------------------------

export class MockTimeProvider implements TimeProvider {
  private _nowMs: number

  constructor(initialMs: number = Date.now()) {
    this._nowMs = initialMs
  }

  now(): number {
    return this._nowMs
  }

  date(): Date {
    return new Date(this._nowMs)
  }

  /** Advance time by milliseconds */
  advance(ms: number): void {
    this._nowMs += ms
  }

  /** Set to a specific timestamp */
  set(ms: number): void {
    this._nowMs = ms
  }
}

export const HOUR_MS = 60 * 60 * 1000
export const DAY_MS = 24 * HOUR_MS

/** Start of a trailing window ending at the provider's current time. */
export function windowStart(clock: TimeProvider, windowMs: number): Date {
  return new Date(clock.now() - windowMs)
}

/** Default system time provider. Replace via DI for testing. */
export const defaultTimeProvider: TimeProvider = new SystemTimeProvider()
