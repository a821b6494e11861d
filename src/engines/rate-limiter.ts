import type { BackendId } from "./types.js"

export const RATE_WINDOW_MS = 60_000

export type Clock = () => number

interface RateWindow {
  count: number
  windowStart: number
}

/**
 * Fixed 60s request window per backend. Backends without a configured limit
 * are never throttled. Only successful dispatches are recorded.
 *
 * In-flight dispatches hold a reservation that counts against the limit
 * until it is committed (success) or released (failure).
 */
export class RateLimiter {
  private readonly windows = new Map<BackendId, RateWindow>()
  private readonly reserved = new Map<BackendId, number>()

  constructor(
    private readonly limits: Readonly<Partial<Record<BackendId, number>>>,
    private readonly now: Clock = Date.now,
  ) {}

  limitFor(id: BackendId): number | null {
    return this.limits[id] ?? null
  }

  /** Eligibility check. Starts a fresh window once the current one is older than 60s. */
  check(id: BackendId): boolean {
    const limit = this.limits[id]
    if (limit === undefined) {
      return true
    }

    return this.currentWindow(id).count + this.reservedFor(id) < limit
  }

  /** Same answer as check() without touching the window. */
  peek(id: BackendId): boolean {
    const limit = this.limits[id]
    if (limit === undefined) {
      return true
    }

    const window = this.windows.get(id)
    if (!window || this.now() - window.windowStart > RATE_WINDOW_MS) {
      return this.reservedFor(id) < limit
    }
    return window.count + this.reservedFor(id) < limit
  }

  record(id: BackendId): void {
    if (this.limits[id] === undefined) {
      return
    }

    this.currentWindow(id).count += 1
  }

  /** Holds a slot for a dispatch that has not finished yet. */
  reserve(id: BackendId): void {
    if (this.limits[id] === undefined) {
      return
    }

    this.reserved.set(id, this.reservedFor(id) + 1)
  }

  /** Drops a reservation without spending quota. */
  release(id: BackendId): void {
    const held = this.reservedFor(id)
    if (held <= 1) {
      this.reserved.delete(id)
    } else {
      this.reserved.set(id, held - 1)
    }
  }

  /** Turns a reservation into a recorded request. */
  commit(id: BackendId): void {
    this.release(id)
    this.record(id)
  }

  remaining(id: BackendId): number | null {
    const limit = this.limits[id]
    if (limit === undefined) {
      return null
    }

    const window = this.windows.get(id)
    const used = !window || this.now() - window.windowStart > RATE_WINDOW_MS ? 0 : window.count
    return Math.max(0, limit - used - this.reservedFor(id))
  }

  private reservedFor(id: BackendId): number {
    return this.reserved.get(id) ?? 0
  }

  private currentWindow(id: BackendId): RateWindow {
    const now = this.now()
    const window = this.windows.get(id)
    if (window && now - window.windowStart <= RATE_WINDOW_MS) {
      return window
    }

    const fresh: RateWindow = { count: 0, windowStart: now }
    this.windows.set(id, fresh)
    return fresh
  }
}
