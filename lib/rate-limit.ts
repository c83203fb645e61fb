import type { IncomingMessage } from 'node:http'

const WINDOW_MS = 60_000

export type RateLimitResult = { allowed: true } | { allowed: false; retryAfter: number }

export function getClientIp(req: IncomingMessage): string {
  const forwarded = req.headers['x-forwarded-for']
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded
  if (first) return first.split(',')[0].trim()
  return req.socket.remoteAddress ?? '127.0.0.1'
}

/**
 * Sliding-window limiter keyed by client IP. Stale IPs are evicted lazily on
 * each check rather than by a timer, so nothing keeps the process alive.
 */
export class RateLimiter {
  // Map<ip, request timestamps[]> — timestamps are ms epoch values, oldest-first
  private readonly store = new Map<string, number[]>()
  private lastSweep = 0

  constructor(
    private readonly maxRequests = 60,
    private readonly windowMs = WINDOW_MS,
    private readonly now: () => number = Date.now
  ) {}

  check(ip: string): RateLimitResult {
    const now = this.now()
    const cutoff = now - this.windowMs
    this.sweep(now, cutoff)

    const timestamps = (this.store.get(ip) ?? []).filter((t) => t >= cutoff)
    if (timestamps.length >= this.maxRequests) {
      this.store.set(ip, timestamps)
      return { allowed: false, retryAfter: Math.ceil((timestamps[0] + this.windowMs - now) / 1000) }
    }

    timestamps.push(now)
    this.store.set(ip, timestamps)
    return { allowed: true }
  }

  get trackedClients(): number {
    return this.store.size
  }

  private sweep(now: number, cutoff: number) {
    if (now - this.lastSweep < 5 * this.windowMs) return
    this.lastSweep = now
    for (const [ip, timestamps] of this.store) {
      const fresh = timestamps.filter((t) => t >= cutoff)
      if (fresh.length === 0) this.store.delete(ip)
      else this.store.set(ip, fresh)
    }
  }
}
