/**
 * Newswire — Bounded, deduplicated history
 *
 * Keeps the most recently inserted events (oldest first) for replay to new
 * subscribers. Eviction is FIFO by insertion; reads do not refresh an entry.
 * Invariants: no two retained events share a dedup key, size ≤ capacity.
 */

import type { NewsEvent } from './types.js'

export const DEFAULT_HISTORY_CAPACITY = 300

/** url if present, else "headline|timestamp". */
export function dedupKey(event: Pick<NewsEvent, 'url' | 'headline' | 'timestamp'>): string {
  const url = (event.url ?? '').trim()
  if (url) return url
  return `${(event.headline ?? '').trim()}|${(event.timestamp ?? '').trim()}`
}

export class HistoryBuffer {
  private events: NewsEvent[] = []
  private keys = new Set<string>()
  readonly capacity: number

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`history capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  /** Retain the event unless its key is already held. Returns true if retained. */
  insert(event: NewsEvent): boolean {
    const key = dedupKey(event)
    if (this.keys.has(key)) return false

    this.events.push(event)
    this.keys.add(key)

    while (this.events.length > this.capacity) {
      const evicted = this.events.shift()
      if (evicted) this.keys.delete(dedupKey(evicted))
    }
    return true
  }

  /** Retained events, oldest first. The returned array is a copy. */
  snapshot(): NewsEvent[] {
    return [...this.events]
  }

  has(key: string): boolean {
    return this.keys.has(key)
  }

  get size(): number {
    return this.events.length
  }
}
