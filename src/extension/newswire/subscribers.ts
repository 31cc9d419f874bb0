/**
 * Newswire — Subscriber registry
 *
 * Tracks live subscribers and owns the join protocol:
 *   1. snapshot history, register, and queue the snapshot, all in one synchronous step
 *   2. live events broadcast afterwards queue behind the snapshot
 *   3. a subscriber whose history replay fails is unregistered and closed
 *
 * Each subscriber has its own outbox (a promise chain), so sends to one
 * subscriber are strictly ordered while different subscribers proceed
 * independently. Once a send fails, everything queued behind it fails too.
 */

import type { HistoryBuffer } from './history.js'
import type { NewsEvent, Subscriber } from './types.js'

export const DEFAULT_DELIVERY_TIMEOUT_MS = 5_000

// ==================== Errors ====================

export class DeliveryTimeoutError extends Error {
  constructor(readonly subscriberId: string, readonly timeoutMs: number) {
    super(`delivery to ${subscriberId} timed out after ${timeoutMs}ms`)
    this.name = 'DeliveryTimeoutError'
  }
}

export class SubscriberGoneError extends Error {
  constructor(readonly subscriberId: string) {
    super(`subscriber ${subscriberId} is no longer receiving`)
    this.name = 'SubscriberGoneError'
  }
}

// ==================== Types ====================

export interface SubscriberRegistryOpts {
  /** A send that has not settled after this long counts as failed. 0 disables. */
  deliveryTimeoutMs?: number
}

export interface BroadcastResult {
  delivered: number
  dropped: number
}

interface Entry {
  subscriber: Subscriber
  /** Settles when everything queued so far has been attempted */
  tail: Promise<void>
  failed: boolean
  /** Set once the entry leaves the registry */
  retired: boolean
  /** Rejectors of the sends in flight, failed together on retirement */
  inFlight: Set<(err: Error) => void>
}

// ==================== Registry ====================

export class SubscriberRegistry {
  private entries = new Map<string, Entry>()
  private deliveryTimeoutMs: number

  constructor(private history: HistoryBuffer, opts?: SubscriberRegistryOpts) {
    this.deliveryTimeoutMs = opts?.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS
  }

  /**
   * Register a subscriber and replay history to it.
   * Resolves true once history is delivered, false if replay failed (the
   * subscriber is then unregistered and closed).
   */
  async join(subscriber: Subscriber): Promise<boolean> {
    // Replacing a live registration under the same id: retire the old one first.
    const previous = this.entries.get(subscriber.id)
    if (previous) {
      this.entries.delete(subscriber.id)
      retire(previous)
      await closeQuietly(previous.subscriber)
    }

    const entry: Entry = { subscriber, tail: Promise.resolve(), failed: false, retired: false, inFlight: new Set() }
    const snapshot = this.history.snapshot()
    this.entries.set(subscriber.id, entry)
    const replay = snapshot.map((event) => this.enqueue(entry, event))

    try {
      await Promise.all(replay)
      return true
    } catch (err) {
      console.warn(
        `newswire-subscribers: history replay to ${subscriber.id} failed: ${err instanceof Error ? err.message : err}`,
      )
      this.remove(entry)
      await closeQuietly(subscriber)
      return false
    }
  }

  /** Unregister. Safe to call any number of times. */
  leave(id: string): boolean {
    const entry = this.entries.get(id)
    if (!entry) return false
    this.entries.delete(id)
    retire(entry)
    return true
  }

  /**
   * Deliver one event to every registered subscriber. Waits for the whole
   * pass, then drops the subscribers whose delivery failed.
   */
  async broadcast(event: NewsEvent): Promise<BroadcastResult> {
    const targets = [...this.entries.values()]
    if (targets.length === 0) return { delivered: 0, dropped: 0 }

    const results = await Promise.allSettled(targets.map((entry) => this.enqueue(entry, event)))

    const failed: Entry[] = []
    results.forEach((result, i) => {
      if (result.status === 'rejected') failed.push(targets[i])
    })

    for (const entry of failed) {
      this.remove(entry)
      await closeQuietly(entry.subscriber)
    }

    if (failed.length > 0) {
      console.log(`newswire-subscribers: dropped ${failed.length} subscriber(s), ${this.entries.size} remaining`)
    }

    return { delivered: targets.length - failed.length, dropped: failed.length }
  }

  /**
   * Unregister and close everyone (shutdown). Deliveries still in flight fail
   * at once, so a broadcast pass waiting on them completes.
   */
  async closeAll(): Promise<void> {
    const entries = [...this.entries.values()]
    this.entries.clear()
    for (const entry of entries) retire(entry)
    await Promise.all(entries.map((entry) => closeQuietly(entry.subscriber)))
  }

  has(id: string): boolean {
    return this.entries.has(id)
  }

  get size(): number {
    return this.entries.size
  }

  // ==================== Private ====================

  private enqueue(entry: Entry, event: NewsEvent): Promise<void> {
    const { subscriber } = entry
    const delivery = entry.tail.then(() => {
      if (entry.failed || entry.retired) throw new SubscriberGoneError(subscriber.id)
      return this.deliver(entry, event)
    })
    entry.tail = delivery.catch(() => {
      entry.failed = true
    })
    return delivery
  }

  private deliver(entry: Entry, event: NewsEvent): Promise<void> {
    const { subscriber } = entry
    return new Promise<void>((resolve, reject) => {
      const abandon = (err: Error) => reject(err)
      entry.inFlight.add(abandon)
      withTimeout(subscriber.send(event), this.deliveryTimeoutMs, subscriber.id).then(
        () => { entry.inFlight.delete(abandon); resolve() },
        (err: unknown) => { entry.inFlight.delete(abandon); reject(err) },
      )
    })
  }

  /** Remove only if this exact entry is still the registered one. */
  private remove(entry: Entry): void {
    if (this.entries.get(entry.subscriber.id) === entry) {
      this.entries.delete(entry.subscriber.id)
    }
    retire(entry)
  }
}

// ==================== Helpers ====================

/** Mark the entry gone and fail whatever it still has in flight. */
function retire(entry: Entry): void {
  entry.retired = true
  const pending = [...entry.inFlight]
  entry.inFlight.clear()
  for (const abandon of pending) abandon(new SubscriberGoneError(entry.subscriber.id))
}

function withTimeout(promise: Promise<void>, ms: number, subscriberId: string): Promise<void> {
  if (ms <= 0) return promise
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(new DeliveryTimeoutError(subscriberId, ms)), ms)
    promise.then(
      () => { clearTimeout(timer); resolve() },
      (err: unknown) => { clearTimeout(timer); reject(err) },
    )
  })
}

async function closeQuietly(subscriber: Subscriber): Promise<void> {
  try {
    await subscriber.close?.()
  } catch (err) {
    console.warn(`newswire-subscribers: closing ${subscriber.id} failed: ${err instanceof Error ? err.message : err}`)
  }
}
