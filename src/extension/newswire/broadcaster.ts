/**
 * Newswire — Broadcast loop
 *
 * The only consumer of the event channel. For each event, in channel order:
 * record it in history (a duplicate is simply not retained), then fan it out
 * to every registered subscriber. History insertion and the choice of fan-out
 * targets happen in the same tick, so a joining subscriber gets each event
 * either in its replay or live, never both and never neither.
 */

import type { Channel } from '../../core/channel.js'
import type { HistoryBuffer } from './history.js'
import type { BroadcastResult, SubscriberRegistry } from './subscribers.js'
import type { NewsEvent } from './types.js'

export interface BroadcasterOpts {
  channel: Channel<NewsEvent>
  history: HistoryBuffer
  registry: SubscriberRegistry
}

export interface BroadcasterStats {
  /** Events taken off the channel */
  received: number
  /** Events that were new to history */
  retained: number
  /** Subscribers dropped after a failed delivery */
  dropped: number
}

export class NewsBroadcaster {
  private channel: Channel<NewsEvent>
  private history: HistoryBuffer
  private registry: SubscriberRegistry
  private abort: AbortController | null = null
  private loop: Promise<void> | null = null
  private counters: BroadcasterStats = { received: 0, retained: 0, dropped: 0 }

  constructor(opts: BroadcasterOpts) {
    this.channel = opts.channel
    this.history = opts.history
    this.registry = opts.registry
  }

  /** Start draining the channel. No-op if already running. */
  start(): void {
    if (this.loop) return
    const abort = new AbortController()
    this.abort = abort
    this.loop = this.run(abort.signal).catch((err) => {
      console.error('newswire-broadcaster: loop crashed:', err)
    })
  }

  /** Stop after the in-flight delivery pass and wait for the loop to exit. */
  async stop(): Promise<void> {
    this.abort?.abort()
    await this.loop
    this.abort = null
    this.loop = null
  }

  /** Record one event in history and fan it out. */
  async dispatch(event: NewsEvent): Promise<BroadcastResult> {
    this.counters.received++
    if (this.history.insert(event)) this.counters.retained++

    const result = await this.registry.broadcast(event)
    this.counters.dropped += result.dropped
    return result
  }

  get running(): boolean {
    return this.loop !== null
  }

  get stats(): BroadcasterStats {
    return { ...this.counters }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const next = await this.channel.take(signal)
      if (next.done) break
      await this.dispatch(next.value)
    }
  }
}
