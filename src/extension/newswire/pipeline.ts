/**
 * Newswire — Pipeline assembly
 *
 * Builds the shared state (channel, history, registry) once and injects it
 * into the poll and broadcast loops. Nothing here is a module-level singleton;
 * callers own the returned instance.
 */

import { Channel } from '../../core/channel.js'
import { NewsBroadcaster, type BroadcasterStats } from './broadcaster.js'
import type { NewswireConfig } from './config.js'
import { HistoryBuffer } from './history.js'
import { createLanguageDetector, type LanguageDetector } from './language.js'
import { NewsPoller, type CycleResult } from './poller.js'
import { createSource } from './sources/index.js'
import { SubscriberRegistry } from './subscribers.js'
import type { NewsEvent, NewsSource } from './types.js'

export interface NewswireDeps {
  /** Replace the configured primary source */
  source?: NewsSource
  /** Replace the configured fallback source (null disables it) */
  fallback?: NewsSource | null
  detectLanguage?: LanguageDetector
  now?: () => number
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>
}

export interface NewswireStatus {
  running: boolean
  subscribers: number
  history: { size: number; capacity: number }
  seen: number
  pending: number
  backoffMs: number
  lastCycle: CycleResult | null
  broadcast: BroadcasterStats
}

export interface Newswire {
  readonly channel: Channel<NewsEvent>
  readonly history: HistoryBuffer
  readonly registry: SubscriberRegistry
  readonly poller: NewsPoller
  readonly broadcaster: NewsBroadcaster
  start(): void
  stop(): Promise<void>
  status(): NewswireStatus
}

export function createNewswire(config: NewswireConfig, deps: NewswireDeps = {}): Newswire {
  const timeoutMs = config.timeoutSeconds * 1000

  const channel = new Channel<NewsEvent>()
  const history = new HistoryBuffer(config.historyCapacity)
  const registry = new SubscriberRegistry(history, { deliveryTimeoutMs: config.deliveryTimeoutMs })

  const source = deps.source ?? createSource(config.source, timeoutMs)
  const fallback = deps.fallback !== undefined
    ? deps.fallback
    : config.fallback ? createSource(config.fallback, timeoutMs) : null

  const poller = new NewsPoller({
    source,
    fallback,
    channel,
    detectLanguage: deps.detectLanguage ?? createLanguageDetector(config.languageDetection),
    intervalMs: config.intervalSeconds * 1000,
    maxBackoffMs: config.maxBackoffSeconds * 1000,
    now: deps.now,
    sleep: deps.sleep,
  })

  const broadcaster = new NewsBroadcaster({ channel, history, registry })

  return {
    channel,
    history,
    registry,
    poller,
    broadcaster,

    start() {
      broadcaster.start()
      poller.start()
      console.log(
        `newswire: started (source=${source.name}${fallback ? `, fallback=${fallback.name}` : ''}, every ${config.intervalSeconds}s)`,
      )
    },

    async stop() {
      await poller.stop()
      // Closing subscribers first fails any delivery the broadcast loop is waiting on.
      await registry.closeAll()
      await broadcaster.stop()
      channel.close()
      console.log('newswire: stopped')
    },

    status() {
      return {
        running: poller.running && broadcaster.running,
        subscribers: registry.size,
        history: { size: history.size, capacity: history.capacity },
        seen: poller.seenCount,
        pending: channel.size,
        backoffMs: poller.currentBackoffMs,
        lastCycle: poller.lastResult,
        broadcast: broadcaster.stats,
      }
    },
  }
}
