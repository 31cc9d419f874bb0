/**
 * Newswire — Poll loop
 *
 * Emits a seed event, then repeats: fetch → normalize → enrich → dedup → push
 * onto the channel → sleep. A successful cycle resets the sleep to the base
 * interval; a failed one doubles it up to the configured ceiling.
 *
 * The "seen" set here lives for the whole process and is never evicted. It is
 * separate from HistoryBuffer's keys: an item that has aged out
 * of history but is re-listed by the source must still not be re-emitted.
 */

import type { Channel } from '../../core/channel.js'
import { createSeedEvent, enrichRecord } from './enricher.js'
import type { LanguageDetector } from './language.js'
import { DEFAULT_FIELD_ALIASES, normalizeBatch } from './normalizer.js'
import type { FieldAliases, NewsEvent, NewsSource, NormalizedRecord, RawBatch } from './types.js'

// ==================== Types ====================

export interface NewsPollerOpts {
  source: NewsSource
  /** Tried in the same cycle when the primary source produced nothing new */
  fallback?: NewsSource | null
  channel: Channel<NewsEvent>
  detectLanguage: LanguageDetector
  intervalMs: number
  maxBackoffMs: number
  aliases?: FieldAliases
  /** Inject clock for testing. */
  now?: () => number
  /** Inject sleep for testing. Must resolve early when `signal` aborts. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>
}

export interface IngestStats {
  /** Raw rows returned by the source */
  fetched: number
  /** New events pushed onto the channel */
  enqueued: number
  /** Rows whose key was already seen */
  duplicates: number
  /** Rows dropped by normalization or enrichment */
  skipped: number
  bytes: number
}

export type CycleResult =
  | ({ ok: true; usedFallback: boolean } & IngestStats)
  | { ok: false; error: string }

// ==================== Poller ====================

export class NewsPoller {
  private source: NewsSource
  private fallback: NewsSource | null
  private channel: Channel<NewsEvent>
  private detectLanguage: LanguageDetector
  private aliases: FieldAliases
  private intervalMs: number
  private maxBackoffMs: number
  private now: () => number
  private sleep: (ms: number, signal: AbortSignal) => Promise<void>

  private seen = new Set<string>()
  private backoffMs: number
  private abort: AbortController | null = null
  private loop: Promise<void> | null = null
  private last: CycleResult | null = null

  constructor(opts: NewsPollerOpts) {
    this.source = opts.source
    this.fallback = opts.fallback ?? null
    this.channel = opts.channel
    this.detectLanguage = opts.detectLanguage
    this.aliases = opts.aliases ?? DEFAULT_FIELD_ALIASES
    this.intervalMs = opts.intervalMs
    this.maxBackoffMs = Math.max(opts.maxBackoffMs, opts.intervalMs)
    this.now = opts.now ?? Date.now
    this.sleep = opts.sleep ?? abortableSleep
    this.backoffMs = opts.intervalMs
  }

  /** Emit the seed event and start polling. No-op if already running. */
  start(): void {
    if (this.loop) return
    const abort = new AbortController()
    this.abort = abort
    this.loop = this.run(abort.signal).catch((err) => {
      console.error('newswire-poller: loop crashed:', err)
    })
  }

  /** Cancel the in-flight fetch or sleep and wait for the loop to exit. */
  async stop(): Promise<void> {
    this.abort?.abort()
    await this.loop
    this.abort = null
    this.loop = null
  }

  /**
   * One fetch cycle. Never throws: a failed fetch is reported as `{ ok: false }`
   * and bumps the backoff.
   */
  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    let result: CycleResult
    try {
      const batch = await this.source.fetch({ signal })
      const stats = this.ingest(batch)
      console.log(
        `newswire-poller: ${this.source.name} returned ${stats.fetched} records (${stats.bytes} bytes), ${stats.enqueued} new`,
      )

      let usedFallback = false
      if (stats.enqueued === 0 && this.fallback && !signal?.aborted) {
        const extra = await this.pollFallback(this.fallback, signal)
        if (extra) {
          usedFallback = true
          stats.fetched += extra.fetched
          stats.enqueued += extra.enqueued
          stats.duplicates += extra.duplicates
          stats.skipped += extra.skipped
          stats.bytes += extra.bytes
        }
      }

      this.backoffMs = this.intervalMs
      result = { ok: true, usedFallback, ...stats }
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err)
      // Cancelled by stop(): not a source failure.
      if (signal?.aborted) return { ok: false, error }
      this.backoffMs = Math.min(this.backoffMs * 2, this.maxBackoffMs)
      console.warn(`newswire-poller: cycle failed, retrying in ${Math.round(this.backoffMs / 1000)}s: ${error}`)
      result = { ok: false, error }
    }

    this.last = result
    return result
  }

  /** Delay before the next cycle. */
  get currentBackoffMs(): number {
    return this.backoffMs
  }

  /** Distinct keys ever emitted (never shrinks). */
  get seenCount(): number {
    return this.seen.size
  }

  get lastResult(): CycleResult | null {
    return this.last
  }

  get running(): boolean {
    return this.loop !== null
  }

  // ==================== Private ====================

  private async run(signal: AbortSignal): Promise<void> {
    this.emit(createSeedEvent(this.now))
    console.log('newswire-poller: seed event sent')

    while (!signal.aborted) {
      await this.runCycle(signal)
      if (signal.aborted) break
      await this.sleep(this.backoffMs, signal)
    }
  }

  /** Normalize, enrich and dedup a batch, pushing every new event. */
  private ingest(batch: RawBatch): IngestStats {
    const { records, skipped: unusable } = normalizeBatch(batch, this.aliases)
    let skipped = unusable
    let enqueued = 0
    let duplicates = 0

    for (const record of records) {
      let event: NewsEvent
      try {
        event = enrichRecord(record, this.detectLanguage, this.now)
      } catch (err) {
        skipped++
        console.warn(`newswire-poller: skipping record "${record.title || record.url}": ${err instanceof Error ? err.message : err}`)
        continue
      }

      const key = seenKey(record)
      if (this.seen.has(key)) {
        duplicates++
        continue
      }
      this.seen.add(key)
      if (this.emit(event)) enqueued++
    }

    return { fetched: batch.records.length, enqueued, duplicates, skipped, bytes: batch.bytes }
  }

  private async pollFallback(fallback: NewsSource, signal?: AbortSignal): Promise<IngestStats | null> {
    try {
      const batch = await fallback.fetch({ signal })
      const stats = this.ingest(batch)
      console.log(`newswire-poller: fallback ${fallback.name} returned ${stats.fetched} records, ${stats.enqueued} new`)
      return stats
    } catch (err) {
      console.warn(`newswire-poller: fallback ${fallback.name} failed: ${err instanceof Error ? err.message : err}`)
      return null
    }
  }

  private emit(event: NewsEvent): boolean {
    const accepted = this.channel.push(event)
    if (!accepted) console.warn('newswire-poller: channel closed, dropping event')
    return accepted
  }
}

// ==================== Helpers ====================

/**
 * url if present, else "title|date" on the source's raw date text. Taken from
 * the record, not the event: a dateless event is stamped with the fetch time.
 */
export function seenKey(record: Pick<NormalizedRecord, 'url' | 'title' | 'date'>): string {
  return record.url || `${record.title}|${record.date}`
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve()
    const done = () => {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal.addEventListener('abort', done, { once: true })
  })
}
