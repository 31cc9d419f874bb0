import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { Channel } from '../../core/channel.js'
import { unknownLanguageDetector } from './language.js'
import { NewsPoller, type NewsPollerOpts } from './poller.js'
import type { NewsEvent, NewsSource, RawBatch } from './types.js'

const FIXED_NOW = Date.UTC(2026, 0, 15, 8, 30, 0)

function batch(rows: Array<{ url: string; title: string; date?: string; language?: string }>): RawBatch {
  return {
    columns: ['URL', 'Title', 'Date', 'Language'],
    records: rows.map((r) => ({ URL: r.url, Title: r.title, Date: r.date ?? '', Language: r.language ?? '' })),
    bytes: 100,
  }
}

const TWO_STORIES = batch([
  { url: 'https://example.com/1', title: 'Acme to acquire BETA', date: '20250926195022', language: 'English' },
  { url: 'https://example.com/2', title: 'Gamma beats earnings', date: '20250926200000', language: 'English' },
])

/** Replays canned responses in order; the last one repeats. */
class FakeSource implements NewsSource {
  calls = 0

  constructor(readonly name: string, private responses: Array<RawBatch | Error>) {}

  async fetch(): Promise<RawBatch> {
    const next = this.responses[Math.min(this.calls, this.responses.length - 1)]
    this.calls++
    if (next instanceof Error) throw next
    return next
  }
}

/** Sleep that only ends when the poller is stopped. */
function parkedSleep() {
  return vi.fn((_ms: number, signal: AbortSignal) => new Promise<void>((resolve) => {
    if (signal.aborted) return resolve()
    signal.addEventListener('abort', () => resolve(), { once: true })
  }))
}

function makePoller(overrides: Partial<NewsPollerOpts> & Pick<NewsPollerOpts, 'source'>) {
  const channel = overrides.channel ?? new Channel<NewsEvent>()
  const poller = new NewsPoller({
    channel,
    detectLanguage: unknownLanguageDetector,
    intervalMs: 1_000,
    maxBackoffMs: 5_000,
    now: () => FIXED_NOW,
    sleep: parkedSleep(),
    ...overrides,
  })
  return { poller, channel }
}

describe('NewsPoller', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('runCycle', () => {
    it('pushes enriched events in source order', async () => {
      const { poller, channel } = makePoller({ source: new FakeSource('fake', [TWO_STORIES]) })

      const result = await poller.runCycle()
      expect(result).toEqual({
        ok: true,
        usedFallback: false,
        fetched: 2,
        enqueued: 2,
        duplicates: 0,
        skipped: 0,
        bytes: 100,
      })

      const first = await channel.take()
      const second = await channel.take()
      expect(first.value).toEqual({
        headline: 'Acme to acquire BETA',
        summary: 'Source: example.com',
        tickers: ['BETA'],
        category: 'M&A',
        url: 'https://example.com/1',
        timestamp: '2025-09-26T19:50:22Z',
        domain: 'example.com',
        language: 'en',
      })
      expect(second.value?.category).toBe('Earnings')
    })

    it('never emits the same key twice across cycles', async () => {
      const source = new FakeSource('fake', [
        TWO_STORIES,
        batch([
          { url: 'https://example.com/2', title: 'Gamma beats earnings (updated)' },
          { url: 'https://example.com/3', title: 'Delta wins contract' },
        ]),
      ])
      const { poller, channel } = makePoller({ source })

      await poller.runCycle()
      const second = await poller.runCycle()

      expect(second).toMatchObject({ ok: true, enqueued: 1, duplicates: 1 })
      expect(channel.size).toBe(3)
      expect(poller.seenCount).toBe(3)
    })

    it('dedups within one batch', async () => {
      const source = new FakeSource('fake', [batch([
        { url: 'https://example.com/1', title: 'First copy' },
        { url: 'https://example.com/1', title: 'Second copy' },
      ])])
      const { poller, channel } = makePoller({ source })

      expect(await poller.runCycle()).toMatchObject({ enqueued: 1, duplicates: 1 })
      expect((await channel.take()).value?.headline).toBe('First copy')
    })

    it('counts rows with neither title nor url as skipped', async () => {
      const source = new FakeSource('fake', [batch([
        { url: '', title: '' },
        { url: 'https://example.com/1', title: 'Kept' },
      ])])
      const { poller } = makePoller({ source })

      expect(await poller.runCycle()).toMatchObject({ fetched: 2, enqueued: 1, skipped: 1 })
    })

    it('detects the language only when the source gave none', async () => {
      const detectLanguage = vi.fn(() => 'de')
      const source = new FakeSource('fake', [batch([
        { url: 'https://example.com/1', title: 'Regierung kauft Anteile', language: '' },
        { url: 'https://example.com/2', title: 'Acme rallies', language: 'English' },
      ])])
      const { poller, channel } = makePoller({ source, detectLanguage })

      await poller.runCycle()
      expect(detectLanguage).toHaveBeenCalledTimes(1)
      expect((await channel.take()).value?.language).toBe('de')
      expect((await channel.take()).value?.language).toBe('en')
    })

    it('does not re-emit a dateless, url-less item on a later cycle', async () => {
      let clock = FIXED_NOW
      const source = new FakeSource('fake', [batch([{ url: '', title: 'Same story' }])])
      const { poller, channel } = makePoller({ source, now: () => clock })

      expect(await poller.runCycle()).toMatchObject({ enqueued: 1, duplicates: 0 })
      clock += 30_000
      expect(await poller.runCycle()).toMatchObject({ enqueued: 0, duplicates: 1 })
      expect(channel.size).toBe(1)
      expect(poller.seenCount).toBe(1)
    })

    it('keeps items apart that share a title but not a source date', async () => {
      const source = new FakeSource('fake', [batch([
        { url: '', title: 'Markets close', date: '20250926200000' },
        { url: '', title: 'Markets close', date: '20250927200000' },
      ])])
      const { poller } = makePoller({ source })

      expect(await poller.runCycle()).toMatchObject({ enqueued: 2, duplicates: 0 })
    })

    it('treats cancellation by stop as neither failure nor backoff', async () => {
      const source: NewsSource = {
        name: 'hanging',
        fetch: (opts) => new Promise<RawBatch>((_resolve, reject) => {
          opts?.signal?.addEventListener('abort', () => reject(new Error('request aborted')), { once: true })
        }),
      }
      const { poller } = makePoller({ source })
      const abort = new AbortController()

      const cycle = poller.runCycle(abort.signal)
      abort.abort()

      expect(await cycle).toEqual({ ok: false, error: 'request aborted' })
      expect(poller.currentBackoffMs).toBe(1_000)
      expect(poller.lastResult).toBeNull()
      expect(console.warn).not.toHaveBeenCalled()
    })

    it('doubles the backoff on failure up to the ceiling, then resets on success', async () => {
      const boom = new Error('HTTP 503')
      const source = new FakeSource('fake', [boom, boom, boom, boom, TWO_STORIES])
      const { poller } = makePoller({ source })

      expect(poller.currentBackoffMs).toBe(1_000)
      expect(await poller.runCycle()).toEqual({ ok: false, error: 'HTTP 503' })
      expect(poller.currentBackoffMs).toBe(2_000)
      await poller.runCycle()
      expect(poller.currentBackoffMs).toBe(4_000)
      await poller.runCycle()
      expect(poller.currentBackoffMs).toBe(5_000)
      await poller.runCycle()
      expect(poller.currentBackoffMs).toBe(5_000)

      expect(await poller.runCycle()).toMatchObject({ ok: true })
      expect(poller.currentBackoffMs).toBe(1_000)
      expect(poller.lastResult).toMatchObject({ ok: true, enqueued: 2 })
    })

    it('treats an empty batch as success', async () => {
      const { poller } = makePoller({ source: new FakeSource('fake', [new Error('x'), batch([])]) })
      await poller.runCycle()
      expect(await poller.runCycle()).toMatchObject({ ok: true, fetched: 0, enqueued: 0 })
      expect(poller.currentBackoffMs).toBe(1_000)
    })
  })

  describe('fallback', () => {
    it('is consulted when the primary yields nothing new', async () => {
      const fallback = new FakeSource('backup', [batch([{ url: 'https://backup.example/1', title: 'From backup' }])])
      const { poller, channel } = makePoller({ source: new FakeSource('fake', [batch([])]), fallback })

      const result = await poller.runCycle()
      expect(result).toMatchObject({ ok: true, usedFallback: true, fetched: 1, enqueued: 1 })
      expect((await channel.take()).value?.headline).toBe('From backup')
    })

    it('is not consulted when the primary produced events', async () => {
      const fallback = new FakeSource('backup', [batch([])])
      const { poller } = makePoller({ source: new FakeSource('fake', [TWO_STORIES]), fallback })

      expect(await poller.runCycle()).toMatchObject({ usedFallback: false })
      expect(fallback.calls).toBe(0)
    })

    it('a failing fallback does not fail the cycle', async () => {
      const fallback = new FakeSource('backup', [new Error('feed down')])
      const { poller } = makePoller({ source: new FakeSource('fake', [batch([])]), fallback })

      expect(await poller.runCycle()).toMatchObject({ ok: true, usedFallback: false })
      expect(poller.currentBackoffMs).toBe(1_000)
      expect(console.warn).toHaveBeenCalledWith('newswire-poller: fallback backup failed: feed down')
    })

    it('shares the seen set with the primary', async () => {
      const fallback = new FakeSource('backup', [batch([{ url: 'https://example.com/1', title: 'Same story' }])])
      const source = new FakeSource('fake', [TWO_STORIES, batch([])])
      const { poller } = makePoller({ source, fallback })

      await poller.runCycle()
      expect(await poller.runCycle()).toMatchObject({ usedFallback: true, enqueued: 0, duplicates: 1 })
    })
  })

  describe('loop', () => {
    it('emits the seed event before anything from the source', async () => {
      const sleep = parkedSleep()
      const { poller, channel } = makePoller({ source: new FakeSource('fake', [TWO_STORIES]), sleep })

      poller.start()
      expect(poller.running).toBe(true)
      await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1))

      const events = [
        (await channel.take()).value,
        (await channel.take()).value,
        (await channel.take()).value,
      ]
      expect(events.map((e) => e?.category)).toEqual(['Info', 'M&A', 'Earnings'])
      expect(events[0]?.timestamp).toBe('2026-01-15T08:30:00Z')
      expect(sleep).toHaveBeenCalledWith(1_000, expect.any(AbortSignal))

      await poller.stop()
      expect(poller.running).toBe(false)
    })

    it('sleeps for the backed-off delay after a failure', async () => {
      const sleep = parkedSleep()
      const { poller } = makePoller({ source: new FakeSource('fake', [new Error('timeout')]), sleep })

      poller.start()
      await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1))
      expect(sleep).toHaveBeenCalledWith(2_000, expect.any(AbortSignal))
      await poller.stop()
    })

    it('keeps polling until stopped', async () => {
      // Yields to the timer queue between cycles
      const sleep = vi.fn((_ms: number, _signal: AbortSignal) => new Promise<void>((resolve) => setTimeout(resolve, 1)))
      const source = new FakeSource('fake', [TWO_STORIES])
      const { poller } = makePoller({ source, sleep })

      poller.start()
      await vi.waitFor(() => expect(source.calls).toBeGreaterThanOrEqual(3))
      await poller.stop()

      const calls = source.calls
      await new Promise((resolve) => setTimeout(resolve, 10))
      expect(source.calls).toBe(calls)
    })

    it('stops during a fetch without logging a failure', async () => {
      let fetching = false
      const source: NewsSource = {
        name: 'hanging',
        fetch: (opts) => new Promise<RawBatch>((_resolve, reject) => {
          fetching = true
          opts?.signal?.addEventListener('abort', () => reject(new Error('request aborted')), { once: true })
        }),
      }
      const { poller } = makePoller({ source })

      poller.start()
      await vi.waitFor(() => expect(fetching).toBe(true))
      await poller.stop()

      expect(poller.currentBackoffMs).toBe(1_000)
      expect(console.warn).not.toHaveBeenCalled()
    })

    it('warns instead of throwing when the channel is closed', async () => {
      const channel = new Channel<NewsEvent>()
      channel.close()
      const { poller } = makePoller({ source: new FakeSource('fake', [TWO_STORIES]), channel })

      expect(await poller.runCycle()).toMatchObject({ ok: true, enqueued: 0 })
      expect(console.warn).toHaveBeenCalledWith('newswire-poller: channel closed, dropping event')
    })
  })
})
