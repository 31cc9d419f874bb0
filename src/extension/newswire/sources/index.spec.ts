import { describe, it, expect } from 'vitest'
import { newswireSchema } from '../config.js'
import { createSource, GdeltSource, RssSource } from './index.js'

describe('createSource', () => {
  it('builds a GDELT source from the default config', () => {
    const { source } = newswireSchema.parse({})
    const built = createSource(source, 12_000)

    expect(built).toBeInstanceOf(GdeltSource)
    expect(built.name).toBe('gdelt')
  })

  it('builds an RSS source named after its host', () => {
    const { fallback } = newswireSchema.parse({ fallback: { type: 'rss', url: 'https://feeds.example.com/markets' } })
    if (!fallback) throw new Error('expected a fallback source')
    const built = createSource(fallback, 12_000)

    expect(built).toBeInstanceOf(RssSource)
    expect(built.name).toBe('rss:feeds.example.com')
  })

  it('carries the GDELT query settings into the request url', () => {
    const { source } = newswireSchema.parse({ source: { type: 'gdelt', query: 'lithium', maxRecords: 25, timespan: '1d' } })
    const built = createSource(source, 12_000)
    if (!(built instanceof GdeltSource)) throw new Error('expected a GDELT source')

    const url = new URL(built.url)
    expect(url.searchParams.get('query')).toBe('lithium')
    expect(url.searchParams.get('maxrecords')).toBe('25')
    expect(url.searchParams.get('timespan')).toBe('1d')
  })
})
