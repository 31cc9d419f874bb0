/**
 * Newswire — RSS / Atom source
 *
 * Zero-dependency parser for RSS 2.0 (<item>) and Atom (<entry>) feeds,
 * CDATA included. Items become raw records under the column names
 * Title / Link / Date / Language / Domain so they flow through the same
 * normalizer as any other source.
 */

import type { FetchOptions, NewsSource, RawBatch, RawRecord } from '../types.js'
import { SourceFetchError, requestSignal } from './errors.js'

export interface FeedEntry {
  title: string
  link: string
  /** Raw date text as published (RFC-2822 for RSS, ISO-8601 for Atom) */
  published: string
}

export interface ParsedFeed {
  /** Channel-level <language>, lowercased; "" when absent */
  language: string
  entries: FeedEntry[]
}

export interface RssSourceOpts {
  url: string
  timeoutMs: number
  /** Overrides the feed's own <language> */
  language?: string
  /** Overrides the host derived from each link */
  domain?: string
  /** Label in logs; defaults to the feed host */
  name?: string
  fetch?: typeof fetch
}

export const RSS_COLUMNS = ['Title', 'Link', 'Date', 'Language', 'Domain'] as const

const ENTRY_BLOCK = /<(item|entry)[\s>]([\s\S]*?)<\/\1>/gi

/** Parse an RSS/Atom document. Unknown markup is ignored. */
export function parseFeedXml(xml: string): ParsedFeed {
  const entries: FeedEntry[] = []

  let match: RegExpExecArray | null
  ENTRY_BLOCK.lastIndex = 0
  while ((match = ENTRY_BLOCK.exec(xml)) !== null) {
    const block = match[2]
    entries.push({
      title: decodeEntities(stripTags(rawTagText(block, 'title') ?? '')),
      link: tagText(block, 'link') ?? attrValue(block, 'link', 'href') ?? '',
      published:
        tagText(block, 'pubDate')
        ?? tagText(block, 'dc:date')
        ?? tagText(block, 'published')
        ?? tagText(block, 'updated')
        ?? '',
    })
  }

  // Channel language sits before the first item; don't pick up per-item tags.
  const head = xml.split(/<(?:item|entry)[\s>]/i, 1)[0]
  const language = (tagText(head, 'language') ?? attrValue(head, 'feed', 'xml:lang') ?? '').toLowerCase()

  return { language, entries }
}

/** Map parsed entries onto raw records. */
export function feedToBatch(feed: ParsedFeed, bytes: number, overrides?: { language?: string; domain?: string }): RawBatch {
  const language = overrides?.language || feed.language
  const records = feed.entries.map((entry): RawRecord => ({
    Title: entry.title,
    Link: entry.link,
    Date: entry.published,
    Language: language,
    Domain: overrides?.domain ?? '',
  }))
  return { columns: [...RSS_COLUMNS], records, bytes }
}

export class RssSource implements NewsSource {
  readonly name: string
  private opts: RssSourceOpts

  constructor(opts: RssSourceOpts) {
    this.opts = opts
    this.name = opts.name ?? `rss:${hostLabel(opts.url)}`
  }

  async fetch(fetchOpts?: FetchOptions): Promise<RawBatch> {
    const doFetch = this.opts.fetch ?? fetch

    let res: Response
    try {
      res = await doFetch(this.opts.url, {
        signal: requestSignal(this.opts.timeoutMs, fetchOpts?.signal),
        headers: { 'User-Agent': 'newswire/0.1 (+poller)' },
      })
    } catch (err) {
      throw new SourceFetchError(this.name, `request failed: ${err instanceof Error ? err.message : err}`, undefined, { cause: err })
    }
    if (!res.ok) {
      throw new SourceFetchError(this.name, `HTTP ${res.status} ${res.statusText}`, res.status)
    }

    const body = await res.arrayBuffer()
    const xml = new TextDecoder('utf-8').decode(body)
    return feedToBatch(parseFeedXml(xml), body.byteLength, {
      language: this.opts.language,
      domain: this.opts.domain,
    })
  }
}

// ==================== Helpers ====================

/** Inner text of the first <tag>…</tag>, CDATA unwrapped, entities left as-is. */
function rawTagText(xml: string, tag: string): string | null {
  const t = escapeRegex(tag)
  const m = new RegExp(`<${t}(?:\\s[^>]*)?>([\\s\\S]*?)</${t}>`, 'i').exec(xml)
  if (!m) return null
  const inner = m[1].trim()
  const cdata = /^<!\[CDATA\[([\s\S]*?)\]\]>$/.exec(inner)
  return cdata ? cdata[1].trim() : inner
}

/** Text of the first <tag>…</tag> with entities decoded. */
function tagText(xml: string, tag: string): string | null {
  const raw = rawTagText(xml, tag)
  return raw === null ? null : decodeEntities(raw)
}

/** Attribute of the first <tag …>, e.g. <link href="…"/>. */
function attrValue(xml: string, tag: string, attr: string): string | null {
  const m = new RegExp(`<${escapeRegex(tag)}\\s[^>]*${escapeRegex(attr)}="([^"]*)"`, 'i').exec(xml)
  return m ? decodeEntities(m[1]) : null
}

function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, '').trim()
}

function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(Number(code)))
    .replace(/&#x([0-9a-fA-F]+);/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/&amp;/g, '&')
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function hostLabel(url: string): string {
  try {
    return new URL(url).host
  } catch {
    return url
  }
}
