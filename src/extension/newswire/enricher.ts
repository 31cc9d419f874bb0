/**
 * Newswire — Event enrichment
 *
 * Turns a normalized record into a NewsEvent: language code, UTC timestamp,
 * category and ticker guesses, all derived from the headline and the source
 * fields. Everything here is pure apart from the clock fallback in toIsoUtc.
 */

import type { LanguageDetector } from './language.js'
import type { NewsCategory, NewsEvent, NormalizedRecord } from './types.js'

export const UNTITLED_HEADLINE = '(untitled)'

const MAX_TICKERS = 6

/** Uppercase tokens that look like tickers but almost never are. */
const TICKER_STOPLIST = new Set([
  'THE', 'AND', 'FOR', 'WITH', 'FROM', 'THIS', 'THAT', 'WAS', 'WILL', 'HAVE', 'HAS',
  'USA', 'US', 'CEO', 'CFO', 'DOE', 'DOD', 'IPO', 'ETF', 'FDA', 'SEC', 'EU', 'UK',
  'LITHIUM', 'OIL', 'GAS', 'BANK', 'NEWS', 'MERGER', 'ACQUISITION', 'Q1', 'Q2', 'Q3', 'Q4',
])

/** Ordered: the first rule whose pattern matches the headline decides. */
const CATEGORY_RULES: ReadonlyArray<{ category: NewsCategory; pattern: RegExp }> = [
  { category: 'GovStake', pattern: /\b(government|state)\b.*\b(stake|equity|share)\b/i },
  { category: 'CEOResignation', pattern: /\b(CEO|CFO)\b.*\b(resigns?|steps down|resignation)\b/i },
  { category: 'M&A', pattern: /\b(acquisition|acquire|acquired|merger|merging|combine)\b/i },
  { category: 'Earnings', pattern: /\b(earnings|guidance|EPS|revenue)\b/i },
  { category: 'Contract', pattern: /\b(contract|award|offtake|MoU)\b/i },
]

/** 2–5 ASCII capitals not touching any other letter, digit or underscore (accented ones included). */
const UPPER_TOKEN = /(?<![\p{L}\p{N}_])[A-Z]{2,5}(?![\p{L}\p{N}_])/gu

// ==================== Language ====================

/**
 * Collapse the many spellings sources use into a short code.
 * "es-ES" / "spanish" → "es", "en-GB" / "English" → "en", "" → "unk".
 */
export function normalizeLanguage(lang: string): string {
  const l = (lang ?? '').trim().toLowerCase()
  if (!l) return 'unk'
  if (l.startsWith('es') || l === 'spanish') return 'es'
  if (l.startsWith('en') || l === 'english') return 'en'
  return l
}

// ==================== Timestamps ====================

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/
const ISO_LIKE_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,6}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i
const RFC2822_DATE =
  /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{2,4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s+([+-]\d{4}|[A-Za-z]{1,5}))?$/

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
}

/** RFC-2822 obsolete zone names, in minutes east of UTC. */
const ZONE_OFFSETS: Record<string, number> = {
  UT: 0, UTC: 0, GMT: 0, Z: 0,
  EST: -300, EDT: -240, CST: -360, CDT: -300,
  MST: -420, MDT: -360, PST: -480, PDT: -420,
}

/** "2025-09-26T19:50:22Z" for the given instant. */
export function formatIsoUtc(ms: number): string {
  return new Date(ms).toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/**
 * Epoch ms for the given UTC wall-clock fields, or null if any field is out of
 * range (Feb 30, hour 25, ...).
 */
function utcMillis(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): number | null {
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null
  const ms = Date.UTC(year, month - 1, day, hour, minute, second)
  const d = new Date(ms)
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null
  return ms
}

/** "+05:30" / "-0800" / "Z" → minutes east of UTC. */
function parseOffset(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === 'Z') return 0
  const sign = offset.startsWith('-') ? -1 : 1
  const digits = offset.slice(1).replace(':', '')
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)))
}

function parseCompact(s: string): number | null {
  const m = COMPACT_DATE.exec(s)
  if (!m) return null
  return utcMillis(Number(m[1]), Number(m[2]), Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6]))
}

function parseIsoLike(s: string): number | null {
  const m = ISO_LIKE_DATE.exec(s.replace(' ', 'T'))
  if (!m) return null
  const base = utcMillis(
    Number(m[1]), Number(m[2]), Number(m[3]),
    Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0),
  )
  if (base === null) return null
  const fraction = m[7] ? Math.floor(Number(`0.${m[7]}`) * 1000) : 0
  return base + fraction - parseOffset(m[8]) * 60_000
}

function parseRfc2822(s: string): number | null {
  const m = RFC2822_DATE.exec(s.trim())
  if (!m) return null
  const month = MONTHS[m[2].toLowerCase()]
  if (month === undefined) return null

  let year = Number(m[3])
  if (m[3].length <= 2) year += year < 50 ? 2000 : 1900

  const base = utcMillis(year, month, Number(m[1]), Number(m[4]), Number(m[5]), Number(m[6] ?? 0))
  if (base === null) return null

  const zone = m[7]
  const offset = zone === undefined
    ? 0
    : /^[+-]\d{4}$/.test(zone) ? parseOffset(zone) : ZONE_OFFSETS[zone.toUpperCase()] ?? 0
  return base - offset * 60_000
}

/**
 * Parse a source date into an ISO-8601 UTC string.
 *
 * Tried in order: compact `YYYYMMDDHHMMSS`, `YYYY-MM-DD HH:MM:SS` (space or T,
 * naive = UTC), RFC-2822. Anything else, including "", yields the current time.
 */
export function toIsoUtc(dateStr: string, now: () => number = Date.now): string {
  const s = (dateStr ?? '').trim()
  if (!s) return formatIsoUtc(now())

  const ms = parseCompact(s) ?? parseIsoLike(s) ?? parseRfc2822(s)
  return formatIsoUtc(ms ?? now())
}

// ==================== Classification ====================

export function classify(title: string): NewsCategory {
  const t = title ?? ''
  for (const rule of CATEGORY_RULES) {
    if (rule.pattern.test(t)) return rule.category
  }
  return 'News'
}

/** Ticker-like uppercase tokens (2–5 letters), stoplist removed, unique, max 6. */
export function guessTickers(title: string): string[] {
  const out: string[] = []
  for (const token of (title ?? '').match(UPPER_TOKEN) ?? []) {
    if (TICKER_STOPLIST.has(token) || out.includes(token)) continue
    out.push(token)
    if (out.length === MAX_TICKERS) break
  }
  return out
}

// ==================== Event ====================

export function enrichRecord(
  record: NormalizedRecord,
  detectLanguage: LanguageDetector,
  now: () => number = Date.now,
): NewsEvent {
  const language = record.language
    ? normalizeLanguage(record.language)
    : normalizeLanguage(detectLanguage(record.title))

  return {
    headline: record.title || UNTITLED_HEADLINE,
    summary: record.domain ? `Source: ${record.domain}` : '',
    tickers: guessTickers(record.title),
    category: classify(record.title),
    url: record.url,
    timestamp: toIsoUtc(record.date, now),
    domain: record.domain,
    language,
  }
}

/** First event every subscriber sees after a restart; proves the stream is live. */
export function createSeedEvent(now: () => number = Date.now): NewsEvent {
  return {
    headline: '✅ Source connected (seed)',
    summary: 'Stream OK; filtering happens on the client',
    tickers: ['TEST'],
    category: 'Info',
    url: '',
    timestamp: formatIsoUtc(now()),
    domain: '',
    language: 'en',
  }
}
