/**
 * Newswire — Type definitions
 */

// ==================== Source side ====================

/** One row from a source, keyed by the source's own column names. */
export type RawRecord = Record<string, string>

/** Everything a single fetch returned. */
export interface RawBatch {
  /** Header as the source named it; aliases are resolved against this once per batch. */
  columns: string[]
  records: RawRecord[]
  /** Size of the raw payload in bytes */
  bytes: number
}

export interface FetchOptions {
  signal?: AbortSignal
}

/** Anything that can hand the poller a batch of raw records. */
export interface NewsSource {
  /** Short label used in logs and status, e.g. "gdelt" */
  readonly name: string
  fetch(opts?: FetchOptions): Promise<RawBatch>
}

// ==================== Normalized record ====================

export type CanonicalField = 'date' | 'title' | 'url' | 'domain' | 'language'

/** Canonical field → accepted column names, in priority order (matched case-insensitively). */
export type FieldAliases = Record<CanonicalField, readonly string[]>

/** Canonical field → the actual column that carries it in this batch (null if absent). */
export type ResolvedFields = Record<CanonicalField, string | null>

export interface NormalizedRecord {
  /** Whatever the source put in its date column, e.g. "20250926195022" */
  date: string
  title: string
  url: string
  /** Lowercased host; derived from url when the source has no domain column */
  domain: string
  /** Lowercased source value; may be empty ("english", "es", ...) */
  language: string
}

// ==================== Event ====================

export const NEWS_CATEGORIES = [
  'GovStake',
  'CEOResignation',
  'M&A',
  'Earnings',
  'Contract',
  'News',
  'Info',
] as const

export type NewsCategory = (typeof NEWS_CATEGORIES)[number]

/** Canonical unit streamed to subscribers. Serialized as-is. */
export interface NewsEvent {
  /** Never empty */
  headline: string
  /** "Source: {domain}" or "" */
  summary: string
  /** Up to 6 unique ticker-like tokens, first-occurrence order */
  tickers: string[]
  category: NewsCategory
  url: string
  /** ISO-8601 UTC, e.g. "2025-09-26T19:50:22Z" */
  timestamp: string
  domain: string
  /** ISO 639-1 code or "unk" */
  language: string
}

// ==================== Subscribers ====================

/** A live consumer of the stream. A rejected send means it is gone. */
export interface Subscriber {
  readonly id: string
  send(event: NewsEvent): Promise<void>
  /** Tear down the underlying connection, if any. */
  close?(): void | Promise<void>
}
