/**
 * Newswire — GDELT DOC API source
 *
 * Requests the ArtList view as CSV and hands back the rows keyed by whatever
 * header GDELT sent this time. Column naming is left to the normalizer.
 */

import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import type { FetchOptions, NewsSource, RawBatch, RawRecord } from '../types.js'
import { SourceFetchError, requestSignal } from './errors.js'

export const GDELT_DOC_ENDPOINT = 'https://api.gdeltproject.org/api/v2/doc/doc'

export const DEFAULT_GDELT_QUERY =
  '(stocks OR stock OR shares OR market OR earnings OR EPS OR revenue OR acquisition OR merger '
  + 'OR resigns OR resignation OR contract OR lithium OR oil OR mining OR semiconductor OR government)'

export interface GdeltSourceOpts {
  query: string
  maxRecords: number
  /** GDELT lookback, e.g. "12h", "1d" */
  timespan: string
  timeoutMs: number
  sort?: string
  /** Injected for tests */
  fetch?: typeof fetch
}

const csvRowsSchema = z.array(z.array(z.string()))

export function buildGdeltUrl(opts: Pick<GdeltSourceOpts, 'query' | 'maxRecords' | 'timespan' | 'sort'>): string {
  const params = new URLSearchParams({
    query: opts.query,
    mode: 'ArtList',
    maxrecords: String(opts.maxRecords),
    sort: opts.sort ?? 'DateDesc',
    format: 'CSV',
    timespan: opts.timespan,
  })
  return `${GDELT_DOC_ENDPOINT}?${params.toString()}`
}

/**
 * Parse a CSV payload into a batch. The first row is the header; short rows
 * are padded with "" and extra cells are ignored.
 */
export function parseCsvBatch(text: string, bytes: number): RawBatch {
  const rows = csvRowsSchema.parse(
    parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    }),
  )

  const [header, ...body] = rows
  if (!header) return { columns: [], records: [], bytes }

  const columns = header.map((h) => h.trim())
  const records = body.map((row) => {
    const record: RawRecord = {}
    columns.forEach((column, i) => {
      if (!(column in record)) record[column] = row[i] ?? ''
    })
    return record
  })

  return { columns, records, bytes }
}

export class GdeltSource implements NewsSource {
  readonly name = 'gdelt'
  private opts: GdeltSourceOpts

  constructor(opts: GdeltSourceOpts) {
    this.opts = opts
  }

  get url(): string {
    return buildGdeltUrl(this.opts)
  }

  async fetch(fetchOpts?: FetchOptions): Promise<RawBatch> {
    const doFetch = this.opts.fetch ?? fetch

    let res: Response
    try {
      res = await doFetch(this.url, {
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
    const text = new TextDecoder('utf-8').decode(body)

    try {
      return parseCsvBatch(text, body.byteLength)
    } catch (err) {
      throw new SourceFetchError(this.name, `unparseable CSV: ${err instanceof Error ? err.message : err}`, undefined, { cause: err })
    }
  }
}
