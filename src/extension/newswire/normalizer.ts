/**
 * Newswire — Record normalizer
 *
 * Sources disagree on column names (GDELT alone has shipped URL, SourceURL and
 * DocumentIdentifier). Each canonical field carries a list of accepted aliases;
 * the first alias present in the batch header wins, independently per field.
 */

import type {
  CanonicalField,
  FieldAliases,
  NormalizedRecord,
  RawBatch,
  RawRecord,
  ResolvedFields,
} from './types.js'

export const DEFAULT_FIELD_ALIASES: FieldAliases = {
  url: ['URL', 'SourceURL', 'DocumentIdentifier', 'Link'],
  title: ['Title', 'DocumentTitle', 'AltTitle'],
  date: ['Date', 'Timestamp', 'SQLDate', 'DateAdded', 'DATE'],
  language: ['Language', 'DocLanguage'],
  domain: ['Domain'],
}

/** Map each canonical field to the column that carries it in `columns`. */
export function resolveFields(
  columns: readonly string[],
  aliases: FieldAliases = DEFAULT_FIELD_ALIASES,
): ResolvedFields {
  const byLower = new Map<string, string>()
  for (const column of columns) {
    const key = column.toLowerCase()
    if (!byLower.has(key)) byLower.set(key, column)
  }

  const pick = (field: CanonicalField): string | null => {
    for (const candidate of aliases[field]) {
      const column = byLower.get(candidate.toLowerCase())
      if (column !== undefined) return column
    }
    return null
  }

  return {
    date: pick('date'),
    title: pick('title'),
    url: pick('url'),
    domain: pick('domain'),
    language: pick('language'),
  }
}

/**
 * Normalize one raw record. Returns null when both title and url are empty.
 */
export function normalizeRecord(record: RawRecord, fields: ResolvedFields): NormalizedRecord | null {
  const read = (field: CanonicalField): string => {
    const column = fields[field]
    if (column === null) return ''
    return (record[column] ?? '').trim()
  }

  const title = read('title')
  const url = read('url')
  if (!title && !url) return null

  let domain = read('domain').toLowerCase()
  if (!domain && url.startsWith('http')) {
    domain = hostOf(url)
  }

  return {
    date: read('date'),
    title,
    url,
    domain,
    language: read('language').toLowerCase(),
  }
}

export interface NormalizedBatch {
  records: NormalizedRecord[]
  /** Rows dropped: empty title+url, or rows that failed to normalize */
  skipped: number
}

/** Resolve aliases once against the batch header, then normalize every row. */
export function normalizeBatch(
  batch: RawBatch,
  aliases: FieldAliases = DEFAULT_FIELD_ALIASES,
): NormalizedBatch {
  const fields = resolveFields(batch.columns, aliases)
  const records: NormalizedRecord[] = []
  let skipped = 0

  for (const raw of batch.records) {
    try {
      const record = normalizeRecord(raw, fields)
      if (record) {
        records.push(record)
      } else {
        skipped++
      }
    } catch (err) {
      skipped++
      console.warn(`newswire-normalizer: skipping malformed record: ${err instanceof Error ? err.message : err}`)
    }
  }

  return { records, skipped }
}

/** Lowercased host of a URL, or "" if it does not parse. */
export function hostOf(url: string): string {
  try {
    return new URL(url).host.toLowerCase()
  } catch {
    return ''
  }
}
