import type { SourceConfig } from '../config.js'
import type { NewsSource } from '../types.js'
import { GdeltSource } from './gdelt.js'
import { RssSource } from './rss.js'

export { GdeltSource, buildGdeltUrl, parseCsvBatch, DEFAULT_GDELT_QUERY, GDELT_DOC_ENDPOINT } from './gdelt.js'
export type { GdeltSourceOpts } from './gdelt.js'
export { RssSource, parseFeedXml, feedToBatch } from './rss.js'
export type { RssSourceOpts, ParsedFeed, FeedEntry } from './rss.js'
export { SourceFetchError } from './errors.js'

/** Build a source from its config entry. */
export function createSource(config: SourceConfig, timeoutMs: number): NewsSource {
  switch (config.type) {
    case 'gdelt':
      return new GdeltSource({
        query: config.query,
        maxRecords: config.maxRecords,
        timespan: config.timespan,
        timeoutMs,
      })
    case 'rss':
      return new RssSource({
        url: config.url,
        language: config.language,
        domain: config.domain,
        timeoutMs,
      })
  }
}
