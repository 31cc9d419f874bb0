/**
 * Newswire — Public exports
 */

export { createNewswire } from './pipeline.js'
export type { Newswire, NewswireDeps, NewswireStatus } from './pipeline.js'
export { NewsPoller, seenKey } from './poller.js'
export type { NewsPollerOpts, CycleResult, IngestStats } from './poller.js'
export { NewsBroadcaster } from './broadcaster.js'
export type { BroadcasterOpts, BroadcasterStats } from './broadcaster.js'
export { SubscriberRegistry, DeliveryTimeoutError, SubscriberGoneError } from './subscribers.js'
export type { BroadcastResult, SubscriberRegistryOpts } from './subscribers.js'
export { HistoryBuffer, dedupKey, DEFAULT_HISTORY_CAPACITY } from './history.js'
export { enrichRecord, classify, guessTickers, normalizeLanguage, toIsoUtc, createSeedEvent } from './enricher.js'
export { createLanguageDetector, francLanguageDetector, unknownLanguageDetector } from './language.js'
export type { LanguageDetector, LanguageDetection } from './language.js'
export { normalizeBatch, normalizeRecord, resolveFields, DEFAULT_FIELD_ALIASES } from './normalizer.js'
export { createSource, GdeltSource, RssSource, SourceFetchError } from './sources/index.js'
export { newswireSchema } from './config.js'
export type { NewswireConfig, SourceConfig } from './config.js'
export type {
  NewsEvent,
  NewsCategory,
  NewsSource,
  NormalizedRecord,
  RawBatch,
  RawRecord,
  Subscriber,
  FieldAliases,
} from './types.js'
