/**
 * Newswire — Zod configuration schema
 *
 * Loaded from data/config/newswire.json (seeded with these defaults if absent).
 */

import { z } from 'zod'
import { DEFAULT_GDELT_QUERY } from './sources/gdelt.js'

const gdeltSourceSchema = z.object({
  type: z.literal('gdelt'),
  /** GDELT DOC query expression */
  query: z.string().min(1).default(DEFAULT_GDELT_QUERY),
  /** Records requested per poll */
  maxRecords: z.number().int().positive().max(250).default(120),
  /** Lookback window, e.g. "12h", "1d" */
  timespan: z.string().regex(/^\d+(min|h|d|w|m)$/, 'Expected e.g. "15min", "12h", "1d"').default('12h'),
})

const rssSourceSchema = z.object({
  type: z.literal('rss'),
  url: z.string().url(),
  /** Forces the language of every item (e.g. "en") */
  language: z.string().optional(),
  /** Forces the domain of every item */
  domain: z.string().optional(),
})

export const sourceSchema = z.discriminatedUnion('type', [gdeltSourceSchema, rssSourceSchema])

export type SourceConfig = z.infer<typeof sourceSchema>

export const newswireSchema = z.object({
  /** Poll interval after a successful cycle */
  intervalSeconds: z.number().int().positive().default(30),
  /** Ceiling for exponential backoff after failed cycles */
  maxBackoffSeconds: z.number().int().positive().default(300),
  /** Per-request fetch timeout */
  timeoutSeconds: z.number().int().positive().default(12),
  /** Events retained for replay to new subscribers */
  historyCapacity: z.number().int().positive().default(300),
  /** A subscriber that takes longer than this to accept an event is dropped */
  deliveryTimeoutMs: z.number().int().nonnegative().default(5000),
  /** "off" marks every item without a source language as "unk" */
  languageDetection: z.enum(['franc', 'off']).default('franc'),
  source: sourceSchema.default({
    type: 'gdelt',
    query: DEFAULT_GDELT_QUERY,
    maxRecords: 120,
    timespan: '12h',
  }),
  /** Consulted in the same cycle when the primary source yields nothing new */
  fallback: sourceSchema.nullable().default(null),
}).refine((c) => c.maxBackoffSeconds >= c.intervalSeconds, {
  message: 'maxBackoffSeconds must be >= intervalSeconds',
  path: ['maxBackoffSeconds'],
})

export type NewswireConfig = z.infer<typeof newswireSchema>
