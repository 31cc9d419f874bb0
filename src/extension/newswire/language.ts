/**
 * Newswire — Language detection
 *
 * Detection is a capability chosen once at construction. The default uses
 * franc's trigram model, which has no random component, so the same title
 * always yields the same code.
 */

import { franc } from 'franc'
import { iso6393To1 } from 'iso-639-3'

/** Text → ISO 639-1 code (or ISO 639-3 when no two-letter code exists), "unk" if unknown. */
export type LanguageDetector = (text: string) => string

export type LanguageDetection = 'franc' | 'off'

/** Shortest title franc is asked to judge. */
const MIN_LENGTH = 10

export const unknownLanguageDetector: LanguageDetector = () => 'unk'

export const francLanguageDetector: LanguageDetector = (text) => {
  if (!text || !text.trim()) return 'unk'
  try {
    const code = franc(text, { minLength: MIN_LENGTH })
    if (code === 'und') return 'unk'
    return iso6393To1[code] ?? code
  } catch (err) {
    console.warn(`newswire-language: detection failed: ${err instanceof Error ? err.message : err}`)
    return 'unk'
  }
}

export function createLanguageDetector(mode: LanguageDetection = 'franc'): LanguageDetector {
  return mode === 'franc' ? francLanguageDetector : unknownLanguageDetector
}
