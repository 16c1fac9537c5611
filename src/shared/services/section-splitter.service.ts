import { Injectable } from '@nestjs/common'
import { escapeRegExp } from '../helpers'
import { HEADING_TRIM_PATTERN } from '../../rules/recruitment/section-headings.rules'

export type SectionHeadingMap<K extends string> = Readonly<Record<K, readonly string[]>>

export type SectionTexts<K extends string> = Partial<Record<K, string>>

const WORD_CHAR = /[\p{L}\p{N}_]/u

/**
 * SectionSplitterService - Stage 1
 *
 * Purpose: Deterministically split document text into labeled sections using
 * heading synonyms (résumé headings or job posting headings).
 *
 * Allowed logic:
 * - Heading-keyword detection only
 * - Line breaks injected around headings that PDF extraction glued to surrounding text
 *
 * Rules:
 * - Lines before the first heading belong to no section and are dropped
 * - A heading seen again restarts its section: only the LAST contiguous run survives
 * - No heading at all → empty result; callers fall back to the full text
 */
@Injectable()
export class SectionSplitterService {
  split<K extends string>(text: string, headings: SectionHeadingMap<K>): SectionTexts<K> {
    const lines = this.injectHeadingBreaks(text, headings).split('\n')
    const buckets = new Map<K, string[]>()
    let current: K | null = null

    for (const rawLine of lines) {
      const line = rawLine.trim()
      if (!line) continue

      const heading = this.detectHeading(line, headings)
      if (heading !== null) {
        current = heading
        buckets.set(heading, [])
        continue
      }

      if (current !== null) {
        buckets.get(current)?.push(line)
      }
    }

    const sections: SectionTexts<K> = {}
    for (const [name, bucket] of buckets) {
      sections[name] = bucket.join('\n').trim()
    }
    return sections
  }

  /**
   * Section whose synonym starts the line (after stripping bullets/colons/dashes), or null
   */
  detectHeading<K extends string>(line: string, headings: SectionHeadingMap<K>): K | null {
    const normalized = line.toLowerCase().replace(HEADING_TRIM_PATTERN, '')
    if (!normalized) return null

    for (const name in headings) {
      for (const synonym of headings[name]) {
        if (this.startsWithWord(normalized, synonym.toLowerCase())) {
          return name
        }
      }
    }
    return null
  }

  private startsWithWord(text: string, prefix: string): boolean {
    if (!text.startsWith(prefix)) return false
    const next = text.charAt(prefix.length)
    return next === '' || !WORD_CHAR.test(next)
  }

  private injectHeadingBreaks<K extends string>(text: string, headings: SectionHeadingMap<K>): string {
    const synonyms = new Set<string>()
    for (const name in headings) {
      for (const synonym of headings[name]) {
        synonyms.add(synonym)
      }
    }
    if (synonyms.size === 0) return text

    // Longest first so "compétences techniques" wins over "compétences"
    const alternation = [...synonyms]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp)
      .join('|')
    // A colon right after the heading belongs to it ("Compétences: Python")
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])(${alternation})(?![\\p{L}\\p{N}_])[^\\S\\n]*:?`, 'giu')

    return text.replace(pattern, '\n$1\n')
  }
}
