import path from 'path'

const WORD_CHAR = '[\\p{L}\\p{N}_]'

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Case-insensitive pattern matching `term` only where it is not glued to a letter or digit.
 * Unicode-aware, so accented words (éducation, compétences) get proper boundaries.
 */
export function wholeWordPattern(term: string, flags = 'iu'): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(term)}(?!${WORD_CHAR})`, flags)
}

export function containsWholeWord(text: string, term: string): boolean {
  return wholeWordPattern(term).test(text)
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

export function normalizeTerm(value: string): string {
  return value.trim().toLowerCase()
}

export function toTermSet(values: readonly string[]): Set<string> {
  const terms = new Set<string>()
  for (const value of values) {
    const term = normalizeTerm(value)
    if (term) {
      terms.add(term)
    }
  }
  return terms
}

/**
 * Lower-cased, trimmed, de-duplicated terms in first-seen order
 */
export function normalizeTerms(values: readonly string[]): string[] {
  return [...toTermSet(values)]
}

export function countWords(text: string): number {
  const trimmed = text.trim()
  return trimmed ? trimmed.split(/\s+/).length : 0
}

/**
 * Record id: lower-cased, every run of characters outside [a-z0-9_] collapsed to '_', edges trimmed.
 */
export function toRecordId(value: string, fallback: string): string {
  const id = value
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '_')
    .replace(/^_+|_+$/g, '')
  return id || fallback
}

// Same as toRecordId over the file stem ("CV Jean.pdf" -> "cv_jean")
export function buildRecordId(fileName: string, fallback: string): string {
  return toRecordId(path.parse(fileName.trim()).name, fallback)
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
    Object.freeze(value)
  }
  return value
}
