/**
 * ENTITY EXTRACTION RULES
 * APPLICABLE TO: RÉSUMÉS, COVER LETTERS, JOB POSTINGS
 *
 * Every ordered list below is evaluated top to bottom and the FIRST match wins.
 * Order is part of the contract: "3 ans d'expérience, 10 years" yields 3.
 */

import type { EducationLevelType } from '../../routes/candidate/candidate.model'

// =============================================================================
// CONTACT
// =============================================================================

export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/

export const PHONE_PATTERN = /\+?\d[\d .-]{7,}\d/

// =============================================================================
// YEARS OF EXPERIENCE (matched against lower-cased text)
// =============================================================================

export const YEARS_OF_EXPERIENCE_PATTERNS = [
  /(\d+)\s*ans?\s*d['’ ]?exp/u,
  /(\d+)\s*years?\s*of\s*experience/u,
  /(\d+)\+?\s*(?:ans?|ann[ée]es?|years?)(?![\p{L}\p{N}_])/u,
  /exp[ée]rience\s*:\s*(\d+)/u,
] as const

// =============================================================================
// EDUCATION (tiers checked in priority order)
// =============================================================================

export interface EducationTier {
  level: Exclude<EducationLevelType, 'unknown'>
  terms: readonly string[]
}

export const EDUCATION_TIERS: readonly EducationTier[] = [
  { level: 'doctorat', terms: ['doctorat', 'phd', 'ph.d'] },
  { level: 'master', terms: ['master', 'm2', 'm1', 'msc', 'ms'] },
  { level: 'licence', terms: ['licence', 'bachelor', 'bsc', 'l3'] },
  { level: 'bac', terms: ['bac', 'baccalauréat', 'high school'] },
]

// Substring vocabulary; first type found on a line wins
export const DIPLOMA_TYPES = ['master', 'licence', 'bachelor', 'doctorat', 'phd', 'bts', 'dut', 'ingénieur'] as const

export const DIPLOMA_MIN_LINE_LENGTH = 5

// =============================================================================
// SKILLS
// =============================================================================

export const SKILL_DELIMITER = /[;,•-]\s*/

export const SKILL_MIN_LENGTH = 2

// =============================================================================
// EXPERIENCE ENTRIES
// =============================================================================

// 1900-2099, not part of a longer digit run
export const EXPERIENCE_YEAR_PATTERN = /(?<!\d)(?:19|20)\d{2}(?!\d)/

// =============================================================================
// CANDIDATE NAME
// =============================================================================

export const NAME_RULES = {
  scannedLines: 5,
  minLength: 4,
  maxLength: 49,
  phonePattern: /\d{10}/,
} as const

// =============================================================================
// LANGUAGES (canonical name → aliases, in reporting order)
// =============================================================================

export const LANGUAGE_ALIASES: ReadonlyArray<{ language: string; aliases: readonly string[] }> = [
  { language: 'anglais', aliases: ['anglais', 'english'] },
  { language: 'francais', aliases: ['francais', 'français', 'french'] },
  { language: 'espagnol', aliases: ['espagnol', 'spanish'] },
  { language: 'allemand', aliases: ['allemand', 'german'] },
]
