import { Injectable } from '@nestjs/common'
import { containsWholeWord } from '../helpers'
import {
  DIPLOMA_MIN_LINE_LENGTH,
  DIPLOMA_TYPES,
  EDUCATION_TIERS,
  EMAIL_PATTERN,
  EXPERIENCE_YEAR_PATTERN,
  LANGUAGE_ALIASES,
  NAME_RULES,
  PHONE_PATTERN,
  SKILL_DELIMITER,
  SKILL_MIN_LENGTH,
  YEARS_OF_EXPERIENCE_PATTERNS,
} from '../../rules/recruitment/extraction.rules'
import type {
  DiplomaType,
  EducationLevelType,
  ExperienceEntryType,
} from '../../routes/candidate/candidate.model'

/**
 * EntityExtractionService - Stage 2
 *
 * Purpose: Pull atomic facts out of section text or raw text.
 *
 * Allowed logic:
 * - Regex / vocabulary lookups from rules/recruitment/extraction.rules
 * - Ordered pattern lists, first match wins
 *
 * Forbidden logic:
 * - Throwing on a miss: every extractor resolves to its documented default
 *   ('' / 0 / 'unknown' / [])
 */
@Injectable()
export class EntityExtractionService {
  extractEmail(text: string): string {
    return text.match(EMAIL_PATTERN)?.[0] ?? ''
  }

  extractPhone(text: string): string {
    return text.match(PHONE_PATTERN)?.[0] ?? ''
  }

  /**
   * First integer captured by the first pattern (in declared order) that matches; 0 otherwise
   */
  extractYearsOfExperience(text: string): number {
    const lowered = text.toLowerCase()
    for (const pattern of YEARS_OF_EXPERIENCE_PATTERNS) {
      const match = lowered.match(pattern)
      if (match?.[1]) {
        return Number.parseInt(match[1], 10)
      }
    }
    return 0
  }

  extractEducationLevel(text: string): EducationLevelType {
    for (const tier of EDUCATION_TIERS) {
      if (tier.terms.some((term) => containsWholeWord(text, term))) {
        return tier.level
      }
    }
    return 'unknown'
  }

  /**
   * Newlines become delimiters; tokens are trimmed, short ones dropped,
   * duplicates (case-insensitive) removed with first spelling kept.
   */
  parseSkills(text: string): string[] {
    const seen = new Set<string>()
    const skills: string[] = []

    for (const token of text.replace(/\r?\n/g, ',').split(SKILL_DELIMITER)) {
      const skill = token.trim()
      if (skill.length < SKILL_MIN_LENGTH) continue

      const key = skill.toLowerCase()
      if (seen.has(key)) continue
      seen.add(key)
      skills.push(skill)
    }

    return skills
  }

  extractDiplomas(text: string): DiplomaType[] {
    const diplomas: DiplomaType[] = []

    for (const rawLine of text.split('\n')) {
      const line = rawLine.trim()
      if (line.length < DIPLOMA_MIN_LINE_LENGTH) continue

      const lowered = line.toLowerCase()
      const type = DIPLOMA_TYPES.find((diploma) => lowered.includes(diploma))
      if (type) {
        diplomas.push({ type, description: line })
      }
    }

    return diplomas
  }

  /**
   * A year line opens an entry, following lines extend it, a blank line closes it.
   */
  extractExperiences(text: string): ExperienceEntryType[] {
    const entries: ExperienceEntryType[] = []
    let current: ExperienceEntryType | null = null

    for (const rawLine of text.split('\n')) {
      const line = rawLine.trim()

      if (!line) {
        if (current) entries.push(current)
        current = null
        continue
      }

      const year = line.match(EXPERIENCE_YEAR_PATTERN)?.[0]
      if (year) {
        if (current) entries.push(current)
        current = { year, description: line }
      } else if (current) {
        current.description = `${current.description} ${line}`
      }
    }

    if (current) entries.push(current)
    return entries
  }

  /**
   * Naive "looks like a name" heuristic over the first non-empty lines
   */
  extractName(text: string): string {
    const lines = text
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .slice(0, NAME_RULES.scannedLines)

    return (
      lines.find(
        (line) =>
          line.length >= NAME_RULES.minLength &&
          line.length <= NAME_RULES.maxLength &&
          !line.includes('@') &&
          !NAME_RULES.phonePattern.test(line),
      ) ?? ''
    )
  }

  /**
   * Canonical language names mentioned in the text, in reporting order
   */
  detectLanguages(text: string): string[] {
    return LANGUAGE_ALIASES.filter(({ aliases }) => aliases.some((alias) => containsWholeWord(text, alias))).map(
      ({ language }) => language,
    )
  }
}
