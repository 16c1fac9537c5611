/**
 * CANONICAL SCORING CONTRACT
 *
 * Single source of truth for every sub-score. Pure functions only: no I/O,
 * no configuration lookups, no language model. All results are clamped to [0, 100].
 *
 * Skill and language comparisons use case-insensitive, trimmed set semantics.
 */

import { countWords, normalizeTerm, toTermSet } from '../../shared/helpers'
import {
  EXPERIENCE_RULES,
  NEUTRAL_SCORE,
  NO_LANGUAGE_REQUIRED_SCORE,
  PROFILE_WEIGHTS,
  SCORED_SOFT_SKILLS,
  SCORE_MAX,
  SCORE_MIN,
  SKILL_MATCH_WEIGHTS,
  SOFT_SKILL_RULES,
  type SoftSkillCategory,
} from '../../rules/recruitment/scoring.rules'

export function clampScore(value: number): number {
  return Math.min(SCORE_MAX, Math.max(SCORE_MIN, value))
}

function overlap(left: Set<string>, right: Set<string>): number {
  let count = 0
  for (const term of left) {
    if (right.has(term)) count++
  }
  return count
}

// Skill match

/**
 * 70 × required coverage + 30 × optional coverage.
 * Neutral 50 when nothing is required; optional term is 0 when no optional skill is listed.
 */
export function skillMatchScore(
  candidateSkills: readonly string[],
  requiredSkills: readonly string[],
  optionalSkills: readonly string[] = [],
): number {
  const candidate = toTermSet(candidateSkills)
  const required = toTermSet(requiredSkills)
  const optional = toTermSet(optionalSkills)

  if (required.size === 0) {
    return NEUTRAL_SCORE
  }

  const requiredPart = (overlap(candidate, required) / required.size) * SKILL_MATCH_WEIGHTS.required
  const optionalPart =
    optional.size > 0 ? (overlap(candidate, optional) / optional.size) * SKILL_MATCH_WEIGHTS.optional : 0

  return clampScore(requiredPart + optionalPart)
}

// Experience

/**
 * - no minimum            → 50
 * - below minimum         → 50 − 10 per missing year, floored at 0
 * - above maximum (if any) → 100 − 5 per extra year, floored at 70
 * - otherwise             → 100
 */
export function experienceScore(candidateYears: number, requiredMin: number | null, requiredMax: number | null): number {
  if (requiredMin === null) {
    return NEUTRAL_SCORE
  }

  if (candidateYears < requiredMin) {
    return clampScore(Math.max(0, NEUTRAL_SCORE - (requiredMin - candidateYears) * EXPERIENCE_RULES.penaltyPerMissingYear))
  }

  if (requiredMax !== null && candidateYears > requiredMax) {
    const excess = candidateYears - requiredMax
    return clampScore(
      Math.max(EXPERIENCE_RULES.overqualifiedFloor, SCORE_MAX - excess * EXPERIENCE_RULES.penaltyPerExtraYear),
    )
  }

  return SCORE_MAX
}

// Languages

export function languageScore(candidateLanguages: readonly string[], requiredLanguages: readonly string[]): number {
  const required = toTermSet(requiredLanguages)
  if (required.size === 0) {
    return NO_LANGUAGE_REQUIRED_SCORE
  }

  const candidate = toTermSet(candidateLanguages)
  return clampScore((overlap(candidate, required) / required.size) * SCORE_MAX)
}

// Soft skills

/**
 * Categories whose terms appear (substring) in the lower-cased text, in category order
 */
export function detectSoftSkillCategories(text: string, categories: SoftSkillCategory): string[] {
  const lowered = text.toLowerCase()
  return Object.entries(categories)
    .filter(([, terms]) => terms.some((term) => lowered.includes(term)))
    .map(([category]) => category)
}

/**
 * Neutral 50 without a motivation text. Otherwise:
 * 60 × detected/7 + 40 × matched keywords/keywords + min(10, words/50)
 */
export function softSkillsScore(
  motivationText: string,
  experienceText: string,
  recruiterKeywords: readonly string[],
): number {
  if (!motivationText.trim()) {
    return NEUTRAL_SCORE
  }

  const combined = `${motivationText} ${experienceText}`.toLowerCase()
  const categoryCount = Object.keys(SCORED_SOFT_SKILLS).length
  const detected = detectSoftSkillCategories(combined, SCORED_SOFT_SKILLS).length
  const base = (detected / categoryCount) * SOFT_SKILL_RULES.categoryWeight

  const keywords = recruiterKeywords.map(normalizeTerm).filter((keyword) => keyword.length > 0)
  const keywordBonus =
    keywords.length > 0
      ? (keywords.filter((keyword) => combined.includes(keyword)).length / keywords.length) *
        SOFT_SKILL_RULES.keywordWeight
      : 0

  const lengthBonus = Math.min(
    SOFT_SKILL_RULES.maxLengthBonus,
    countWords(motivationText) / SOFT_SKILL_RULES.wordsPerLengthPoint,
  )

  return clampScore(base + keywordBonus + lengthBonus)
}

// Composites

export interface ProfileScoreBreakdown {
  score: number
  skillMatchScore: number
  experienceScore: number
  languageScore: number
}

export interface ProfileScoreInput {
  candidateSkills: readonly string[]
  candidateYears: number
  candidateLanguages: readonly string[]
  requiredSkills: readonly string[]
  optionalSkills: readonly string[]
  experienceMin: number | null
  experienceMax: number | null
  requiredLanguages: readonly string[]
}

/**
 * 0.5 × skill match + 0.3 × experience + 0.2 × languages
 */
export function profileScore(input: ProfileScoreInput): ProfileScoreBreakdown {
  const skills = skillMatchScore(input.candidateSkills, input.requiredSkills, input.optionalSkills)
  const experience = experienceScore(input.candidateYears, input.experienceMin, input.experienceMax)
  const languages = languageScore(input.candidateLanguages, input.requiredLanguages)

  return {
    score: clampScore(
      skills * PROFILE_WEIGHTS.skills + experience * PROFILE_WEIGHTS.experience + languages * PROFILE_WEIGHTS.languages,
    ),
    skillMatchScore: skills,
    experienceScore: experience,
    languageScore: languages,
  }
}

export interface TechnicalScoreBreakdown {
  score: number
  matched: string[]
  missing: string[]
  coverage: number
}

/**
 * Required-only skill match, computed independently of the profile score.
 * Coverage = |matched| / |required| (0 when nothing is required).
 */
export function technicalScore(
  candidateSkills: readonly string[],
  requiredSkills: readonly string[],
): TechnicalScoreBreakdown {
  const candidate = toTermSet(candidateSkills)
  const required = [...toTermSet(requiredSkills)]
  const matched = required.filter((skill) => candidate.has(skill))
  const missing = required.filter((skill) => !candidate.has(skill))

  return {
    score: skillMatchScore(candidateSkills, requiredSkills, []),
    matched,
    missing,
    coverage: required.length > 0 ? matched.length / required.length : 0,
  }
}
