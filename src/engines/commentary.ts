/**
 * Shared formatting for the deterministic (template) commentary.
 * Output is French, like the rest of the recruiter-facing text.
 */

import {
  COVERAGE_LEVEL_FLOOR,
  COVERAGE_LEVELS,
  SCORE_LEVEL_FLOOR,
  SCORE_LEVELS,
} from '../rules/recruitment/scoring.rules'

export function formatScore(score: number): string {
  return score.toFixed(1)
}

export function scoreLevel(score: number): string {
  return SCORE_LEVELS.find(({ minScore }) => score >= minScore)?.level ?? SCORE_LEVEL_FLOOR
}

export function coverageLevel(coverage: number): string {
  return COVERAGE_LEVELS.find(({ minCoverage }) => coverage >= minCoverage)?.level ?? COVERAGE_LEVEL_FLOOR
}

// "A. B. C."
export function joinSentences(parts: readonly string[]): string {
  return `${parts.join('. ')}.`
}

export function listPreview(items: readonly string[], limit: number): string {
  return items.slice(0, limit).join(', ')
}
