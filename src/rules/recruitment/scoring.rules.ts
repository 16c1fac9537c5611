/**
 * SCORING RULES
 * APPLICABLE TO: EVERY (CANDIDATE, JOB) EVALUATION
 *
 * =============================================================================
 * SCORE MODEL
 * =============================================================================
 *
 * All sub-scores live in [0, 100].
 *
 * profile     = 0.5 × skill match + 0.3 × experience fit + 0.2 × language fit
 * technical   = skill match against required skills only
 * soft skills = category signal + recruiter keyword bonus + letter length bonus
 * global      = weighted sum of the three (weights from ScoringConfig, sum = 1)
 *
 * Missing job criteria never fail an evaluation: they resolve to neutral scores.
 * =============================================================================
 */

import type { RecommendationType } from '../../routes/evaluation/evaluation.model'

export const SCORE_MIN = 0
export const SCORE_MAX = 100

// Returned when the job gives nothing to compare against
export const NEUTRAL_SCORE = 50

export const SKILL_MATCH_WEIGHTS = {
  required: 70,
  optional: 30,
} as const

export const EXPERIENCE_RULES = {
  penaltyPerMissingYear: 10,
  penaltyPerExtraYear: 5,
  // Overqualified candidates never drop below this
  overqualifiedFloor: 70,
} as const

// No language required means every candidate fits
export const NO_LANGUAGE_REQUIRED_SCORE = 100

export const PROFILE_WEIGHTS = {
  skills: 0.5,
  experience: 0.3,
  languages: 0.2,
} as const

export const SOFT_SKILL_RULES = {
  categoryWeight: 60,
  keywordWeight: 40,
  maxLengthBonus: 10,
  wordsPerLengthPoint: 50,
} as const

export type SoftSkillCategory = Readonly<Record<string, readonly string[]>>

/**
 * Categories counted by the soft-skill SCORE (denominator = 7).
 * Terms are matched as substrings of the lower-cased letter + experience text.
 */
export const SCORED_SOFT_SKILLS = {
  teamwork: ['équipe', 'collaboration', 'teamwork', 'collaborer'],
  communication: ['communication', 'communiquer', 'présenter', 'expliquer'],
  leadership: ['lead', 'leader', 'diriger', 'management', 'gérer'],
  autonomy: ['autonome', 'autonomie', 'indépendant', 'indépendance'],
  problem_solving: ['résoudre', 'solution', 'problème', 'challenge'],
  adaptability: ['adaptable', 'flexible', 'changement', 'évolution'],
  motivation: ['motivé', 'motivation', 'passion', 'intéressé', 'enthousiaste'],
} as const satisfies SoftSkillCategory

/**
 * Wider list REPORTED in evaluation details and commentary. Does not affect the score.
 */
export const REPORTED_SOFT_SKILLS = {
  teamwork: ['équipe', 'collaboration', 'teamwork', 'collaborer', 'coopération'],
  communication: ['communication', 'communiquer', 'présenter', 'expliquer', 'oral', 'écrit'],
  leadership: ['lead', 'leader', 'diriger', 'management', 'gérer', 'encadrer'],
  autonomy: ['autonome', 'autonomie', 'indépendant', 'indépendance', 'initiative'],
  problem_solving: ['résoudre', 'solution', 'problème', 'challenge', 'défi', 'analyser'],
  adaptability: ['adaptable', 'flexible', 'changement', 'évolution', 'agile'],
  motivation: ['motivé', 'motivation', 'passion', 'intéressé', 'enthousiaste', 'désireux'],
  creativity: ['créatif', 'créativité', 'innovation', 'imagination', 'original'],
  organization: ['organisé', 'organisation', 'planification', 'méthodique', 'structuré'],
  stress_management: ['stress', 'pression', 'sous pression', 'calme', 'sérénité'],
} as const satisfies SoftSkillCategory

// =============================================================================
// RECOMMENDATION BANDS (evaluated high to low, first match wins)
// =============================================================================

export interface RecommendationBand {
  minScore: number
  label: RecommendationType
}

export const DEFAULT_RECOMMENDATION_BANDS: readonly RecommendationBand[] = [
  { minScore: 80, label: 'fortement recommandé' },
  { minScore: 60, label: 'recommandé' },
  { minScore: 40, label: 'à considérer' },
  { minScore: Number.NEGATIVE_INFINITY, label: 'à rejeter' },
]

export const DEFAULT_SCORE_WEIGHTS = {
  profile: 0.3,
  technical: 0.4,
  softSkills: 0.3,
} as const

export const DEFAULT_REPORT_TOP_N = 5

// =============================================================================
// COMMENTARY LEVELS
// =============================================================================

// Score (0-100) → level used by profile and soft-skill commentary
export const SCORE_LEVELS = [
  { minScore: 80, level: 'excellent' },
  { minScore: 60, level: 'bon' },
  { minScore: 40, level: 'moyen' },
] as const
export const SCORE_LEVEL_FLOOR = 'faible'

// Coverage ratio (0-1) → level used by technical commentary
export const COVERAGE_LEVELS = [
  { minCoverage: 0.8, level: 'excellent' },
  { minCoverage: 0.6, level: 'bon' },
  { minCoverage: 0.4, level: 'moyen' },
] as const
export const COVERAGE_LEVEL_FLOOR = 'insuffisant'

export const LETTER_LENGTH_LEVELS = [
  { minWords: 201, label: 'Lettre de motivation détaillée et structurée' },
  { minWords: 101, label: 'Lettre de motivation correcte' },
  { minWords: 0, label: 'Lettre de motivation courte' },
] as const
export const NO_LETTER_LABEL = 'Aucune lettre de motivation fournie'
