import envConfig from './config'
import { deepFreeze } from './helpers'
import {
  DEFAULT_RECOMMENDATION_BANDS,
  DEFAULT_REPORT_TOP_N,
  DEFAULT_SCORE_WEIGHTS,
  type RecommendationBand,
} from '../rules/recruitment/scoring.rules'

export const SCORING_CONFIG = Symbol('SCORING_CONFIG')

export interface ScoreWeights {
  profile: number
  technical: number
  softSkills: number
}

export interface ScoringConfig {
  readonly weights: Readonly<ScoreWeights>
  // Highest threshold first; the last band must accept any score
  readonly bands: readonly Readonly<RecommendationBand>[]
  readonly topN: number
}

export class InvalidScoringConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidScoringConfigError'
  }
}

const WEIGHT_SUM_TOLERANCE = 1e-9

/**
 * Build the immutable scoring configuration injected into the decision engine.
 * Throws InvalidScoringConfigError when weights are negative or do not sum to 1,
 * or when bands are not strictly descending with a catch-all last band.
 */
export function createScoringConfig(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
  const weights = { ...(overrides.weights ?? DEFAULT_SCORE_WEIGHTS) }
  const bands = (overrides.bands ?? DEFAULT_RECOMMENDATION_BANDS).map((band) => ({ ...band }))
  const topN = overrides.topN ?? DEFAULT_REPORT_TOP_N

  const values = [weights.profile, weights.technical, weights.softSkills]
  if (values.some((weight) => !Number.isFinite(weight) || weight < 0)) {
    throw new InvalidScoringConfigError('Scoring weights must be finite and non-negative')
  }
  const sum = values.reduce((total, weight) => total + weight, 0)
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new InvalidScoringConfigError(`Scoring weights must sum to 1 (got ${sum})`)
  }

  if (bands.length === 0) {
    throw new InvalidScoringConfigError('At least one recommendation band is required')
  }
  for (let i = 1; i < bands.length; i++) {
    if (bands[i].minScore >= bands[i - 1].minScore) {
      throw new InvalidScoringConfigError('Recommendation bands must be ordered by strictly descending minScore')
    }
  }
  if (bands[bands.length - 1].minScore > 0) {
    throw new InvalidScoringConfigError('The last recommendation band must accept a score of 0')
  }

  if (!Number.isInteger(topN) || topN < 1) {
    throw new InvalidScoringConfigError('Report top N must be a positive integer')
  }

  return deepFreeze({ weights, bands, topN })
}

/**
 * Scoring configuration from the environment (WEIGHT_*, REPORT_TOP_N)
 */
export function scoringConfigFromEnv(): ScoringConfig {
  return createScoringConfig({
    weights: {
      profile: envConfig.WEIGHT_PROFILE,
      technical: envConfig.WEIGHT_TECHNICAL,
      softSkills: envConfig.WEIGHT_SOFTSKILLS,
    },
    topN: envConfig.REPORT_TOP_N,
  })
}
