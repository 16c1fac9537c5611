import { createScoringConfig, InvalidScoringConfigError } from './scoring-config'

describe('createScoringConfig', () => {
  it('defaults to 0.3 / 0.4 / 0.3 with four bands and a top 5', () => {
    const config = createScoringConfig()

    expect(config.weights).toEqual({ profile: 0.3, technical: 0.4, softSkills: 0.3 })
    expect(config.bands.map((band) => band.label)).toEqual([
      'fortement recommandé',
      'recommandé',
      'à considérer',
      'à rejeter',
    ])
    expect(config.topN).toBe(5)
  })

  it('returns a frozen object', () => {
    const config = createScoringConfig()

    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.weights)).toBe(true)
    expect(Object.isFrozen(config.bands[0])).toBe(true)
  })

  it('accepts weights whose float sum is 1 within tolerance', () => {
    expect(() => createScoringConfig({ weights: { profile: 0.1, technical: 0.2, softSkills: 0.7 } })).not.toThrow()
  })

  it('rejects weights that do not sum to 1', () => {
    expect(() => createScoringConfig({ weights: { profile: 0.5, technical: 0.5, softSkills: 0.5 } })).toThrow(
      InvalidScoringConfigError,
    )
  })

  it('rejects negative or non-finite weights', () => {
    expect(() => createScoringConfig({ weights: { profile: -0.2, technical: 0.6, softSkills: 0.6 } })).toThrow(
      'Scoring weights must be finite and non-negative',
    )
    expect(() => createScoringConfig({ weights: { profile: Number.NaN, technical: 0.5, softSkills: 0.5 } })).toThrow(
      InvalidScoringConfigError,
    )
  })

  it('rejects bands that are not strictly descending', () => {
    expect(() =>
      createScoringConfig({
        bands: [
          { minScore: 40, label: 'à considérer' },
          { minScore: 60, label: 'recommandé' },
          { minScore: 0, label: 'à rejeter' },
        ],
      }),
    ).toThrow('Recommendation bands must be ordered by strictly descending minScore')
  })

  it('requires a last band that accepts a score of 0', () => {
    expect(() => createScoringConfig({ bands: [{ minScore: 50, label: 'recommandé' }] })).toThrow(
      'The last recommendation band must accept a score of 0',
    )
  })

  it('rejects a non-positive top N', () => {
    expect(() => createScoringConfig({ topN: 0 })).toThrow('Report top N must be a positive integer')
  })

  it('does not share state with the caller', () => {
    const weights = { profile: 0.2, technical: 0.5, softSkills: 0.3 }
    const config = createScoringConfig({ weights })
    weights.profile = 0.9

    expect(config.weights.profile).toBe(0.2)
  })
})
