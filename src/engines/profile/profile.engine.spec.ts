import { ProfileEngine } from './profile.engine'
import { LlmGatewayService } from '../../shared/services/llm-gateway.service'
import { LoggerService } from '../../shared/services/logger.service'
import { UnavailableTextGenerator } from '../../shared/services/text-generator'
import { FakeTextGenerator, buildCandidate, buildJob } from '../../testing/fixtures'

describe('ProfileEngine', () => {
  const job = buildJob({
    requiredSkills: ['python', 'power bi', 'machine learning'],
    experience: { min: 2, max: null },
    languages: ['anglais', 'francais'],
  })
  const candidate = buildCandidate({ skills: ['Python', 'SQL'], yearsExperience: 3 })

  it('scores the profile and writes the template comment without a model', async () => {
    const engine = new ProfileEngine(new LlmGatewayService(new UnavailableTextGenerator(), new LoggerService()))

    const result = await engine.evaluate(candidate, job)

    expect(result.score).toBeCloseTo(41.667, 3)
    expect(result.skillMatchScore).toBeCloseTo(23.333, 3)
    expect(result.experienceScore).toBe(100)
    expect(result.languageScore).toBe(0)
    expect(result.matchedSkills).toEqual(['python'])
    expect(result.comment).toBe(
      'Compétences correspondantes: python. Expérience adéquate (3 ans). Score global: 41.7/100 (moyen).',
    )
  })

  it('reports insufficient experience', async () => {
    const engine = new ProfileEngine(new LlmGatewayService(new UnavailableTextGenerator(), new LoggerService()))

    const result = await engine.evaluate(
      buildCandidate({ yearsExperience: 1 }),
      buildJob({ requiredSkills: ['python'], experience: { min: 3, max: null } }),
    )

    expect(result.comment).toBe('Expérience insuffisante (1 ans requis: 3). Score global: 29.0/100 (faible).')
  })

  it('takes the comment from the model but never the score', async () => {
    const generator = new FakeTextGenerator(async () => 'Profil prometteur, à approfondir en entretien.')
    const engine = new ProfileEngine(new LlmGatewayService(generator, new LoggerService()))

    const result = await engine.evaluate(candidate, job)

    expect(result.comment).toBe('Profil prometteur, à approfondir en entretien.')
    expect(result.score).toBeCloseTo(41.667, 3)
    expect(generator.prompts).toHaveLength(1)
  })
})
