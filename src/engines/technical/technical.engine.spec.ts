import { TechnicalEngine } from './technical.engine'
import { LlmGatewayService } from '../../shared/services/llm-gateway.service'
import { LoggerService } from '../../shared/services/logger.service'
import { UnavailableTextGenerator } from '../../shared/services/text-generator'
import { buildCandidate, buildJob } from '../../testing/fixtures'

describe('TechnicalEngine', () => {
  const engine = new TechnicalEngine(new LlmGatewayService(new UnavailableTextGenerator(), new LoggerService()))

  it('scores required coverage and reports optional matches as bonus', async () => {
    const result = await engine.evaluate(
      buildCandidate({ skills: ['Python', 'SQL', 'Docker'] }),
      buildJob({ requiredSkills: ['python', 'power bi', 'machine learning'], optionalSkills: ['docker'] }),
    )

    expect(result.score).toBeCloseTo(23.333, 3)
    expect(result.matched).toEqual(['python'])
    expect(result.missing).toEqual(['power bi', 'machine learning'])
    expect(result.bonus).toEqual(['docker'])
    expect(result.comment).toBe(
      'Compétences techniques maîtrisées: python. Compétences manquantes: power bi, machine learning. ' +
        'Compétences bonus: docker. Score technique: 23.3/100 (insuffisant, 1/3 compétences).',
    )
  })

  it('is neutral when the job requires nothing', async () => {
    const result = await engine.evaluate(buildCandidate({ skills: ['python'] }), buildJob())

    expect(result.score).toBe(50)
    expect(result.comment).toBe('Score technique: 50.0/100 (insuffisant, 0/0 compétences).')
  })
})
