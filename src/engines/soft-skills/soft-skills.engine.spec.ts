import { SoftSkillsEngine } from './soft-skills.engine'
import { LlmGatewayService } from '../../shared/services/llm-gateway.service'
import { LoggerService } from '../../shared/services/logger.service'
import { UnavailableTextGenerator } from '../../shared/services/text-generator'
import { buildCandidate, buildJob } from '../../testing/fixtures'

describe('SoftSkillsEngine', () => {
  const engine = new SoftSkillsEngine(new LlmGatewayService(new UnavailableTextGenerator(), new LoggerService()))

  it('reads soft skills from the cover letter', async () => {
    const result = await engine.evaluate(
      buildCandidate({ coverLetter: "Motivé et autonome, j'aime le travail en équipe et les challenges." }),
      buildJob({ keywords: ['python'] }),
    )

    // 4 of 7 scored categories, no keyword, 11 words
    expect(result.score).toBeCloseTo(34.506, 3)
    expect(result.detected).toEqual(['teamwork', 'autonomy', 'problem_solving', 'motivation'])
    expect(result.matchedKeywords).toEqual([])
    expect(result.comment).toBe(
      'Soft skills détectés: teamwork, autonomy, problem_solving, motivation. ' +
        'Lettre de motivation courte. Score soft skills: 34.5/100 (faible).',
    )
  })

  it('reports recruiter keywords found in the letter', async () => {
    const result = await engine.evaluate(
      buildCandidate({ coverLetter: 'Je pratique Python au quotidien.' }),
      buildJob({ keywords: ['python', 'sql'] }),
    )

    expect(result.matchedKeywords).toEqual(['python'])
    expect(result.comment).toContain('Mots-clés recherchés trouvés: python.')
  })

  it('is neutral without a cover letter', async () => {
    const result = await engine.evaluate(buildCandidate(), buildJob({ keywords: ['python'] }))

    expect(result.score).toBe(50)
    expect(result.detected).toEqual([])
    expect(result.comment).toBe('Aucune lettre de motivation fournie. Score soft skills: 50.0/100 (moyen).')
  })
})
