import { Test, type TestingModule } from '@nestjs/testing'
import { mkdtemp, rm } from 'fs/promises'
import os from 'os'
import path from 'path'
import { EvaluationService } from './evaluation.service'
import { EvaluationModule } from './evaluation.module'
import { JobService } from '../job/job.service'
import { CandidateService } from '../candidate/candidate.service'
import { CandidateNotFoundException } from '../candidate/candidate.error'
import { SharedModule } from '../../shared/shared.module'
import { DATA_DIR } from '../../shared/services/json-store.service'
import { TEXT_GENERATOR, UnavailableTextGenerator } from '../../shared/services/text-generator'
import {
  CANDIDATE_RETRIEVER,
  UnavailableCandidateRetriever,
  type CandidateRetriever,
} from '../../shared/services/candidate-retriever'
import { FakeCandidateRetriever } from '../../testing/fixtures'

const DATA_SCIENTIST_POSTING = `Data Scientist
Nous recherchons un Data Scientist avec 2 ans d'expérience minimum.
Compétences requises: Python, Machine Learning, Power BI.
Langues: Français, Anglais.`

const BOB_RESUME = 'Bob Durand\nDisponible, 3 ans en data\nCompétences\nPython, SQL'

const CHLOE_RESUME = 'Chloé Durand\nCompétences\nPython, Power BI, Machine Learning\nLangues\nFrançais, Anglais'

describe('EvaluationService', () => {
  let dataDir: string
  let moduleRef: TestingModule | undefined

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'evaluation-service-'))
  })

  afterEach(async () => {
    await moduleRef?.close()
    moduleRef = undefined
    await rm(dataDir, { recursive: true, force: true })
  })

  async function setup(retriever: CandidateRetriever = new UnavailableCandidateRetriever(), withCandidates = true) {
    moduleRef = await Test.createTestingModule({ imports: [SharedModule, EvaluationModule] })
      .overrideProvider(DATA_DIR)
      .useValue(dataDir)
      .overrideProvider(TEXT_GENERATOR)
      .useValue(new UnavailableTextGenerator())
      .overrideProvider(CANDIDATE_RETRIEVER)
      .useValue(retriever)
      .compile()

    const candidateService = moduleRef.get(CandidateService)
    await moduleRef.get(JobService).createJob('data_scientist', DATA_SCIENTIST_POSTING)
    if (withCandidates) {
      await candidateService.createCandidate(BOB_RESUME, 'cv_bob.txt')
      await candidateService.createCandidate(CHLOE_RESUME, 'cv_chloe.txt')
    }

    return { evaluationService: moduleRef.get(EvaluationService), candidateService }
  }

  it('scores every stored candidate and ranks them by global score', async () => {
    const { evaluationService } = await setup()

    const result = await evaluationService.runEvaluation('data_scientist')

    expect(result.warnings).toEqual([])
    expect(result.evaluations.map((evaluation) => evaluation.candidateId)).toEqual(['cv_chloe', 'cv_bob'])

    const [chloe, bob] = result.evaluations
    expect(chloe.scores.global).toBeCloseTo(62.2, 6)
    expect(chloe.recommendation).toBe('recommandé')

    expect(bob.scores.profile).toBeCloseTo(41.667, 3)
    expect(bob.scores.technical).toBeCloseTo(23.333, 3)
    expect(bob.scores.softSkills).toBe(50)
    expect(bob.scores.global).toBeCloseTo(36.833, 3)
    expect(bob.recommendation).toBe('à rejeter')
    expect(bob.details).toMatchObject({
      matchedSkills: ['python'],
      missingSkills: ['power bi', 'machine learning'],
      bonusSkills: [],
      experienceScore: 100,
      languageScore: 0,
      softSkillsDetected: [],
    })
    expect(bob.details.coverage).toBeCloseTo(1 / 3, 6)

    expect(result.report.statistics.total).toBe(2)
    expect(result.report.topCandidates.map((evaluation) => evaluation.candidateId)).toEqual(['cv_chloe', 'cv_bob'])
  })

  it('evaluates only the retrieved candidates it knows', async () => {
    const retriever = new FakeCandidateRetriever(async () => [
      { candidateId: 'cv_bob', score: 0.9 },
      { candidateId: 'cv_inconnu', score: 0.5 },
    ])
    const { evaluationService } = await setup(retriever)

    const result = await evaluationService.runEvaluation('data_scientist', { topK: 3 })

    expect(retriever.queries).toEqual([{ jobId: 'data_scientist', topK: 3 }])
    expect(result.evaluations.map((evaluation) => evaluation.candidateId)).toEqual(['cv_bob'])
    expect(result.warnings).toEqual([])
  })

  it('falls back to every candidate when retrieval finds no known one', async () => {
    const { evaluationService } = await setup(
      new FakeCandidateRetriever(async () => [{ candidateId: 'cv_inconnu', score: 0.5 }]),
    )

    const result = await evaluationService.runEvaluation('data_scientist')

    expect(result.evaluations).toHaveLength(2)
    expect(result.warnings).toEqual(['Retrieval returned no known candidates, evaluating all candidates'])
  })

  it('falls back to every candidate when retrieval fails', async () => {
    const { evaluationService } = await setup(
      new FakeCandidateRetriever(async () => {
        throw new Error('index offline')
      }),
    )

    const result = await evaluationService.runEvaluation('data_scientist')

    expect(result.evaluations).toHaveLength(2)
    expect(result.warnings).toEqual(['Retrieval failed, evaluating all candidates'])
  })

  it('skips retrieval when the caller turns it off', async () => {
    const retriever = new FakeCandidateRetriever(async () => [{ candidateId: 'cv_bob', score: 0.9 }])
    const { evaluationService } = await setup(retriever)

    const result = await evaluationService.runEvaluation('data_scientist', { useRetrieval: false })

    expect(retriever.queries).toEqual([])
    expect(result.evaluations).toHaveLength(2)
  })

  it('warns when there is nobody to evaluate', async () => {
    const { evaluationService } = await setup(undefined, false)

    const result = await evaluationService.runEvaluation('data_scientist')

    expect(result.evaluations).toEqual([])
    expect(result.warnings).toEqual(['No candidates to evaluate'])
    expect(result.report.statistics).toEqual({ total: 0, mean: 0, max: 0, min: 0 })
  })

  it('keeps input order in batch evaluation', async () => {
    const { evaluationService, candidateService } = await setup()
    const bob = await candidateService.getCandidate('cv_bob')
    const chloe = await candidateService.getCandidate('cv_chloe')
    const job = await moduleRef?.get(JobService).getJob('data_scientist')
    if (!job) throw new Error('job missing')

    const evaluations = await evaluationService.evaluateAll([bob, chloe, bob], job)

    expect(evaluations.map((evaluation) => evaluation.candidateId)).toEqual(['cv_bob', 'cv_chloe', 'cv_bob'])
  })

  it('evaluates a single stored candidate', async () => {
    const { evaluationService } = await setup()

    const evaluation = await evaluationService.evaluateCandidate('data_scientist', 'cv_bob')

    expect(evaluation.scores.global).toBeCloseTo(36.833, 3)
    await expect(evaluationService.evaluateCandidate('data_scientist', 'cv_inconnu')).rejects.toBe(
      CandidateNotFoundException,
    )
  })
})
