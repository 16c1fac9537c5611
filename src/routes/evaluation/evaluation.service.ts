import { Inject, Injectable } from '@nestjs/common'
import { JobService } from '../job/job.service'
import { CandidateService } from '../candidate/candidate.service'
import { CandidateRepo } from '../candidate/candidate.repo'
import { ProfileEngine } from '../../engines/profile/profile.engine'
import { TechnicalEngine } from '../../engines/technical/technical.engine'
import { SoftSkillsEngine } from '../../engines/soft-skills/soft-skills.engine'
import { DecisionEngine } from '../../engines/decision/decision.engine'
import { CANDIDATE_RETRIEVER, type CandidateRetriever } from '../../shared/services/candidate-retriever'
import { LoggerService } from '../../shared/services/logger.service'
import envConfig from '../../shared/config'
import type { CandidateProfileType } from '../candidate/candidate.model'
import type { JobProfileType } from '../job/job.model'
import type { EvaluationRunResultType, EvaluationType } from './evaluation.model'

export interface RunForJobOptions {
  useRetrieval?: boolean
  topK?: number
}

/**
 * EvaluationService is a PURE ORCHESTRATOR.
 *
 * Allowed:
 * - Candidate selection (retrieval pre-filter, fallback to every stored candidate)
 * - Fan-out to the three scoring engines, bounded by EVALUATION_CONCURRENCY
 * - Collecting soft warnings for the caller
 *
 * Forbidden:
 * - Scoring
 * - Threshold/band application
 * - Ranking logic (DecisionEngine owns it)
 */
@Injectable()
export class EvaluationService {
  private readonly concurrency = envConfig.EVALUATION_CONCURRENCY

  constructor(
    private readonly jobService: JobService,
    private readonly candidateService: CandidateService,
    private readonly candidateRepo: CandidateRepo,
    private readonly profileEngine: ProfileEngine,
    private readonly technicalEngine: TechnicalEngine,
    private readonly softSkillsEngine: SoftSkillsEngine,
    private readonly decisionEngine: DecisionEngine,
    @Inject(CANDIDATE_RETRIEVER) private readonly retriever: CandidateRetriever,
    private readonly logger: LoggerService,
  ) {}

  async evaluate(candidate: CandidateProfileType, job: JobProfileType): Promise<EvaluationType> {
    const [profile, technical, softSkills] = await Promise.all([
      this.profileEngine.evaluate(candidate, job),
      this.technicalEngine.evaluate(candidate, job),
      this.softSkillsEngine.evaluate(candidate, job),
    ])

    return this.decisionEngine.decide({
      candidateId: candidate.id,
      scores: {
        profile: profile.score,
        technical: technical.score,
        softSkills: softSkills.score,
      },
      comments: {
        profile: profile.comment,
        technical: technical.comment,
        softSkills: softSkills.comment,
      },
      details: {
        matchedSkills: technical.matched,
        missingSkills: technical.missing,
        bonusSkills: technical.bonus,
        coverage: technical.coverage,
        skillMatchScore: profile.skillMatchScore,
        experienceScore: profile.experienceScore,
        languageScore: profile.languageScore,
        softSkillsDetected: softSkills.detected,
      },
    })
  }

  /**
   * Evaluations in input order; at most `concurrency` candidates in flight
   */
  async evaluateAll(candidates: readonly CandidateProfileType[], job: JobProfileType): Promise<EvaluationType[]> {
    const evaluations: EvaluationType[] = []
    for (let start = 0; start < candidates.length; start += this.concurrency) {
      const batch = candidates.slice(start, start + this.concurrency)
      evaluations.push(...(await Promise.all(batch.map((candidate) => this.evaluate(candidate, job)))))
    }
    return evaluations
  }

  async runForJob(job: JobProfileType, options: RunForJobOptions = {}): Promise<EvaluationRunResultType> {
    const startTime = Date.now()
    const warnings: string[] = []

    const candidates = await this.selectCandidates(job, options, warnings)
    if (candidates.length === 0) {
      warnings.push('No candidates to evaluate')
    }

    const evaluations = this.decisionEngine.rank(await this.evaluateAll(candidates, job))
    const report = this.decisionEngine.summarize(evaluations)

    for (const warning of warnings) {
      this.logger.logWarning(warning, { service: 'EvaluationService', operation: 'runForJob', jobId: job.id })
    }
    this.logger.logInfo('Evaluation run completed', {
      service: 'EvaluationService',
      operation: 'runForJob',
      jobId: job.id,
      candidates: evaluations.length,
      durationMs: Date.now() - startTime,
    })

    return { job, evaluations, report, warnings }
  }

  async runEvaluation(jobId: string, options: RunForJobOptions = {}) {
    const job = await this.jobService.getJob(jobId)
    return this.runForJob(job, options)
  }

  async evaluateCandidate(jobId: string, candidateId: string) {
    const [job, candidate] = await Promise.all([
      this.jobService.getJob(jobId),
      this.candidateService.getCandidate(candidateId),
    ])
    return this.evaluate(candidate, job)
  }

  /**
   * Retrieval pre-filter when asked for and available; any empty, unknown or
   * failed result falls back to every stored candidate.
   */
  private async selectCandidates(
    job: JobProfileType,
    options: RunForJobOptions,
    warnings: string[],
  ): Promise<CandidateProfileType[]> {
    const useRetrieval = options.useRetrieval ?? true

    if (useRetrieval && this.retriever.available) {
      try {
        const retrieved = await this.retriever.queryByJobProfile(job, options.topK ?? envConfig.RETRIEVAL_TOP_K)
        const candidates = await this.candidateRepo.findCandidatesByIds(retrieved.map((hit) => hit.candidateId))
        if (candidates.length > 0) {
          return candidates
        }
        warnings.push('Retrieval returned no known candidates, evaluating all candidates')
      } catch (error) {
        this.logger.logError(error, { service: 'EvaluationService', operation: 'selectCandidates', jobId: job.id })
        warnings.push('Retrieval failed, evaluating all candidates')
      }
    }

    return this.candidateRepo.findAllCandidates()
  }
}
