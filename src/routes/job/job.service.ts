import { Injectable } from '@nestjs/common'
import { JobRepo } from './job.repo'
import { JobDescriptionParserService, type ParsedJobPosting } from '../../shared/services/job-description-parser.service'
import { EntityExtractionService } from '../../shared/services/entity-extraction.service'
import { LlmGatewayService } from '../../shared/services/llm-gateway.service'
import { LoggerService } from '../../shared/services/logger.service'
import { buildRecordId, deepFreeze, normalizeTerm, normalizeTerms, toRecordId } from '../../shared/helpers'
import {
  JobInvalidExperienceRangeException,
  JobInvalidProfileException,
  JobInvalidSalaryRangeException,
  JobNotFoundException,
} from './job.error'
import {
  JobProfileSchema,
  LlmJobAnalysisSchema,
  type JobCriteriaOverridesType,
  type JobProfileType,
  type LlmJobAnalysisType,
  type RangeType,
} from './job.model'

export interface AnalyzeJobOptions {
  preferLlm?: boolean
  id?: string
}

/**
 * JobService - Stage 2 (job side)
 *
 * Purpose: Turn a free-text posting into the canonical, immutable JobProfile.
 *
 * Precedence (per field): recruiter override > language model > rules.
 * An override key that is present, null included, always wins.
 *
 * Forbidden logic:
 * - Scoring candidates
 * - Calling the model outside LlmGatewayService
 */
@Injectable()
export class JobService {
  constructor(
    private readonly jobRepo: JobRepo,
    private readonly jobParser: JobDescriptionParserService,
    private readonly entityExtraction: EntityExtractionService,
    private readonly llmGateway: LlmGatewayService,
    private readonly logger: LoggerService,
  ) {}

  async analyzeJob(
    description: string,
    overrides: JobCriteriaOverridesType = {},
    options: AnalyzeJobOptions = {},
  ): Promise<JobProfileType> {
    const parsed = this.jobParser.parse(description)
    const llm = options.preferLlm
      ? await this.llmGateway.completeJson(
          { operation: 'analyzeJob', prompt: this.buildAnalysisPrompt(description) },
          LlmJobAnalysisSchema,
        )
      : null

    // Model and rule values never raise: an inconsistent pair falls back to the rules
    const extractedExperience = this.extractedRange(
      'experience',
      { min: llm?.experienceMin, max: llm?.experienceMax },
      { min: parsed.experienceMin, max: null },
    )
    const experience = this.applyOverrides(overrides.experienceMin, overrides.experienceMax, extractedExperience)
    if (!isOrdered(experience)) {
      throw JobInvalidExperienceRangeException
    }

    const extractedSalary = this.extractedRange('salary', {}, parsed.salary)
    const salary = this.applyOverrides(overrides.salaryMin, overrides.salaryMax, extractedSalary)
    if (!isOrdered(salary)) {
      throw JobInvalidSalaryRangeException
    }

    const title = overrides.title ?? nonEmpty(llm?.title) ?? parsed.title

    const candidate = {
      id: options.id ?? toRecordId(title, 'job'),
      title,
      position: overrides.position ?? parsed.position,
      seniority: overrides.seniority ?? llm?.seniority ?? parsed.seniority,
      experience,
      requiredSkills: normalizeTerms(overrides.requiredSkills ?? nonEmptyList(llm?.requiredSkills) ?? parsed.keywords),
      optionalSkills: normalizeTerms(overrides.optionalSkills ?? nonEmptyList(llm?.optionalSkills) ?? []),
      languages: this.canonicalLanguages(overrides.languages ?? nonEmptyList(llm?.languages) ?? parsed.languages),
      location: overrides.location ?? nonEmpty(llm?.location) ?? parsed.location,
      contractType: overrides.contractType ?? llm?.contractType ?? parsed.contractType,
      salary,
      keywords: normalizeTerms(overrides.keywords ?? this.mergeKeywords(parsed, llm)),
      notes: overrides.notes ?? '',
      sections: parsed.sections,
      rawText: parsed.rawText,
      source: llm ? 'llm' : 'rules',
    }

    const result = JobProfileSchema.safeParse(candidate)
    if (!result.success) {
      this.logger.logWarning('Job profile failed validation', {
        service: 'JobService',
        operation: 'analyzeJob',
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      })
      throw JobInvalidProfileException
    }

    return deepFreeze(result.data)
  }

  async createJob(name: string, description: string, overrides?: JobCriteriaOverridesType, preferLlm = false) {
    const job = await this.analyzeJob(description, overrides, {
      preferLlm,
      id: buildRecordId(name, 'job'),
    })
    await this.jobRepo.saveJob(job)

    this.logger.logInfo('Job profile stored', {
      service: 'JobService',
      operation: 'createJob',
      jobId: job.id,
      source: job.source,
    })
    return job
  }

  async listJobs() {
    const jobs = await this.jobRepo.findAllJobs()
    return {
      jobs: jobs.map((job) => ({
        id: job.id,
        title: job.title,
        seniority: job.seniority,
        contractType: job.contractType,
        requiredSkillCount: job.requiredSkills.length,
      })),
    }
  }

  async getJob(jobId: string) {
    const job = await this.jobRepo.findJobById(jobId)
    if (!job) {
      throw JobNotFoundException
    }
    return deepFreeze(job)
  }

  async deleteJob(jobId: string) {
    const deleted = await this.jobRepo.deleteJob(jobId)
    if (!deleted) {
      throw JobNotFoundException
    }
    return { message: 'Job deleted successfully' }
  }

  /**
   * Model bounds over rule bounds; if the pair comes out inverted, the rules alone
   * (or no range at all when the rules are inverted too).
   */
  private extractedRange(
    field: 'experience' | 'salary',
    llm: { min?: number | null; max?: number | null },
    rules: RangeType,
  ): RangeType {
    const merged = {
      min: llm.min !== undefined ? llm.min : rules.min,
      max: llm.max !== undefined ? llm.max : rules.max,
    }
    if (isOrdered(merged)) return merged

    this.logger.logWarning('Discarding inconsistent extracted range', {
      service: 'JobService',
      operation: 'analyzeJob',
      field,
      min: merged.min,
      max: merged.max,
    })
    return isOrdered(rules) ? rules : { min: null, max: null }
  }

  // A present override key wins, null included
  private applyOverrides(
    overrideMin: number | null | undefined,
    overrideMax: number | null | undefined,
    extracted: RangeType,
  ): RangeType {
    return {
      min: overrideMin !== undefined ? overrideMin : extracted.min,
      max: overrideMax !== undefined ? overrideMax : extracted.max,
    }
  }

  private mergeKeywords(parsed: ParsedJobPosting, llm: LlmJobAnalysisType | null): string[] {
    return [...parsed.keywords, ...(llm?.keywords ?? [])]
  }

  // "English" and "anglais" must land on the same term candidates carry
  private canonicalLanguages(values: readonly string[]): string[] {
    return normalizeTerms(values.map((value) => this.entityExtraction.detectLanguages(value)[0] ?? normalizeTerm(value)))
  }

  private buildAnalysisPrompt(description: string): string {
    return `Tu es un analyste RH. Extrais les critères de recrutement de l'offre d'emploi ci-dessous.

OFFRE:
"""
${description}
"""

Réponds UNIQUEMENT avec un objet JSON compact, sans texte autour, au format:
{
  "title": "intitulé du poste",
  "seniority": "junior" | "intermediate" | "senior" | "intern",
  "experienceMin": nombre d'années minimum ou null,
  "experienceMax": nombre d'années maximum ou null,
  "requiredSkills": ["compétence obligatoire", ...],
  "optionalSkills": ["compétence appréciée", ...],
  "languages": ["anglais", "francais", ...],
  "location": "ville ou remote",
  "contractType": "CDI" | "CDD" | "Stage" | "Alternance" | "Freelance" | "unspecified",
  "keywords": ["mot-clé technique", ...]
}

Omets un champ si l'offre ne le précise pas. Les compétences sont en minuscules.`
  }
}

function isOrdered(range: RangeType): boolean {
  return range.min === null || range.max === null || range.min <= range.max
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined
}

function nonEmptyList(values: string[] | undefined): string[] | undefined {
  return values && values.length > 0 ? values : undefined
}
