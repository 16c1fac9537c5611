import { Injectable } from '@nestjs/common'
import { collapseWhitespace, containsWholeWord } from '../helpers'
import { SectionSplitterService } from './section-splitter.service'
import { EntityExtractionService } from './entity-extraction.service'
import { JOB_SECTION_HEADINGS } from '../../rules/recruitment/section-headings.rules'
import {
  CONTRACT_RULES,
  JOB_EXPERIENCE_PATTERNS,
  JOB_TITLES,
  LOCATION_PATTERN,
  ROLE_KEYWORDS,
  SALARY_PATTERNS,
  SALARY_UNIT,
  SENIORITY_RULES,
  TECHNICAL_KEYWORDS,
  TITLE_MAX_LENGTH,
} from '../../rules/recruitment/job-posting.rules'
import type { JobContractType, JobSeniorityType, RangeType } from '../../routes/job/job.model'

export interface ParsedJobPosting {
  title: string
  position: string
  seniority: JobSeniorityType
  experienceMin: number | null
  languages: string[]
  location: string
  contractType: JobContractType
  salary: RangeType
  keywords: string[]
  sections: Record<string, string>
  rawText: string
}

/**
 * JobDescriptionParserService - Stage 2 (job side)
 *
 * Purpose: Rule-based structured extraction from a job posting.
 *
 * Allowed logic:
 * - Section splitting with job posting headings
 * - Vocabulary / regex detection (title, contract, salary, location, languages, keywords)
 *
 * Forbidden logic:
 * - Any LLM usage (see JobService for the optional LLM-first path)
 * - Applying recruiter overrides (JobService owns precedence)
 */
@Injectable()
export class JobDescriptionParserService {
  constructor(
    private readonly sectionSplitter: SectionSplitterService,
    private readonly entityExtraction: EntityExtractionService,
  ) {}

  parse(text: string): ParsedJobPosting {
    const cleaned = collapseWhitespace(text)
    const lowered = cleaned.toLowerCase()
    const sections: Record<string, string> = {}
    for (const [name, body] of Object.entries(this.sectionSplitter.split(cleaned, JOB_SECTION_HEADINGS))) {
      if (typeof body === 'string') sections[name] = body
    }

    return {
      title: this.detectTitle(text),
      position: this.detectPosition(lowered),
      seniority: this.detectSeniority(lowered),
      experienceMin: this.extractMinimumExperience(lowered),
      languages: this.entityExtraction.detectLanguages(lowered),
      location: this.detectLocation(lowered),
      contractType: this.detectContractType(lowered),
      salary: this.extractSalaryRange(lowered),
      keywords: this.detectTechnicalKeywords(lowered),
      sections,
      rawText: text.trim(),
    }
  }

  /**
   * First raw line carrying a role keyword, else the first non-empty line
   */
  detectTitle(text: string): string {
    const lines = text
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)

    const titleLine = lines.find((line) => ROLE_KEYWORDS.some((keyword) => containsWholeWord(line, keyword))) ?? lines[0]
    return (titleLine ?? '').slice(0, TITLE_MAX_LENGTH)
  }

  detectPosition(lowered: string): string {
    return JOB_TITLES.find((title) => containsWholeWord(lowered, title)) ?? ''
  }

  detectSeniority(lowered: string): JobSeniorityType {
    const rule = SENIORITY_RULES.find(({ terms }) => terms.some((term) => containsWholeWord(lowered, term)))
    return rule?.seniority ?? 'intermediate'
  }

  detectContractType(lowered: string): JobContractType {
    const rule = CONTRACT_RULES.find(({ terms }) => terms.some((term) => containsWholeWord(lowered, term)))
    return rule?.contractType ?? 'unspecified'
  }

  /**
   * Every amount in thousands ("45k", "45 ke", "50 euros"); range over all of them
   */
  extractSalaryRange(lowered: string): RangeType {
    const amounts: number[] = []
    for (const pattern of SALARY_PATTERNS) {
      for (const match of lowered.matchAll(pattern)) {
        amounts.push(Number.parseInt(match[1], 10))
      }
    }

    if (amounts.length === 0) {
      return { min: null, max: null }
    }
    return {
      min: Math.min(...amounts) * SALARY_UNIT,
      max: Math.max(...amounts) * SALARY_UNIT,
    }
  }

  detectLocation(lowered: string): string {
    return lowered.match(LOCATION_PATTERN)?.[1] ?? ''
  }

  extractMinimumExperience(lowered: string): number | null {
    for (const pattern of JOB_EXPERIENCE_PATTERNS) {
      const match = lowered.match(pattern)
      if (match?.[1]) {
        return Number.parseInt(match[1], 10)
      }
    }
    return null
  }

  /**
   * Technical vocabulary present as whole words, in vocabulary order
   */
  detectTechnicalKeywords(lowered: string): string[] {
    return TECHNICAL_KEYWORDS.filter((keyword) => containsWholeWord(lowered, keyword))
  }
}
