/**
 * JOB POSTING RULES
 * APPLICABLE TO: JOB DESCRIPTIONS (FR / EN)
 *
 * Lists are ordered and evaluated first-match-wins, except salary, which
 * collects every amount in the posting and keeps the [min, max] range.
 */

import type { JobContractType, JobSeniorityType } from '../../routes/job/job.model'
import vocabulary from './vocabulary.json'

export const JOB_TITLES: readonly string[] = vocabulary.jobTitles

export const ROLE_KEYWORDS: readonly string[] = vocabulary.roleKeywords

export const TECHNICAL_KEYWORDS: readonly string[] = vocabulary.technicalKeywords

export const TITLE_MAX_LENGTH = 200

// =============================================================================
// CONTRACT
// =============================================================================

export interface ContractRule {
  contractType: Exclude<JobContractType, 'unspecified'>
  terms: readonly string[]
}

export const CONTRACT_RULES: readonly ContractRule[] = [
  { contractType: 'CDI', terms: ['cdi'] },
  { contractType: 'CDD', terms: ['cdd'] },
  { contractType: 'Stage', terms: ['stage', 'intern', 'internship'] },
  { contractType: 'Alternance', terms: ['alternance', 'apprentissage'] },
  { contractType: 'Freelance', terms: ['freelance', 'indépendant', 'independant'] },
]

// =============================================================================
// SENIORITY (intermediate when nothing matches)
// =============================================================================

export interface SeniorityRule {
  seniority: Exclude<JobSeniorityType, 'intermediate'>
  terms: readonly string[]
}

export const SENIORITY_RULES: readonly SeniorityRule[] = [
  { seniority: 'junior', terms: ['junior', 'débutant', 'debutant', 'entry'] },
  { seniority: 'senior', terms: ['senior', 'expérimenté', 'experimente', 'lead'] },
  { seniority: 'intern', terms: ['alternance', 'apprentissage', 'intern', 'stage'] },
]

// =============================================================================
// SALARY (amounts in thousands)
// =============================================================================

export const SALARY_PATTERNS = [/(\d{2,3})\s*ke?(?![\p{L}\p{N}_])/gu, /(\d+)\s*euros/gu] as const

export const SALARY_UNIT = 1000

// =============================================================================
// LOCATION
// =============================================================================

export const LOCATION_PATTERN =
  /(?<![\p{L}\p{N}_])(paris|lyon|lille|nantes|bordeaux|remote|teletravail|télétravail|idf|ile-de-france|levallois(?:-|\s)?perret)(?![\p{L}\p{N}_])/u

// =============================================================================
// MINIMUM EXPERIENCE (matched against lower-cased text)
// =============================================================================

export const JOB_EXPERIENCE_PATTERNS = [/(\d+)\s*ans?\s*d['’ ]?exp/u, /(\d+)\+?\s*years/u] as const
