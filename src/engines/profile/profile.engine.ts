import { Injectable } from '@nestjs/common'
import { LlmGatewayService } from '../../shared/services/llm-gateway.service'
import { profileScore, type ProfileScoreBreakdown } from '../scoring/scoring.contract'
import { formatScore, joinSentences, listPreview, scoreLevel } from '../commentary'
import { toTermSet } from '../../shared/helpers'
import type { CandidateProfileType } from '../../routes/candidate/candidate.model'
import type { JobProfileType } from '../../routes/job/job.model'

export interface ProfileEvaluation extends ProfileScoreBreakdown {
  matchedSkills: string[]
  comment: string
}

/**
 * Profile Engine
 *
 * Overall fit: skills (required + optional), years of experience, languages.
 * The comment may come from the language model; the score never does.
 */
@Injectable()
export class ProfileEngine {
  constructor(private readonly llmGateway: LlmGatewayService) {}

  async evaluate(candidate: CandidateProfileType, job: JobProfileType): Promise<ProfileEvaluation> {
    const breakdown = profileScore({
      candidateSkills: candidate.skills,
      candidateYears: candidate.yearsExperience,
      candidateLanguages: candidate.languages,
      requiredSkills: job.requiredSkills,
      optionalSkills: job.optionalSkills,
      experienceMin: job.experience.min,
      experienceMax: job.experience.max,
      requiredLanguages: job.languages,
    })

    const required = toTermSet(job.requiredSkills)
    const matchedSkills = [...toTermSet(candidate.skills)].filter((skill) => required.has(skill))

    const fallback = this.buildComment(candidate, job, breakdown.score, matchedSkills)
    const comment = await this.llmGateway.complete({
      operation: 'profileComment',
      prompt: this.buildPrompt(candidate, job, breakdown.score, matchedSkills),
      fallback,
    })

    return { ...breakdown, matchedSkills, comment }
  }

  buildComment(candidate: CandidateProfileType, job: JobProfileType, score: number, matchedSkills: string[]): string {
    const parts: string[] = []

    if (matchedSkills.length > 0) {
      parts.push(`Compétences correspondantes: ${listPreview(matchedSkills, 5)}`)
    }

    const minimum = job.experience.min
    if (minimum !== null && minimum > 0) {
      parts.push(
        candidate.yearsExperience >= minimum
          ? `Expérience adéquate (${candidate.yearsExperience} ans)`
          : `Expérience insuffisante (${candidate.yearsExperience} ans requis: ${minimum})`,
      )
    }

    parts.push(`Score global: ${formatScore(score)}/100 (${scoreLevel(score)})`)
    return joinSentences(parts)
  }

  private buildPrompt(candidate: CandidateProfileType, job: JobProfileType, score: number, matchedSkills: string[]) {
    return `Tu es un agent RH expert. Analyse le profil suivant et génère un commentaire justificatif pour un score de profil de ${formatScore(score)}/100.

Poste: ${job.title || 'Non précisé'}
Compétences requises: ${job.requiredSkills.join(', ') || 'Aucune'}
Expérience requise: ${job.experience.min ?? 'Non précisée'} ans
Langues requises: ${job.languages.join(', ') || 'Aucune'}

Compétences du candidat: ${candidate.skills.join(', ') || 'Aucune'}
Compétences correspondantes: ${matchedSkills.join(', ') || 'Aucune'}
Expérience du candidat: ${candidate.yearsExperience} ans
Niveau d'études: ${candidate.educationLevel}

Génère un commentaire concis (2-3 phrases) expliquant le score. Ne propose pas d'autre score.`
  }
}
