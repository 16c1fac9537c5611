import { Injectable } from '@nestjs/common'
import { LlmGatewayService } from '../../shared/services/llm-gateway.service'
import { technicalScore, type TechnicalScoreBreakdown } from '../scoring/scoring.contract'
import { coverageLevel, formatScore, joinSentences, listPreview } from '../commentary'
import { toTermSet } from '../../shared/helpers'
import type { CandidateProfileType } from '../../routes/candidate/candidate.model'
import type { JobProfileType } from '../../routes/job/job.model'

export interface TechnicalEvaluation extends TechnicalScoreBreakdown {
  bonus: string[]
  comment: string
}

/**
 * Technical Engine
 *
 * Required-skill coverage only (optional skills are reported as bonus, never scored here).
 */
@Injectable()
export class TechnicalEngine {
  constructor(private readonly llmGateway: LlmGatewayService) {}

  async evaluate(candidate: CandidateProfileType, job: JobProfileType): Promise<TechnicalEvaluation> {
    const breakdown = technicalScore(candidate.skills, job.requiredSkills)

    const optional = toTermSet(job.optionalSkills)
    const bonus = [...toTermSet(candidate.skills)].filter((skill) => optional.has(skill))

    const fallback = this.buildComment(breakdown, bonus)
    const comment = await this.llmGateway.complete({
      operation: 'technicalComment',
      prompt: this.buildPrompt(breakdown, bonus),
      fallback,
    })

    return { ...breakdown, bonus, comment }
  }

  buildComment(breakdown: TechnicalScoreBreakdown, bonus: string[]): string {
    const parts: string[] = []

    if (breakdown.matched.length > 0) {
      parts.push(`Compétences techniques maîtrisées: ${listPreview(breakdown.matched, 5)}`)
    }
    if (breakdown.missing.length > 0) {
      parts.push(`Compétences manquantes: ${listPreview(breakdown.missing, 5)}`)
    }
    if (bonus.length > 0) {
      parts.push(`Compétences bonus: ${listPreview(bonus, 3)}`)
    }

    const requiredCount = breakdown.matched.length + breakdown.missing.length
    parts.push(
      `Score technique: ${formatScore(breakdown.score)}/100 (${coverageLevel(breakdown.coverage)}, ${breakdown.matched.length}/${requiredCount} compétences)`,
    )
    return joinSentences(parts)
  }

  private buildPrompt(breakdown: TechnicalScoreBreakdown, bonus: string[]) {
    return `Tu es un expert technique en recrutement. Analyse l'évaluation suivante et génère un commentaire justificatif pour un score technique de ${formatScore(breakdown.score)}/100.

Compétences maîtrisées: ${breakdown.matched.join(', ') || 'Aucune'}
Compétences manquantes: ${breakdown.missing.join(', ') || 'Aucune'}
Compétences bonus: ${bonus.join(', ') || 'Aucune'}
Couverture des compétences requises: ${Math.round(breakdown.coverage * 100)}%

Génère un commentaire concis (2-3 phrases) sur le niveau technique du candidat. Ne propose pas d'autre score.`
  }
}
