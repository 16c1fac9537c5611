import { Injectable } from '@nestjs/common'
import { LlmGatewayService } from '../../shared/services/llm-gateway.service'
import { detectSoftSkillCategories, softSkillsScore } from '../scoring/scoring.contract'
import { formatScore, joinSentences, listPreview, scoreLevel } from '../commentary'
import { countWords, normalizeTerm } from '../../shared/helpers'
import {
  LETTER_LENGTH_LEVELS,
  NO_LETTER_LABEL,
  REPORTED_SOFT_SKILLS,
} from '../../rules/recruitment/scoring.rules'
import type { CandidateProfileType } from '../../routes/candidate/candidate.model'
import type { JobProfileType } from '../../routes/job/job.model'

export interface SoftSkillsEvaluation {
  score: number
  detected: string[]
  matchedKeywords: string[]
  comment: string
}

/**
 * Soft Skills Engine
 *
 * Signal from the cover letter (plus experience text): soft-skill vocabulary,
 * recruiter keywords, letter length. No letter → neutral score.
 */
@Injectable()
export class SoftSkillsEngine {
  constructor(private readonly llmGateway: LlmGatewayService) {}

  async evaluate(candidate: CandidateProfileType, job: JobProfileType): Promise<SoftSkillsEvaluation> {
    const letter = candidate.coverLetter
    const experienceText = candidate.sections.experience
    const combined = `${letter} ${experienceText}`.toLowerCase()

    const score = softSkillsScore(letter, experienceText, job.keywords)
    const detected = detectSoftSkillCategories(combined, REPORTED_SOFT_SKILLS)
    const matchedKeywords = job.keywords.filter((keyword) => {
      const term = normalizeTerm(keyword)
      return term.length > 0 && combined.includes(term)
    })

    const fallback = this.buildComment(letter, detected, matchedKeywords, score)
    const comment = await this.llmGateway.complete({
      operation: 'softSkillsComment',
      prompt: this.buildPrompt(letter, experienceText, detected, job.keywords, score),
      fallback,
    })

    return { score, detected, matchedKeywords, comment }
  }

  buildComment(letter: string, detected: string[], matchedKeywords: string[], score: number): string {
    const parts: string[] = []

    if (detected.length > 0) {
      parts.push(`Soft skills détectés: ${listPreview(detected, 5)}`)
    }

    if (letter.trim()) {
      const words = countWords(letter)
      parts.push(LETTER_LENGTH_LEVELS.find(({ minWords }) => words >= minWords)?.label ?? NO_LETTER_LABEL)
    } else {
      parts.push(NO_LETTER_LABEL)
    }

    if (matchedKeywords.length > 0) {
      parts.push(`Mots-clés recherchés trouvés: ${listPreview(matchedKeywords, 3)}`)
    }

    parts.push(`Score soft skills: ${formatScore(score)}/100 (${scoreLevel(score)})`)
    return joinSentences(parts)
  }

  private buildPrompt(letter: string, experienceText: string, detected: string[], keywords: string[], score: number) {
    return `Tu es un expert RH spécialisé dans l'évaluation des soft skills. Analyse le profil suivant et génère un commentaire justificatif pour un score de soft skills de ${formatScore(score)}/100.

Lettre de motivation (extrait): ${letter.slice(0, 500) || 'Non fournie'}
Expérience: ${experienceText.slice(0, 300) || 'Non fournie'}
Soft skills détectés: ${detected.join(', ') || 'Aucun'}
Mots-clés recherchés: ${keywords.join(', ') || 'Aucun'}

Génère un commentaire concis (2-3 phrases) sur les soft skills du candidat. Ne propose pas d'autre score.`
  }
}
