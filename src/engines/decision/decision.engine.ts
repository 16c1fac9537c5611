import { Inject, Injectable } from '@nestjs/common'
import { LlmGatewayService } from '../../shared/services/llm-gateway.service'
import { SCORING_CONFIG, type ScoringConfig } from '../../shared/scoring-config'
import { deepFreeze } from '../../shared/helpers'
import { clampScore } from '../scoring/scoring.contract'
import { formatScore } from '../commentary'
import type {
  EvaluationCommentsType,
  EvaluationDetailsType,
  EvaluationScoresType,
  EvaluationType,
  RecommendationType,
  ReportType,
} from '../../routes/evaluation/evaluation.model'

export interface SubScores {
  profile: number
  technical: number
  softSkills: number
}

export interface DecisionInput {
  candidateId: string
  scores: SubScores
  comments: EvaluationCommentsType
  details: EvaluationDetailsType
}

/**
 * Decision Engine
 *
 * Aggregation & ranking. Weights, bands and top-N come from the immutable
 * ScoringConfig given at construction; nothing here reads process state.
 *
 * Responsibilities:
 * - Global score = Σ sub-score × weight
 * - Recommendation band (threshold ladder, high to low, first match wins)
 * - Justification (language model when available, deterministic template otherwise)
 * - Stable ranking by global score, report with statistics over the whole set
 */
@Injectable()
export class DecisionEngine {
  constructor(
    @Inject(SCORING_CONFIG) private readonly config: ScoringConfig,
    private readonly llmGateway: LlmGatewayService,
  ) {}

  globalScore(scores: SubScores): number {
    const { weights } = this.config
    return clampScore(
      scores.profile * weights.profile + scores.technical * weights.technical + scores.softSkills * weights.softSkills,
    )
  }

  classify(globalScore: number): RecommendationType {
    const band = this.config.bands.find(({ minScore }) => globalScore >= minScore)
    // createScoringConfig guarantees a catch-all last band
    return (band ?? this.config.bands[this.config.bands.length - 1]).label
  }

  async decide(input: DecisionInput): Promise<EvaluationType> {
    const scores: EvaluationScoresType = {
      profile: input.scores.profile,
      technical: input.scores.technical,
      softSkills: input.scores.softSkills,
      global: this.globalScore(input.scores),
    }
    const recommendation = this.classify(scores.global)

    const justification = await this.llmGateway.complete({
      operation: 'justification',
      prompt: this.buildJustificationPrompt(input.candidateId, scores, recommendation, input.comments),
      fallback: this.buildJustification(input.candidateId, scores, recommendation, input.comments),
    })

    return deepFreeze({
      candidateId: input.candidateId,
      scores,
      recommendation,
      justification,
      comments: { ...input.comments },
      details: structuredClone(input.details),
    })
  }

  /**
   * Deterministic justification; system of record when no model answers.
   */
  buildJustification(
    candidateId: string,
    scores: EvaluationScoresType,
    recommendation: RecommendationType,
    comments: EvaluationCommentsType,
  ): string {
    const lines = [
      `Candidat: ${candidateId}`,
      `Score global: ${formatScore(scores.global)}/100`,
      `Recommandation: ${recommendation.toUpperCase()}`,
      '',
      'Détail des scores:',
      `- Profil: ${formatScore(scores.profile)}/100`,
      `- Technique: ${formatScore(scores.technical)}/100`,
      `- Soft Skills: ${formatScore(scores.softSkills)}/100`,
      '',
      'Justifications:',
    ]

    if (comments.profile) lines.push(`Profil: ${comments.profile}`)
    if (comments.technical) lines.push(`Technique: ${comments.technical}`)
    if (comments.softSkills) lines.push(`Soft Skills: ${comments.softSkills}`)

    return lines.join('\n')
  }

  /**
   * Stable sort by global score, descending. Ties keep their input order.
   */
  rank(evaluations: readonly EvaluationType[]): EvaluationType[] {
    return evaluations
      .map((evaluation, index) => ({ evaluation, index }))
      .sort((a, b) => b.evaluation.scores.global - a.evaluation.scores.global || a.index - b.index)
      .map(({ evaluation }) => evaluation)
  }

  /**
   * Top-N slice plus mean/max/min over the WHOLE ranked set (all 0 when empty)
   */
  summarize(ranked: readonly EvaluationType[]): ReportType {
    const topN = Math.min(this.config.topN, ranked.length)
    const topCandidates = ranked.slice(0, topN)
    const globals = ranked.map((evaluation) => evaluation.scores.global)

    const statistics = {
      total: ranked.length,
      mean: globals.length > 0 ? globals.reduce((total, score) => total + score, 0) / globals.length : 0,
      max: globals.length > 0 ? Math.max(...globals) : 0,
      min: globals.length > 0 ? Math.min(...globals) : 0,
    }

    const lines = [
      `Rapport de sélection - ${ranked.length} candidat(s) évalué(s)`,
      '',
      `Top ${topN} candidats:`,
      ...topCandidates.map(
        (evaluation, i) =>
          `${i + 1}. ${evaluation.candidateId} - Score: ${formatScore(evaluation.scores.global)}/100 (${evaluation.recommendation})`,
      ),
      '',
      'Statistiques:',
      `- Score moyen: ${formatScore(statistics.mean)}/100`,
      `- Score max: ${formatScore(statistics.max)}/100`,
      `- Score min: ${formatScore(statistics.min)}/100`,
    ]

    return { topCandidates, statistics, summary: lines.join('\n') }
  }

  private buildJustificationPrompt(
    candidateId: string,
    scores: EvaluationScoresType,
    recommendation: RecommendationType,
    comments: EvaluationCommentsType,
  ): string {
    return `Tu es un agent décideur RH expert. Génère un rapport de décision complet et justifié pour le candidat ${candidateId}.

Score global: ${formatScore(scores.global)}/100
Recommandation: ${recommendation}

Détail des scores:
- Profil: ${formatScore(scores.profile)}/100
- Technique: ${formatScore(scores.technical)}/100
- Soft Skills: ${formatScore(scores.softSkills)}/100

Commentaires des agents:
- Profil: ${comments.profile}
- Technique: ${comments.technical}
- Soft Skills: ${comments.softSkills}

Génère un rapport structuré (4-5 phrases) expliquant la décision finale de manière claire et professionnelle. Ne modifie ni les scores ni la recommandation.`
  }
}
