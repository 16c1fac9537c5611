import { z } from 'zod'
import { JobProfileSchema } from '../job/job.model'

// Enums
export const RecommendationSchema = z.enum(['fortement recommandé', 'recommandé', 'à considérer', 'à rejeter'])
export type RecommendationType = z.infer<typeof RecommendationSchema>

const ScoreSchema = z.number().min(0).max(100)

export const EvaluationScoresSchema = z.object({
  profile: ScoreSchema,
  technical: ScoreSchema,
  softSkills: ScoreSchema,
  global: ScoreSchema,
})
export type EvaluationScoresType = z.infer<typeof EvaluationScoresSchema>

export const EvaluationCommentsSchema = z.object({
  profile: z.string(),
  technical: z.string(),
  softSkills: z.string(),
})
export type EvaluationCommentsType = z.infer<typeof EvaluationCommentsSchema>

export const EvaluationDetailsSchema = z.object({
  matchedSkills: z.array(z.string()),
  missingSkills: z.array(z.string()),
  bonusSkills: z.array(z.string()),
  coverage: z.number().min(0).max(1),
  skillMatchScore: ScoreSchema,
  experienceScore: ScoreSchema,
  languageScore: ScoreSchema,
  softSkillsDetected: z.array(z.string()),
})
export type EvaluationDetailsType = z.infer<typeof EvaluationDetailsSchema>

// Evaluation (one candidate against one job)
export const EvaluationSchema = z.object({
  candidateId: z.string(),
  scores: EvaluationScoresSchema,
  recommendation: RecommendationSchema,
  justification: z.string(),
  comments: EvaluationCommentsSchema,
  details: EvaluationDetailsSchema,
})
export type EvaluationType = z.infer<typeof EvaluationSchema>

// Report
export const ReportStatisticsSchema = z.object({
  total: z.number().int(),
  mean: z.number(),
  max: z.number(),
  min: z.number(),
})

export const ReportSchema = z.object({
  topCandidates: z.array(EvaluationSchema),
  statistics: ReportStatisticsSchema,
  summary: z.string(),
})
export type ReportType = z.infer<typeof ReportSchema>

// Run Evaluation Request
export const RunEvaluationBodySchema = z
  .object({
    jobId: z.string().min(1),
    useRetrieval: z.boolean().default(true),
    topK: z.number().int().positive().max(500).optional(),
  })
  .strict()

// Single Evaluation Request
export const EvaluateCandidateBodySchema = z
  .object({
    jobId: z.string().min(1),
    candidateId: z.string().min(1),
  })
  .strict()

// Run Evaluation Response
export const EvaluationRunResultSchema = z.object({
  job: JobProfileSchema,
  evaluations: z.array(EvaluationSchema),
  report: ReportSchema,
  warnings: z.array(z.string()),
})
export type EvaluationRunResultType = z.infer<typeof EvaluationRunResultSchema>
