import { z } from 'zod'

// Enums
export const JobSenioritySchema = z.enum(['junior', 'intermediate', 'senior', 'intern'])
export type JobSeniorityType = z.infer<typeof JobSenioritySchema>

export const JobContractSchema = z.enum(['CDI', 'CDD', 'Stage', 'Alternance', 'Freelance', 'unspecified'])
export type JobContractType = z.infer<typeof JobContractSchema>

export const JobProfileSourceSchema = z.enum(['rules', 'llm'])

const boundSchema = z.number().int().nonnegative().nullable()

// min <= max whenever both bounds are present
export const RangeSchema = z
  .object({
    min: boundSchema,
    max: boundSchema,
  })
  .refine((range) => range.min === null || range.max === null || range.min <= range.max, {
    message: 'Error.RangeMinGreaterThanMax',
    path: ['min'],
  })
export type RangeType = z.infer<typeof RangeSchema>

// Job Profile (canonical record)
export const JobProfileSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  position: z.string(),
  seniority: JobSenioritySchema,
  experience: RangeSchema,
  requiredSkills: z.array(z.string()),
  optionalSkills: z.array(z.string()),
  languages: z.array(z.string()),
  location: z.string(),
  contractType: JobContractSchema,
  salary: RangeSchema,
  keywords: z.array(z.string()),
  notes: z.string(),
  sections: z.record(z.string(), z.string()),
  rawText: z.string(),
  source: JobProfileSourceSchema,
})
export type JobProfileType = z.infer<typeof JobProfileSchema>

// Recruiter overrides: a present key (null included) always replaces the extracted value
export const JobCriteriaOverridesSchema = z
  .object({
    title: z.string().max(200).optional(),
    position: z.string().max(200).optional(),
    seniority: JobSenioritySchema.optional(),
    experienceMin: boundSchema.optional(),
    experienceMax: boundSchema.optional(),
    requiredSkills: z.array(z.string().min(1)).optional(),
    optionalSkills: z.array(z.string().min(1)).optional(),
    languages: z.array(z.string().min(1)).optional(),
    location: z.string().optional(),
    contractType: JobContractSchema.optional(),
    salaryMin: boundSchema.optional(),
    salaryMax: boundSchema.optional(),
    keywords: z.array(z.string().min(1)).optional(),
    notes: z.string().optional(),
  })
  .strict()
export type JobCriteriaOverridesType = z.infer<typeof JobCriteriaOverridesSchema>

// Analyze (no persistence)
export const AnalyzeJobBodySchema = z
  .object({
    description: z.string().min(10).max(50000),
    overrides: JobCriteriaOverridesSchema.optional(),
    preferLlm: z.boolean().default(false),
  })
  .strict()

// Create (analyze + persist)
export const CreateJobBodySchema = z
  .object({
    name: z.string().min(1).max(200),
    description: z.string().min(10).max(50000),
    overrides: JobCriteriaOverridesSchema.optional(),
    preferLlm: z.boolean().default(false),
  })
  .strict()

// Job List Item
export const JobListItemSchema = z.object({
  id: z.string(),
  title: z.string(),
  seniority: JobSenioritySchema,
  contractType: JobContractSchema,
  requiredSkillCount: z.number().int(),
})

export const JobListResponseSchema = z.object({
  jobs: z.array(JobListItemSchema),
})

// Structured output requested from the language model; every field optional
export const LlmJobAnalysisSchema = z.object({
  title: z.string().optional(),
  seniority: JobSenioritySchema.optional(),
  experienceMin: z.number().int().nonnegative().nullable().optional(),
  experienceMax: z.number().int().nonnegative().nullable().optional(),
  requiredSkills: z.array(z.string()).optional(),
  optionalSkills: z.array(z.string()).optional(),
  languages: z.array(z.string()).optional(),
  location: z.string().optional(),
  contractType: JobContractSchema.optional(),
  keywords: z.array(z.string()).optional(),
})
export type LlmJobAnalysisType = z.infer<typeof LlmJobAnalysisSchema>
