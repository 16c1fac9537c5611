import { z } from 'zod'
import { buildRecordId } from '../../shared/helpers'

// Enums
export const EducationLevelSchema = z.enum(['doctorat', 'master', 'licence', 'bac', 'unknown'])
export type EducationLevelType = z.infer<typeof EducationLevelSchema>

export const DiplomaSchema = z.object({
  type: z.string(),
  description: z.string(),
})
export type DiplomaType = z.infer<typeof DiplomaSchema>

export const ExperienceEntrySchema = z.object({
  year: z.string().regex(/^(19|20)\d{2}$/),
  description: z.string(),
})
export type ExperienceEntryType = z.infer<typeof ExperienceEntrySchema>

export const CandidateSectionsSchema = z.object({
  skills: z.string(),
  experience: z.string(),
  education: z.string(),
  languages: z.string(),
})

// Candidate Profile (canonical record)
export const CandidateProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  yearsExperience: z.number().int().nonnegative(),
  educationLevel: EducationLevelSchema,
  diplomas: z.array(DiplomaSchema),
  experiences: z.array(ExperienceEntrySchema),
  skills: z.array(z.string()),
  languages: z.array(z.string()),
  sections: CandidateSectionsSchema,
  coverLetter: z.string(),
  rawText: z.string(),
  sourceFile: z.string().nullable(),
})
export type CandidateProfileType = z.infer<typeof CandidateProfileSchema>

// Candidate Create Request (already decoded text)
export const CreateCandidateBodySchema = z
  .object({
    rawText: z.string().min(1).max(100000),
    coverLetter: z.string().max(50000).optional(),
    // Record id source: its stem must slug to a non-empty id
    sourceName: z
      .string()
      .max(255)
      .refine((name) => buildRecordId(name, '') !== '', { message: 'Error.CandidateSourceNameWithoutId' }),
  })
  .strict()

// Candidate Upload Request (multipart fields next to the file)
export const UploadCandidateBodySchema = z
  .object({
    coverLetter: z.string().max(50000).optional(),
  })
  .strict()

// Candidate List Item
export const CandidateListItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  yearsExperience: z.number().int(),
  educationLevel: EducationLevelSchema,
  skillCount: z.number().int(),
  hasCoverLetter: z.boolean(),
})

export const CandidateListResponseSchema = z.object({
  candidates: z.array(CandidateListItemSchema),
})
