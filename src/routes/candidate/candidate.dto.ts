import { createZodDto } from 'nestjs-zod'
import {
  CandidateListResponseSchema,
  CandidateProfileSchema,
  CreateCandidateBodySchema,
  UploadCandidateBodySchema,
} from './candidate.model'

export class CreateCandidateBodyDTO extends createZodDto(CreateCandidateBodySchema) {}
export class UploadCandidateBodyDTO extends createZodDto(UploadCandidateBodySchema) {}
export class CandidateProfileResponseDTO extends createZodDto(CandidateProfileSchema) {}
export class CandidateListResponseDTO extends createZodDto(CandidateListResponseSchema) {}
