import { createZodDto } from 'nestjs-zod'
import { AnalyzeJobBodySchema, CreateJobBodySchema, JobListResponseSchema, JobProfileSchema } from './job.model'

export class AnalyzeJobBodyDTO extends createZodDto(AnalyzeJobBodySchema) {}
export class CreateJobBodyDTO extends createZodDto(CreateJobBodySchema) {}
export class JobProfileResponseDTO extends createZodDto(JobProfileSchema) {}
export class JobListResponseDTO extends createZodDto(JobListResponseSchema) {}
