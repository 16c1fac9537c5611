import { createZodDto } from 'nestjs-zod'
import {
  EvaluateCandidateBodySchema,
  EvaluationRunResultSchema,
  EvaluationSchema,
  RunEvaluationBodySchema,
} from './evaluation.model'

export class RunEvaluationBodyDTO extends createZodDto(RunEvaluationBodySchema) {}
export class EvaluateCandidateBodyDTO extends createZodDto(EvaluateCandidateBodySchema) {}
export class EvaluationRunResultDTO extends createZodDto(EvaluationRunResultSchema) {}
export class EvaluationDTO extends createZodDto(EvaluationSchema) {}
