import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common'
import { ZodSerializerDto } from 'nestjs-zod'
import { EvaluationService } from './evaluation.service'
import {
  EvaluateCandidateBodyDTO,
  RunEvaluationBodyDTO,
  EvaluationDTO,
  EvaluationRunResultDTO,
} from './evaluation.dto'

@Controller('evaluation')
export class EvaluationController {
  constructor(private readonly evaluationService: EvaluationService) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(EvaluationRunResultDTO)
  async runEvaluation(@Body() body: RunEvaluationBodyDTO): Promise<EvaluationRunResultDTO> {
    return await this.evaluationService.runEvaluation(body.jobId, {
      useRetrieval: body.useRetrieval,
      topK: body.topK,
    })
  }

  @Post('candidate')
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(EvaluationDTO)
  async evaluateCandidate(@Body() body: EvaluateCandidateBodyDTO): Promise<EvaluationDTO> {
    return await this.evaluationService.evaluateCandidate(body.jobId, body.candidateId)
  }
}
