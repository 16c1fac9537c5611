import { Module } from '@nestjs/common'
import { EvaluationController } from './evaluation.controller'
import { EvaluationService } from './evaluation.service'
import { CandidateModule } from '../candidate/candidate.module'
import { JobModule } from '../job/job.module'
import { EnginesModule } from '../../engines/engines.module'

@Module({
  imports: [CandidateModule, JobModule, EnginesModule],
  controllers: [EvaluationController],
  providers: [EvaluationService],
  exports: [EvaluationService],
})
export class EvaluationModule {}
