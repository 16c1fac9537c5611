import { Module } from '@nestjs/common'
import { CandidateController } from './candidate.controller'
import { CandidateService } from './candidate.service'
import { CandidateRepo } from './candidate.repo'

@Module({
  controllers: [CandidateController],
  providers: [CandidateService, CandidateRepo],
  exports: [CandidateService, CandidateRepo],
})
export class CandidateModule {}
