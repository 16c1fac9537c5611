import { Module } from '@nestjs/common'
import { JobController } from './job.controller'
import { JobService } from './job.service'
import { JobRepo } from './job.repo'

@Module({
  controllers: [JobController],
  providers: [JobService, JobRepo],
  exports: [JobService, JobRepo],
})
export class JobModule {}
