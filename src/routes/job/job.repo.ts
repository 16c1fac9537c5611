import { Injectable } from '@nestjs/common'
import { JsonStoreService } from '../../shared/services/json-store.service'
import { JobProfileSchema, type JobProfileType } from './job.model'

@Injectable()
export class JobRepo {
  constructor(private readonly store: JsonStoreService) {}

  async saveJob(job: JobProfileType) {
    await this.store.save('jobs', job.id, job)
    return job
  }

  async findJobById(jobId: string) {
    return this.store.read('jobs', jobId, JobProfileSchema)
  }

  async findAllJobs() {
    return this.store.list('jobs', JobProfileSchema)
  }

  async deleteJob(jobId: string) {
    return this.store.delete('jobs', jobId)
  }
}
