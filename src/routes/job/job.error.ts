import { NotFoundException, UnprocessableEntityException } from '@nestjs/common'

// Job not found
export const JobNotFoundException = new NotFoundException('Error.JobNotFound')

// Job criteria errors
export const JobInvalidExperienceRangeException = new UnprocessableEntityException([
  {
    message: 'Error.JobExperienceMinGreaterThanMax',
    path: 'overrides.experienceMin',
  },
])

export const JobInvalidSalaryRangeException = new UnprocessableEntityException([
  {
    message: 'Error.JobSalaryMinGreaterThanMax',
    path: 'overrides.salaryMin',
  },
])

export const JobInvalidProfileException = new UnprocessableEntityException([
  {
    message: 'Error.JobInvalidProfile',
    path: 'description',
  },
])
