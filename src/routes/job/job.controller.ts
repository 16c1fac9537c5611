import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common'
import { ZodSerializerDto } from 'nestjs-zod'
import { JobService } from './job.service'
import { AnalyzeJobBodyDTO, CreateJobBodyDTO, JobListResponseDTO, JobProfileResponseDTO } from './job.dto'

@Controller('jobs')
export class JobController {
  constructor(private readonly jobService: JobService) {}

  // Parse only, nothing is stored
  @Post('analyze')
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(JobProfileResponseDTO)
  async analyzeJob(@Body() body: AnalyzeJobBodyDTO): Promise<JobProfileResponseDTO> {
    return await this.jobService.analyzeJob(body.description, body.overrides, { preferLlm: body.preferLlm })
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ZodSerializerDto(JobProfileResponseDTO)
  async createJob(@Body() body: CreateJobBodyDTO): Promise<JobProfileResponseDTO> {
    return await this.jobService.createJob(body.name, body.description, body.overrides, body.preferLlm)
  }

  @Get()
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(JobListResponseDTO)
  async listJobs(): Promise<JobListResponseDTO> {
    return await this.jobService.listJobs()
  }

  @Get(':jobId')
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(JobProfileResponseDTO)
  async getJob(@Param('jobId') jobId: string): Promise<JobProfileResponseDTO> {
    return await this.jobService.getJob(jobId)
  }

  @Delete(':jobId')
  @HttpCode(HttpStatus.OK)
  async deleteJob(@Param('jobId') jobId: string) {
    return await this.jobService.deleteJob(jobId)
  }
}
