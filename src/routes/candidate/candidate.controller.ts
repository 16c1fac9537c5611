import {
  Body,
  Controller,
  Delete,
  FileTypeValidator,
  Get,
  HttpCode,
  HttpStatus,
  MaxFileSizeValidator,
  Param,
  ParseFilePipe,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common'
import { ZodSerializerDto } from 'nestjs-zod'
import { FileInterceptor } from '@nestjs/platform-express'
import { CandidateService } from './candidate.service'
import {
  CreateCandidateBodyDTO,
  UploadCandidateBodyDTO,
  CandidateListResponseDTO,
  CandidateProfileResponseDTO,
} from './candidate.dto'

@Controller('candidates')
export class CandidateController {
  constructor(private readonly candidateService: CandidateService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ZodSerializerDto(CandidateProfileResponseDTO)
  async createCandidate(@Body() body: CreateCandidateBodyDTO): Promise<CandidateProfileResponseDTO> {
    return await this.candidateService.createCandidate(body.rawText, body.sourceName, body.coverLetter)
  }

  @Post('upload')
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(FileInterceptor('file'))
  @ZodSerializerDto(CandidateProfileResponseDTO)
  async uploadCandidate(
    @UploadedFile(
      new ParseFilePipe({
        validators: [
          new MaxFileSizeValidator({ maxSize: 10 * 1024 * 1024 }), // 10MB
          new FileTypeValidator({ fileType: /^(application\/pdf|text\/plain)$/ }),
        ],
      }),
    )
    file: Express.Multer.File,
    @Body() body: UploadCandidateBodyDTO,
  ): Promise<CandidateProfileResponseDTO> {
    return await this.candidateService.uploadCandidate(file, body.coverLetter)
  }

  @Get()
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(CandidateListResponseDTO)
  async listCandidates(): Promise<CandidateListResponseDTO> {
    return await this.candidateService.listCandidates()
  }

  @Get(':candidateId')
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(CandidateProfileResponseDTO)
  async getCandidate(@Param('candidateId') candidateId: string): Promise<CandidateProfileResponseDTO> {
    return await this.candidateService.getCandidate(candidateId)
  }

  @Delete(':candidateId')
  @HttpCode(HttpStatus.OK)
  async deleteCandidate(@Param('candidateId') candidateId: string) {
    return await this.candidateService.deleteCandidate(candidateId)
  }
}
