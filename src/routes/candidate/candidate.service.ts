import { Injectable } from '@nestjs/common'
import { CandidateRepo } from './candidate.repo'
import { SectionSplitterService } from '../../shared/services/section-splitter.service'
import { EntityExtractionService } from '../../shared/services/entity-extraction.service'
import { DocumentTextService, isSupportedDocument } from '../../shared/services/document-text.service'
import { LoggerService } from '../../shared/services/logger.service'
import { buildRecordId, deepFreeze } from '../../shared/helpers'
import { CANDIDATE_SECTION_HEADINGS } from '../../rules/recruitment/section-headings.rules'
import {
  CandidateDocumentEmptyTextException,
  CandidateDocumentUnreadableException,
  CandidateInvalidFileTypeException,
  CandidateInvalidProfileException,
  CandidateNotFoundException,
  CandidateSourceNameWithoutIdException,
} from './candidate.error'
import { CandidateProfileSchema, type CandidateProfileType } from './candidate.model'

/**
 * CandidateService - Stage 1 (candidate side)
 *
 * Purpose: Build the canonical, immutable CandidateProfile from decoded résumé text.
 *
 * Allowed logic:
 * - Section splitting + rule-based entity extraction
 * - Persisting the profile as a JSON record
 *
 * Forbidden logic:
 * - Scoring against a job
 * - Any LLM usage
 */
@Injectable()
export class CandidateService {
  constructor(
    private readonly candidateRepo: CandidateRepo,
    private readonly sectionSplitter: SectionSplitterService,
    private readonly entityExtraction: EntityExtractionService,
    private readonly documentTextService: DocumentTextService,
    private readonly logger: LoggerService,
  ) {}

  buildCandidateProfile(rawText: string, coverLetter = '', sourceName?: string): CandidateProfileType {
    const text = rawText.trim()
    const split = this.sectionSplitter.split(text, CANDIDATE_SECTION_HEADINGS)
    const sections = {
      skills: split.skills ?? '',
      experience: split.experience ?? '',
      education: split.education ?? '',
      languages: split.languages ?? '',
    }

    const profile = {
      id: buildRecordId(sourceName ?? '', 'candidate'),
      name: this.entityExtraction.extractName(text),
      email: this.entityExtraction.extractEmail(text),
      phone: this.entityExtraction.extractPhone(text),
      yearsExperience: this.entityExtraction.extractYearsOfExperience(text),
      // Résumés without an education heading still mention their degree somewhere
      educationLevel: this.entityExtraction.extractEducationLevel(sections.education || text),
      diplomas: this.entityExtraction.extractDiplomas(sections.education),
      experiences: this.entityExtraction.extractExperiences(sections.experience),
      skills: this.entityExtraction.parseSkills(sections.skills),
      languages: this.entityExtraction.detectLanguages(sections.languages),
      sections,
      coverLetter: coverLetter.trim(),
      rawText: text,
      sourceFile: sourceName ?? null,
    }

    const result = CandidateProfileSchema.safeParse(profile)
    if (!result.success) {
      this.logger.logWarning('Candidate profile failed validation', {
        service: 'CandidateService',
        operation: 'buildCandidateProfile',
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      })
      throw CandidateInvalidProfileException
    }

    return deepFreeze(result.data)
  }

  async createCandidate(rawText: string, sourceName: string, coverLetter?: string) {
    // One record per id: no shared fallback id
    if (!buildRecordId(sourceName, '')) {
      throw CandidateSourceNameWithoutIdException
    }

    const candidate = this.buildCandidateProfile(rawText, coverLetter, sourceName)
    await this.candidateRepo.saveCandidate(candidate)

    this.logger.logInfo('Candidate profile stored', {
      service: 'CandidateService',
      operation: 'createCandidate',
      candidateId: candidate.id,
      skills: candidate.skills.length,
    })
    return candidate
  }

  async uploadCandidate(file: Express.Multer.File, coverLetter?: string) {
    if (!isSupportedDocument(file.originalname)) {
      throw CandidateInvalidFileTypeException
    }

    let rawText: string
    try {
      rawText = await this.documentTextService.extractFromBuffer(file.buffer, file.originalname)
    } catch (error) {
      if (error instanceof Error && error.message === 'PDF_EMPTY_TEXT') {
        throw CandidateDocumentEmptyTextException
      }
      throw CandidateDocumentUnreadableException
    }

    if (!rawText.trim()) {
      throw CandidateDocumentEmptyTextException
    }

    return this.createCandidate(rawText, file.originalname, coverLetter)
  }

  async listCandidates() {
    const candidates = await this.candidateRepo.findAllCandidates()
    return {
      candidates: candidates.map((candidate) => ({
        id: candidate.id,
        name: candidate.name,
        yearsExperience: candidate.yearsExperience,
        educationLevel: candidate.educationLevel,
        skillCount: candidate.skills.length,
        hasCoverLetter: candidate.coverLetter.length > 0,
      })),
    }
  }

  async getCandidate(candidateId: string) {
    const candidate = await this.candidateRepo.findCandidateById(candidateId)
    if (!candidate) {
      throw CandidateNotFoundException
    }
    return deepFreeze(candidate)
  }

  async deleteCandidate(candidateId: string) {
    const deleted = await this.candidateRepo.deleteCandidate(candidateId)
    if (!deleted) {
      throw CandidateNotFoundException
    }
    return { message: 'Candidate deleted successfully' }
  }
}
