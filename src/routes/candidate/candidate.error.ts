import { NotFoundException, UnprocessableEntityException } from '@nestjs/common'

// Candidate not found
export const CandidateNotFoundException = new NotFoundException('Error.CandidateNotFound')

// Document decoding errors
export const CandidateDocumentUnreadableException = new UnprocessableEntityException([
  {
    message: 'Error.CandidateDocumentUnreadable',
    path: 'file',
  },
])

export const CandidateDocumentEmptyTextException = new UnprocessableEntityException([
  {
    message: 'Error.CandidateDocumentEmptyText',
    path: 'file',
  },
])

export const CandidateInvalidFileTypeException = new UnprocessableEntityException([
  {
    message: 'Error.CandidateInvalidFileType',
    path: 'file',
  },
])

export const CandidateInvalidProfileException = new UnprocessableEntityException([
  {
    message: 'Error.CandidateInvalidProfile',
    path: 'rawText',
  },
])

export const CandidateSourceNameWithoutIdException = new UnprocessableEntityException([
  {
    message: 'Error.CandidateSourceNameWithoutId',
    path: 'sourceName',
  },
])
