import type { JobProfileType } from '../../routes/job/job.model'

export interface RetrievedCandidate {
  candidateId: string
  score: number
}

/**
 * Optional similarity pre-filter (vector index or similar). The pipeline must
 * work without it: an unavailable retriever, an empty result or a failure all
 * fall back to evaluating every known candidate.
 */
export interface CandidateRetriever {
  readonly available: boolean
  queryByJobProfile(job: JobProfileType, topK: number): Promise<RetrievedCandidate[]>
}

export const CANDIDATE_RETRIEVER = Symbol('CANDIDATE_RETRIEVER')

export class UnavailableCandidateRetriever implements CandidateRetriever {
  readonly available = false

  async queryByJobProfile(): Promise<RetrievedCandidate[]> {
    return []
  }
}
