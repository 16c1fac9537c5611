import { Injectable } from '@nestjs/common'
import { JsonStoreService } from '../../shared/services/json-store.service'
import { CandidateProfileSchema, type CandidateProfileType } from './candidate.model'

@Injectable()
export class CandidateRepo {
  constructor(private readonly store: JsonStoreService) {}

  async saveCandidate(candidate: CandidateProfileType) {
    await this.store.save('candidates', candidate.id, candidate)
    return candidate
  }

  async findCandidateById(candidateId: string) {
    return this.store.read('candidates', candidateId, CandidateProfileSchema)
  }

  async findCandidatesByIds(candidateIds: readonly string[]) {
    const candidates: CandidateProfileType[] = []
    for (const candidateId of candidateIds) {
      const candidate = await this.store.read('candidates', candidateId, CandidateProfileSchema)
      if (candidate) {
        candidates.push(candidate)
      }
    }
    return candidates
  }

  async findAllCandidates() {
    return this.store.list('candidates', CandidateProfileSchema)
  }

  async deleteCandidate(candidateId: string) {
    return this.store.delete('candidates', candidateId)
  }
}
