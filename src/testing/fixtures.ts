import type { TextGenerator } from '../shared/services/text-generator'
import type { CandidateRetriever, RetrievedCandidate } from '../shared/services/candidate-retriever'
import type { CandidateProfileType } from '../routes/candidate/candidate.model'
import type { JobProfileType } from '../routes/job/job.model'

/**
 * Scripted language model: answers every prompt through `respond` and records the prompts
 */
export class FakeTextGenerator implements TextGenerator {
  readonly available = true
  readonly model = 'fake-model'
  readonly prompts: string[] = []

  constructor(private readonly respond: (prompt: string) => Promise<string>) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt)
    return this.respond(prompt)
  }
}

export class FakeCandidateRetriever implements CandidateRetriever {
  readonly available = true
  readonly queries: Array<{ jobId: string; topK: number }> = []

  constructor(private readonly respond: () => Promise<RetrievedCandidate[]>) {}

  async queryByJobProfile(job: JobProfileType, topK: number): Promise<RetrievedCandidate[]> {
    this.queries.push({ jobId: job.id, topK })
    return this.respond()
  }
}

export function buildJob(overrides: Partial<JobProfileType> = {}): JobProfileType {
  return {
    id: 'data_scientist',
    title: 'Data Scientist',
    position: 'data scientist',
    seniority: 'intermediate',
    experience: { min: null, max: null },
    requiredSkills: [],
    optionalSkills: [],
    languages: [],
    location: '',
    contractType: 'unspecified',
    salary: { min: null, max: null },
    keywords: [],
    notes: '',
    sections: {},
    rawText: '',
    source: 'rules',
    ...overrides,
  }
}

export function buildCandidate(overrides: Partial<CandidateProfileType> = {}): CandidateProfileType {
  return {
    id: 'candidate_a',
    name: '',
    email: '',
    phone: '',
    yearsExperience: 0,
    educationLevel: 'unknown',
    diplomas: [],
    experiences: [],
    skills: [],
    languages: [],
    sections: { skills: '', experience: '', education: '', languages: '' },
    coverLetter: '',
    rawText: '',
    sourceFile: null,
    ...overrides,
  }
}
