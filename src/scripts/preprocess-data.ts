import 'reflect-metadata'
import { NestFactory } from '@nestjs/core'
import * as fs from 'fs'
import * as path from 'path'
import { AppModule } from '../app.module'
import envConfig from '../shared/config'
import { CandidateService } from '../routes/candidate/candidate.service'
import { JobService } from '../routes/job/job.service'
import { DocumentTextService, isSupportedDocument } from '../shared/services/document-text.service'

const COVER_LETTER_SUFFIX = '.lettre.txt'

/**
 * CLI script to parse raw résumés and job postings into JSON records.
 *
 * Usage:
 *   npm run preprocess
 *
 * Layout (relative to DATA_DIR):
 * - raw/<name>.pdf|txt            résumé, optional cover letter in raw/<name>.lettre.txt
 * - jobs/<name>.pdf|txt           job posting
 * Records are written to processed/parsed and processed/jobs_parsed.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn'],
  })

  try {
    const candidateService = app.get(CandidateService)
    const jobService = app.get(JobService)
    const documentTextService = app.get(DocumentTextService)

    const rawDir = path.resolve(envConfig.DATA_DIR, 'raw')
    const jobsDir = path.resolve(envConfig.DATA_DIR, 'jobs')

    console.log('1. Parsing résumés...')
    let candidates = 0
    for (const fileName of listDocuments(rawDir)) {
      if (fileName.endsWith(COVER_LETTER_SUFFIX)) continue

      try {
        const rawText = await documentTextService.extractText(path.join(rawDir, fileName))
        const letterPath = path.join(rawDir, `${path.parse(fileName).name}${COVER_LETTER_SUFFIX}`)
        const coverLetter = fs.existsSync(letterPath) ? await documentTextService.extractText(letterPath) : ''

        const candidate = await candidateService.createCandidate(rawText, fileName, coverLetter)
        console.log(`   - ${fileName} -> ${candidate.id}`)
        candidates++
      } catch (error) {
        console.error(`   ! ${fileName} skipped:`, error instanceof Error ? error.message : error)
      }
    }
    console.log(`   ${candidates} résumé(s) parsed`)

    console.log('2. Parsing job postings...')
    let jobs = 0
    for (const fileName of listDocuments(jobsDir)) {
      try {
        const description = await documentTextService.extractText(path.join(jobsDir, fileName))
        const job = await jobService.createJob(fileName, description)
        console.log(`   - ${fileName} -> ${job.id}`)
        jobs++
      } catch (error) {
        console.error(`   ! ${fileName} skipped:`, error instanceof Error ? error.message : error)
      }
    }
    console.log(`   ${jobs} posting(s) parsed`)
  } catch (error) {
    console.error('Error during preprocessing:', error)
    process.exitCode = 1
  } finally {
    await app.close()
  }
}

function listDocuments(directory: string): string[] {
  if (!fs.existsSync(directory)) {
    console.warn(`   Directory not found: ${directory}`)
    return []
  }
  return fs
    .readdirSync(directory)
    .filter((fileName) => isSupportedDocument(fileName))
    .sort()
}

void bootstrap()
