import 'reflect-metadata'
import { NestFactory } from '@nestjs/core'
import * as path from 'path'
import { AppModule } from '../app.module'
import { JobService } from '../routes/job/job.service'
import { EvaluationService } from '../routes/evaluation/evaluation.service'
import { DocumentTextService } from '../shared/services/document-text.service'
import { formatScore } from '../engines/commentary'

const SAMPLE_POSTING = `Data Scientist
Nous recherchons un Data Scientist avec 2 ans d'expérience minimum.
Compétences requises: Python, Machine Learning, Power BI.
Langues: Français, Anglais.`

/**
 * CLI script to rank every stored candidate against one job posting.
 *
 * Usage:
 *   npm run rank -- [path/to/posting.txt|pdf]
 *
 * Without a path the built-in Data Scientist posting is used.
 * Candidates come from `npm run preprocess`.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  })

  try {
    const jobService = app.get(JobService)
    const evaluationService = app.get(EvaluationService)
    const documentTextService = app.get(DocumentTextService)

    const postingPath = process.argv[2]
    const description = postingPath
      ? await documentTextService.extractText(path.resolve(postingPath))
      : SAMPLE_POSTING
    const job = await jobService.analyzeJob(description)

    console.log(`Offre: ${job.title} (${job.requiredSkills.join(', ') || 'aucune compétence requise détectée'})`)

    const result = await evaluationService.runForJob(job)
    for (const warning of result.warnings) {
      console.warn(`! ${warning}`)
    }

    console.log('')
    console.log(result.report.summary)
    console.log('')
    for (const evaluation of result.evaluations) {
      console.log(`${evaluation.candidateId}: ${formatScore(evaluation.scores.global)}/100 (${evaluation.recommendation})`)
    }
  } catch (error) {
    console.error('Error during ranking:', error)
    process.exitCode = 1
  } finally {
    await app.close()
  }
}

void bootstrap()
