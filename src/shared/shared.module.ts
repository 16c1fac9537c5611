import { Global, Module } from '@nestjs/common'
import envConfig from './config'
import { LoggerService } from './services/logger.service'
import { PdfTextService } from './services/pdf-text.service'
import { DocumentTextService } from './services/document-text.service'
import { DATA_DIR, JsonStoreService } from './services/json-store.service'
import { SectionSplitterService } from './services/section-splitter.service'
import { EntityExtractionService } from './services/entity-extraction.service'
import { JobDescriptionParserService } from './services/job-description-parser.service'
import { LlmGatewayService } from './services/llm-gateway.service'
import { GeminiTextGeneratorService } from './services/gemini-text-generator.service'
import { TEXT_GENERATOR, UnavailableTextGenerator, type TextGenerator } from './services/text-generator'
import { CANDIDATE_RETRIEVER, UnavailableCandidateRetriever } from './services/candidate-retriever'

const sharedServices = [
  LoggerService,
  PdfTextService,
  DocumentTextService,
  JsonStoreService,
  SectionSplitterService,
  EntityExtractionService,
  JobDescriptionParserService,
  LlmGatewayService,
]

@Global()
@Module({
  providers: [
    ...sharedServices,
    { provide: DATA_DIR, useValue: envConfig.DATA_DIR },
    {
      provide: TEXT_GENERATOR,
      inject: [LoggerService],
      useFactory: (logger: LoggerService): TextGenerator =>
        envConfig.LLM_ENABLED && envConfig.GEMINI_API_KEY
          ? new GeminiTextGeneratorService(logger)
          : new UnavailableTextGenerator(),
    },
    // No vector index ships with the service: every run evaluates the full candidate set
    { provide: CANDIDATE_RETRIEVER, useClass: UnavailableCandidateRetriever },
  ],
  exports: [...sharedServices, DATA_DIR, TEXT_GENERATOR, CANDIDATE_RETRIEVER],
})
export class SharedModule {}
