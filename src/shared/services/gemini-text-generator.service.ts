import { Injectable } from '@nestjs/common'
import { GoogleGenerativeAI } from '@google/generative-ai'
import envConfig from '../config'
import { LoggerService } from './logger.service'
import { TextGeneratorUnavailableError, type TextGenerator } from './text-generator'

const MAX_RETRIES = 3

function isRateLimitError(error: unknown): boolean {
  if (error instanceof Error) {
    const status: unknown = Reflect.get(error, 'status')
    return status === 429 || error.message.includes('429')
  }
  return false
}

/**
 * GeminiTextGeneratorService
 *
 * Purpose: TextGenerator backed by Gemini. Used for commentary, justifications
 * and the optional LLM-first job analysis.
 *
 * Allowed logic:
 * - Streaming generation, token usage logging, retry with backoff on 429
 *
 * Forbidden logic:
 * - Swallowing failures: callers go through LlmGatewayService, which owns the fallback
 */
@Injectable()
export class GeminiTextGeneratorService implements TextGenerator {
  private readonly genAI: GoogleGenerativeAI | null
  readonly model: string

  constructor(private readonly logger: LoggerService) {
    this.model = envConfig.LLM_MODEL
    this.genAI = envConfig.LLM_ENABLED && envConfig.GEMINI_API_KEY ? new GoogleGenerativeAI(envConfig.GEMINI_API_KEY) : null
  }

  get available(): boolean {
    return this.genAI !== null
  }

  async generate(prompt: string): Promise<string> {
    if (!this.genAI) {
      throw new TextGeneratorUnavailableError()
    }

    const model = this.genAI.getGenerativeModel({ model: this.model })

    const result = await this.callWithRetry(async () => {
      const stream = await model.generateContentStream({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: 0.2,
          maxOutputTokens: 1024,
        },
      })

      // Collect all chunks from the stream
      let fullText = ''
      for await (const chunk of stream.stream) {
        fullText += chunk.text()
      }

      const response = await stream.response
      return { response, fullText }
    })

    const usage = result.response.usageMetadata
    if (usage) {
      this.logger.logTokenUsage({
        service: 'GeminiTextGeneratorService',
        operation: 'generate',
        inputTokens: usage.promptTokenCount,
        outputTokens: usage.candidatesTokenCount,
        totalTokens: usage.totalTokenCount,
        model: this.model,
      })
    }

    return result.fullText
  }

  /**
   * Retry logic with exponential backoff for rate limits
   */
  private async callWithRetry<T>(fn: () => Promise<T>, maxRetries = MAX_RETRIES): Promise<T> {
    for (let i = 0; i < maxRetries; i++) {
      try {
        return await fn()
      } catch (error) {
        const shouldRetry = isRateLimitError(error) && i < maxRetries - 1

        if (shouldRetry) {
          const delay = Math.pow(2, i) * 1000 // 1s, 2s, 4s
          this.logger.logWarning('Rate limit hit, retrying', { delay, attempt: i + 1, maxRetries })
          await new Promise((resolve) => setTimeout(resolve, delay))
          continue
        }
        throw error
      }
    }
    throw new Error('Max retries exceeded')
  }
}
