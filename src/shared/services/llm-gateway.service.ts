import { Inject, Injectable } from '@nestjs/common'
import type { z } from 'zod'
import envConfig from '../config'
import { LoggerService } from './logger.service'
import { TEXT_GENERATOR, type TextGenerator } from './text-generator'

export class LlmTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Language model did not answer within ${timeoutMs}ms`)
    this.name = 'LlmTimeoutError'
  }
}

export interface CompletionRequest {
  operation: string
  prompt: string
  timeoutMs?: number
}

export interface TextCompletionRequest extends CompletionRequest {
  // Deterministic text returned whenever the model is unavailable or fails
  fallback: string
}

/**
 * LlmGatewayService
 *
 * Purpose: The ONE place language model calls are made and degraded.
 *
 * Rules:
 * - Unavailable model → fallback, no call
 * - Timeout, exception, empty or malformed output → warning + fallback, never thrown
 */
@Injectable()
export class LlmGatewayService {
  constructor(
    @Inject(TEXT_GENERATOR) private readonly generator: TextGenerator,
    private readonly logger: LoggerService,
  ) {}

  async complete(request: TextCompletionRequest): Promise<string> {
    if (!this.generator.available) {
      return request.fallback
    }

    try {
      const text = (await this.generateWithin(request)).trim()
      if (!text) {
        throw new Error('Empty completion')
      }
      return text
    } catch (error) {
      this.reportFailure(request.operation, error)
      return request.fallback
    }
  }

  /**
   * Structured completion validated against `schema`; null on any failure
   */
  async completeJson<T>(request: CompletionRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    if (!this.generator.available) {
      return null
    }

    try {
      const text = await this.generateWithin(request)
      const parsed = schema.safeParse(this.extractJson(text))
      if (!parsed.success) {
        throw new Error(`Malformed structured output: ${parsed.error.issues.length} issue(s)`)
      }
      return parsed.data
    } catch (error) {
      this.reportFailure(request.operation, error)
      return null
    }
  }

  private async generateWithin(request: CompletionRequest): Promise<string> {
    const timeoutMs = request.timeoutMs ?? envConfig.LLM_TIMEOUT_MS
    let timer: NodeJS.Timeout | undefined

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new LlmTimeoutError(timeoutMs)), timeoutMs)
    })

    try {
      return await Promise.race([this.generator.generate(request.prompt), timeout])
    } finally {
      clearTimeout(timer)
    }
  }

  /**
   * Accepts raw JSON, markdown-fenced JSON, or JSON embedded in prose
   */
  private extractJson(text: string): unknown {
    let cleanText = text.trim()
    if (cleanText.startsWith('```')) {
      cleanText = cleanText.replace(/^```(?:json)?\s*/, '').replace(/\s*```$/, '')
    }

    try {
      return JSON.parse(cleanText)
    } catch {
      const jsonMatch = cleanText.match(/\{[\s\S]*\}/)
      if (!jsonMatch) {
        throw new Error('No JSON object in completion')
      }
      return JSON.parse(jsonMatch[0])
    }
  }

  private reportFailure(operation: string, error: unknown) {
    this.logger.logWarning('Language model call failed, using deterministic fallback', {
      service: 'LlmGatewayService',
      operation,
      reason: error instanceof Error ? error.message : String(error),
    })
  }
}
