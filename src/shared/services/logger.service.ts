import { Injectable } from '@nestjs/common'
import type { Request } from 'express'

export interface TokenUsageContext {
  service: string
  operation: string
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
  model: string
  requestId?: string
}

export interface ErrorContext {
  service?: string
  operation?: string
  path?: string
  method?: string
  requestId?: string
  [key: string]: unknown
}

export type LogContext = Record<string, unknown>

/**
 * One JSON line per event on stdout/stderr.
 * Silent under NODE_ENV=test unless LOG_IN_TESTS is set.
 */
@Injectable()
export class LoggerService {
  private readonly silent = process.env.NODE_ENV === 'test' && !process.env.LOG_IN_TESTS

  /**
   * Log token usage for Gemini API calls
   */
  logTokenUsage(context: TokenUsageContext) {
    this.write('log', 'TOKEN_USAGE', { ...context })
  }

  /**
   * Log errors with structured context
   */
  logError(error: unknown, context?: ErrorContext) {
    const errorObj = error instanceof Error ? error : new Error(String(error))

    this.write('error', 'ERROR', {
      message: errorObj.message,
      stack: errorObj.stack,
      ...context,
    })
  }

  /**
   * Log HTTP requests
   */
  logRequest(req: Request, statusCode: number, duration: number) {
    this.write('log', 'REQUEST', {
      method: req.method,
      path: req.path || req.url,
      statusCode,
      duration,
    })
  }

  /**
   * Log general info
   */
  logInfo(message: string, context?: LogContext) {
    this.write('log', 'INFO', { message, ...context })
  }

  /**
   * Log warnings
   */
  logWarning(message: string, context?: LogContext) {
    this.write('warn', 'WARNING', { message, ...context })
  }

  private write(channel: 'log' | 'warn' | 'error', type: string, payload: LogContext) {
    if (this.silent) return

    console[channel](
      JSON.stringify({
        type,
        timestamp: new Date().toISOString(),
        ...payload,
      }),
    )
  }
}
