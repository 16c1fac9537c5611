import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common'
import type { Request, Response } from 'express'
import { LoggerService } from '../services/logger.service'

/**
 * Serializes every error as `{ statusCode, message, error? }`.
 * Unknown errors become a bare 500 and are logged with their stack.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp()
    const request = ctx.getRequest<Request>()
    const response = ctx.getResponse<Response>()

    if (exception instanceof HttpException) {
      const status = exception.getStatus()
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.logError(exception, { path: request.url, method: request.method })
      }

      const body = exception.getResponse()
      response.status(status).json(typeof body === 'string' ? { statusCode: status, message: body } : body)
      return
    }

    this.logger.logError(exception, { path: request.url, method: request.method })
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
    })
  }
}
