import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common'
import type { Request, Response } from 'express'
import { Observable, tap } from 'rxjs'
import { LoggerService } from '../services/logger.service'

// One REQUEST line per handled call; errors are logged by HttpExceptionFilter
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: LoggerService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp()
    const request = http.getRequest<Request>()
    const response = http.getResponse<Response>()
    const startTime = Date.now()

    return next.handle().pipe(
      tap(() => {
        this.logger.logRequest(request, response.statusCode, Date.now() - startTime)
      }),
    )
  }
}
