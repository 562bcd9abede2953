import { Injectable, NestInterceptor, ExecutionContext, CallHandler, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { redactSensitive } from '../utils/redact';
import { getClientAddress } from '../utils/client-identifier';

interface RequestWithUser extends Request {
  user?: { id?: string };
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const req = context.switchToHttp().getRequest<RequestWithUser>();
    const res = context.switchToHttp().getResponse<Response>();
    const startTime = Date.now();

    const { method, url } = req;

    const requestLog: Record<string, unknown> = {
      method,
      url,
      ip: getClientAddress(req),
      userAgent: req.get('user-agent') || 'unknown',
    };

    if (req.query && Object.keys(req.query).length > 0) requestLog.query = redactSensitive(req.query);
    if (method !== 'GET' && req.body && Object.keys(req.body).length > 0) {
      requestLog.body = redactSensitive(req.body);
    }

    this.logger.log(`[REQUEST] ${JSON.stringify(requestLog)}`);

    return next.handle().pipe(
      tap({
        next: () => {
          const responseLog: Record<string, unknown> = {
            method,
            url,
            statusCode: res.statusCode,
            responseTime: `${Date.now() - startTime}ms`,
          };

          if (req.user?.id) responseLog.userId = req.user.id;

          this.logger.log(`[RESPONSE] ${JSON.stringify(responseLog)}`);
        },
        error: (err: unknown) => {
          const errorLog: Record<string, unknown> = {
            method,
            url,
            responseTime: `${Date.now() - startTime}ms`,
            error: err instanceof Error ? err.name : 'Unknown error',
          };

          if (req.user?.id) errorLog.userId = req.user.id;

          this.logger.warn(`[ERROR] ${JSON.stringify(errorLog)}`);
        },
      }),
    );
  }
}
