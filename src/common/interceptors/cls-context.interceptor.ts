// src/common/interceptors/cls-context.interceptor.ts
import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Observable, tap } from 'rxjs';
import type { Request, Response } from 'express';
import { ClsService } from 'nestjs-cls';
import { AppClsStore } from '../context/cls-store.type';
import { v4 as uuidv4 } from 'uuid';

function firstHeaderValue(raw: string | string[] | undefined): string | undefined {
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

@Injectable()
export class ClsContextInterceptor implements NestInterceptor {
  private readonly logger = new Logger(ClsContextInterceptor.name);

  constructor(
    private readonly cls: ClsService<AppClsStore>,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const httpCtx = context.switchToHttp();
    const req = httpCtx.getRequest<Request>();
    const res = httpCtx.getResponse<Response>();

    const { method, url } = req;
    const start = Date.now();

    const correlationId =
      firstHeaderValue(req.headers['x-correlation-id']) ?? uuidv4();
    this.cls.set('correlationId', correlationId);

    const sessionId = firstHeaderValue(req.headers['x-session-id']);
    if (sessionId) {
      this.cls.set('sessionId', sessionId);
    }

    res.setHeader('x-correlation-id', correlationId);

    const ip = this.cls.get('ip');
    const ua = this.cls.get('userAgent');

    return next.handle().pipe(
      tap(() => {
        const ms = Date.now() - start;

        this.logger.log(
          [
            `corrId=${correlationId}`,
            `session=${sessionId ?? '-'}`,
            `ip=${ip ?? '-'}`,
            `ua="${ua ?? '-'}"`,
            `${method} ${url}`,
            `+${ms}ms`,
          ].join(' | '),
        );
      }),
    );
  }
}
