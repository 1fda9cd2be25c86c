import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ClsService } from 'nestjs-cls';
import { AppClsStore } from '../context/cls-store.type';

interface ErrorResponseBody {
  success: false;
  statusCode: number;
  correlationId: string | null;
  timestamp: string;
  path: string;
  method: string;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

interface NormalizedError {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function normalizeException(exception: unknown): NormalizedError {
  if (!(exception instanceof HttpException)) {
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred. Please try again later.',
    };
  }

  const status = exception.getStatus();
  const response = exception.getResponse();
  const fallbackCode = HttpStatus[status] ?? `HTTP_${status}`;

  // throw new BadRequestException('message')
  if (typeof response === 'string') {
    return { status, code: fallbackCode, message: response };
  }

  if (!isRecord(response)) {
    return { status, code: fallbackCode, message: exception.message };
  }

  // Domain errors: { code, message, details? }; Nest default: { statusCode, message, error }
  let code = fallbackCode;
  if (typeof response.code === 'string') {
    code = response.code;
  } else if (typeof response.error === 'string') {
    code = response.error;
  }

  let message = exception.message;
  let details: unknown = undefined;

  if (Array.isArray(response.message)) {
    // class-validator messages
    const messages = response.message.map(String);
    message = messages.join(' ');
    details = { validationErrors: messages };
  } else if (typeof response.message === 'string') {
    message = response.message;
  }

  if (response.details !== undefined) {
    details = response.details;
  }

  return { status, code, message, details };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(
    private readonly cls: ClsService<AppClsStore>,
  ) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    const correlationId = this.cls.get('correlationId') ?? null;
    const { status, code, message, details } = normalizeException(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `corrId=${correlationId ?? '-'} | ${req.method} ${req.url} | ${code}`,
        (exception instanceof Error ? exception.stack : undefined) ?? String(exception),
      );
    }

    const body: ErrorResponseBody = {
      success: false,
      statusCode: status,
      correlationId,
      timestamp: new Date().toISOString(),
      path: req.url,
      method: req.method,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
    };

    res.status(status).json(body);
  }
}
