import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { CORRELATION_ID_HEADER, createJsonLogEntry, ensureCorrelationId } from '@editor-uploads/shared';

export interface HttpRequestLike {
  headers: Record<string, string | string[] | undefined>;
  originalUrl?: string;
  url?: string;
  method: string;
}

export interface HttpResponseLike {
  setHeader(name: string, value: string): void;
  status(code: number): HttpResponseLike;
  json(body: unknown): void;
}

interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
  statusCode: number;
  path: string;
  method: string;
  timestamp: string;
  correlationId: string;
}

export interface NormalizedHttpError {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<HttpRequestLike>();
    const response = ctx.getResponse<HttpResponseLike>();

    const correlationId = ensureCorrelationId(request.headers[CORRELATION_ID_HEADER]);
    const normalized = normalizeHttpException(exception);
    const body: ErrorResponseBody = {
      error: {
        code: normalized.code,
        message: normalized.message,
        ...(normalized.details === undefined ? {} : { details: normalized.details }),
      },
      statusCode: normalized.statusCode,
      path: request.originalUrl ?? request.url ?? '/',
      method: request.method,
      timestamp: new Date().toISOString(),
      correlationId,
    };

    response.setHeader(CORRELATION_ID_HEADER, correlationId);
    response.status(normalized.statusCode).json(body);

    const level = normalized.statusCode >= 500 ? 'error' : 'warn';
    const logLine = JSON.stringify(createJsonLogEntry({
      level,
      service: 'editor-upload-service',
      message: 'HTTP request failed.',
      correlationId,
      route: body.path,
      metadata: {
        method: body.method,
        statusCode: body.statusCode,
        errorCode: body.error.code,
      },
      error: normalized.statusCode >= 500 ? exception : undefined,
    }));

    if (level === 'error') {
      this.logger.error(logLine);
    } else {
      this.logger.warn(logLine);
    }
  }
}

export function normalizeHttpException(exception: unknown): NormalizedHttpError {
  if (exception instanceof HttpException) {
    const statusCode = exception.getStatus();
    const response = exception.getResponse();

    if (typeof response === 'string') {
      return {
        statusCode,
        code: defaultCodeForStatus(statusCode),
        message: response,
      };
    }

    if (response && typeof response === 'object') {
      const body: Record<string, unknown> = { ...response };
      const message = extractMessage(body.message) ?? (exception.message || 'Request failed.');
      const code = typeof body.errorCode === 'string'
        ? body.errorCode
        : typeof body.code === 'string'
          ? body.code
          : defaultCodeForStatus(statusCode);
      const details = body.details ?? (Array.isArray(body.message) ? body.message : undefined);

      return { statusCode, code, message, details };
    }

    return {
      statusCode,
      code: defaultCodeForStatus(statusCode),
      message: exception.message || 'Request failed.',
    };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    code: 'INTERNAL_SERVER_ERROR',
    message: 'Unexpected server error.',
  };
}

function extractMessage(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) {
    return value;
  }
  if (Array.isArray(value) && value.length > 0) {
    const first = value.find((item) => typeof item === 'string' && item.trim());
    if (typeof first === 'string') {
      return first;
    }
  }
  return undefined;
}

function defaultCodeForStatus(statusCode: number): string {
  switch (statusCode) {
    case HttpStatus.BAD_REQUEST:
      return 'BAD_REQUEST';
    case HttpStatus.UNAUTHORIZED:
      return 'UNAUTHORIZED';
    case HttpStatus.FORBIDDEN:
      return 'FORBIDDEN';
    case HttpStatus.NOT_FOUND:
      return 'NOT_FOUND';
    case HttpStatus.PAYLOAD_TOO_LARGE:
      return 'PAYLOAD_TOO_LARGE';
    case HttpStatus.TOO_MANY_REQUESTS:
      return 'TOO_MANY_REQUESTS';
    default:
      return statusCode >= 500 ? 'INTERNAL_SERVER_ERROR' : 'HTTP_ERROR';
  }
}
