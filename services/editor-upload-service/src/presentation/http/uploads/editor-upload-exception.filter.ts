import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Inject,
  Logger,
} from '@nestjs/common';
import { CORRELATION_ID_HEADER, createJsonLogEntry, ensureCorrelationId } from '@editor-uploads/shared';
import { editorErrorBody, toEditorErrorResponse } from '../../../application/uploads/editor-upload-response';
import { UPLOAD_PIPELINE_CONFIG } from '../../../application/uploads/upload-pipeline-config.token';
import { describeByteLimit, uploadError } from '../../../domain/uploads/upload-error';
import type { UploadPipelineConfig } from '../../../domain/uploads/upload-policy';
import {
  normalizeHttpException,
  type HttpRequestLike,
  type HttpResponseLike,
} from '../common/http-exception.filter';

/**
 * Renders failures raised around the upload pipeline (guard, multipart
 * parser) in the `{ error: { message } }` shape the editor widget reads.
 */
@Catch()
export class EditorUploadExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(EditorUploadExceptionFilter.name);

  constructor(
    @Inject(UPLOAD_PIPELINE_CONFIG)
    private readonly config: UploadPipelineConfig,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<HttpRequestLike>();
    const response = ctx.getResponse<HttpResponseLike>();
    const correlationId = ensureCorrelationId(request.headers[CORRELATION_ID_HEADER]);

    const normalized = normalizeHttpException(exception);
    const rendered = this.render(normalized.statusCode, normalized.message);

    response.setHeader(CORRELATION_ID_HEADER, correlationId);
    response.status(rendered.statusCode).json(rendered.body);

    const level = rendered.statusCode >= 500 ? 'error' : 'warn';
    const logLine = JSON.stringify(createJsonLogEntry({
      level,
      service: 'editor-upload-service',
      message: 'Editor upload request failed before the pipeline ran.',
      correlationId,
      route: request.originalUrl ?? request.url ?? '/',
      metadata: {
        method: request.method,
        statusCode: rendered.statusCode,
        sourceStatusCode: normalized.statusCode,
        errorCode: normalized.code,
      },
      error: rendered.statusCode >= 500 ? exception : undefined,
    }));

    if (level === 'error') {
      this.logger.error(logLine);
    } else {
      this.logger.warn(logLine);
    }
  }

  private render(statusCode: number, message: string) {
    if (statusCode === HttpStatus.PAYLOAD_TOO_LARGE) {
      return toEditorErrorResponse(
        uploadError(
          'PayloadTooLarge',
          `File too large. Maximum size is ${describeByteLimit(this.config.maxUploadBytes)}.`,
        ),
      );
    }

    if (statusCode >= 500) {
      return toEditorErrorResponse(uploadError('StorageWriteError'));
    }

    return { statusCode, body: editorErrorBody(message) };
  }
}
