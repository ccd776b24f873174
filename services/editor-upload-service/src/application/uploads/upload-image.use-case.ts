import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { createJsonLogEntry, ensureCorrelationId, type LogLevel } from '@editor-uploads/shared';
import type { AuthenticatedUser } from '../../domain/auth/authenticated-user';
import { uploadError, type UploadError } from '../../domain/uploads/upload-error';
import type { UploadPipelineConfig } from '../../domain/uploads/upload-policy';
import {
  checkClaimedExtension,
  checkDecodedFormat,
  checkPayloadSize,
} from '../../domain/uploads/upload-validation';
import {
  generateStorageName,
  joinPublicUrl,
  type RandomBytesSource,
} from '../../domain/uploads/storage-name';
import type {
  UploadOutcome,
  UploadPipelineStage,
  ValidatedAsset,
} from '../../domain/uploads/validated-asset';
import { ASSET_STORAGE_PORT, type AssetStoragePort } from './ports/asset-storage.port';
import { IMAGE_DECODER_PORT, type ImageDecoderPort } from './ports/image-decoder.port';
import { RANDOM_BYTES_SOURCE } from './ports/random-bytes.port';
import { UPLOAD_PIPELINE_CONFIG } from './upload-pipeline-config.token';

const SERVICE_NAME = 'editor-upload-service';

export interface UploadRequest {
  bytes: Buffer;
  fileName: string | null | undefined;
  declaredSizeBytes?: number;
  principal: AuthenticatedUser;
  correlationId?: string;
  signal?: AbortSignal;
}

interface RejectionContext {
  stage: UploadPipelineStage;
  request: UploadRequest;
  correlationId: string;
  detail?: Record<string, unknown>;
  cause?: unknown;
}

@Injectable()
export class UploadImageUseCase {
  private readonly logger = new Logger(UploadImageUseCase.name);

  constructor(
    @Inject(IMAGE_DECODER_PORT)
    private readonly imageDecoder: ImageDecoderPort,
    @Inject(ASSET_STORAGE_PORT)
    private readonly assetStorage: AssetStoragePort,
    @Inject(UPLOAD_PIPELINE_CONFIG)
    private readonly config: UploadPipelineConfig,
    @Optional()
    @Inject(RANDOM_BYTES_SOURCE)
    private readonly randomBytes?: RandomBytesSource,
  ) {}

  async execute(request: UploadRequest): Promise<UploadOutcome> {
    const correlationId = ensureCorrelationId(request.correlationId);

    const extension = checkClaimedExtension(request.fileName, this.config.allowedExtensions);
    if (!extension.ok) {
      return this.reject(extension.error, { stage: 'received', request, correlationId });
    }

    const size = checkPayloadSize(
      {
        declaredSizeBytes: request.declaredSizeBytes,
        actualSizeBytes: request.bytes.length,
      },
      this.config.maxUploadBytes,
    );
    if (!size.ok) {
      return this.reject(size.error, {
        stage: 'extension-checked',
        request,
        correlationId,
        detail: { declaredSizeBytes: request.declaredSizeBytes, actualSizeBytes: request.bytes.length },
      });
    }

    const decoded = await this.imageDecoder.decode(request.bytes);
    if (!decoded.decoded) {
      return this.reject(uploadError('InvalidImageContent'), {
        stage: 'size-checked',
        request,
        correlationId,
        detail: { decoderReason: decoded.reason },
      });
    }

    const format = checkDecodedFormat(extension.value, decoded.image);
    if (!format.ok) {
      return this.reject(format.error, {
        stage: 'size-checked',
        request,
        correlationId,
        detail: { claimedExtension: extension.value, detectedFormat: decoded.image.format },
      });
    }

    for (let attempt = 1; attempt <= this.config.nameAttempts; attempt += 1) {
      const storageName = generateStorageName(extension.value, this.randomBytes);
      const written = await this.assetStorage.writeAsset(storageName, request.bytes, request.signal);

      if (written.written) {
        const asset: ValidatedAsset = {
          format: format.value,
          extension: extension.value,
          sizeBytes: size.value,
          width: decoded.image.width,
          height: decoded.image.height,
          storageName,
          storagePath: written.path,
          publicUrl: joinPublicUrl(this.config.publicBaseUrl, storageName),
        };

        this.log('info', 'Editor image stored.', {
          correlationId,
          userId: request.principal.subject,
          assetName: storageName,
          metadata: {
            format: asset.format,
            sizeBytes: asset.sizeBytes,
            width: asset.width,
            height: asset.height,
            attempt,
          },
        });

        return { outcome: 'stored', asset };
      }

      if (written.reason !== 'exists') {
        return this.reject(uploadError('StorageWriteError'), {
          stage: 'name-generated',
          request,
          correlationId,
          detail: { storageFailure: written.reason, attempt },
          cause: written.error,
        });
      }

      this.log('warn', 'Generated storage name already taken, retrying.', {
        correlationId,
        userId: request.principal.subject,
        assetName: storageName,
        metadata: { attempt, maxAttempts: this.config.nameAttempts },
      });
    }

    return this.reject(uploadError('StorageWriteError'), {
      stage: 'name-generated',
      request,
      correlationId,
      detail: { storageFailure: 'name-collision', attempts: this.config.nameAttempts },
    });
  }

  private reject(error: UploadError, context: RejectionContext): UploadOutcome {
    const level: LogLevel = error.kind === 'StorageWriteError' ? 'error' : 'warn';

    this.log(level, 'Editor image upload rejected.', {
      correlationId: context.correlationId,
      userId: context.request.principal.subject,
      metadata: {
        errorKind: error.kind,
        failedAfter: context.stage,
        ...context.detail,
      },
      error: context.cause,
    });

    return { outcome: 'rejected', error };
  }

  private log(
    level: LogLevel,
    message: string,
    fields: {
      correlationId: string;
      userId?: string;
      assetName?: string;
      metadata?: Record<string, unknown>;
      error?: unknown;
    },
  ): void {
    const line = JSON.stringify(createJsonLogEntry({
      level,
      service: SERVICE_NAME,
      message,
      ...fields,
    }));

    if (level === 'error') {
      this.logger.error(line);
    } else if (level === 'warn') {
      this.logger.warn(line);
    } else {
      this.logger.log(line);
    }
  }
}
