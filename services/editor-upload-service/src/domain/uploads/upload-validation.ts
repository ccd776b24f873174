import { formatForExtension, isImageExtension, isImageFormat, type ImageExtension, type ImageFormat } from './image-format';
import { describeByteLimit, uploadError } from './upload-error';
import type { DecodedImage, StageResult } from './validated-asset';

export interface PayloadSizeProbe {
  declaredSizeBytes?: number;
  actualSizeBytes: number;
}

export function checkClaimedExtension(
  fileName: string | null | undefined,
  allowedExtensions: readonly ImageExtension[],
): StageResult<ImageExtension> {
  const unsupported = (): StageResult<ImageExtension> => ({
    ok: false,
    error: uploadError('UnsupportedFormat', `Invalid file type. Allowed: ${allowedExtensions.join(', ')}`),
  });

  if (typeof fileName !== 'string') {
    return unsupported();
  }

  const baseName = extractBaseName(fileName);
  if (!baseName || baseName.endsWith('.')) {
    return unsupported();
  }

  const dot = baseName.lastIndexOf('.');
  if (dot <= 0) {
    return unsupported();
  }

  const extension = baseName.slice(dot).toLowerCase();
  if (!isImageExtension(extension) || !allowedExtensions.includes(extension)) {
    return unsupported();
  }

  return { ok: true, value: extension };
}

export function checkPayloadSize(probe: PayloadSizeProbe, maxUploadBytes: number): StageResult<number> {
  const declared = isTrustworthyLength(probe.declaredSizeBytes) ? probe.declaredSizeBytes : undefined;

  if ((declared !== undefined && declared > maxUploadBytes) || probe.actualSizeBytes > maxUploadBytes) {
    return {
      ok: false,
      error: uploadError('PayloadTooLarge', `File too large. Maximum size is ${describeByteLimit(maxUploadBytes)}.`),
    };
  }

  return { ok: true, value: probe.actualSizeBytes };
}

export function checkDecodedFormat(extension: ImageExtension, decoded: DecodedImage): StageResult<ImageFormat> {
  if (!isImageFormat(decoded.format) || decoded.width <= 0 || decoded.height <= 0 || decoded.pixelBytes <= 0) {
    return { ok: false, error: uploadError('InvalidImageContent') };
  }

  if (decoded.format !== formatForExtension(extension)) {
    return { ok: false, error: uploadError('ExtensionMismatch') };
  }

  return { ok: true, value: decoded.format };
}

/** Display-safe base name of a client file name, or an empty string. */
export function extractBaseName(fileName: string): string {
  const segments = fileName.trim().split(/[\\/]/);
  return (segments[segments.length - 1] ?? '').replace(/[\u0000-\u001f\u007f]/g, '').trim();
}

function isTrustworthyLength(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}
