import { isImageExtension, SUPPORTED_IMAGE_EXTENSIONS, type ImageExtension } from './image-format';

export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
export const DEFAULT_NAME_ATTEMPTS = 3;
export const DEFAULT_MAX_INPUT_PIXELS = 40_000_000;

/**
 * Everything the upload pipeline needs to know, resolved once at start-up and
 * handed to the use case. Nothing in the pipeline reads process-wide settings.
 */
export interface UploadPipelineConfig {
  maxUploadBytes: number;
  allowedExtensions: readonly ImageExtension[];
  uploadRoot: string;
  publicBaseUrl: string;
  nameAttempts: number;
  echoFileName: boolean;
}

export function parseAllowedExtensions(raw: string | undefined): ImageExtension[] {
  const fallback = [...SUPPORTED_IMAGE_EXTENSIONS];
  if (!raw || raw.trim().length === 0) {
    return fallback;
  }

  const values = raw
    .split(',')
    .map((value) => normalizeExtension(value))
    .filter((value) => value.length > 0);

  const unsupported = values.filter((value) => !isImageExtension(value));
  if (unsupported.length > 0) {
    throw new Error(`Unsupported upload extensions: ${unsupported.join(', ')}`);
  }

  const allowed = values.filter(isImageExtension);
  return allowed.length > 0 ? Array.from(new Set(allowed)) : fallback;
}

function normalizeExtension(value: string): string {
  const normalized = value.trim().toLowerCase();
  if (normalized.length === 0) {
    return normalized;
  }
  return normalized.startsWith('.') ? normalized : `.${normalized}`;
}
