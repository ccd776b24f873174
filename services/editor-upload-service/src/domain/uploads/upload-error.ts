import { UPLOAD_ERROR_CATALOG_V1, type UploadErrorKind } from '@editor-uploads/shared';

export type { UploadErrorKind };

export interface UploadError {
  kind: UploadErrorKind;
  message: string;
}

export function uploadError(kind: UploadErrorKind, message?: string): UploadError {
  return {
    kind,
    message: message ?? UPLOAD_ERROR_CATALOG_V1[kind].defaultMessage,
  };
}

export function httpStatusForUploadError(error: UploadError): number {
  return UPLOAD_ERROR_CATALOG_V1[error.kind].httpStatus;
}

export function describeByteLimit(maxBytes: number): string {
  const mebibytes = maxBytes / (1024 * 1024);
  return Number.isInteger(mebibytes) ? `${mebibytes}MB` : `${maxBytes} bytes`;
}
