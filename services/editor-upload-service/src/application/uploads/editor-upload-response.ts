import type {
  EditorUploadErrorBody,
  EditorUploadResponseBody,
  EditorUploadSuccessBody,
} from '@editor-uploads/shared';
import { httpStatusForUploadError, type UploadError } from '../../domain/uploads/upload-error';
import { extractBaseName } from '../../domain/uploads/upload-validation';
import type { UploadOutcome } from '../../domain/uploads/validated-asset';

export interface EditorUploadHttpResponse {
  statusCode: number;
  body: EditorUploadResponseBody;
}

export interface EditorUploadResponseOptions {
  /** Client file name to echo back as `fileName`; omitted from the body when absent. */
  displayName?: string | null;
}

export function toEditorUploadResponse(
  outcome: UploadOutcome,
  options: EditorUploadResponseOptions = {},
): EditorUploadHttpResponse {
  if (outcome.outcome === 'rejected') {
    return toEditorErrorResponse(outcome.error);
  }

  const body: EditorUploadSuccessBody = { url: outcome.asset.publicUrl };
  const displayName = options.displayName ? extractBaseName(options.displayName) : '';
  if (displayName) {
    body.fileName = displayName;
  }

  return { statusCode: 200, body };
}

export function toEditorErrorResponse(error: UploadError): EditorUploadHttpResponse {
  return {
    statusCode: httpStatusForUploadError(error),
    body: editorErrorBody(error.message),
  };
}

export function editorErrorBody(message: string): EditorUploadErrorBody {
  return { error: { message } };
}
