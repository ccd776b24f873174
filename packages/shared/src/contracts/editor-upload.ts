/**
 * Wire contract of the rich-text editor upload endpoint (CKEditor 5 simple
 * upload adapter). The editor reads `url` on success and `error.message` on
 * failure; nothing else is required by the widget.
 */
export const EDITOR_UPLOAD_FIELD_NAME = 'upload';

export const UPLOAD_ERROR_CATALOG_V1 = {
  UnsupportedFormat: {
    httpStatus: 400,
    defaultMessage: 'Invalid file type.',
  },
  PayloadTooLarge: {
    httpStatus: 400,
    defaultMessage: 'File too large.',
  },
  InvalidImageContent: {
    httpStatus: 400,
    defaultMessage: 'Invalid image file.',
  },
  ExtensionMismatch: {
    httpStatus: 400,
    defaultMessage: 'File content does not match its extension.',
  },
  StorageWriteError: {
    httpStatus: 500,
    defaultMessage: 'Upload failed. Please try again.',
  },
} as const;

export type UploadErrorKind = keyof typeof UPLOAD_ERROR_CATALOG_V1;

export const UPLOAD_ERROR_KINDS: readonly UploadErrorKind[] = [
  'UnsupportedFormat',
  'PayloadTooLarge',
  'InvalidImageContent',
  'ExtensionMismatch',
  'StorageWriteError',
];

export interface EditorUploadSuccessBody {
  url: string;
  fileName?: string;
}

export interface EditorUploadErrorBody {
  error: {
    message: string;
  };
}

export type EditorUploadResponseBody = EditorUploadSuccessBody | EditorUploadErrorBody;

export interface EditorBrowseEntry {
  name: string;
  url: string;
}

export interface EditorBrowseBody {
  files: EditorBrowseEntry[];
}

export function isUploadErrorKind(value: unknown): value is UploadErrorKind {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(UPLOAD_ERROR_CATALOG_V1, value);
}

export function isEditorUploadErrorBody(body: EditorUploadResponseBody): body is EditorUploadErrorBody {
  return 'error' in body;
}
