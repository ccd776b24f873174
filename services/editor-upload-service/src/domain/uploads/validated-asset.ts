import type { ImageExtension, ImageFormat } from './image-format';
import type { UploadError } from './upload-error';

export type StageResult<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      error: UploadError;
    };

export interface DecodedImage {
  /** Format reported by the decoder, not by the client. May be outside {@link ImageFormat}. */
  format: string;
  width: number;
  height: number;
  frames: number;
  /** Bytes of raw pixel data produced by the decode pass. */
  pixelBytes: number;
}

export interface ValidatedAsset {
  readonly format: ImageFormat;
  readonly extension: ImageExtension;
  readonly sizeBytes: number;
  readonly width: number;
  readonly height: number;
  readonly storageName: string;
  readonly storagePath: string;
  readonly publicUrl: string;
}

export type UploadOutcome =
  | {
      outcome: 'stored';
      asset: ValidatedAsset;
    }
  | {
      outcome: 'rejected';
      error: UploadError;
    };

export type UploadPipelineStage =
  | 'received'
  | 'extension-checked'
  | 'size-checked'
  | 'content-validated'
  | 'name-generated'
  | 'stored';
