import { Inject, Injectable } from '@nestjs/common';
import sharp from 'sharp';
import type {
  ImageDecodeResult,
  ImageDecoderPort,
} from '../../application/uploads/ports/image-decoder.port';
import { EditorUploadServiceConfigService } from '../config/editor-upload-service-config.service';

@Injectable()
export class SharpImageDecoderAdapter implements ImageDecoderPort {
  constructor(
    @Inject(EditorUploadServiceConfigService)
    private readonly config: EditorUploadServiceConfigService,
  ) {}

  async decode(bytes: Buffer): Promise<ImageDecodeResult> {
    if (bytes.length === 0) {
      return { decoded: false, reason: 'Empty payload.' };
    }

    try {
      // pages: -1 pulls every frame of animated GIF/WEBP through the decoder.
      const image = sharp(bytes, {
        failOn: 'truncated',
        limitInputPixels: this.config.maxInputPixels,
        pages: -1,
      });

      const metadata = await image.metadata();
      const { data, info } = await image.raw().toBuffer({ resolveWithObject: true });

      return {
        decoded: true,
        image: {
          format: metadata.format ?? 'unknown',
          width: metadata.width ?? info.width,
          height: metadata.pageHeight ?? metadata.height ?? info.height,
          frames: metadata.pages ?? 1,
          pixelBytes: data.length,
        },
      };
    } catch (error) {
      return {
        decoded: false,
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
