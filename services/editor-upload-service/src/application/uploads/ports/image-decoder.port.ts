import type { DecodedImage } from '../../../domain/uploads/validated-asset';

export const IMAGE_DECODER_PORT = Symbol('IMAGE_DECODER_PORT');

export type ImageDecodeResult =
  | {
      decoded: true;
      image: DecodedImage;
    }
  | {
      decoded: false;
      reason: string;
    };

export interface ImageDecoderPort {
  /** Decodes every pixel of every frame; a header that parses is not enough. */
  decode(bytes: Buffer): Promise<ImageDecodeResult>;
}
