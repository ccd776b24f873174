import { Controller, Get, Inject, NotFoundException, Param, Res, StreamableFile } from '@nestjs/common';
import { EditorImagesQuery } from '../../../application/uploads/editor-images.query';
import { Public } from '../auth/public.decorator';
import type { UploadResponseLike } from './uploads.http-types';

@Controller('media/editor-images')
export class EditorMediaController {
  constructor(@Inject(EditorImagesQuery) private readonly editorImages: EditorImagesQuery) {}

  @Public()
  @Get(':name')
  async getImage(
    @Param('name') name: string,
    @Res({ passthrough: true }) response: UploadResponseLike,
  ): Promise<StreamableFile> {
    const image = await this.editorImages.read(name);
    if (!image) {
      throw new NotFoundException('Image not found.');
    }

    response.setHeader('X-Content-Type-Options', 'nosniff');
    response.setHeader('Cache-Control', 'public, max-age=31536000, immutable');

    return new StreamableFile(image.bytes, {
      type: image.contentType,
      length: image.bytes.length,
    });
  }
}
