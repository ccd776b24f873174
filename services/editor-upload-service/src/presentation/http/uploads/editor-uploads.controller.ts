import {
  BadRequestException,
  Controller,
  Get,
  Headers,
  Inject,
  Post,
  Res,
  UploadedFile,
  UseFilters,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import {
  CORRELATION_ID_HEADER,
  EDITOR_UPLOAD_FIELD_NAME,
  type EditorBrowseBody,
  type EditorUploadResponseBody,
} from '@editor-uploads/shared';
import { toEditorUploadResponse } from '../../../application/uploads/editor-upload-response';
import { EditorImagesQuery } from '../../../application/uploads/editor-images.query';
import { UploadImageUseCase } from '../../../application/uploads/upload-image.use-case';
import { UPLOAD_PIPELINE_CONFIG } from '../../../application/uploads/upload-pipeline-config.token';
import type { AuthenticatedUser } from '../../../domain/auth/authenticated-user';
import type { UploadPipelineConfig } from '../../../domain/uploads/upload-policy';
import { CurrentUser } from '../auth/current-user.decorator';
import { EditorUploadExceptionFilter } from './editor-upload-exception.filter';
import type { UploadedEditorFile, UploadResponseLike } from './uploads.http-types';

@Controller('uploads/editor-images')
@UseFilters(EditorUploadExceptionFilter)
export class EditorUploadsController {
  constructor(
    @Inject(UploadImageUseCase)
    private readonly uploadImage: UploadImageUseCase,
    @Inject(EditorImagesQuery)
    private readonly editorImages: EditorImagesQuery,
    @Inject(UPLOAD_PIPELINE_CONFIG)
    private readonly config: UploadPipelineConfig,
  ) {}

  @Post()
  @UseInterceptors(FileInterceptor(EDITOR_UPLOAD_FIELD_NAME))
  async upload(
    @UploadedFile() file: UploadedEditorFile | undefined,
    @CurrentUser() user: AuthenticatedUser,
    @Res({ passthrough: true }) response: UploadResponseLike,
    @Headers(CORRELATION_ID_HEADER) correlationId?: string,
  ): Promise<EditorUploadResponseBody> {
    if (!file) {
      throw new BadRequestException('No file uploaded.');
    }

    const abort = new AbortController();
    response.once('close', () => {
      if (!response.writableFinished) {
        abort.abort();
      }
    });

    const outcome = await this.uploadImage.execute({
      bytes: file.buffer,
      fileName: file.originalname,
      declaredSizeBytes: file.size,
      principal: user,
      correlationId,
      signal: abort.signal,
    });

    const rendered = toEditorUploadResponse(outcome, {
      displayName: this.config.echoFileName ? file.originalname : undefined,
    });

    response.status(rendered.statusCode);
    return rendered.body;
  }

  @Get()
  async browse(): Promise<EditorBrowseBody> {
    return this.editorImages.browse();
  }
}
