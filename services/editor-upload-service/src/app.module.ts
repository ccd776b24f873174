import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { MulterModule } from '@nestjs/platform-express';
import { ACCESS_TOKEN_VERIFIER } from './application/auth/ports/access-token-verifier.port';
import { ServiceInfoQuery } from './application/system/service-info.query';
import { EditorImagesQuery } from './application/uploads/editor-images.query';
import { ASSET_STORAGE_PORT } from './application/uploads/ports/asset-storage.port';
import { IMAGE_DECODER_PORT } from './application/uploads/ports/image-decoder.port';
import { UploadImageUseCase } from './application/uploads/upload-image.use-case';
import { UPLOAD_PIPELINE_CONFIG } from './application/uploads/upload-pipeline-config.token';
import { OidcAccessTokenVerifierService } from './infrastructure/auth/oidc-access-token-verifier.service';
import {
  EDITOR_UPLOAD_SERVICE_ENV_FILE_PATHS,
  EditorUploadServiceConfigService,
  validateEditorUploadServiceEnvironment,
} from './infrastructure/config/editor-upload-service-config.service';
import { SharpImageDecoderAdapter } from './infrastructure/imaging/sharp-image-decoder.adapter';
import { LocalFilesystemAssetStorageAdapter } from './infrastructure/storage/local-filesystem-asset-storage.adapter';
import { JwtAuthGuard } from './presentation/http/auth/jwt-auth.guard';
import { AppController } from './presentation/http/system/app.controller';
import { EditorMediaController } from './presentation/http/uploads/editor-media.controller';
import { EditorUploadsController } from './presentation/http/uploads/editor-uploads.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: EDITOR_UPLOAD_SERVICE_ENV_FILE_PATHS,
      validate: validateEditorUploadServiceEnvironment,
    }),
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        // Multipart parsing stops at the ceiling; the pipeline re-checks actual bytes.
        limits: {
          fileSize: new EditorUploadServiceConfigService(config).maxUploadBytes,
          files: 1,
          fields: 10,
        },
      }),
    }),
  ],
  controllers: [AppController, EditorUploadsController, EditorMediaController],
  providers: [
    EditorUploadServiceConfigService,
    {
      provide: UPLOAD_PIPELINE_CONFIG,
      inject: [EditorUploadServiceConfigService],
      useFactory: (config: EditorUploadServiceConfigService) => config.toUploadPipelineConfig(),
    },
    ServiceInfoQuery,
    OidcAccessTokenVerifierService,
    {
      provide: ACCESS_TOKEN_VERIFIER,
      useExisting: OidcAccessTokenVerifierService,
    },
    SharpImageDecoderAdapter,
    {
      provide: IMAGE_DECODER_PORT,
      useExisting: SharpImageDecoderAdapter,
    },
    LocalFilesystemAssetStorageAdapter,
    {
      provide: ASSET_STORAGE_PORT,
      useExisting: LocalFilesystemAssetStorageAdapter,
    },
    UploadImageUseCase,
    EditorImagesQuery,
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard,
    },
  ],
})
export class AppModule {}
