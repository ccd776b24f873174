import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createJsonLogEntry } from '@editor-uploads/shared';
import { AppModule } from './app.module';
import { EditorUploadServiceConfigService } from './infrastructure/config/editor-upload-service-config.service';
import { HttpExceptionFilter } from './presentation/http/common/http-exception.filter';

const SERVICE_NAME = 'editor-upload-service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableCors();
  app.useGlobalFilters(new HttpExceptionFilter());
  const config = app.get(EditorUploadServiceConfigService);
  const port = config.port;

  app.enableShutdownHooks();
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(JSON.stringify(createJsonLogEntry({
    level: 'info',
    service: SERVICE_NAME,
    message: `${SERVICE_NAME} listening on port ${port}`,
    correlationId: 'system',
    metadata: {
      port,
      uploadRoot: config.uploadRoot,
      publicBaseUrl: config.publicBaseUrl,
      maxUploadBytes: config.maxUploadBytes,
    },
  })));
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(JSON.stringify(createJsonLogEntry({
    level: 'error',
    service: SERVICE_NAME,
    message: `Failed to start ${SERVICE_NAME}`,
    correlationId: 'system',
    error,
  })));
  process.exitCode = 1;
});
