import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { ConfigService } from '@nestjs/config';
import {
  EditorUploadServiceConfigService,
  validateEditorUploadServiceEnvironment,
} from '../../../services/editor-upload-service/src/infrastructure/config/editor-upload-service-config.service';

test('validateEditorUploadServiceEnvironment applies defaults', () => {
  const env = validateEditorUploadServiceEnvironment({ AUTH_DEV_BYPASS: 'true' });

  assert.equal(env.EDITOR_UPLOAD_SERVICE_PORT, 3000);
  assert.equal(env.EDITOR_UPLOAD_MAX_BYTES, 10 * 1024 * 1024);
  assert.equal(env.EDITOR_UPLOAD_ALLOWED_EXTENSIONS, '.jpg,.jpeg,.png,.gif,.webp');
  assert.equal(env.EDITOR_UPLOAD_ROOT, path.resolve(process.cwd(), 'media/uploads/editor'));
  assert.equal(env.EDITOR_UPLOAD_PUBLIC_BASE_URL, '/media/editor-images');
  assert.equal(env.EDITOR_UPLOAD_NAME_ATTEMPTS, 3);
  assert.equal(env.EDITOR_UPLOAD_MAX_INPUT_PIXELS, 40_000_000);
  assert.equal(env.EDITOR_UPLOAD_ECHO_FILE_NAME, false);
  assert.equal(env.AUTH_DEV_BYPASS, true);
  assert.equal(env.JWT_ISSUER_URL, '');
});

test('validateEditorUploadServiceEnvironment normalizes explicit values', () => {
  const env = validateEditorUploadServiceEnvironment({
    EDITOR_UPLOAD_MAX_BYTES: '2048',
    EDITOR_UPLOAD_ALLOWED_EXTENSIONS: 'PNG,jpg',
    EDITOR_UPLOAD_ROOT: '/srv/media/uploads/editor/',
    EDITOR_UPLOAD_PUBLIC_BASE_URL: 'https://cdn.example.test/editor/',
    EDITOR_UPLOAD_ECHO_FILE_NAME: 'TRUE',
    JWT_ISSUER_URL: 'https://auth.example.test/realms/blog',
  });

  assert.equal(env.EDITOR_UPLOAD_MAX_BYTES, 2048);
  assert.equal(env.EDITOR_UPLOAD_ALLOWED_EXTENSIONS, '.png,.jpg');
  assert.equal(env.EDITOR_UPLOAD_ROOT, '/srv/media/uploads/editor');
  assert.equal(env.EDITOR_UPLOAD_PUBLIC_BASE_URL, 'https://cdn.example.test/editor');
  assert.equal(env.EDITOR_UPLOAD_ECHO_FILE_NAME, true);
  assert.equal(env.AUTH_DEV_BYPASS, false);
  assert.equal(env.JWT_ISSUER_URL, 'https://auth.example.test/realms/blog');
});

test('validateEditorUploadServiceEnvironment requires an issuer unless the dev bypass is on', () => {
  assert.throws(
    () => validateEditorUploadServiceEnvironment({}),
    /JWT_ISSUER_URL is required when AUTH_DEV_BYPASS=false/,
  );
});

test('validateEditorUploadServiceEnvironment rejects unsafe or malformed settings', () => {
  const base = { AUTH_DEV_BYPASS: 'true' };

  assert.throws(
    () => validateEditorUploadServiceEnvironment({ ...base, EDITOR_UPLOAD_ROOT: 'media/uploads' }),
    /EDITOR_UPLOAD_ROOT must be an absolute path/,
  );
  assert.throws(
    () => validateEditorUploadServiceEnvironment({ ...base, EDITOR_UPLOAD_ALLOWED_EXTENSIONS: '.png,.svg' }),
    /EDITOR_UPLOAD_ALLOWED_EXTENSIONS is invalid: Unsupported upload extensions: \.svg/,
  );
  assert.throws(
    () => validateEditorUploadServiceEnvironment({ ...base, EDITOR_UPLOAD_MAX_BYTES: '0' }),
    /EDITOR_UPLOAD_MAX_BYTES must be a positive integer/,
  );
  assert.throws(
    () => validateEditorUploadServiceEnvironment({ ...base, EDITOR_UPLOAD_NAME_ATTEMPTS: '11' }),
    /EDITOR_UPLOAD_NAME_ATTEMPTS must not exceed 10/,
  );
  assert.throws(
    () => validateEditorUploadServiceEnvironment({ ...base, EDITOR_UPLOAD_PUBLIC_BASE_URL: 'media/editor' }),
    /EDITOR_UPLOAD_PUBLIC_BASE_URL must be an absolute http\(s\) URL/,
  );
  assert.throws(
    () => validateEditorUploadServiceEnvironment({ ...base, EDITOR_UPLOAD_ECHO_FILE_NAME: 'yes' }),
    /EDITOR_UPLOAD_ECHO_FILE_NAME must be "true" or "false"/,
  );
});

test('EditorUploadServiceConfigService builds the pipeline config from validated values', () => {
  const env = validateEditorUploadServiceEnvironment({
    AUTH_DEV_BYPASS: 'true',
    EDITOR_UPLOAD_MAX_BYTES: '4096',
    EDITOR_UPLOAD_ALLOWED_EXTENSIONS: '.gif',
    EDITOR_UPLOAD_ROOT: '/srv/editor',
    EDITOR_UPLOAD_NAME_ATTEMPTS: '5',
  });
  const config = new EditorUploadServiceConfigService(new ConfigService(env));

  assert.deepEqual(config.toUploadPipelineConfig(), {
    maxUploadBytes: 4096,
    allowedExtensions: ['.gif'],
    uploadRoot: '/srv/editor',
    publicBaseUrl: '/media/editor-images',
    nameAttempts: 5,
    echoFileName: false,
  });
  assert.equal(config.authDevBypassEnabled, true);
  assert.equal(config.jwtIssuerUrl, undefined);
  assert.equal(config.jwtJwksUrl, undefined);
});
