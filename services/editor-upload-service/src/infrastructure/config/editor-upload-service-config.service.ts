import path from 'node:path';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ImageExtension } from '../../domain/uploads/image-format';
import {
  DEFAULT_MAX_INPUT_PIXELS,
  DEFAULT_MAX_UPLOAD_BYTES,
  DEFAULT_NAME_ATTEMPTS,
  parseAllowedExtensions,
  type UploadPipelineConfig,
} from '../../domain/uploads/upload-policy';

const DEFAULTS = {
  port: 3000,
  maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
  allowedExtensions: '.jpg,.jpeg,.png,.gif,.webp',
  uploadRootRelative: 'media/uploads/editor',
  publicBaseUrl: '/media/editor-images',
  nameAttempts: DEFAULT_NAME_ATTEMPTS,
  maxInputPixels: DEFAULT_MAX_INPUT_PIXELS,
  echoFileName: false,
  authDevBypass: false,
  jwtAudience: '',
  jwtJwksCacheTtlMs: 300000,
} as const;

const MAX_NAME_ATTEMPTS = 10;

export const EDITOR_UPLOAD_SERVICE_ENV_FILE_PATHS = [
  '.env.local',
  '.env',
  '../../.env.local',
  '../../.env',
];

@Injectable()
export class EditorUploadServiceConfigService {
  constructor(@Inject(ConfigService) private readonly config: ConfigService) {}

  get port(): number {
    return this.config.get<number>('EDITOR_UPLOAD_SERVICE_PORT', DEFAULTS.port);
  }

  get maxUploadBytes(): number {
    return this.config.get<number>('EDITOR_UPLOAD_MAX_BYTES', DEFAULTS.maxUploadBytes);
  }

  get allowedExtensions(): ImageExtension[] {
    return parseAllowedExtensions(
      this.config.get<string>('EDITOR_UPLOAD_ALLOWED_EXTENSIONS', DEFAULTS.allowedExtensions),
    );
  }

  get uploadRoot(): string {
    return this.config.get<string>('EDITOR_UPLOAD_ROOT', defaultUploadRoot());
  }

  get publicBaseUrl(): string {
    return this.config.get<string>('EDITOR_UPLOAD_PUBLIC_BASE_URL', DEFAULTS.publicBaseUrl);
  }

  get nameAttempts(): number {
    return this.config.get<number>('EDITOR_UPLOAD_NAME_ATTEMPTS', DEFAULTS.nameAttempts);
  }

  get maxInputPixels(): number {
    return this.config.get<number>('EDITOR_UPLOAD_MAX_INPUT_PIXELS', DEFAULTS.maxInputPixels);
  }

  get echoFileName(): boolean {
    return this.config.get<boolean>('EDITOR_UPLOAD_ECHO_FILE_NAME', DEFAULTS.echoFileName);
  }

  get authDevBypassEnabled(): boolean {
    return this.config.get<boolean>('AUTH_DEV_BYPASS', DEFAULTS.authDevBypass);
  }

  get jwtIssuerUrl(): string | undefined {
    return optionalString(this.config.get<string>('JWT_ISSUER_URL'));
  }

  get jwtAudience(): string | undefined {
    return optionalString(this.config.get<string>('JWT_AUDIENCE', DEFAULTS.jwtAudience));
  }

  get jwtJwksUrl(): string | undefined {
    return optionalString(this.config.get<string>('JWT_JWKS_URL'));
  }

  get jwtJwksCacheTtlMs(): number {
    return this.config.get<number>('JWT_JWKS_CACHE_TTL_MS', DEFAULTS.jwtJwksCacheTtlMs);
  }

  toUploadPipelineConfig(): UploadPipelineConfig {
    return {
      maxUploadBytes: this.maxUploadBytes,
      allowedExtensions: this.allowedExtensions,
      uploadRoot: this.uploadRoot,
      publicBaseUrl: this.publicBaseUrl,
      nameAttempts: this.nameAttempts,
      echoFileName: this.echoFileName,
    };
  }
}

export function validateEditorUploadServiceEnvironment(
  raw: Record<string, unknown>,
): Record<string, unknown> {
  const env = { ...raw };

  env.EDITOR_UPLOAD_SERVICE_PORT = toPositiveInt(
    raw.EDITOR_UPLOAD_SERVICE_PORT,
    DEFAULTS.port,
    'EDITOR_UPLOAD_SERVICE_PORT',
  );
  env.EDITOR_UPLOAD_MAX_BYTES = toPositiveInt(
    raw.EDITOR_UPLOAD_MAX_BYTES,
    DEFAULTS.maxUploadBytes,
    'EDITOR_UPLOAD_MAX_BYTES',
  );

  const allowedExtensions = optionalString(raw.EDITOR_UPLOAD_ALLOWED_EXTENSIONS) ?? DEFAULTS.allowedExtensions;
  try {
    env.EDITOR_UPLOAD_ALLOWED_EXTENSIONS = parseAllowedExtensions(allowedExtensions).join(',');
  } catch (error) {
    throw new Error(
      `[editor-upload-service] EDITOR_UPLOAD_ALLOWED_EXTENSIONS is invalid: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const uploadRoot = optionalString(raw.EDITOR_UPLOAD_ROOT) ?? defaultUploadRoot();
  if (!path.isAbsolute(uploadRoot)) {
    throw new Error('[editor-upload-service] EDITOR_UPLOAD_ROOT must be an absolute path.');
  }
  env.EDITOR_UPLOAD_ROOT = path.resolve(uploadRoot);

  env.EDITOR_UPLOAD_PUBLIC_BASE_URL = toPublicBaseUrl(raw.EDITOR_UPLOAD_PUBLIC_BASE_URL);

  const nameAttempts = toPositiveInt(
    raw.EDITOR_UPLOAD_NAME_ATTEMPTS,
    DEFAULTS.nameAttempts,
    'EDITOR_UPLOAD_NAME_ATTEMPTS',
  );
  if (nameAttempts > MAX_NAME_ATTEMPTS) {
    throw new Error(`[editor-upload-service] EDITOR_UPLOAD_NAME_ATTEMPTS must not exceed ${MAX_NAME_ATTEMPTS}.`);
  }
  env.EDITOR_UPLOAD_NAME_ATTEMPTS = nameAttempts;

  env.EDITOR_UPLOAD_MAX_INPUT_PIXELS = toPositiveInt(
    raw.EDITOR_UPLOAD_MAX_INPUT_PIXELS,
    DEFAULTS.maxInputPixels,
    'EDITOR_UPLOAD_MAX_INPUT_PIXELS',
  );
  env.EDITOR_UPLOAD_ECHO_FILE_NAME = toBoolean(
    raw.EDITOR_UPLOAD_ECHO_FILE_NAME,
    DEFAULTS.echoFileName,
    'EDITOR_UPLOAD_ECHO_FILE_NAME',
  );
  env.AUTH_DEV_BYPASS = toBoolean(raw.AUTH_DEV_BYPASS, DEFAULTS.authDevBypass, 'AUTH_DEV_BYPASS');
  env.JWT_AUDIENCE = optionalString(raw.JWT_AUDIENCE) ?? DEFAULTS.jwtAudience;
  env.JWT_JWKS_URL = optionalString(raw.JWT_JWKS_URL) ?? '';
  env.JWT_JWKS_CACHE_TTL_MS = toPositiveInt(
    raw.JWT_JWKS_CACHE_TTL_MS,
    DEFAULTS.jwtJwksCacheTtlMs,
    'JWT_JWKS_CACHE_TTL_MS',
  );

  const issuer = optionalString(raw.JWT_ISSUER_URL);
  if (env.AUTH_DEV_BYPASS === false && !issuer) {
    throw new Error('[editor-upload-service] JWT_ISSUER_URL is required when AUTH_DEV_BYPASS=false.');
  }
  env.JWT_ISSUER_URL = issuer ?? '';

  return env;
}

function defaultUploadRoot(): string {
  return path.resolve(process.cwd(), DEFAULTS.uploadRootRelative);
}

function toPublicBaseUrl(value: unknown): string {
  const raw = optionalString(value) ?? DEFAULTS.publicBaseUrl;
  const normalized = raw.replace(/\/+$/, '');

  if (normalized.startsWith('/') || isHttpUrl(normalized)) {
    return normalized;
  }

  throw new Error(
    '[editor-upload-service] EDITOR_UPLOAD_PUBLIC_BASE_URL must be an absolute http(s) URL or a path starting with "/".',
  );
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

function toPositiveInt(value: unknown, fallback: number, name: string): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`[editor-upload-service] ${name} must be a positive integer.`);
  }

  return Math.trunc(parsed);
}

function toBoolean(value: unknown, fallback: boolean, name: string): boolean {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  if (typeof value === 'boolean') {
    return value;
  }

  const normalized = String(value).trim().toLowerCase();
  if (normalized === 'true') {
    return true;
  }
  if (normalized === 'false') {
    return false;
  }

  throw new Error(`[editor-upload-service] ${name} must be "true" or "false".`);
}
