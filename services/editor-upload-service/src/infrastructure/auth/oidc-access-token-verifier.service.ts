import { Inject, Injectable, InternalServerErrorException, UnauthorizedException } from '@nestjs/common';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import jwkToPem from 'jwk-to-pem';
import type { AccessTokenVerifier } from '../../application/auth/ports/access-token-verifier.port';
import type { AuthenticatedUser, JwtAccessTokenClaims } from '../../domain/auth/authenticated-user';
import { EditorUploadServiceConfigService } from '../config/editor-upload-service-config.service';

interface JsonWebKey {
  kid?: string;
  kty: string;
  use?: string;
  alg?: string;
  n?: string;
  e?: string;
  [key: string]: unknown;
}

@Injectable()
export class OidcAccessTokenVerifierService implements AccessTokenVerifier {
  private readonly jwksCache = new Map<string, { expiresAt: number; keys: JsonWebKey[] }>();

  constructor(
    @Inject(EditorUploadServiceConfigService)
    private readonly config: EditorUploadServiceConfigService,
  ) {}

  async verifyAccessToken(token: string): Promise<AuthenticatedUser> {
    const issuer = this.requiredIssuer();
    const audience = this.config.jwtAudience;
    const jwksUrl = this.resolveJwksUrl(issuer);

    const decoded = jwt.decode(token, { complete: true });
    if (!decoded || typeof decoded === 'string' || !decoded.header) {
      throw new UnauthorizedException('Invalid bearer token.');
    }

    const kid = typeof decoded.header.kid === 'string' ? decoded.header.kid : undefined;
    if (!kid) {
      throw new UnauthorizedException('JWT header is missing "kid".');
    }

    const jwk = await this.findJwk(jwksUrl, kid);
    if (jwk.kty !== 'RSA' || typeof jwk.n !== 'string' || typeof jwk.e !== 'string') {
      throw new UnauthorizedException(`JWK "${kid}" is not an RSA signing key.`);
    }
    const pem = jwkToPem({ kty: 'RSA', n: jwk.n, e: jwk.e });

    let verified: string | JwtPayload;
    try {
      verified = jwt.verify(token, pem, {
        algorithms: ['RS256', 'RS384', 'RS512'],
        issuer,
        audience,
      });
    } catch (error) {
      throw new UnauthorizedException(
        `JWT validation failed: ${error instanceof Error ? error.message : 'unknown error'}`,
      );
    }

    if (typeof verified === 'string') {
      throw new UnauthorizedException('Unexpected JWT payload format.');
    }

    const subject = verified.sub;
    if (!subject || typeof subject !== 'string') {
      throw new UnauthorizedException('JWT payload is missing "sub".');
    }

    return toAuthenticatedUser({ ...verified, sub: subject });
  }

  private requiredIssuer(): string {
    const issuer = this.config.jwtIssuerUrl;
    if (issuer) {
      return issuer;
    }
    throw new InternalServerErrorException('Missing required environment variable: JWT_ISSUER_URL');
  }

  private resolveJwksUrl(issuer: string): string {
    const explicit = this.config.jwtJwksUrl;
    if (explicit) {
      return explicit;
    }

    return `${issuer.replace(/\/$/, '')}/protocol/openid-connect/certs`;
  }

  private async findJwk(jwksUrl: string, kid: string): Promise<JsonWebKey> {
    const keys = await this.loadJwks(jwksUrl);
    const match = keys.find((key) => key.kid === kid);

    if (!match) {
      this.jwksCache.delete(jwksUrl);
      const refreshed = await this.loadJwks(jwksUrl);
      const refreshedMatch = refreshed.find((key) => key.kid === kid);
      if (refreshedMatch) {
        return refreshedMatch;
      }
      throw new UnauthorizedException(`JWK with kid "${kid}" not found.`);
    }

    return match;
  }

  private async loadJwks(jwksUrl: string): Promise<JsonWebKey[]> {
    const now = Date.now();
    const cached = this.jwksCache.get(jwksUrl);
    if (cached && cached.expiresAt > now) {
      return cached.keys;
    }

    const response = await fetch(jwksUrl, {
      headers: {
        accept: 'application/json',
      },
    });

    if (!response.ok) {
      throw new UnauthorizedException(`Unable to fetch JWKS (${response.status}).`);
    }

    const keys = parseJwks(await response.json());

    if (keys.length === 0) {
      throw new UnauthorizedException('JWKS endpoint returned no keys.');
    }

    this.jwksCache.set(jwksUrl, {
      keys,
      expiresAt: now + this.config.jwtJwksCacheTtlMs,
    });

    return keys;
  }
}

export function toAuthenticatedUser(claims: JwtAccessTokenClaims): AuthenticatedUser {
  const realmRoles = Array.isArray(claims.realm_access?.roles) ? claims.realm_access.roles : [];
  const resourceRoles = Object.values(claims.resource_access ?? {})
    .flatMap((entry) => (Array.isArray(entry.roles) ? entry.roles : []))
    .filter((value): value is string => typeof value === 'string');

  const roles = Array.from(new Set([...realmRoles, ...resourceRoles]));

  const username =
    (typeof claims.preferred_username === 'string' && claims.preferred_username) ||
    (typeof claims.email === 'string' && claims.email) ||
    claims.sub;

  return {
    subject: claims.sub,
    username,
    email: typeof claims.email === 'string' ? claims.email : undefined,
    roles,
    rawClaims: { ...claims },
  };
}

function parseJwks(data: unknown): JsonWebKey[] {
  if (!data || typeof data !== 'object' || !('keys' in data) || !Array.isArray(data.keys)) {
    return [];
  }

  return data.keys.filter(isJsonWebKey);
}

function isJsonWebKey(value: unknown): value is JsonWebKey {
  return !!value && typeof value === 'object' && 'kty' in value && typeof value.kty === 'string';
}
