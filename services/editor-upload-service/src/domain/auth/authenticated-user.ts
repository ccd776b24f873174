/** Principal on whose behalf an upload runs. Always verified before it reaches a use case. */
export interface AuthenticatedUser {
  subject: string;
  username: string;
  email?: string;
  roles: string[];
  rawClaims: Record<string, unknown>;
}

export interface JwtAccessTokenClaims extends Record<string, unknown> {
  sub: string;
  preferred_username?: string;
  email?: string;
  realm_access?: {
    roles?: string[];
  };
  resource_access?: Record<string, { roles?: string[] }>;
}
