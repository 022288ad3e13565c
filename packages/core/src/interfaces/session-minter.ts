/**
 * Session minting: turns an identity into a bearer token and back.
 */

export interface Session {
  token: string;
  /** Unique per token; matches the `jti` claim */
  sessionId: string;
  /** The identity the token is bound to (user id / network origin) */
  identity: string;
  issuedAt: number;
  expiresAt: number;
}

export interface SessionClaims {
  sub: string;
  iat: number;
  exp: number;
  jti: string;
}

export interface SessionMinter {
  /** Rejects with SessionError when a token cannot be minted. */
  mint(identity: string): Promise<Session>;

  /** Claims for a valid, unexpired token; null otherwise. */
  verify(token: string): Promise<SessionClaims | null>;
}
