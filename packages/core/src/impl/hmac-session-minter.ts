/**
 * HmacSessionMinter: signed bearer tokens without a token store.
 *
 * Token format: base64url(JSON claims) "." base64url(HMAC-SHA256(payload)).
 */

import { createHmac, randomUUID, timingSafeEqual } from 'crypto';
import type { Session, SessionClaims, SessionMinter } from '../interfaces/session-minter';
import { SessionError } from '../types/errors';

export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

export interface HmacSessionMinterOptions {
  secret: string;
  /** Token lifetime (default: 24h) */
  ttlMs?: number;
  /** Clock, for tests */
  now?: () => number;
}

export class HmacSessionMinter implements SessionMinter {
  private readonly secret: string;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: HmacSessionMinterOptions) {
    if (!options.secret) {
      throw new SessionError('Session secret is required');
    }
    this.secret = options.secret;
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async mint(identity: string): Promise<Session> {
    if (!identity) {
      throw new SessionError('Cannot mint a session for an empty identity');
    }

    const iat = this.now();
    const claims: SessionClaims = {
      sub: identity,
      iat,
      exp: iat + this.ttlMs,
      jti: randomUUID(),
    };

    const payload = Buffer.from(JSON.stringify(claims)).toString('base64url');
    return {
      token: `${payload}.${this.sign(payload)}`,
      sessionId: claims.jti,
      identity,
      issuedAt: claims.iat,
      expiresAt: claims.exp,
    };
  }

  async verify(token: string): Promise<SessionClaims | null> {
    const parts = token.split('.');
    if (parts.length !== 2) return null;
    const [payload, signature] = parts;

    const expected = Buffer.from(this.sign(payload));
    const actual = Buffer.from(signature);
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      return null;
    }

    const claims = decodeClaims(payload);
    if (!claims || claims.exp <= this.now()) return null;
    return claims;
  }

  private sign(payload: string): string {
    return createHmac('sha256', this.secret).update(payload).digest('base64url');
  }
}

function decodeClaims(payload: string): SessionClaims | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
  } catch {
    return null;
  }

  if (
    typeof parsed !== 'object' || parsed === null ||
    !('sub' in parsed) || !('iat' in parsed) || !('exp' in parsed) || !('jti' in parsed)
  ) {
    return null;
  }
  const { sub, iat, exp, jti } = parsed;
  if (typeof sub !== 'string' || typeof iat !== 'number' || typeof exp !== 'number' || typeof jti !== 'string') {
    return null;
  }
  return { sub, iat, exp, jti };
}
