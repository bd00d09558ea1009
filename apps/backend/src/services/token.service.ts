import jwt from 'jsonwebtoken';
import type { Subject } from '@sensor-registry/shared-types';
import { TokenExpiredError, TokenInvalidSignatureError } from '../lib/errors';

export interface IssuedToken {
  token: string;
  issuedAt: Date;
  expiresAt: Date;
  /** Seconds until expiry at the moment of issue. */
  expiresIn: number;
}

/**
 * Issues and checks bearer tokens. Callers depend on this interface only, so
 * the signing scheme can change without touching them.
 */
export interface TokenVerifier {
  issue(subject: Subject): IssuedToken;
  verify(token: string): Subject;
}

export interface JwtTokenServiceOptions {
  secretKey: string;
  expireMinutes: number;
  now?: () => number;
}

const ALGORITHM = 'HS256';

export class JwtTokenService implements TokenVerifier {
  private readonly now: () => number;

  constructor(private readonly options: JwtTokenServiceOptions) {
    this.now = options.now ?? Date.now;
  }

  issue(subject: Subject): IssuedToken {
    // Claims hold whole seconds, so the window starts at the issuing second
    const issuedAt = Math.floor(this.now() / 1000);
    const expiresIn = this.options.expireMinutes * 60;
    const expiresAt = issuedAt + expiresIn;

    const token = jwt.sign(
      { sub: subject.userId, username: subject.username, iat: issuedAt, exp: expiresAt },
      this.options.secretKey,
      { algorithm: ALGORITHM }
    );

    return {
      token,
      issuedAt: new Date(issuedAt * 1000),
      expiresAt: new Date(expiresAt * 1000),
      expiresIn,
    };
  }

  // jws compares signatures in constant time; expiry is checked as now >= exp
  verify(token: string): Subject {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secretKey, {
        algorithms: [ALGORITHM],
        clockTimestamp: Math.floor(this.now() / 1000),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenExpiredError();
      }
      throw new TokenInvalidSignatureError();
    }

    if (typeof payload === 'string') {
      throw new TokenInvalidSignatureError();
    }
    const { sub, username } = payload;
    if (typeof sub !== 'string' || typeof username !== 'string' || typeof payload.exp !== 'number') {
      throw new TokenInvalidSignatureError();
    }

    return { userId: sub, username };
  }
}
