// src/services/AuthService.ts
import {
  CustomError,
  InvalidCredentialsError,
  TokenExpiredError,
  TokenInvalidError,
} from 'App/errors/CustomError';
import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import crypto from 'node:crypto';
import { CredentialStore } from './CredentialStore';

export interface AuthServiceOptions {
  secret: string;
  /** Access token lifetime (seconds). */
  ttlSec: number;
  bcryptRounds?: number;
  now?: () => number;
}

/** Verified content of an access token. */
export interface AccessClaims {
  subject: string;
  expiresAt: Date;
}

export interface IssuedToken {
  token: string;
  expires_at: string; // ISO
}

/**
 * Password check against the credential store and HS256 access tokens
 * carrying `sub` (the user id) and `exp`.
 */
export class AuthService {
  private readonly secret: string;
  private readonly ttlSec: number;
  private readonly now: () => number;
  // compared against when the username is unknown, so both failures cost the same
  private readonly dummyHash: string;

  constructor(
    private readonly store: CredentialStore,
    options: AuthServiceOptions,
  ) {
    this.secret = options.secret;
    this.ttlSec = options.ttlSec;
    this.now = options.now ?? Date.now;
    this.dummyHash = bcrypt.hashSync(
      crypto.randomBytes(16).toString('hex'),
      options.bcryptRounds ?? 12,
    );
  }

  /** @throws InvalidCredentialsError for an unknown user or a wrong password */
  async authenticate(username: string, password: string): Promise<IssuedToken> {
    const user = this.store.findByUsername(username);
    const matches = await bcrypt.compare(
      password,
      user ? user.password : this.dummyHash,
    );
    if (!user || !matches) {
      throw new InvalidCredentialsError();
    }
    return this.issue(user.id);
  }

  issue(subject: string): IssuedToken {
    const iat = Math.floor(this.now() / 1000);
    const exp = iat + this.ttlSec;
    const token = jwt.sign({ sub: subject, type: 'access', iat, exp }, this.secret, {
      algorithm: 'HS256',
    });
    return { token, expires_at: new Date(exp * 1000).toISOString() };
  }

  /**
   * @throws TokenExpiredError once `exp` has passed
   * @throws TokenInvalidError for anything else that does not verify
   */
  verify(token: string): AccessClaims {
    try {
      const payload = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        clockTimestamp: Math.floor(this.now() / 1000),
      });
      if (
        typeof payload === 'string' ||
        payload.type !== 'access' ||
        typeof payload.sub !== 'string' ||
        typeof payload.exp !== 'number'
      ) {
        throw new TokenInvalidError();
      }
      return { subject: payload.sub, expiresAt: new Date(payload.exp * 1000) };
    } catch (err) {
      if (err instanceof CustomError) throw err;
      if (err instanceof jwt.TokenExpiredError) throw new TokenExpiredError();
      throw new TokenInvalidError();
    }
  }
}
