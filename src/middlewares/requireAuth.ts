import { TokenInvalidError } from 'App/errors/CustomError';
import { AccessClaims, AuthService } from 'App/services/AuthService';
import { NextFunction, Request, Response } from 'express';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Set by requireAuth once the bearer token verified. */
      auth?: AccessClaims;
    }
  }
}

const BEARER = /^Bearer\s+(\S+)$/i;

/**
 * Rejects the request unless it carries `Authorization: Bearer <token>` with a
 * valid, unexpired access token. Verification errors keep their own code
 * (TOKEN_EXPIRED / TOKEN_INVALID).
 */
export const requireAuth =
  (auth: AuthService) =>
  (req: Request, _res: Response, next: NextFunction): void => {
    const match = BEARER.exec(req.headers.authorization ?? '');
    if (!match) {
      next(new TokenInvalidError('Missing bearer token'));
      return;
    }
    try {
      req.auth = auth.verify(match[1]);
      next();
    } catch (err) {
      next(err);
    }
  };

/** Claims set by requireAuth; throws when the route was mounted without it. */
export const claimsOf = (req: Request): AccessClaims => {
  if (!req.auth) {
    throw new TokenInvalidError('Missing bearer token');
  }
  return req.auth;
};
