import { CorsOptions } from 'cors';
import { CORS_REJECTION } from './handleCorsError';

/**
 * Origin check shared by the HTTP routes and the streaming endpoint.
 * An empty allowlist allows any origin; same-origin and non-browser clients
 * send no Origin header and always pass.
 */
export const isOriginAllowed = (
  allowed: readonly string[],
  origin: string | undefined,
): boolean => !allowed.length || !origin || allowed.includes(origin);

export const createCorsOptions = (allowed: readonly string[]): CorsOptions => ({
  methods: ['GET', 'POST'],
  origin: allowed.length
    ? (origin, callback) => {
        if (isOriginAllowed(allowed, origin)) {
          callback(null, true);
        } else {
          callback(new Error(CORS_REJECTION));
        }
      }
    : true,
});
