import { NextFunction, Request, Response } from 'express';

/** Message the `cors` origin callback rejects with. */
export const CORS_REJECTION = 'Not allowed by CORS';

/**
 * Turns a rejected origin into a 403; every other error goes on to errorHandler.
 */
const handleCorsError = (
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  if (err.message !== CORS_REJECTION) {
    next(err);
    return;
  }
  console.warn(`[CORS] Rejected origin ${req.headers.origin ?? '(none)'}`);
  res.status(403).json({
    code: 'NOT_ALLOWED_BY_CORS',
    message: `Origin ${req.headers.origin ?? ''} is not allowed to access this API.`,
  });
};

export default handleCorsError;
