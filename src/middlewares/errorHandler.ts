import { NextFunction, Request, Response } from 'express';

import { BadRequestError, CustomError } from 'App/errors/CustomError';
import { validationErrorType } from 'App/types/errorType';
// --------------------------------------------------------------

/** body-parser marks malformed JSON bodies with this type. */
const isBodyParseError = (err: Error): boolean =>
  'type' in err && err.type === 'entity.parse.failed';

/**
 * Global error handling middleware for Express applications.
 * Captures errors thrown in routes and middleware, logs them,
 * and sends a standardized error response to the client.
 *
 * @param err - The error object thrown.
 * @param req - The Express Request object.
 * @param res - The Express Response object.
 * @param next - The next middleware function in the stack.
 */
function errorHandler(
  err: CustomError | Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction,
): void {
  const known: CustomError | undefined =
    err instanceof CustomError
      ? err
      : isBodyParseError(err)
        ? new BadRequestError('Malformed JSON body')
        : undefined;

  /**
   * Determine the HTTP status code, error code, message, and details.
   * Anything that is not a CustomError is a 500 with a generic message.
   */
  const statusCode: number = known ? known.statusCode : 500;
  const code: string = known ? known.code : 'INTERNAL_SERVER_ERROR';
  const message: string = known ? known.message : 'An unexpected error occurred';
  const details: validationErrorType[] | undefined = known?.details;

  // Authentication failures are routine; keep stack traces for the rest
  if (statusCode === 401) {
    console.warn('Request rejected', { code, method: req.method, url: req.originalUrl, ip: req.ip });
  } else {
    console.error('Error occurred', {
      statusCode,
      code,
      message: err.message,
      method: req.method,
      url: req.originalUrl,
      ip: req.ip,
      stack: err.stack,
    });
  }

  res.status(statusCode).json({
    code,
    message,
    details,
  });
}

export default errorHandler;
