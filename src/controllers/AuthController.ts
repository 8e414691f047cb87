// src/controllers/AuthController.ts
import { ValidationError } from 'App/errors/CustomError';
import { AuthService } from 'App/services/AuthService';
import { validationErrorType } from 'App/types/errorType';
import { NextFunction, Request, Response } from 'express';

const readString = (body: unknown, key: string): string | undefined => {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

class AuthController {
  constructor(private readonly auth: AuthService) {}

  /**
   * POST /authenticate
   * Body: { username: string, password: string }
   * Returns { token, expires_at }.
   */
  authenticate = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const username = readString(req.body, 'username');
      const password = readString(req.body, 'password');
      if (!username || !password) {
        const details: validationErrorType[] = [];
        if (!username) {
          details.push({ field: 'username', message: 'username (string) is required' });
        }
        if (!password) {
          details.push({ field: 'password', message: 'password (string) is required' });
        }
        throw new ValidationError('Invalid authentication request', details);
      }

      const issued = await this.auth.authenticate(username, password);
      return res.status(200).json(issued);
    } catch (err) {
      return next(err);
    }
  };
}

export default AuthController;
