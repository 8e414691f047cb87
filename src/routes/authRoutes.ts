// src/routes/authRoutes.ts
import AuthController from 'App/controllers/AuthController';
import { RequestHandler, Router } from 'express';

export const createAuthRoutes = (
  controller: AuthController,
  limiters: RequestHandler[] = [],
): Router => {
  const authRoutes = Router();

  authRoutes.post('/authenticate', ...limiters, controller.authenticate);

  return authRoutes;
};
