import { Router, type Request, type Response, type NextFunction, type RequestHandler } from 'express';
import { z } from 'zod';
import type { RegisterRequest, TokenRequest, TokenResponse } from '@sensor-registry/shared-types';
import { isValidPassword, isValidUsername } from '@sensor-registry/shared-utils';
import { NotFoundError } from '../lib/errors';
import { parseRequest } from '../lib/request-validation';
import type { AuthService } from '../services/auth.service';
import { toUserResponse } from './presenters';

const registerSchema = z.object({
  username: z.string().refine(isValidUsername, 'Username must be 3-64 characters of letters, digits, ".", "_" or "-"'),
  password: z.string().refine(
    (p) => isValidPassword(p).valid,
    (p) => ({ message: isValidPassword(p).errors.join(', ') || 'Invalid password' })
  ),
});

const tokenSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export function createAuthRoutes(auth: AuthService, requireAuth: RequestHandler): Router {
  const router = Router();

  // POST /api/v1/auth/register
  router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password }: RegisterRequest = parseRequest(registerSchema, req.body, 'body');
      const user = await auth.register(username, password);

      res.status(201).json({
        success: true,
        data: toUserResponse(user),
      });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/auth/token
  router.post('/token', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const credentials: TokenRequest = parseRequest(tokenSchema, req.body, 'body');
      const issued = await auth.authenticate(credentials);

      const data: TokenResponse = {
        accessToken: issued.token,
        tokenType: 'bearer',
        expiresIn: issued.expiresIn,
        expiresAt: issued.expiresAt.toISOString(),
      };
      res.json({ success: true, data });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/auth/me
  router.get('/me', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = req.subject ? await auth.getUser(req.subject.userId) : null;
      if (!user) {
        throw new NotFoundError('User no longer exists');
      }

      res.json({ success: true, data: toUserResponse(user) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
