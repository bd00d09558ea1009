import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ApiResponse, Subject } from '@sensor-registry/shared-types';
import { createLogger } from '@sensor-registry/shared-utils';
import { AppError } from '../lib/errors';
import type { TokenVerifier } from '../services/token.service';

const logger = createLogger('Auth');

declare global {
  namespace Express {
    interface Request {
      subject?: Subject;
    }
  }
}

function unauthorized(res: Response, message: string): void {
  const body: ApiResponse<never> = {
    success: false,
    error: { code: 'UNAUTHORIZED', message },
  };
  res.status(401).json(body);
}

export function createAuthMiddleware(tokens: TokenVerifier): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !/^Bearer\s+\S+$/i.test(authHeader)) {
      unauthorized(res, 'No token provided');
      return;
    }

    const token = authHeader.replace(/^Bearer\s+/i, '');

    try {
      req.subject = tokens.verify(token);
      next();
    } catch (error) {
      if (error instanceof AppError && (error.code === 'TOKEN_EXPIRED' || error.code === 'TOKEN_INVALID_SIGNATURE')) {
        // Expired and forged tokens look the same to the client
        logger.debug(`Rejected token on ${req.method} ${req.path}: ${error.code}`);
        unauthorized(res, 'Invalid or expired token');
        return;
      }
      next(error);
    }
  };
}
