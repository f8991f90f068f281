import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { UnauthorizedError } from '../../../application/errors.js';

export interface AuthRequest extends Request {
  userId?: string;
  userEmail?: string;
}

/** Claims this service reads from tokens issued by the identity provider. */
const tokenClaims = z.object({
  userId: z.string().min(1),
  email: z.string(),
});

export function authMiddleware(jwtSecret: string) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    const token = authHeader.substring(7);

    let decoded: unknown;
    try {
      decoded = jwt.verify(token, jwtSecret);
    } catch {
      next(new UnauthorizedError('Invalid or expired token'));
      return;
    }

    const claims = tokenClaims.safeParse(decoded);
    if (!claims.success) {
      next(new UnauthorizedError('Invalid or expired token'));
      return;
    }

    req.userId = claims.data.userId;
    req.userEmail = claims.data.email;
    next();
  };
}

/** The caller's user id; only valid behind `authMiddleware`. */
export function requireUserId(req: AuthRequest): string {
  if (!req.userId) {
    throw new Error('authMiddleware is not mounted for this route');
  }
  return req.userId;
}
