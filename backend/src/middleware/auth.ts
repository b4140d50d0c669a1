import type { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { forbidden, unauthorized } from '../errors.js';

const tokenSchema = z.object({
  sub: z.string().min(1),
  permissions: z.array(z.string()).default([]),
});

export type AuthenticatedUser = {
  id: string;
  permissions: string[];
};

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

/**
 * Bearer JWT (HS256) carrying the caller id in `sub` and its `permissions`.
 */
export function requireAuth(secret: string | undefined): RequestHandler {
  return (req, _res, next) => {
    try {
      const authHeader = req.headers.authorization ?? '';
      const token = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : null;
      if (!token) {
        throw unauthorized();
      }

      if (!secret) {
        throw unauthorized('server misconfiguration');
      }

      let payload: unknown;
      try {
        payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
      } catch (error) {
        throw unauthorized(error instanceof jwt.TokenExpiredError ? 'token expired' : 'invalid token');
      }

      const claims = tokenSchema.safeParse(payload);
      if (!claims.success) {
        throw unauthorized('invalid token');
      }

      req.user = { id: claims.data.sub, permissions: claims.data.permissions };
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function requirePermission(...required: string[]): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.user) {
      return next(unauthorized());
    }

    const userPermissions = req.user.permissions;
    if (userPermissions.includes('*')) {
      return next();
    }

    const hasPermission = required.some((permission) => userPermissions.includes(permission));
    if (!hasPermission) {
      return next(forbidden());
    }

    return next();
  };
}
