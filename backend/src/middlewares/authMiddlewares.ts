import type { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { ROLES, type AuthUser, type Role } from '../types/authTypes.js';
import { AppError } from '../utils/AppError.js';

// Tokens are issued by the auth service; this side only verifies them.
const accessTokenSchema = z.object({
  sub: z.string().regex(/^[0-9a-fA-F]{24}$/),
  role: z.enum(ROLES),
});

const extractToken = (req: Request): string | undefined => {
  const header = req.headers.authorization;
  if (header?.startsWith('Bearer ')) return header.slice('Bearer '.length).trim();

  const cookies: Record<string, unknown> = req.cookies ?? {};
  const cookie = cookies['jwt'];
  return typeof cookie === 'string' && cookie.length > 0 ? cookie : undefined;
};

export const verifyAccessToken = (token: string, secret: string): AuthUser => {
  const decoded = jwt.verify(token, secret);
  const payload = accessTokenSchema.safeParse(decoded);
  if (!payload.success) throw AppError.unauthorized('Invalid token payload');
  return { id: payload.data.sub, role: payload.data.role };
};

export const createAuthMiddlewares = (jwtSecret: string) => {
  /** Requires a valid access token. */
  const protect: RequestHandler = (req: Request, _res: Response, next: NextFunction) => {
    const token = extractToken(req);
    if (!token) return next(AppError.unauthorized('You are not logged in. Please log in to get access.'));

    try {
      req.user = verifyAccessToken(token, jwtSecret);
      next();
    } catch (err) {
      next(err);
    }
  };

  /** Attaches the user when a valid token is present; anonymous otherwise. */
  const optionalAuth: RequestHandler = (req: Request, _res: Response, next: NextFunction) => {
    const token = extractToken(req);
    if (token) {
      try {
        req.user = verifyAccessToken(token, jwtSecret);
      } catch {
        req.user = undefined;
      }
    }
    next();
  };

  const restrictTo =
    (...roles: Role[]): RequestHandler =>
    (req: Request, _res: Response, next: NextFunction) => {
      if (!req.user || !roles.includes(req.user.role)) {
        return next(AppError.forbidden('You do not have permission to perform this action'));
      }
      next();
    };

  return { protect, optionalAuth, restrictTo };
};

export type AuthMiddlewares = ReturnType<typeof createAuthMiddlewares>;

/** Narrows `req.user` for handlers mounted behind `protect`. */
export const requireUser = (req: Request): AuthUser => {
  if (!req.user) throw AppError.unauthorized();
  return req.user;
};

/** Viewer behind `optionalAuth`, if any. */
export const optionalUser = (req: Request): AuthUser | undefined => req.user;
