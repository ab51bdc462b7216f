/**
 * Bearer token authentication
 *
 * Tokens are HS256 JWTs carrying:
 * - sub: the user id the request acts as
 * - role: CITIZEN | PHARMACIST | REGULATORY_AGENT | HEALTH_FACILITY | ADMIN
 *
 * Issuance happens outside this service; only verification lives here.
 * Whether the user still exists and is active is checked by the services.
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { USER_ROLES, UserId, UserRole } from '../../domain-types';
import { AuthContext } from '../types';

// Extend Express Request to include auth context
declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
      correlationId?: string;
    }
  }
}

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const tokenClaimsSchema = z.object({
  sub: z.string().uuid(),
  role: z.enum(USER_ROLES).refine((role) => role !== 'SYSTEM', { message: 'SYSTEM tokens are not accepted' }),
});

export function createAuthMiddleware(jwtSecret: string) {
  return function authenticate(req: Request, res: Response, next: NextFunction): void {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      next(new ApiError(401, 'MISSING_AUTHORIZATION', 'Authorization header is required'));
      return;
    }

    // Expect: "Bearer <token>"
    const parts = authHeader.split(' ');
    if (parts.length !== 2 || parts[0] !== 'Bearer') {
      next(new ApiError(401, 'INVALID_AUTHORIZATION_FORMAT', 'Authorization header must be: Bearer <token>'));
      return;
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(parts[1], jwtSecret, { algorithms: ['HS256'] });
    } catch (error) {
      const expired = error instanceof jwt.TokenExpiredError;
      next(
        new ApiError(
          401,
          expired ? 'TOKEN_EXPIRED' : 'INVALID_TOKEN',
          expired ? 'Token has expired' : 'Token is invalid'
        )
      );
      return;
    }

    const claims = tokenClaimsSchema.safeParse(payload);
    if (!claims.success) {
      next(new ApiError(401, 'INVALID_TOKEN_CLAIMS', 'Token must carry sub and a known role'));
      return;
    }

    req.auth = {
      userId: claims.data.sub as UserId,
      role: claims.data.role,
    };
    next();
  };
}

/**
 * Role gate middleware factory
 */
export function requireRole(...allowedRoles: UserRole[]) {
  return function checkRole(req: Request, res: Response, next: NextFunction): void {
    if (!req.auth) {
      next(new ApiError(401, 'NOT_AUTHENTICATED', 'Authentication required'));
      return;
    }

    if (!allowedRoles.includes(req.auth.role)) {
      next(
        new ApiError(403, 'ROLE_NOT_ALLOWED', `This endpoint requires role: ${allowedRoles.join(' or ')}`, {
          role: req.auth.role,
        })
      );
      return;
    }

    next();
  };
}

export function requireAuth(req: Request): AuthContext {
  if (!req.auth) {
    throw new ApiError(401, 'NOT_AUTHENTICATED', 'Authentication required');
  }
  return req.auth;
}
