import type { NextFunction, Request, Response } from 'express';
import type { TokenClaims, TokenIssuer } from '../../../domain/auth/token.js';

export interface AuthRequest extends Request {
  auth?: TokenClaims;
}

/**
 * Require a valid bearer token. Verification is purely local: signature
 * and expiry, no lookup.
 */
export function authMiddleware(tokenIssuer: TokenIssuer) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      });
      return;
    }

    try {
      req.auth = tokenIssuer.verify(authHeader.substring(7));
      next();
    } catch {
      res.status(401).json({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
    }
  };
}
