import type { RequestHandler } from 'express';
import { NotFoundError } from '../../../application/errors.js';

/**
 * Converts unknown API routes into a structured 404.
 */
export const notFoundHandler: RequestHandler = (req, _res, next) => {
  if (!req.path.startsWith('/api')) {
    next();
    return;
  }
  next(new NotFoundError(`Route ${req.method} ${req.originalUrl} not found`));
};
