import { Router } from 'express';
import { z } from 'zod';
import type { AuthService } from '../../../application/auth/authService.js';
import { Deadline } from '../../../application/deadline.js';
import { DEFAULT_ROLE } from '../../../domain/auth/user.js';
import type { RateLimitRequestHandler } from 'express-rate-limit';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password]
 *             properties:
 *               username: { type: string, minLength: 3, maxLength: 50 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8, maxLength: 128 }
 *               role: { type: string, enum: [user, admin], default: user }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/UserProfile'
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 token: { type: string }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Invalid credentials (unknown email or wrong password)
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

export const registerBodySchema = z.object({
  username: z
    .string()
    .min(3)
    .max(50)
    .regex(/^[A-Za-z0-9_-]+$/, 'Username may only contain letters, digits, _ and -'),
  email: z.string().email(),
  password: z
    .string()
    .min(8)
    .max(128)
    .regex(/[A-Za-z]/, 'Password must contain a letter')
    .regex(/\d/, 'Password must contain a digit'),
  role: z.enum(['user', 'admin']).default(DEFAULT_ROLE),
});

export const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export interface AuthRoutesOptions {
  requestTimeoutMs: number;
  loginRateLimiter: RateLimitRequestHandler;
}

export function createAuthRoutes(auth: AuthService, options: AuthRoutesOptions) {
  const router = Router();

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const user = await auth.register.execute(body, Deadline.after(options.requestTimeoutMs));
      res.status(201).json(user);
    })
  );

  router.post(
    '/login',
    options.loginRateLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await auth.login.execute(body, Deadline.after(options.requestTimeoutMs));
      res.status(200).json(result);
    })
  );

  return router;
}
