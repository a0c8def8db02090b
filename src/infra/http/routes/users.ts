import { Router } from 'express';
import { z } from 'zod';
import type { AuthService } from '../../../application/auth/authService.js';
import { Deadline } from '../../../application/deadline.js';
import type { TokenIssuer } from '../../../domain/auth/token.js';
import { authMiddleware } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /api/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user's profile
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer, minimum: 1 }
 *     responses:
 *       200:
 *         description: Profile
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/UserProfile'
 *       400:
 *         description: Invalid user id
 *       401:
 *         description: Missing, invalid or expired token
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const MAX_USER_ID = 2 ** 31 - 1;

export const userIdParamsSchema = z.object({
  id: z.coerce.number().int().min(1).max(MAX_USER_ID),
});

export function createUserRoutes(
  auth: AuthService,
  tokenIssuer: TokenIssuer,
  options: { requestTimeoutMs: number }
) {
  const router = Router();

  router.use(authMiddleware(tokenIssuer));

  router.get(
    '/:id',
    validate({ params: userIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const user = await auth.getProfile.execute(id, Deadline.after(options.requestTimeoutMs));
      res.status(200).json(user);
    })
  );

  return router;
}
