import { Router } from 'express';
import { z } from 'zod';
import type { UserService } from '../../../application/users/userService.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/v1/users:
 *   get:
 *     tags: [Users]
 *     summary: List all users
 *     responses:
 *       200:
 *         description: Users in store order
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/UserResponse' }
 *   post:
 *     tags: [Users]
 *     summary: Create a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/UserRequest' }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserResponse' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Username or email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/v1/users/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: integer, minimum: 1 }
 *   get:
 *     tags: [Users]
 *     summary: Get a user by id
 *     responses:
 *       200:
 *         description: The user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Users]
 *     summary: Replace a user's profile fields
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/UserRequest' }
 *     responses:
 *       200:
 *         description: User updated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserResponse' }
 *       400:
 *         description: Validation error
 *       404:
 *         description: User not found
 *       409:
 *         description: Duplicate username or email, or stale version
 *   delete:
 *     tags: [Users]
 *     summary: Delete a user
 *     responses:
 *       204:
 *         description: User deleted
 *       404:
 *         description: User not found
 *
 * /api/v1/users/username/{username}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user by username
 *     parameters:
 *       - in: path
 *         name: username
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: The user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserResponse' }
 *       404:
 *         description: User not found
 */

const optionalName = z.string().max(100).nullish();

export const userRequestSchema = z.object({
  username: z
    .string({ required_error: 'Username is required' })
    .trim()
    .min(1, 'Username is required')
    .max(100, 'Username must be at most 100 characters'),
  email: z
    .string({ required_error: 'Email is required' })
    .trim()
    .min(1, 'Email is required')
    .max(255, 'Email must be at most 255 characters')
    .email('Email must be valid'),
  firstName: optionalName,
  lastName: optionalName,
});

// Decimal digits only; ids past MAX_SAFE_INTEGER would lose precision as numbers
export const userIdParamsSchema = z.object({
  id: z
    .string()
    .regex(/^[1-9]\d*$/, 'Id must be a positive integer')
    .transform(Number)
    .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER, 'Id is out of range')),
});

const usernameParamsSchema = z.object({
  username: z.string().min(1),
});

export function createUserRoutes(userService: UserService) {
  const router = Router();

  router.get(
    '/users',
    asyncHandler(async (_req, res) => {
      res.json(await userService.listUsers());
    })
  );

  router.get(
    '/users/username/:username',
    asyncHandler(async (req, res) => {
      const { username } = usernameParamsSchema.parse(req.params);
      res.json(await userService.getUserByUsername(username));
    })
  );

  router.get(
    '/users/:id',
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      res.json(await userService.getUser(id));
    })
  );

  router.post(
    '/users',
    asyncHandler(async (req, res) => {
      const body = userRequestSchema.parse(req.body);
      res.status(201).json(await userService.createUser(body));
    })
  );

  router.put(
    '/users/:id',
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const body = userRequestSchema.parse(req.body);
      res.json(await userService.updateUser(id, body));
    })
  );

  router.delete(
    '/users/:id',
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      await userService.deleteUser(id);
      res.status(204).end();
    })
  );

  return router;
}
