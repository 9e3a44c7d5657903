import { Router } from 'express';
import { z } from 'zod';
import type { RegisterUseCase } from '../../../application/auth/register.js';
import type { LoginUseCase } from '../../../application/auth/login.js';
import type { GetProfileUseCase, UpdateProfileUseCase } from '../../../application/auth/profile.js';
import type { TokenService } from '../../../application/auth/tokenService.js';
import { authGate, requireIdentity } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { sendSuccess } from '../response.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user and receive a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, email, password]
 *             properties:
 *               name: { type: string, maxLength: 100 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/AuthResponse' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
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
 *             schema: { $ref: '#/components/schemas/AuthResponse' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/profile:
 *   get:
 *     tags: [Auth]
 *     summary: Current user's profile
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Auth]
 *     summary: Update name, email or password
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               name: { type: string, nullable: true }
 *               email: { type: string, format: email, nullable: true }
 *               password: { type: string, minLength: 8, nullable: true }
 *     responses:
 *       200: { description: OK }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const nameSchema = z.string().trim().min(1, 'Name cannot be empty').max(100, 'Name is too long');

const emailSchema = z.string().trim().email('Invalid email format').max(255, 'Email is too long');

const passwordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .regex(/[A-Z]/, 'Password must contain an uppercase letter')
  .regex(/[a-z]/, 'Password must contain a lowercase letter')
  .regex(/[0-9]/, 'Password must contain a digit');

export const registerBodySchema = z.object({
  name: nameSchema,
  email: emailSchema,
  password: passwordSchema,
});

export const loginBodySchema = z.object({
  email: emailSchema,
  password: z.string().min(1),
});

export const updateProfileBodySchema = z.object({
  name: nameSchema.nullish(),
  email: emailSchema.nullish(),
  password: passwordSchema.nullish(),
});

export interface AuthRouteDeps {
  tokens: TokenService;
  register: RegisterUseCase;
  login: LoginUseCase;
  getProfile: GetProfileUseCase;
  updateProfile: UpdateProfileUseCase;
}

export function createAuthRoutes(deps: AuthRouteDeps) {
  const router = Router();

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await deps.register.execute(body);
      sendSuccess(res, 201, `User ${result.user.name} registered successfully`, result);
    })
  );

  router.post(
    '/login',
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await deps.login.execute(body);
      sendSuccess(res, 200, 'Login successful', result);
    })
  );

  router.get(
    '/profile',
    authGate(deps.tokens),
    asyncHandler(async (req, res) => {
      const profile = await deps.getProfile.execute(requireIdentity(req));
      sendSuccess(res, 200, 'Profile retrieved successfully', profile);
    })
  );

  router.put(
    '/profile',
    authGate(deps.tokens),
    validate({ body: updateProfileBodySchema }),
    asyncHandler(async (req, res) => {
      const body = updateProfileBodySchema.parse(req.body);
      const profile = await deps.updateProfile.execute(requireIdentity(req), body);
      sendSuccess(res, 200, 'Profile updated successfully', profile);
    })
  );

  return router;
}
