import { Router } from 'express';
import { z } from 'zod';
import type { CreatePostUseCase } from '../../../application/posts/createPost.js';
import type { UpdatePostUseCase } from '../../../application/posts/updatePost.js';
import type { DeletePostUseCase } from '../../../application/posts/deletePost.js';
import type { PostQueries } from '../../../application/posts/queries.js';
import type { TokenService } from '../../../application/auth/tokenService.js';
import { authGate, requireIdentity } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { sendSuccess } from '../response.js';

/**
 * @openapi
 * /api/posts:
 *   get:
 *     tags: [Posts]
 *     summary: List every post, newest first (public)
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/PostListResponse' }
 *   post:
 *     tags: [Posts]
 *     summary: Create a post owned by the caller
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title, body]
 *             properties:
 *               title: { type: string, maxLength: 200 }
 *               body: { type: string }
 *     responses:
 *       201: { description: Created }
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
 *
 * /api/posts/my:
 *   get:
 *     tags: [Posts]
 *     summary: List the caller's own posts
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/PostListResponse' }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/posts/{id}:
 *   get:
 *     tags: [Posts]
 *     summary: Get a post (public)
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: Post not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Posts]
 *     summary: Update a post (owner only)
 *     description: >
 *       A missing post is reported as 404 before ownership is checked, so any
 *       authenticated caller can tell whether a post id exists.
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               title: { type: string, nullable: true }
 *               body: { type: string, nullable: true }
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       403:
 *         description: Caller is not the owner
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Post not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Posts]
 *     summary: Delete a post (owner only)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200: { description: Deleted }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       403:
 *         description: Caller is not the owner
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Post not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const titleSchema = z.string().trim().min(1, 'Post title cannot be empty').max(200);

const bodySchema = z.string().trim().min(1, 'Post body cannot be empty').max(10_000);

const postIdParamsSchema = z.object({
  id: z.string().uuid(),
});

const createPostBodySchema = z.object({
  title: titleSchema,
  body: bodySchema,
});

const updatePostBodySchema = z.object({
  title: titleSchema.nullish(),
  body: bodySchema.nullish(),
});

export interface PostRouteDeps {
  tokens: TokenService;
  createPost: CreatePostUseCase;
  updatePost: UpdatePostUseCase;
  deletePost: DeletePostUseCase;
  queries: PostQueries;
}

export function createPostRoutes(deps: PostRouteDeps) {
  const router = Router();
  const requireAuth = authGate(deps.tokens);

  // List posts (public)
  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const posts = await deps.queries.list();
      sendSuccess(res, 200, `Retrieved ${posts.length} posts`, posts);
    })
  );

  // My posts; the owner is always the caller, never client input.
  // Registered before '/:id' so "my" is not taken for an id.
  router.get(
    '/my',
    requireAuth,
    asyncHandler(async (req, res) => {
      const identity = requireIdentity(req);
      const posts = await deps.queries.listByOwner(identity, identity.userId);
      sendSuccess(res, 200, `Retrieved ${posts.length} posts`, posts);
    })
  );

  // Get post (public)
  router.get(
    '/:id',
    validate({ params: postIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = postIdParamsSchema.parse(req.params);
      const post = await deps.queries.get(id);
      sendSuccess(res, 200, 'Post retrieved successfully', post);
    })
  );

  // Create post
  router.post(
    '/',
    requireAuth,
    validate({ body: createPostBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createPostBodySchema.parse(req.body);
      const post = await deps.createPost.execute(requireIdentity(req), body);
      sendSuccess(res, 201, `Post '${post.title}' created successfully`, post);
    })
  );

  // Update post
  router.put(
    '/:id',
    requireAuth,
    validate({ params: postIdParamsSchema, body: updatePostBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = postIdParamsSchema.parse(req.params);
      const body = updatePostBodySchema.parse(req.body);
      const post = await deps.updatePost.execute(requireIdentity(req), id, body);
      sendSuccess(res, 200, `Post '${post.title}' updated successfully`, post);
    })
  );

  // Delete post
  router.delete(
    '/:id',
    requireAuth,
    validate({ params: postIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = postIdParamsSchema.parse(req.params);
      await deps.deletePost.execute(requireIdentity(req), id);
      sendSuccess(res, 200, 'Post deleted successfully');
    })
  );

  return router;
}
