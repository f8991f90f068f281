import { Router } from 'express';
import { z } from 'zod';
import { UserService } from '../../../application/users/userService.js';
import { GetAllUsersRequest, UpdateUserRequest } from '../../../application/users/requests.js';
import type { ValidatorRegistry } from '../../../application/validation/registry.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { authMiddleware, requireUserId } from '../middleware/auth.js';
import { ScopedRequest, requireUnitOfWork } from '../middleware/unitOfWork.js';
import { validateRequest } from '../middleware/validationPipeline.js';

const userIdParams = z.object({
  id: z.string().min(1),
});

function users(req: ScopedRequest): UserService {
  return new UserService(requireUnitOfWork(req));
}

/**
 * User profile endpoints. Every route needs a bearer token; accounts
 * themselves are created by the identity provider.
 */
export function createUserRoutes(registry: ValidatorRegistry, jwtSecret: string): Router {
  const router = Router();

  router.use(authMiddleware(jwtSecret));

  router.get(
    '/',
    validateRequest(registry, { query: GetAllUsersRequest }),
    asyncHandler(async (req, res) => {
      const query = GetAllUsersRequest.schema.parse(req.query);
      res.json(await users(req).list(query));
    })
  );

  router.get(
    '/current',
    asyncHandler(async (req, res) => {
      res.json(await users(req).get(requireUserId(req)));
    })
  );

  router.put(
    '/profile',
    validateRequest(registry, { body: UpdateUserRequest }),
    asyncHandler(async (req, res) => {
      const body = UpdateUserRequest.schema.parse(req.body);
      res.json(await users(req).update(requireUserId(req), body));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = userIdParams.parse(req.params);
      res.json(await users(req).get(id));
    })
  );

  router.put(
    '/:id',
    validateRequest(registry, { body: UpdateUserRequest }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParams.parse(req.params);
      const body = UpdateUserRequest.schema.parse(req.body);
      res.json(await users(req).update(id, body));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = userIdParams.parse(req.params);
      await users(req).deactivate(id);
      res.status(204).end();
    })
  );

  return router;
}
