import { Router } from 'express';
import { BenefitQueries } from '../../../application/benefits/queries.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requireUnitOfWork } from '../middleware/unitOfWork.js';

export function createBenefitRoutes(): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const queries = new BenefitQueries(requireUnitOfWork(req).reader);
      res.json(await queries.getBenefits());
    })
  );

  return router;
}
