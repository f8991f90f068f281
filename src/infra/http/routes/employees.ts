import { Router } from 'express';
import { z } from 'zod';
import { EmployeeService } from '../../../application/employees/employeeService.js';
import {
  CreateEmployeeRequest,
  GetAllEmployeesRequest,
  ReplaceEmployeeBenefitsRequest,
  UpdateEmployeeRequest,
} from '../../../application/employees/requests.js';
import type { ValidatorRegistry } from '../../../application/validation/registry.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { ScopedRequest, requireUnitOfWork } from '../middleware/unitOfWork.js';
import { validateRequest } from '../middleware/validationPipeline.js';

const employeeIdParams = z.object({
  id: z.coerce.number().int().positive(),
});

function employees(req: ScopedRequest): EmployeeService {
  return new EmployeeService(requireUnitOfWork(req));
}

export function createEmployeeRoutes(registry: ValidatorRegistry): Router {
  const router = Router();

  router.get(
    '/',
    validateRequest(registry, { query: GetAllEmployeesRequest }),
    asyncHandler(async (req, res) => {
      const query = GetAllEmployeesRequest.schema.parse(req.query);
      res.json(await employees(req).list(query));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = employeeIdParams.parse(req.params);
      res.json(await employees(req).get(id));
    })
  );

  router.post(
    '/',
    validateRequest(registry, { body: CreateEmployeeRequest }),
    asyncHandler(async (req, res) => {
      const body = CreateEmployeeRequest.schema.parse(req.body);
      const employee = await employees(req).create(body);
      res.status(201).location(`${req.baseUrl}/${employee.id}`).json(employee);
    })
  );

  router.put(
    '/:id',
    validateRequest(registry, { body: UpdateEmployeeRequest }),
    asyncHandler(async (req, res) => {
      const { id } = employeeIdParams.parse(req.params);
      const body = UpdateEmployeeRequest.schema.parse(req.body);
      res.json(await employees(req).update(id, body));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = employeeIdParams.parse(req.params);
      await employees(req).delete(id);
      res.status(204).end();
    })
  );

  router.get(
    '/:id/benefits',
    asyncHandler(async (req, res) => {
      const { id } = employeeIdParams.parse(req.params);
      res.json(await employees(req).benefits(id));
    })
  );

  router.put(
    '/:id/benefits',
    validateRequest(registry, { body: ReplaceEmployeeBenefitsRequest }),
    asyncHandler(async (req, res) => {
      const { id } = employeeIdParams.parse(req.params);
      const body = ReplaceEmployeeBenefitsRequest.schema.parse(req.body);
      res.json(await employees(req).replaceBenefits(id, body));
    })
  );

  return router;
}
