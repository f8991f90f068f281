import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryDatabase } from '../../../testing/memoryDatabase.js';
import { RuleEvaluationFaultError } from '../../errors.js';
import type { ValidationContext } from '../../validation/context.js';
import {
  ADDRESS1_ALREADY_SET,
  CreateEmployeeRequest,
  GetAllEmployeesRequest,
  ReplaceEmployeeBenefitsRequest,
  UpdateEmployeeRequest,
  createEmployeeRequestValidator,
  getAllEmployeesRequestValidator,
  replaceEmployeeBenefitsRequestValidator,
  updateEmployeeRequestValidator,
} from '../requests.js';

describe('employee request validators', () => {
  let db: MemoryDatabase;

  beforeEach(() => {
    db = new MemoryDatabase();
  });

  function context(routeParams: Record<string, string> = {}): ValidationContext {
    return { routeParams, store: db.openSession(), signal: new AbortController().signal };
  }

  describe('CreateEmployeeRequest', () => {
    it('should accept a request with both names', async () => {
      const payload = CreateEmployeeRequest.schema.parse({ firstName: 'Ann', lastName: 'Lee' });

      const outcome = await createEmployeeRequestValidator.validate(payload, context());

      expect(outcome.valid).toBe(true);
    });

    it('should require first and last name', async () => {
      const payload = CreateEmployeeRequest.schema.parse({ firstName: null });

      const outcome = await createEmployeeRequestValidator.validate(payload, context());

      expect(outcome.errors).toEqual({
        firstName: ['First name is required.'],
        lastName: ['Last name is required.'],
      });
    });

    it('should treat a whitespace-only name as missing', async () => {
      const payload = CreateEmployeeRequest.schema.parse({ firstName: '   ', lastName: 'Lee' });

      const outcome = await createEmployeeRequestValidator.validate(payload, context());

      expect(outcome.errors).toEqual({ firstName: ['First name is required.'] });
    });
  });

  describe('UpdateEmployeeRequest', () => {
    it('should reject clearing an address that is already set', async () => {
      const employee = db.seedEmployee({ firstName: 'Ann', lastName: 'Lee', address1: '123 Main St' });
      const payload = UpdateEmployeeRequest.schema.parse({ address1: '' });

      const outcome = await updateEmployeeRequestValidator.validate(payload, context({ id: String(employee.id) }));

      expect(outcome.errors).toEqual({ address1: [ADDRESS1_ALREADY_SET] });
      expect(ADDRESS1_ALREADY_SET).toBe('Address1 must not be empty as an address was already set on the employee.');
    });

    it('should reject a missing address1 when one is already set', async () => {
      const employee = db.seedEmployee({ firstName: 'Ann', lastName: 'Lee', address1: '123 Main St' });
      const payload = UpdateEmployeeRequest.schema.parse({ city: 'Oslo' });

      const outcome = await updateEmployeeRequestValidator.validate(payload, context({ id: String(employee.id) }));

      expect(outcome.valid).toBe(false);
    });

    it('should accept an empty address when the employee has none', async () => {
      const employee = db.seedEmployee({ firstName: 'Bob', lastName: 'Ray', address1: null });
      const payload = UpdateEmployeeRequest.schema.parse({ address1: '' });

      const outcome = await updateEmployeeRequestValidator.validate(payload, context({ id: String(employee.id) }));

      expect(outcome).toEqual({ valid: true, errors: {} });
    });

    it('should accept a replacement address', async () => {
      const employee = db.seedEmployee({ firstName: 'Ann', lastName: 'Lee', address1: '123 Main St' });
      const payload = UpdateEmployeeRequest.schema.parse({ address1: '9 Elm Rd' });

      const outcome = await updateEmployeeRequestValidator.validate(payload, context({ id: String(employee.id) }));

      expect(outcome.valid).toBe(true);
    });

    it.each<Record<string, string>>([{}, { id: 'abc' }, { id: '999' }])(
      'should pass when the route does not identify an employee (%j)',
      async (routeParams) => {
        db.seedEmployee({ firstName: 'Ann', lastName: 'Lee', address1: '123 Main St' });
        const payload = UpdateEmployeeRequest.schema.parse({ address1: '' });

        const outcome = await updateEmployeeRequestValidator.validate(payload, context(routeParams));

        expect(outcome.valid).toBe(true);
      }
    );

    it('should report a storage failure as a rule fault, not as an invalid field', async () => {
      db.failReads(new Error('connection refused'));
      const payload = UpdateEmployeeRequest.schema.parse({ address1: '' });

      const error = await updateEmployeeRequestValidator.validate(payload, context({ id: '1' })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RuleEvaluationFaultError);
      expect(error).toMatchObject({ field: 'address1', payloadType: 'UpdateEmployeeRequest' });
    });
  });

  describe('GetAllEmployeesRequest', () => {
    it('should accept absent paging', async () => {
      const payload = GetAllEmployeesRequest.schema.parse({});

      const outcome = await getAllEmployeesRequestValidator.validate(payload, context());

      expect(outcome.valid).toBe(true);
    });

    it('should coerce query strings and check paging bounds', async () => {
      const payload = GetAllEmployeesRequest.schema.parse({ page: '0', recordsPerPage: '101' });

      const outcome = await getAllEmployeesRequestValidator.validate(payload, context());

      expect(outcome.errors).toEqual({
        page: ['Page number must be set to a positive non-zero integer.'],
        recordsPerPage: ['You cannot return more than 100 records.'],
      });
    });

    it('should require at least one record per page', async () => {
      const payload = GetAllEmployeesRequest.schema.parse({ recordsPerPage: '0' });

      const outcome = await getAllEmployeesRequestValidator.validate(payload, context());

      expect(outcome.errors).toEqual({ recordsPerPage: ['You must return at least one record.'] });
    });

    it('should drop blank name filters', () => {
      expect(GetAllEmployeesRequest.schema.parse({ firstNameContains: '  ', lastNameContains: 'Le' })).toEqual({
        firstNameContains: undefined,
        lastNameContains: 'Le',
      });
    });
  });

  describe('ReplaceEmployeeBenefitsRequest', () => {
    it('should reject negative cost overrides', async () => {
      const payload = ReplaceEmployeeBenefitsRequest.schema.parse({
        benefitIds: [1, 2],
        costOverrides: { '1': 20, '2': -5 },
      });

      const outcome = await replaceEmployeeBenefitsRequestValidator.validate(payload, context());

      expect(outcome.errors).toEqual({ costOverrides: ['Cost overrides must not be negative.'] });
    });

    it('should accept overrides of zero or more', async () => {
      const payload = ReplaceEmployeeBenefitsRequest.schema.parse({ benefitIds: [1], costOverrides: { '1': 0 } });

      const outcome = await replaceEmployeeBenefitsRequestValidator.validate(payload, context());

      expect(outcome.valid).toBe(true);
    });
  });
});
