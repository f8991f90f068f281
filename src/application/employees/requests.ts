import { z } from 'zod';
import { pageRule, pagingQuery, recordsPerPageRule, optionalFilter } from '../paging.js';
import { intRouteParam, isBlank } from '../validation/context.js';
import { definePayload } from '../validation/payload.js';
import { nonNegativeValues, requiredText } from '../validation/rules.js';
import { Validator } from '../validation/validator.js';

// Names are nullable on purpose: a missing name is reported by the validator,
// not rejected while binding.
const text = z.string().nullish();
const benefitIds = z.array(z.number().int().positive());

const createEmployeeRequestSchema = z.object({
  firstName: text,
  lastName: text,
  socialSecurityNumber: text,
  address1: text,
  address2: text,
  city: text,
  state: text,
  zipCode: text,
  phoneNumber: text,
  email: text,
  benefitIds: benefitIds.optional(),
});

export type CreateEmployeeRequest = z.infer<typeof createEmployeeRequestSchema>;
export const CreateEmployeeRequest = definePayload('CreateEmployeeRequest', createEmployeeRequestSchema);

export const createEmployeeRequestValidator = new Validator(CreateEmployeeRequest, (rule) => [
  rule('firstName', requiredText('First name is required.')),
  rule('lastName', requiredText('Last name is required.')),
]);

const updateEmployeeRequestSchema = z.object({
  address1: text,
  address2: text,
  city: text,
  state: text,
  zipCode: text,
  phoneNumber: text,
  email: text,
  benefitIds: benefitIds.optional(),
});

export type UpdateEmployeeRequest = z.infer<typeof updateEmployeeRequestSchema>;
export const UpdateEmployeeRequest = definePayload('UpdateEmployeeRequest', updateEmployeeRequestSchema);

export const ADDRESS1_ALREADY_SET =
  'Address1 must not be empty as an address was already set on the employee.';

export const updateEmployeeRequestValidator = new Validator(UpdateEmployeeRequest, (rule, ctx) => [
  rule(
    'address1',
    text.refine(async (address) => {
      const id = intRouteParam(ctx, 'id');
      if (id === null) {
        return true;
      }
      const employee = await ctx.store.findEmployee(id);
      if (!employee || isBlank(employee.address1)) {
        return true;
      }
      return !isBlank(address);
    }, ADDRESS1_ALREADY_SET)
  ),
]);

const getAllEmployeesRequestSchema = z.object({
  ...pagingQuery,
  firstNameContains: optionalFilter,
  lastNameContains: optionalFilter,
});

export type GetAllEmployeesRequest = z.infer<typeof getAllEmployeesRequestSchema>;
export const GetAllEmployeesRequest = definePayload('GetAllEmployeesRequest', getAllEmployeesRequestSchema);

export const getAllEmployeesRequestValidator = new Validator(GetAllEmployeesRequest, (rule) => [
  rule('page', pageRule),
  rule('recordsPerPage', recordsPerPageRule),
]);

const replaceEmployeeBenefitsRequestSchema = z.object({
  benefitIds,
  // keyed by benefit id
  costOverrides: z.record(z.string().regex(/^\d+$/), z.number()).optional(),
});

export type ReplaceEmployeeBenefitsRequest = z.infer<typeof replaceEmployeeBenefitsRequestSchema>;
export const ReplaceEmployeeBenefitsRequest = definePayload(
  'ReplaceEmployeeBenefitsRequest',
  replaceEmployeeBenefitsRequestSchema
);

export const replaceEmployeeBenefitsRequestValidator = new Validator(ReplaceEmployeeBenefitsRequest, (rule) => [
  rule('costOverrides', nonNegativeValues('Cost overrides must not be negative.')),
]);
