import {
  createEmployeeRequestValidator,
  getAllEmployeesRequestValidator,
  replaceEmployeeBenefitsRequestValidator,
  updateEmployeeRequestValidator,
} from './employees/requests.js';
import { getAllUsersRequestValidator, updateUserRequestValidator } from './users/requests.js';
import { ValidatorRegistry } from './validation/registry.js';
import type { PayloadValidator } from './validation/validator.js';

/**
 * Every validator the service registers. Adding a payload rule set means
 * adding it here.
 */
export const validators: readonly PayloadValidator[] = [
  createEmployeeRequestValidator,
  updateEmployeeRequestValidator,
  getAllEmployeesRequestValidator,
  replaceEmployeeBenefitsRequestValidator,
  updateUserRequestValidator,
  getAllUsersRequestValidator,
];

export function createValidatorRegistry(): ValidatorRegistry {
  return ValidatorRegistry.fromValidators(validators);
}
