import { z } from 'zod';
import { optionalFilter, pageRule, pagingQuery, recordsPerPageRule } from '../paging.js';
import { definePayload } from '../validation/payload.js';
import { absoluteUrlOrEmpty, maxLength } from '../validation/rules.js';
import { Validator } from '../validation/validator.js';

const text = z.string().nullish();

const updateUserRequestSchema = z.object({
  firstName: text,
  lastName: text,
  profilePicture: text,
});

export type UpdateUserRequest = z.infer<typeof updateUserRequestSchema>;
export const UpdateUserRequest = definePayload('UpdateUserRequest', updateUserRequestSchema);

export const updateUserRequestValidator = new Validator(UpdateUserRequest, (rule) => [
  rule('firstName', maxLength(100, 'First name cannot exceed 100 characters.')),
  rule('lastName', maxLength(100, 'Last name cannot exceed 100 characters.')),
  rule('profilePicture', maxLength(500, 'Profile picture URL cannot exceed 500 characters.')),
  rule('profilePicture', absoluteUrlOrEmpty('Profile picture must be a valid URL.')),
]);

const getAllUsersRequestSchema = z.object({
  ...pagingQuery,
  emailContains: optionalFilter,
  firstNameContains: optionalFilter,
  lastNameContains: optionalFilter,
  isActive: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
});

export type GetAllUsersRequest = z.infer<typeof getAllUsersRequestSchema>;
export const GetAllUsersRequest = definePayload('GetAllUsersRequest', getAllUsersRequestSchema);

export const getAllUsersRequestValidator = new Validator(GetAllUsersRequest, (rule) => [
  rule('page', pageRule),
  rule('recordsPerPage', recordsPerPageRule),
]);
