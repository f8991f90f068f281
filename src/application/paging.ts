import { z } from 'zod';
import type { Page } from './persistence/store.js';
import { intRange } from './validation/rules.js';

export const DEFAULT_PAGE = 1;
export const MAX_RECORDS_PER_PAGE = 100;

/** Largest value the paging parameters bind to (32-bit signed int). */
const MAX_PAGING_VALUE = 2147483647;

const pagingNumber = (label: string) =>
  z.coerce.number().int().max(MAX_PAGING_VALUE, `${label} must not exceed ${MAX_PAGING_VALUE}.`).optional();

/** Query-string fields shared by the list endpoints. */
export const pagingQuery = {
  page: pagingNumber('Page number'),
  recordsPerPage: pagingNumber('Records per page'),
};

export const pageRule = intRange({
  min: [1, 'Page number must be set to a positive non-zero integer.'],
});

export const recordsPerPageRule = intRange({
  min: [1, 'You must return at least one record.'],
  max: [MAX_RECORDS_PER_PAGE, `You cannot return more than ${MAX_RECORDS_PER_PAGE} records.`],
});

export function toPage(
  request: { page?: number; recordsPerPage?: number },
  defaultRecordsPerPage: number
): Page {
  return {
    page: request.page ?? DEFAULT_PAGE,
    recordsPerPage: request.recordsPerPage ?? defaultRecordsPerPage,
  };
}

export const optionalFilter = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));
