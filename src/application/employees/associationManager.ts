import {
  BenefitAssignment,
  EmployeeBenefit,
  createEmployeeBenefit,
  createPendingEmployeeBenefit,
} from '../../domain/employees/benefit.js';
import type { Employee } from '../../domain/employees/employee.js';
import { NotFoundError } from '../errors.js';
import type { ReadStore } from '../persistence/store.js';
import type { UnitOfWork } from '../persistence/unitOfWork.js';

/** Cost override per benefit id. JSON object keys arrive as strings. */
export type CostOverrides = Readonly<Record<string, number>>;

/**
 * Stages a replace-all of an employee's benefit links on `uow`: every
 * current link is removed and one link per distinct benefit id is added.
 * Nothing is written until the caller commits, and the commit applies the
 * removals before the additions.
 *
 * Returns the staged links; their ids are assigned by the commit.
 */
export async function replaceAssociations(
  uow: UnitOfWork,
  employeeId: number,
  benefitIds: readonly number[],
  costOverrides: CostOverrides = {}
): Promise<EmployeeBenefit[]> {
  const employee = await uow.reader.findEmployee(employeeId);
  if (!employee) {
    throw new NotFoundError('Employee not found');
  }

  const distinctIds = [...new Set(benefitIds)];
  await requireBenefits(uow.reader, distinctIds);

  const current = await uow.reader.listBenefitAssignments(employeeId);
  for (const { link } of current) {
    uow.remove('employeeBenefit', link);
  }

  return distinctIds.map((benefitId) =>
    uow.add('employeeBenefit', createEmployeeBenefit(employeeId, benefitId, costOverrides[String(benefitId)] ?? null))
  );
}

/**
 * Stages the initial links of an employee that was just added to `uow` and
 * has no id yet. The employee row and its links go out in the same commit.
 */
export async function stageInitialAssociations(
  uow: UnitOfWork,
  employee: Employee,
  benefitIds: readonly number[],
  costOverrides: CostOverrides = {}
): Promise<EmployeeBenefit[]> {
  const distinctIds = [...new Set(benefitIds)];
  await requireBenefits(uow.reader, distinctIds);

  return distinctIds.map((benefitId) =>
    uow.add(
      'employeeBenefit',
      createPendingEmployeeBenefit(employee, benefitId, costOverrides[String(benefitId)] ?? null)
    )
  );
}

export async function requireBenefits(store: ReadStore, benefitIds: readonly number[]): Promise<void> {
  for (const benefitId of benefitIds) {
    const benefit = await store.findBenefit(benefitId);
    if (!benefit) {
      throw new NotFoundError(`Benefit ${benefitId} not found`);
    }
  }
}

/**
 * Current assignments of an employee, 404 when the employee is unknown.
 */
export async function getAssignments(store: ReadStore, employeeId: number): Promise<BenefitAssignment[]> {
  const employee = await store.findEmployee(employeeId);
  if (!employee) {
    throw new NotFoundError('Employee not found');
  }
  return store.listBenefitAssignments(employeeId);
}
