import type { Employee } from './employee.js';

/**
 * A benefit that can be assigned to employees.
 */
export interface Benefit {
  id: number;
  name: string;
  description: string | null;
  baseCost: number;
}

/**
 * Link row between an employee and a benefit.
 * The pair (employeeId, benefitId) is unique across all rows.
 */
export interface EmployeeBenefit {
  id: number;
  employeeId: number;
  benefitId: number;
  costOverride: number | null;
  /**
   * Set while the owning employee is staged in the same change set and has
   * no id yet; storage takes `employeeId` from it once the employee row is
   * written.
   */
  employee?: Employee;
}

/** A link row together with the benefit it references. */
export interface BenefitAssignment {
  readonly link: EmployeeBenefit;
  readonly benefit: Benefit;
}

export function createEmployeeBenefit(
  employeeId: number,
  benefitId: number,
  costOverride: number | null = null
): EmployeeBenefit {
  return { id: 0, employeeId, benefitId, costOverride };
}

/** Link for an employee that is itself still waiting to be inserted. */
export function createPendingEmployeeBenefit(
  employee: Employee,
  benefitId: number,
  costOverride: number | null = null
): EmployeeBenefit {
  return { id: 0, employeeId: employee.id, benefitId, costOverride, employee };
}

/**
 * The employee id a link should be written with. `insertedIds` holds the ids
 * of employees written earlier in the same change set.
 */
export function resolveEmployeeId(link: EmployeeBenefit, insertedIds: ReadonlyMap<Employee, number>): number {
  if (!link.employee) {
    return link.employeeId;
  }
  return insertedIds.get(link.employee) ?? link.employee.id;
}

/**
 * Override first, the benefit's base cost otherwise.
 */
export function effectiveCost(assignment: BenefitAssignment): number {
  return assignment.link.costOverride ?? assignment.benefit.baseCost;
}

export interface EmployeeBenefitView {
  id: number;
  benefitId: number;
  name: string;
  description: string | null;
  cost: number;
}

export function toEmployeeBenefitView(assignment: BenefitAssignment): EmployeeBenefitView {
  return {
    id: assignment.link.id,
    benefitId: assignment.benefit.id,
    name: assignment.benefit.name,
    description: assignment.benefit.description,
    cost: effectiveCost(assignment),
  };
}
