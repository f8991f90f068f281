import type { Employee } from '../../domain/employees/employee.js';
import type { Benefit, BenefitAssignment } from '../../domain/employees/benefit.js';
import type { User } from '../../domain/users/user.js';
import type { ChangeEntry } from './changes.js';

export interface Page {
  page: number;
  recordsPerPage: number;
}

export interface EmployeeFilter extends Page {
  firstNameContains?: string;
  lastNameContains?: string;
}

export interface UserFilter extends Page {
  emailContains?: string;
  firstNameContains?: string;
  lastNameContains?: string;
  isActive?: boolean;
}

/**
 * Read side of a storage session. Every call returns fresh objects; callers
 * own what they get back.
 */
export interface ReadStore {
  findEmployee(id: number): Promise<Employee | null>;
  listEmployees(filter: EmployeeFilter): Promise<Employee[]>;
  findUser(id: string): Promise<User | null>;
  listUsers(filter: UserFilter): Promise<User[]>;
  findBenefit(id: number): Promise<Benefit | null>;
  listBenefits(): Promise<Benefit[]>;
  listBenefitAssignments(employeeId: number): Promise<BenefitAssignment[]>;
}

/**
 * One request's view of storage. Reads and the writes applied by `apply`
 * share a transaction, so a check made during validation sees the same data
 * the commit acts on.
 */
export interface StorageSession extends ReadStore {
  /** Writes the entries in order, atomically. */
  apply(changes: readonly ChangeEntry[]): Promise<void>;
  /** Ends the session, discarding anything not applied. */
  release(): Promise<void>;
}

export type SessionOpener = () => StorageSession;
