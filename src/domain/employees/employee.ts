import { Auditable, AuditView, emptyAudit, toAuditView } from '../audit.js';

/**
 * Employee record. `id` is 0 until the entity is first persisted.
 */
export interface Employee extends Auditable {
  id: number;
  firstName: string;
  lastName: string;
  socialSecurityNumber: string | null;
  address1: string | null;
  address2: string | null;
  city: string | null;
  state: string | null;
  zipCode: string | null;
  phoneNumber: string | null;
  email: string | null;
}

export interface NewEmployee {
  firstName: string;
  lastName: string;
  socialSecurityNumber?: string | null;
  address1?: string | null;
  address2?: string | null;
  city?: string | null;
  state?: string | null;
  zipCode?: string | null;
  phoneNumber?: string | null;
  email?: string | null;
}

export function createEmployee(data: NewEmployee): Employee {
  return {
    id: 0,
    firstName: data.firstName,
    lastName: data.lastName,
    socialSecurityNumber: data.socialSecurityNumber ?? null,
    address1: data.address1 ?? null,
    address2: data.address2 ?? null,
    city: data.city ?? null,
    state: data.state ?? null,
    zipCode: data.zipCode ?? null,
    phoneNumber: data.phoneNumber ?? null,
    email: data.email ?? null,
    ...emptyAudit(),
  };
}

/** Fields an update request is allowed to overwrite. */
export type EmployeeContactDetails = Pick<
  Employee,
  'address1' | 'address2' | 'city' | 'state' | 'zipCode' | 'phoneNumber' | 'email'
>;

export interface EmployeeView extends AuditView {
  id: number;
  firstName: string;
  lastName: string;
  address1: string | null;
  address2: string | null;
  city: string | null;
  state: string | null;
  zipCode: string | null;
  phoneNumber: string | null;
  email: string | null;
}

// Social security number stays out of responses
export function toEmployeeView(employee: Employee): EmployeeView {
  return {
    id: employee.id,
    firstName: employee.firstName,
    lastName: employee.lastName,
    address1: employee.address1,
    address2: employee.address2,
    city: employee.city,
    state: employee.state,
    zipCode: employee.zipCode,
    phoneNumber: employee.phoneNumber,
    email: employee.email,
    ...toAuditView(employee),
  };
}
