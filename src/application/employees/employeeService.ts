import {
  EmployeeContactDetails,
  EmployeeView,
  createEmployee,
  toEmployeeView,
} from '../../domain/employees/employee.js';
import { EmployeeBenefitView, toEmployeeBenefitView } from '../../domain/employees/benefit.js';
import { NotFoundError } from '../errors.js';
import { MAX_RECORDS_PER_PAGE, toPage } from '../paging.js';
import type { UnitOfWork } from '../persistence/unitOfWork.js';
import { getAssignments, replaceAssociations, stageInitialAssociations } from './associationManager.js';
import type {
  CreateEmployeeRequest,
  GetAllEmployeesRequest,
  ReplaceEmployeeBenefitsRequest,
  UpdateEmployeeRequest,
} from './requests.js';

/**
 * Employee use cases, bound to one request's unit of work. Payloads are
 * expected to have passed their validators already.
 */
export class EmployeeService {
  constructor(private readonly uow: UnitOfWork) {}

  async list(request: GetAllEmployeesRequest): Promise<EmployeeView[]> {
    const employees = await this.uow.reader.listEmployees({
      ...toPage(request, MAX_RECORDS_PER_PAGE),
      firstNameContains: request.firstNameContains,
      lastNameContains: request.lastNameContains,
    });
    return employees.map(toEmployeeView);
  }

  async get(id: number): Promise<EmployeeView> {
    const employee = await this.uow.reader.findEmployee(id);
    if (!employee) {
      throw new NotFoundError('Employee not found');
    }
    return toEmployeeView(employee);
  }

  async create(request: CreateEmployeeRequest): Promise<EmployeeView> {
    const employee = this.uow.add(
      'employee',
      createEmployee({
        ...contactDetailsOf(request),
        firstName: request.firstName ?? '',
        lastName: request.lastName ?? '',
        socialSecurityNumber: request.socialSecurityNumber,
      })
    );
    if (request.benefitIds) {
      await stageInitialAssociations(this.uow, employee, request.benefitIds);
    }
    await this.uow.commit();
    return toEmployeeView(employee);
  }

  async update(id: number, request: UpdateEmployeeRequest): Promise<EmployeeView> {
    const existing = await this.uow.reader.findEmployee(id);
    if (!existing) {
      throw new NotFoundError('Employee not found');
    }

    const employee = this.uow.track('employee', existing);
    Object.assign(employee, contactDetailsOf(request));
    if (request.benefitIds) {
      await replaceAssociations(this.uow, id, request.benefitIds);
    }
    await this.uow.commit();
    return toEmployeeView(employee);
  }

  async delete(id: number): Promise<void> {
    const employee = await this.uow.reader.findEmployee(id);
    if (!employee) {
      throw new NotFoundError('Employee not found');
    }
    this.uow.remove('employee', employee);
    await this.uow.commit();
  }

  async benefits(id: number): Promise<EmployeeBenefitView[]> {
    const assignments = await getAssignments(this.uow.reader, id);
    return assignments.map(toEmployeeBenefitView);
  }

  async replaceBenefits(id: number, request: ReplaceEmployeeBenefitsRequest): Promise<EmployeeBenefitView[]> {
    await replaceAssociations(this.uow, id, request.benefitIds, request.costOverrides);
    await this.uow.commit();
    return this.benefits(id);
  }
}

function contactDetailsOf(request: UpdateEmployeeRequest | CreateEmployeeRequest): EmployeeContactDetails {
  return {
    address1: request.address1 ?? null,
    address2: request.address2 ?? null,
    city: request.city ?? null,
    state: request.state ?? null,
    zipCode: request.zipCode ?? null,
    phoneNumber: request.phoneNumber ?? null,
    email: request.email ?? null,
  };
}
