import { describe, it, expect, beforeEach } from 'vitest';
import { FixedClock } from '../../../domain/clock.js';
import { createEmployee } from '../../../domain/employees/employee.js';
import { createEmployeeBenefit } from '../../../domain/employees/benefit.js';
import { MemoryDatabase } from '../../../testing/memoryDatabase.js';
import { CommitFaultError, ConstraintViolationError, SessionClosedError } from '../../errors.js';
import { UnitOfWorkFactory } from '../unitOfWork.js';

const FIXED = '2022-01-01T00:00:00.000Z';

describe('UnitOfWork', () => {
  let db: MemoryDatabase;
  let factory: UnitOfWorkFactory;

  beforeEach(() => {
    db = new MemoryDatabase();
    factory = new UnitOfWorkFactory({ openSession: db.openSession, clock: new FixedClock(FIXED) });
  });

  it('should insert added entities, assign ids and stamp creation', async () => {
    const uow = factory.begin();
    const employee = uow.add('employee', createEmployee({ firstName: 'Ann', lastName: 'Lee' }));

    await uow.commit();

    expect(employee.id).toBe(1);
    expect(db.employee(1)).toMatchObject({ firstName: 'Ann', createdBy: 'system' });
    expect(db.employee(1)?.createdAt?.toISOString()).toBe(FIXED);
  });

  it('should write a tracked entity only when a field changed', async () => {
    const seeded = db.seedEmployee({ firstName: 'Bob', lastName: 'Ray', city: 'Oslo' });
    const uow = factory.begin();
    const loaded = await uow.reader.findEmployee(seeded.id);
    if (!loaded) throw new Error('seed missing');

    uow.track('employee', loaded);
    expect(uow.pendingChanges()).toEqual([]);

    loaded.city = 'Bergen';
    expect(uow.pendingChanges()).toHaveLength(1);

    await uow.commit();

    expect(db.employee(seeded.id)?.city).toBe('Bergen');
    expect(db.employee(seeded.id)?.modifiedAt?.toISOString()).toBe(FIXED);
  });

  it('should not treat an equal Date as a change', async () => {
    const uow = factory.begin();
    const employee = uow.add('employee', createEmployee({ firstName: 'Cy', lastName: 'Doe' }));
    await uow.commit();

    Object.assign(employee, { createdAt: new Date(FIXED) });
    expect(uow.pendingChanges()).toEqual([]);
  });

  it('should order deletes before modifications before additions', async () => {
    const benefit = db.seedBenefit({ name: 'Health', description: null, baseCost: 100 });
    const seeded = db.seedEmployee({ firstName: 'Dee', lastName: 'Fox' });
    const link = db.seedLink(seeded.id, benefit.id);
    const uow = factory.begin();
    const loaded = await uow.reader.findEmployee(seeded.id);
    if (!loaded) throw new Error('seed missing');

    uow.add('employeeBenefit', createEmployeeBenefit(seeded.id, benefit.id));
    uow.track('employee', loaded).city = 'Rome';
    uow.remove('employeeBenefit', link);

    expect(uow.pendingChanges().map((c) => `${c.state}:${c.kind}`)).toEqual([
      'deleted:employeeBenefit',
      'modified:employee',
      'added:employeeBenefit',
    ]);

    await uow.commit();
    expect(db.linksFor(seeded.id)).toEqual([{ id: 2, employeeId: seeded.id, benefitId: benefit.id, costOverride: null }]);
  });

  it('should skip the write entirely when nothing is pending', async () => {
    db.failNextApply(new Error('should not be called'));
    const uow = factory.begin();

    await expect(uow.commit()).resolves.toBeUndefined();
  });

  it('should propagate constraint violations as they are', async () => {
    const benefit = db.seedBenefit({ name: 'Dental', description: null, baseCost: 50 });
    const seeded = db.seedEmployee({ firstName: 'Eve', lastName: 'Gold' });
    db.seedLink(seeded.id, benefit.id);
    const uow = factory.begin();
    uow.add('employeeBenefit', createEmployeeBenefit(seeded.id, benefit.id));

    const error = await uow.commit().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConstraintViolationError);
    expect(error).toMatchObject({ constraint: 'employee_benefits_employee_id_benefit_id_key' });
    expect(db.linksFor(seeded.id)).toHaveLength(1);
  });

  it('should wrap other storage failures in CommitFaultError and keep ids unassigned', async () => {
    const cause = new Error('connection reset');
    db.failNextApply(cause);
    const uow = factory.begin();
    const employee = uow.add('employee', createEmployee({ firstName: 'Fay', lastName: 'Hill' }));

    const error = await uow.commit().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommitFaultError);
    expect(error).toMatchObject({ message: 'Commit failed', cause });
    expect(employee.id).toBe(0);
    expect(employee.createdAt).toBeNull();
  });

  it('should only apply later edits on a second commit', async () => {
    const uow = factory.begin();
    const employee = uow.add('employee', createEmployee({ firstName: 'Gus', lastName: 'Ivy' }));
    await uow.commit();

    employee.email = 'gus@example.com';
    expect(uow.pendingChanges().map((c) => c.state)).toEqual(['modified']);

    await uow.commit();
    expect(db.employee(employee.id)?.email).toBe('gus@example.com');
  });

  it('should release its storage session', async () => {
    const uow = factory.begin();
    await uow.release();

    expect(db.sessions).toEqual({ opened: 1, released: 1 });
  });

  it('should refuse reads and commits once released', async () => {
    const uow = factory.begin();
    uow.add('employee', createEmployee({ firstName: 'Hal', lastName: 'Jay' }));
    await uow.release();

    await expect(uow.reader.findEmployee(1)).rejects.toThrow(SessionClosedError);
    await expect(uow.commit()).rejects.toThrow(SessionClosedError);
    expect(db.employee(1)).toBeUndefined();
  });
});
