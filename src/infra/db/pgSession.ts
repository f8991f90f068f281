import type { QueryResult, QueryResultRow } from 'pg';
import { CommitFaultError, ConstraintViolationError, SessionClosedError } from '../../application/errors.js';
import type { ChangeEntry } from '../../application/persistence/changes.js';
import type {
  EmployeeFilter,
  SessionOpener,
  StorageSession,
  UserFilter,
} from '../../application/persistence/store.js';
import { Benefit, BenefitAssignment, EmployeeBenefit, resolveEmployeeId } from '../../domain/employees/benefit.js';
import type { Employee } from '../../domain/employees/employee.js';
import type { User } from '../../domain/users/user.js';
import { logger } from '../logger.js';

// Row shapes are type aliases so they satisfy pg's QueryResultRow
type AuditRow = {
  created_by: string | null;
  created_at: Date | null;
  modified_by: string | null;
  modified_at: Date | null;
};

type EmployeeRow = AuditRow & {
  id: number;
  first_name: string;
  last_name: string;
  social_security_number: string | null;
  address1: string | null;
  address2: string | null;
  city: string | null;
  state: string | null;
  zip_code: string | null;
  phone_number: string | null;
  email: string | null;
};

type UserRow = AuditRow & {
  id: string;
  email: string;
  user_name: string | null;
  first_name: string | null;
  last_name: string | null;
  profile_picture: string | null;
  is_active: boolean;
  last_login_date: Date | null;
};

// numeric columns come back as strings
type BenefitRow = {
  id: number;
  name: string;
  description: string | null;
  base_cost: string;
};

type EmployeeBenefitRow = {
  id: number;
  employee_id: number;
  benefit_id: number;
  cost_override: string | null;
};

type AssignmentRow = EmployeeBenefitRow & { benefit_name: string; benefit_description: string | null; base_cost: string };

const EMPLOYEE_COLUMNS = `id, first_name, last_name, social_security_number, address1, address2, city, state,
  zip_code, phone_number, email, created_by, created_at, modified_by, modified_at`;

const USER_COLUMNS = `id, email, user_name, first_name, last_name, profile_picture, is_active, last_login_date,
  created_by, created_at, modified_by, modified_at`;

/** The part of a pooled `pg` client a session uses. */
export interface SessionClient {
  query<R extends QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>>;
  release(): void;
}

/** Anything that hands out clients the way `pg.Pool` does. */
export interface ClientPool {
  connect(): Promise<SessionClient>;
}

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

/**
 * Storage session over one pooled client.
 *
 * The client is checked out on first use. Reads open a REPEATABLE READ
 * transaction that stays open until the next `apply` commits it, so
 * validation reads and the following write see the same snapshot. A read
 * after a commit starts a new transaction.
 *
 * Once released the session is closed for good: reads and applies reject
 * with `SessionClosedError` instead of checking out another client.
 */
export class PgSession implements StorageSession {
  private client: SessionClient | null = null;
  private transaction: Promise<SessionClient> | null = null;
  private closed = false;

  constructor(private readonly pool: ClientPool) {}

  async findEmployee(id: number): Promise<Employee | null> {
    const rows = await this.query<EmployeeRow>(`SELECT ${EMPLOYEE_COLUMNS} FROM employees WHERE id = $1`, [id]);
    return rows.length > 0 ? toEmployee(rows[0]) : null;
  }

  async listEmployees(filter: EmployeeFilter): Promise<Employee[]> {
    const rows = await this.query<EmployeeRow>(
      `SELECT ${EMPLOYEE_COLUMNS} FROM employees
       WHERE ($1::text IS NULL OR position($1 in first_name) > 0)
         AND ($2::text IS NULL OR position($2 in last_name) > 0)
       ORDER BY id
       LIMIT $3 OFFSET $4`,
      [
        filter.firstNameContains ?? null,
        filter.lastNameContains ?? null,
        filter.recordsPerPage,
        (filter.page - 1) * filter.recordsPerPage,
      ]
    );
    return rows.map(toEmployee);
  }

  async findUser(id: string): Promise<User | null> {
    const rows = await this.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id::text = $1`, [id]);
    return rows.length > 0 ? toUser(rows[0]) : null;
  }

  async listUsers(filter: UserFilter): Promise<User[]> {
    const rows = await this.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users
       WHERE ($1::text IS NULL OR position($1 in email) > 0)
         AND ($2::text IS NULL OR position($2 in first_name) > 0)
         AND ($3::text IS NULL OR position($3 in last_name) > 0)
         AND ($4::boolean IS NULL OR is_active = $4)
       ORDER BY email
       LIMIT $5 OFFSET $6`,
      [
        filter.emailContains ?? null,
        filter.firstNameContains ?? null,
        filter.lastNameContains ?? null,
        filter.isActive ?? null,
        filter.recordsPerPage,
        (filter.page - 1) * filter.recordsPerPage,
      ]
    );
    return rows.map(toUser);
  }

  async findBenefit(id: number): Promise<Benefit | null> {
    const rows = await this.query<BenefitRow>(
      'SELECT id, name, description, base_cost FROM benefits WHERE id = $1',
      [id]
    );
    return rows.length > 0 ? toBenefit(rows[0]) : null;
  }

  async listBenefits(): Promise<Benefit[]> {
    const rows = await this.query<BenefitRow>('SELECT id, name, description, base_cost FROM benefits ORDER BY id');
    return rows.map(toBenefit);
  }

  async listBenefitAssignments(employeeId: number): Promise<BenefitAssignment[]> {
    const rows = await this.query<AssignmentRow>(
      `SELECT eb.id, eb.employee_id, eb.benefit_id, eb.cost_override,
              b.name AS benefit_name, b.description AS benefit_description, b.base_cost
       FROM employee_benefits eb
       JOIN benefits b ON b.id = eb.benefit_id
       WHERE eb.employee_id = $1
       ORDER BY eb.id`,
      [employeeId]
    );
    return rows.map((row) => ({
      link: toEmployeeBenefit(row),
      benefit: {
        id: row.benefit_id,
        name: row.benefit_name,
        description: row.benefit_description,
        baseCost: Number(row.base_cost),
      },
    }));
  }

  async apply(changes: readonly ChangeEntry[]): Promise<void> {
    const client = await this.begin();
    if (this.closed) {
      throw new SessionClosedError();
    }
    const written: WriteLog = { assignIds: [], employeeIds: new Map() };

    try {
      for (const change of changes) {
        await writeChange(client, change, written);
      }
      await client.query('COMMIT');
    } catch (error) {
      await this.rollback(client);
      throw translateWriteError(error);
    } finally {
      this.transaction = null;
    }

    for (const assign of written.assignIds) {
      assign();
    }
  }

  async release(): Promise<void> {
    this.closed = true;
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = null;

    if (this.transaction) {
      this.transaction = null;
      await this.rollback(client);
    }
    client.release();
  }

  private async query<R extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<R[]> {
    const client = await this.begin();
    if (this.closed) {
      throw new SessionClosedError();
    }
    const result = await client.query<R>(sql, params);
    return result.rows;
  }

  private begin(): Promise<SessionClient> {
    if (this.closed) {
      return Promise.reject(new SessionClosedError());
    }
    if (!this.transaction) {
      this.transaction = this.startTransaction();
    }
    return this.transaction;
  }

  private async startTransaction(): Promise<SessionClient> {
    const client = this.client ?? (await this.checkout());
    await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ');
    return client;
  }

  private async checkout(): Promise<SessionClient> {
    const client = await this.pool.connect();
    // released while connect was in flight
    if (this.closed) {
      client.release();
      throw new SessionClosedError();
    }
    this.client = client;
    return client;
  }

  private async rollback(client: SessionClient): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (err) {
      logger.warn({ err }, 'Rollback failed');
    }
  }
}

export function pgSessionOpener(pool: ClientPool): SessionOpener {
  return () => new PgSession(pool);
}

/** What a commit wrote so far: id assignments to run once it succeeds, new employee ids. */
interface WriteLog {
  assignIds: Array<() => void>;
  employeeIds: Map<Employee, number>;
}

async function writeChange(client: SessionClient, change: ChangeEntry, written: WriteLog): Promise<void> {
  switch (change.kind) {
    case 'employee': {
      const e = change.entity;
      if (change.state === 'deleted') {
        await client.query('DELETE FROM employees WHERE id = $1', [e.id]);
        return;
      }
      const values = [
        e.firstName, e.lastName, e.socialSecurityNumber, e.address1, e.address2, e.city, e.state,
        e.zipCode, e.phoneNumber, e.email, e.createdBy, e.createdAt, e.modifiedBy, e.modifiedAt,
      ];
      if (change.state === 'added') {
        const result = await client.query<{ id: number }>(
          `INSERT INTO employees (first_name, last_name, social_security_number, address1, address2, city, state,
             zip_code, phone_number, email, created_by, created_at, modified_by, modified_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
           RETURNING id`,
          values
        );
        const id = result.rows[0].id;
        written.employeeIds.set(e, id);
        written.assignIds.push(() => {
          e.id = id;
        });
        return;
      }
      await requireUpdated(
        client.query(
          `UPDATE employees SET first_name = $1, last_name = $2, social_security_number = $3, address1 = $4,
             address2 = $5, city = $6, state = $7, zip_code = $8, phone_number = $9, email = $10,
             created_by = $11, created_at = $12, modified_by = $13, modified_at = $14
           WHERE id = $15`,
          [...values, e.id]
        ),
        'employees',
        e.id
      );
      return;
    }
    case 'user': {
      const u = change.entity;
      if (change.state === 'deleted') {
        await client.query('DELETE FROM users WHERE id = $1', [u.id]);
        return;
      }
      const values = [
        u.id, u.email, u.userName, u.firstName, u.lastName, u.profilePicture, u.isActive, u.lastLoginDate,
        u.createdBy, u.createdAt, u.modifiedBy, u.modifiedAt,
      ];
      if (change.state === 'added') {
        await client.query(
          `INSERT INTO users (id, email, user_name, first_name, last_name, profile_picture, is_active,
             last_login_date, created_by, created_at, modified_by, modified_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
          values
        );
        return;
      }
      await requireUpdated(
        client.query(
          `UPDATE users SET email = $2, user_name = $3, first_name = $4, last_name = $5, profile_picture = $6,
             is_active = $7, last_login_date = $8, created_by = $9, created_at = $10, modified_by = $11,
             modified_at = $12
           WHERE id = $1`,
          values
        ),
        'users',
        u.id
      );
      return;
    }
    case 'benefit': {
      const b = change.entity;
      if (change.state === 'deleted') {
        await client.query('DELETE FROM benefits WHERE id = $1', [b.id]);
        return;
      }
      if (change.state === 'added') {
        const result = await client.query<{ id: number }>(
          'INSERT INTO benefits (name, description, base_cost) VALUES ($1, $2, $3) RETURNING id',
          [b.name, b.description, b.baseCost]
        );
        const id = result.rows[0].id;
        written.assignIds.push(() => {
          b.id = id;
        });
        return;
      }
      await requireUpdated(
        client.query('UPDATE benefits SET name = $1, description = $2, base_cost = $3 WHERE id = $4', [
          b.name,
          b.description,
          b.baseCost,
          b.id,
        ]),
        'benefits',
        b.id
      );
      return;
    }
    case 'employeeBenefit': {
      const link = change.entity;
      if (change.state === 'deleted') {
        await client.query('DELETE FROM employee_benefits WHERE id = $1', [link.id]);
        return;
      }
      if (change.state === 'added') {
        const employeeId = resolveEmployeeId(link, written.employeeIds);
        const result = await client.query<{ id: number }>(
          `INSERT INTO employee_benefits (employee_id, benefit_id, cost_override)
           VALUES ($1, $2, $3) RETURNING id`,
          [employeeId, link.benefitId, link.costOverride]
        );
        const id = result.rows[0].id;
        written.assignIds.push(() => {
          link.id = id;
          link.employeeId = employeeId;
          delete link.employee;
        });
        return;
      }
      await requireUpdated(
        client.query(
          'UPDATE employee_benefits SET employee_id = $1, benefit_id = $2, cost_override = $3 WHERE id = $4',
          [link.employeeId, link.benefitId, link.costOverride, link.id]
        ),
        'employee_benefits',
        link.id
      );
      return;
    }
  }
}

async function requireUpdated(
  update: Promise<{ rowCount: number | null }>,
  table: string,
  id: number | string
): Promise<void> {
  const result = await update;
  if (result.rowCount === 0) {
    throw new Error(`Row to update does not exist (${table} ${id})`);
  }
}

function translateWriteError(error: unknown): Error {
  if (error && typeof error === 'object' && 'code' in error) {
    if (error.code === UNIQUE_VIOLATION || error.code === FOREIGN_KEY_VIOLATION) {
      const constraint =
        'constraint' in error && typeof error.constraint === 'string' ? error.constraint : 'unknown';
      return new ConstraintViolationError(constraint, undefined, { cause: error });
    }
  }
  return new CommitFaultError('Commit failed', { cause: error });
}

function toEmployee(row: EmployeeRow): Employee {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    socialSecurityNumber: row.social_security_number,
    address1: row.address1,
    address2: row.address2,
    city: row.city,
    state: row.state,
    zipCode: row.zip_code,
    phoneNumber: row.phone_number,
    email: row.email,
    ...toAudit(row),
  };
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    userName: row.user_name,
    firstName: row.first_name,
    lastName: row.last_name,
    profilePicture: row.profile_picture,
    isActive: row.is_active,
    lastLoginDate: row.last_login_date,
    ...toAudit(row),
  };
}

function toBenefit(row: BenefitRow): Benefit {
  return { id: row.id, name: row.name, description: row.description, baseCost: Number(row.base_cost) };
}

function toEmployeeBenefit(row: EmployeeBenefitRow): EmployeeBenefit {
  return {
    id: row.id,
    employeeId: row.employee_id,
    benefitId: row.benefit_id,
    costOverride: row.cost_override === null ? null : Number(row.cost_override),
  };
}

function toAudit(row: AuditRow) {
  return {
    createdBy: row.created_by,
    createdAt: row.created_at,
    modifiedBy: row.modified_by,
    modifiedAt: row.modified_at,
  };
}
