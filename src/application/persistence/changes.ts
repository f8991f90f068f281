import type { Employee } from '../../domain/employees/employee.js';
import type { Benefit, EmployeeBenefit } from '../../domain/employees/benefit.js';
import type { User } from '../../domain/users/user.js';

export interface EntityMap {
  employee: Employee;
  user: User;
  benefit: Benefit;
  employeeBenefit: EmployeeBenefit;
}

export type EntityKind = keyof EntityMap;

export type EntryState = 'added' | 'modified' | 'deleted';

/**
 * One pending write. The entity is the live object the caller holds, so
 * ids assigned on insert and audit stamps are visible to it after commit.
 */
export type ChangeEntry = {
  [K in EntityKind]: {
    readonly kind: K;
    readonly state: EntryState;
    readonly entity: EntityMap[K];
  };
}[EntityKind];

/**
 * Applies a change set atomically: either every entry is written or none is.
 */
export type CommitHandler = (changes: readonly ChangeEntry[]) => Promise<void>;

type EntryFactories = {
  [K in EntityKind]: (state: EntryState, entity: EntityMap[K]) => ChangeEntry;
};

const entryFactories: EntryFactories = {
  employee: (state, entity) => ({ kind: 'employee', state, entity }),
  user: (state, entity) => ({ kind: 'user', state, entity }),
  benefit: (state, entity) => ({ kind: 'benefit', state, entity }),
  employeeBenefit: (state, entity) => ({ kind: 'employeeBenefit', state, entity }),
};

export function changeEntry<K extends EntityKind>(
  kind: K,
  state: EntryState,
  entity: EntityMap[K]
): ChangeEntry {
  return entryFactories[kind](state, entity);
}
