import type { Clock } from '../../domain/clock.js';
import { CommitFaultError, ConstraintViolationError, SessionClosedError } from '../errors.js';
import { AuthorResolver, withAuditStamping } from './auditInterceptor.js';
import { ChangeEntry, CommitHandler, EntityKind, EntityMap, changeEntry } from './changes.js';
import type { ReadStore, SessionOpener, StorageSession } from './store.js';

interface Tracked {
  readonly change: ChangeEntry;
  readonly snapshot: Map<string, unknown>;
}

/**
 * Request-scoped transactional boundary.
 *
 * Handlers read through `reader`, register new entities with `add`, start
 * change detection on loaded entities with `track`, and mark removals with
 * `remove`. `commit` turns all of it into one change set and applies it
 * through the commit pipeline (audit stamping, then storage).
 */
export class UnitOfWork {
  private added: ChangeEntry[] = [];
  private removed: ChangeEntry[] = [];
  private tracked: Tracked[] = [];

  constructor(
    private readonly session: StorageSession,
    private readonly commitHandler: CommitHandler
  ) {}

  get reader(): ReadStore {
    return this.session;
  }

  add<K extends EntityKind>(kind: K, entity: EntityMap[K]): EntityMap[K] {
    this.added.push(changeEntry(kind, 'added', entity));
    return entity;
  }

  /**
   * Start change detection for an entity loaded from `reader`. At commit the
   * entity becomes a `modified` entry only if one of its fields differs from
   * what it was at this call.
   */
  track<K extends EntityKind>(kind: K, entity: EntityMap[K]): EntityMap[K] {
    if (!this.tracked.some((t) => t.change.entity === entity)) {
      this.tracked.push({ change: changeEntry(kind, 'modified', entity), snapshot: snapshotOf(entity) });
    }
    return entity;
  }

  remove<K extends EntityKind>(kind: K, entity: EntityMap[K]): void {
    this.tracked = this.tracked.filter((t) => t.change.entity !== entity);
    this.added = this.added.filter((c) => c.entity !== entity);
    this.removed.push(changeEntry(kind, 'deleted', entity));
  }

  /** Entries the next commit would apply, in apply order. */
  pendingChanges(): ChangeEntry[] {
    const modified = this.tracked.filter(hasChanged).map((t) => t.change);
    // Deletes first so a replaced row never collides with its successor
    return [...this.removed, ...modified, ...this.added];
  }

  async commit(): Promise<void> {
    const changes = this.pendingChanges();
    if (changes.length === 0) {
      return;
    }

    try {
      await this.commitHandler(changes);
    } catch (error) {
      if (
        error instanceof ConstraintViolationError ||
        error instanceof CommitFaultError ||
        error instanceof SessionClosedError
      ) {
        throw error;
      }
      throw new CommitFaultError('Commit failed', { cause: error });
    }

    const newlyAdded = this.added.map((c) => changeEntry(c.kind, 'modified', c.entity));
    this.added = [];
    this.removed = [];
    // Re-baseline so a later commit only sees later edits
    this.tracked = [...this.tracked.map((t) => t.change), ...newlyAdded].map((change) => ({
      change,
      snapshot: snapshotOf(change.entity),
    }));
  }

  release(): Promise<void> {
    return this.session.release();
  }
}

function snapshotOf(entity: object): Map<string, unknown> {
  return new Map<string, unknown>(Object.entries(entity));
}

function hasChanged(t: Tracked): boolean {
  const current = snapshotOf(t.change.entity);
  if (current.size !== t.snapshot.size) {
    return true;
  }
  for (const [key, value] of current) {
    if (!sameValue(value, t.snapshot.get(key))) {
      return true;
    }
  }
  return false;
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return Object.is(a, b);
}

export interface UnitOfWorkFactoryOptions {
  openSession: SessionOpener;
  clock: Clock;
  resolveAuthor?: AuthorResolver;
}

/**
 * Builds request-scoped units of work whose commit path is
 * audit stamping, then `session.apply`.
 */
export class UnitOfWorkFactory {
  constructor(private readonly options: UnitOfWorkFactoryOptions) {}

  begin(): UnitOfWork {
    const session = this.options.openSession();
    const commit = withAuditStamping((changes) => session.apply(changes), {
      clock: this.options.clock,
      resolveAuthor: this.options.resolveAuthor,
    });
    return new UnitOfWork(session, commit);
  }
}
