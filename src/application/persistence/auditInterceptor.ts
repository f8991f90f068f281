import type { Clock } from '../../domain/clock.js';
import { Auditable, AuditStamp, isAuditable } from '../../domain/audit.js';
import type { CommitHandler } from './changes.js';

/** Author recorded when no caller identity has been resolved. */
export const SYSTEM_AUTHOR = 'system';

export type AuthorResolver = () => string;

// TODO: pass the authenticated caller (AuthRequest.userId) into the unit of
// work and resolve it here instead of the placeholder.
export const systemAuthor: AuthorResolver = () => SYSTEM_AUTHOR;

export interface AuditOptions {
  clock: Clock;
  resolveAuthor?: AuthorResolver;
}

/**
 * Decorates a commit so every auditable entity in the change set is stamped
 * before the write: `added` entries get created*, `modified` entries get
 * modified*. All entities in one commit share a single instant.
 *
 * If the wrapped commit rejects, the stamps are rolled back on the
 * in-memory entities before the error propagates.
 */
export function withAuditStamping(commit: CommitHandler, options: AuditOptions): CommitHandler {
  const resolveAuthor = options.resolveAuthor ?? systemAuthor;

  return async (changes) => {
    const instant = options.clock.now().getTime();
    const author = resolveAuthor();
    const previous: Array<{ target: AuditStamp; fields: Auditable }> = [];

    for (const change of changes) {
      const entity: object = change.entity;
      if (change.state === 'deleted' || !isAuditable(entity)) {
        continue;
      }

      const target: AuditStamp = entity;
      previous.push({ target, fields: snapshotAudit(entity) });

      if (change.state === 'added') {
        target.createdAt = new Date(instant);
        target.createdBy = author;
      } else {
        target.modifiedAt = new Date(instant);
        target.modifiedBy = author;
      }
    }

    try {
      await commit(changes);
    } catch (error) {
      for (const { target, fields } of previous) {
        Object.assign(target, fields);
      }
      throw error;
    }
  };
}

function snapshotAudit(entity: Auditable): Auditable {
  return {
    createdBy: entity.createdBy,
    createdAt: entity.createdAt,
    modifiedBy: entity.modifiedBy,
    modifiedAt: entity.modifiedAt,
  };
}
