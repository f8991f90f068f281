/**
 * Auditable capability.
 *
 * The fields are readonly on every entity type so request handlers cannot
 * assign them; the audit interceptor writes them through {@link AuditStamp}.
 */
export interface Auditable {
  readonly createdBy: string | null;
  readonly createdAt: Date | null;
  readonly modifiedBy: string | null;
  readonly modifiedAt: Date | null;
}

/** Writable view of the audit fields, used only by the audit interceptor. */
export type AuditStamp = {
  -readonly [K in keyof Auditable]: Auditable[K];
};

export function isAuditable(entity: object): entity is Auditable {
  return (
    'createdBy' in entity &&
    'createdAt' in entity &&
    'modifiedBy' in entity &&
    'modifiedAt' in entity
  );
}

export function emptyAudit(): Auditable {
  return {
    createdBy: null,
    createdAt: null,
    modifiedBy: null,
    modifiedAt: null,
  };
}

/**
 * Audit fields as they appear in API responses: ISO-8601 UTC, omitted while unset.
 */
export interface AuditView {
  createdBy?: string;
  createdAt?: string;
  modifiedBy?: string;
  modifiedAt?: string;
}

export function toAuditView(entity: Auditable): AuditView {
  return {
    createdBy: entity.createdBy ?? undefined,
    createdAt: entity.createdAt?.toISOString(),
    modifiedBy: entity.modifiedBy ?? undefined,
    modifiedAt: entity.modifiedAt?.toISOString(),
  };
}
