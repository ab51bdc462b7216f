import { AuditAction, AuditEntityType, Clock, Ids, isAuditEntityType, systemClock, UserId } from '../domain-types';
import { WorkflowError } from '../domain/workflow-error';
import { AuditFilter, AuditLogEntry, WorkflowStore, WorkflowTx } from './workflow-store';

export type AuditMode = 'best-effort' | 'strict';

export interface AuditDraft {
  actorId: UserId | null;
  action: AuditAction;
  entityType: AuditEntityType | null;
  entityId: string | null;
  details?: Record<string, unknown>;
}

export const DEFAULT_AUDIT_LIST_LIMIT = 100;
export const MAX_AUDIT_LIST_LIMIT = 500;

/**
 * Append-only audit trail.
 *
 * `recordTransition` is what state transitions call: the entry is written in a
 * savepoint of the caller's transaction. In best-effort mode a failed write is
 * logged and dropped, and the transition still commits. In strict mode it
 * propagates and the whole transition rolls back.
 */
export class AuditRecorder {
  private readonly mode: AuditMode;
  private readonly clock: Clock;

  constructor(private store: WorkflowStore, options: { mode?: AuditMode; clock?: Clock } = {}) {
    this.mode = options.mode ?? 'best-effort';
    this.clock = options.clock ?? systemClock;
  }

  get auditMode(): AuditMode {
    return this.mode;
  }

  async record(draft: AuditDraft): Promise<AuditLogEntry> {
    return this.store.transaction((tx) => this.recordWithin(tx, draft));
  }

  async recordWithin(tx: WorkflowTx, draft: AuditDraft): Promise<AuditLogEntry> {
    if (!draft.actorId) {
      throw WorkflowError.validation('audit_actor_required', 'Audit entry requires an actor');
    }
    if (!draft.entityType || !isAuditEntityType(draft.entityType)) {
      throw WorkflowError.validation('audit_entity_type_required', 'Audit entry requires an entity type');
    }
    const actor = await tx.findUser(draft.actorId);
    if (!actor) {
      throw WorkflowError.validation('audit_actor_unknown', `Audit actor ${draft.actorId} does not exist`, {
        actorId: draft.actorId,
      });
    }

    const entry: AuditLogEntry = {
      auditEntryId: Ids.auditEntry(),
      actorId: draft.actorId,
      action: draft.action,
      entityType: draft.entityType,
      entityId: draft.entityId,
      details: draft.details ?? {},
      createdAt: this.clock(),
    };
    await tx.insertAuditEntry(entry);
    return entry;
  }

  async recordTransition(tx: WorkflowTx, draft: AuditDraft): Promise<AuditLogEntry | null> {
    try {
      return await tx.savepoint('audit_entry', () => this.recordWithin(tx, draft));
    } catch (error) {
      if (this.mode === 'strict') {
        throw error;
      }
      console.error('[Audit] Failed to record audit entry', {
        action: draft.action,
        entityType: draft.entityType,
        entityId: draft.entityId,
        actorId: draft.actorId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async listEntries(filter: Partial<AuditFilter> = {}): Promise<AuditLogEntry[]> {
    const limit = Math.min(Math.max(filter.limit ?? DEFAULT_AUDIT_LIST_LIMIT, 1), MAX_AUDIT_LIST_LIMIT);
    return this.store.listAuditEntries({
      entityType: filter.entityType,
      entityId: filter.entityId,
      actorId: filter.actorId,
      limit,
    });
  }
}
