import {
  AuditAction,
  Clock,
  DeclarationId,
  Ids,
  isRegulatoryDecision,
  MedicineStatus,
  REGULATORY_DECISIONS,
  RegulatoryDecision,
  systemClock,
  UserId,
  UserRole,
} from '../domain-types';
import {
  applyCancellation,
  applyPharmacyVerification,
  applyRegulatoryDecision,
  checkDeclarationInvariant,
  createDeclaration,
  DeclarationOperation,
  invalidStatusError,
} from '../domain/declaration/declaration-logic';
import { MedicineDeclaration } from '../domain/declaration/declaration-types';
import { validateDeclarationInput } from '../domain/declaration/declaration-validators';
import { checkEligibility, EligibilityReport } from '../domain/declaration/eligibility';
import {
  checkPropositionInvariant,
  createProposition,
  MedicineProposition,
} from '../domain/proposition/proposition-logic';
import { WorkflowError } from '../domain/workflow-error';
import { requireActor } from './actor-guard';
import { AuditRecorder } from './audit-recorder';
import { WorkflowStore, WorkflowTx } from './workflow-store';

export const NOTES_MAX_LENGTH = 2000;
export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 200;

export interface Page {
  limit?: number;
  offset?: number;
}

export interface Viewer {
  userId: UserId;
  role: UserRole;
}

export interface VerificationResult {
  declaration: MedicineDeclaration;
  proposition: MedicineProposition | null;
}

export interface EligibilityCheck extends EligibilityReport {
  declarationId: DeclarationId;
  status: MedicineStatus;
}

const DECISION_AUDIT_ACTIONS: Record<RegulatoryDecision, AuditAction> = {
  APPROVED: 'MEDICINE_APPROVED',
  RESTRICTED: 'MEDICINE_RESTRICTED',
  REJECTED: 'MEDICINE_REJECTED_REGULATORY',
};

export function normalizePage(page: Page = {}): { limit: number; offset: number } {
  const limit = Math.min(Math.max(Math.trunc(page.limit ?? DEFAULT_PAGE_SIZE), 1), MAX_PAGE_SIZE);
  const offset = Math.max(Math.trunc(page.offset ?? 0), 0);
  return { limit, offset };
}

function normalizeNotes(notes: string | null | undefined): string | null {
  if (notes === null || notes === undefined) return null;
  const trimmed = notes.trim();
  if (trimmed.length === 0) return null;
  if (trimmed.length > NOTES_MAX_LENGTH) {
    throw WorkflowError.validation('string_too_long', `notes must be at most ${NOTES_MAX_LENGTH} characters`, {
      field: 'notes',
      maxLength: NOTES_MAX_LENGTH,
    });
  }
  return trimmed;
}

export function declarationNotFound(declarationId: string): WorkflowError {
  return WorkflowError.notFound('declaration_not_found', `Declaration ${declarationId} not found`);
}

/**
 * Citizen, pharmacist and regulatory-agent operations on medicine declarations.
 * Each mutation is one transaction: actor check, row lock, guarded transition,
 * compare-and-set write, audit entry.
 */
export class DeclarationService {
  private readonly clock: Clock;

  constructor(private store: WorkflowStore, private audit: AuditRecorder, options: { clock?: Clock } = {}) {
    this.clock = options.clock ?? systemClock;
  }

  async declare(citizenId: UserId, input: unknown): Promise<MedicineDeclaration> {
    const now = this.clock();
    const draft = validateDeclarationInput(input, now);

    return this.store.transaction(async (tx) => {
      await requireActor(tx, citizenId, 'CITIZEN');

      if (draft.pharmacyId) {
        const pharmacy = await tx.findPharmacy(draft.pharmacyId);
        if (!pharmacy) {
          throw WorkflowError.notFound('pharmacy_not_found', `Pharmacy ${draft.pharmacyId} not found`);
        }
      }

      const declaration = createDeclaration({
        declarationId: Ids.declaration(),
        declarationCode: Ids.declarationCode(now),
        citizenId,
        draft,
        at: now,
      });
      checkDeclarationInvariant(declaration);
      await tx.insertDeclaration(declaration);

      await this.audit.recordTransition(tx, {
        actorId: citizenId,
        action: 'MEDICINE_DECLARED',
        entityType: 'MEDICINE',
        entityId: declaration.declarationId,
        details: {
          declarationCode: declaration.declarationCode,
          name: declaration.name,
          quantity: declaration.quantity,
          status: declaration.status,
        },
      });

      return declaration;
    });
  }

  async verify(
    pharmacistId: UserId,
    declarationId: DeclarationId,
    input: { approved: boolean; notes?: string | null }
  ): Promise<VerificationResult> {
    const notes = normalizeNotes(input.notes);

    return this.store.transaction(async (tx) => {
      await requireActor(tx, pharmacistId, 'PHARMACIST');
      const current = await this.lockDeclaration(tx, declarationId);
      const now = this.clock();

      const next = applyPharmacyVerification(current, {
        approved: input.approved,
        notes,
        pharmacistId,
        at: now,
      });
      await this.writeTransition(tx, current, next, 'verify');

      let proposition: MedicineProposition | null = null;
      if (next.status === 'PHARMACY_VERIFIED') {
        proposition = createProposition(next, Ids.proposition(), now);
        checkPropositionInvariant(proposition);
        await tx.insertProposition(proposition);
      }

      await this.audit.recordTransition(tx, {
        actorId: pharmacistId,
        action: input.approved ? 'MEDICINE_VERIFIED' : 'MEDICINE_REJECTED',
        entityType: 'MEDICINE',
        entityId: next.declarationId,
        details: {
          fromStatus: current.status,
          toStatus: next.status,
          notes,
          propositionId: proposition?.propositionId ?? null,
        },
      });

      return { declaration: next, proposition };
    });
  }

  async validate(
    agentId: UserId,
    declarationId: DeclarationId,
    input: { decision?: unknown; notes?: string | null }
  ): Promise<MedicineDeclaration> {
    const decision = input.decision;
    if (!isRegulatoryDecision(decision)) {
      throw new WorkflowError(
        'INVALID_DECISION',
        'invalid_decision',
        `Decision must be one of ${REGULATORY_DECISIONS.join(', ')}`,
        { decision: decision === undefined ? null : String(decision), allowed: REGULATORY_DECISIONS }
      );
    }
    const notes = normalizeNotes(input.notes);

    return this.store.transaction(async (tx) => {
      await requireActor(tx, agentId, 'REGULATORY_AGENT');
      const current = await this.lockDeclaration(tx, declarationId);

      const next = applyRegulatoryDecision(current, { decision, notes, agentId, at: this.clock() });
      await this.writeTransition(tx, current, next, 'validate');

      await this.audit.recordTransition(tx, {
        actorId: agentId,
        action: DECISION_AUDIT_ACTIONS[decision],
        entityType: 'MEDICINE',
        entityId: next.declarationId,
        details: { fromStatus: current.status, toStatus: next.status, decision, notes },
      });

      return next;
    });
  }

  async cancel(citizenId: UserId, declarationId: DeclarationId): Promise<MedicineDeclaration> {
    return this.store.transaction(async (tx) => {
      await requireActor(tx, citizenId, 'CITIZEN');
      const current = await this.lockDeclaration(tx, declarationId);

      const next = applyCancellation(current, { citizenId, at: this.clock() });
      await this.writeTransition(tx, current, next, 'cancel');

      await this.audit.recordTransition(tx, {
        actorId: citizenId,
        action: 'MEDICINE_CANCELLED',
        entityType: 'MEDICINE',
        entityId: next.declarationId,
        details: { fromStatus: current.status, toStatus: next.status },
      });

      return next;
    });
  }

  async checkEligibility(declarationId: DeclarationId): Promise<EligibilityCheck> {
    const declaration = await this.store.findDeclaration(declarationId);
    if (!declaration) {
      throw declarationNotFound(declarationId);
    }
    return {
      declarationId,
      status: declaration.status,
      ...checkEligibility(declaration, this.clock()),
    };
  }

  async getDeclaration(viewer: Viewer, declarationId: DeclarationId): Promise<MedicineDeclaration> {
    const declaration = await this.store.findDeclaration(declarationId);
    if (!declaration) {
      throw declarationNotFound(declarationId);
    }
    if (viewer.role === 'CITIZEN' && declaration.citizenId !== viewer.userId) {
      throw WorkflowError.forbidden('not_declaration_owner', 'Citizens can only view their own declarations', {
        declarationId,
      });
    }
    return declaration;
  }

  async listMyDeclarations(citizenId: UserId, page?: Page): Promise<MedicineDeclaration[]> {
    await requireActor(this.store, citizenId, 'CITIZEN');
    return this.store.listDeclarations({ citizenId, ...normalizePage(page) });
  }

  async listPendingPharmacyReview(page?: Page): Promise<MedicineDeclaration[]> {
    return this.store.listDeclarations({ status: 'SUBMITTED', ...normalizePage(page) });
  }

  async listPendingRegulatoryReview(page?: Page): Promise<MedicineDeclaration[]> {
    return this.store.listDeclarations({ status: 'PHARMACY_VERIFIED', ...normalizePage(page) });
  }

  private async lockDeclaration(tx: WorkflowTx, declarationId: DeclarationId): Promise<MedicineDeclaration> {
    const declaration = await tx.lockDeclaration(declarationId);
    if (!declaration) {
      throw declarationNotFound(declarationId);
    }
    return declaration;
  }

  private async writeTransition(
    tx: WorkflowTx,
    current: MedicineDeclaration,
    next: MedicineDeclaration,
    operation: DeclarationOperation
  ): Promise<void> {
    checkDeclarationInvariant(next);
    const written = await tx.updateDeclaration(next, current.status);
    if (!written) {
      // Lost the compare-and-set: report against whatever status won.
      const latest = await this.lockDeclaration(tx, current.declarationId);
      throw invalidStatusError(latest, operation, current.status);
    }
  }
}
