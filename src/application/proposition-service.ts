import { Clock, PropositionId, systemClock, UserId } from '../domain-types';
import { applyDistribution, checkDeclarationInvariant } from '../domain/declaration/declaration-logic';
import { canBeRedistributed, eligibilityReasons } from '../domain/declaration/eligibility';
import {
  applyFacilityRequest,
  checkPropositionInvariant,
  MedicineProposition,
} from '../domain/proposition/proposition-logic';
import { WorkflowError } from '../domain/workflow-error';
import { requireActor } from './actor-guard';
import { AuditRecorder } from './audit-recorder';
import { normalizePage, Page } from './declaration-service';
import { PropositionListing, WorkflowStore } from './workflow-store';

export interface PropositionQuery extends Page {
  city?: string;
}

function propositionNotFound(propositionId: string): WorkflowError {
  return WorkflowError.notFound('proposition_not_found', `Proposition ${propositionId} not found`);
}

export class PropositionService {
  private readonly clock: Clock;

  constructor(private store: WorkflowStore, private audit: AuditRecorder, options: { clock?: Clock } = {}) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * A health facility claims an available proposition. The proposition and its
   * declaration both move to DISTRIBUTED in the same transaction.
   */
  async requestProposition(facilityId: UserId, propositionId: PropositionId): Promise<PropositionListing> {
    return this.store.transaction(async (tx) => {
      await requireActor(tx, facilityId, 'HEALTH_FACILITY');

      const proposition = await tx.lockProposition(propositionId);
      if (!proposition) {
        throw propositionNotFound(propositionId);
      }
      const declaration = await tx.lockDeclaration(proposition.declarationId);
      if (!declaration) {
        throw new Error(`PROPOSITION_DECLARATION_MISSING:${propositionId}`);
      }

      const now = this.clock();
      const requested = applyFacilityRequest(proposition, { facilityId, at: now });

      if (!canBeRedistributed(declaration, now)) {
        const reasons = eligibilityReasons(declaration, now);
        throw new WorkflowError('NOT_ELIGIBLE', 'not_eligible', 'Medicine is not eligible for redistribution', {
          propositionId,
          declarationId: declaration.declarationId,
          reasons,
        });
      }
      const distributed = applyDistribution(declaration, now);

      checkPropositionInvariant(requested);
      checkDeclarationInvariant(distributed);

      if (!(await tx.updateProposition(requested, proposition.status))) {
        throw new Error(`PROPOSITION_WRITE_CONFLICT:${propositionId}`);
      }
      if (!(await tx.updateDeclaration(distributed, declaration.status))) {
        throw new Error(`DECLARATION_WRITE_CONFLICT:${declaration.declarationId}`);
      }

      await this.audit.recordTransition(tx, {
        actorId: facilityId,
        action: 'MEDICINE_DISTRIBUTED',
        entityType: 'PROPOSITION',
        entityId: propositionId,
        details: {
          declarationId: declaration.declarationId,
          fromStatus: proposition.status,
          toStatus: requested.status,
          declarationStatus: distributed.status,
        },
      });

      const pharmacy = distributed.pharmacyId ? await tx.findPharmacy(distributed.pharmacyId) : null;
      return { proposition: requested, declaration: distributed, pharmacy };
    });
  }

  async listAvailablePropositions(query: PropositionQuery = {}): Promise<PropositionListing[]> {
    const city = query.city?.trim();
    return this.store.listAvailablePropositions({
      city: city ? city : undefined,
      declarationStatuses: ['APPROVED_FOR_REDISTRIBUTION', 'RESTRICTED_USE'],
      expiringAfter: this.clock(),
      ...normalizePage(query),
    });
  }

  /**
   * Regulatory rejection leaves the eagerly created proposition AVAILABLE
   * until the sweeper expires it; it can never be requested, so it is hidden.
   */
  async getProposition(propositionId: PropositionId): Promise<PropositionListing> {
    const listing = await this.store.findProposition(propositionId);
    if (!listing || listing.declaration.status === 'REJECTED_REGULATORY') {
      throw propositionNotFound(propositionId);
    }
    return listing;
  }

  async findByDeclaration(declarationId: MedicineProposition['declarationId']): Promise<MedicineProposition | null> {
    return this.store.findPropositionByDeclaration(declarationId);
  }
}
