import { DeclarationId, isPropositionStatus, PropositionId, PropositionStatus, UserId } from '../../domain-types';
import { hasProposition } from '../declaration/declaration-logic';
import { MedicineDeclaration } from '../declaration/declaration-types';
import { WorkflowError } from '../workflow-error';

export interface MedicineProposition {
  propositionId: PropositionId;
  declarationId: DeclarationId;
  status: PropositionStatus;
  isActive: boolean;
  expiredAt: Date | null;
  requestingFacilityId: UserId | null;
  requestedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Public listing for a declaration that passed pharmacy verification.
 * Created eagerly, in the verifying transaction.
 */
export function createProposition(
  declaration: Pick<MedicineDeclaration, 'declarationId' | 'status'>,
  propositionId: PropositionId,
  at: Date
): MedicineProposition {
  if (!hasProposition(declaration.status)) {
    throw new Error(`PROPOSITION_REQUIRES_VERIFIED_DECLARATION:${declaration.status}`);
  }

  return {
    propositionId,
    declarationId: declaration.declarationId,
    status: 'AVAILABLE',
    isActive: true,
    expiredAt: null,
    requestingFacilityId: null,
    requestedAt: null,
    createdAt: at,
    updatedAt: at,
  };
}

function assertAvailable(proposition: MedicineProposition, operation: string): void {
  if (proposition.status !== 'AVAILABLE' || !proposition.isActive) {
    throw new WorkflowError(
      'INVALID_STATUS',
      'invalid_status',
      `Cannot ${operation} proposition in ${proposition.status} status${proposition.isActive ? '' : ' (inactive)'}`,
      {
        propositionId: proposition.propositionId,
        currentStatus: proposition.status,
        isActive: proposition.isActive,
        requiredStatus: 'AVAILABLE',
      }
    );
  }
}

export function applyFacilityRequest(
  proposition: MedicineProposition,
  request: { facilityId: UserId; at: Date }
): MedicineProposition {
  assertAvailable(proposition, 'request');

  return {
    ...proposition,
    status: 'DISTRIBUTED',
    isActive: false,
    requestingFacilityId: request.facilityId,
    requestedAt: request.at,
    updatedAt: request.at,
  };
}

export function applyExpiration(proposition: MedicineProposition, at: Date): MedicineProposition {
  assertAvailable(proposition, 'expire');

  return {
    ...proposition,
    status: 'EXPIRED',
    isActive: false,
    expiredAt: at,
    updatedAt: at,
  };
}

// Sweep criterion: strictly past the medicine's expiration instant.
export function isExpirable(
  proposition: Pick<MedicineProposition, 'status' | 'isActive'>,
  declaration: Pick<MedicineDeclaration, 'expirationDate'>,
  now: Date
): boolean {
  return (
    proposition.status === 'AVAILABLE' &&
    proposition.isActive &&
    declaration.expirationDate.getTime() < now.getTime()
  );
}

export function checkPropositionInvariant(proposition: MedicineProposition): void {
  if (!isPropositionStatus(proposition.status)) {
    throw new Error(`PROPOSITION_STATUS_INVARIANT_VIOLATION:${String(proposition.status)}`);
  }
  if (proposition.isActive !== (proposition.status === 'AVAILABLE')) {
    throw new Error('PROPOSITION_ACTIVE_FLAG_INVARIANT_VIOLATION');
  }
  if ((proposition.expiredAt !== null) !== (proposition.status === 'EXPIRED')) {
    throw new Error('PROPOSITION_EXPIRED_AT_INVARIANT_VIOLATION');
  }
  const requested = proposition.requestingFacilityId !== null && proposition.requestedAt !== null;
  const notRequested = proposition.requestingFacilityId === null && proposition.requestedAt === null;
  if (proposition.status === 'DISTRIBUTED' ? !requested : !notRequested) {
    throw new Error('PROPOSITION_REQUEST_INVARIANT_VIOLATION');
  }
}
