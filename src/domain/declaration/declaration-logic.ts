import {
  assertNever,
  DeclarationId,
  isMedicineStatus,
  MEDICINE_STATUSES,
  MedicineStatus,
  RegulatoryDecision,
  UserId,
} from '../../domain-types';
import { WorkflowError } from '../workflow-error';
import {
  DeclarationDraft,
  MedicineDeclaration,
  PharmacyVerification,
  RegulatoryValidation,
} from './declaration-types';
import { isRedistributableStatus } from './eligibility';

export type DeclarationOperation = 'verify' | 'validate' | 'cancel' | 'distribute';

const TRANSITIONS: Record<MedicineStatus, readonly MedicineStatus[]> = {
  SUBMITTED: ['PHARMACY_VERIFIED', 'PHARMACY_REJECTED', 'CANCELLED'],
  PHARMACY_VERIFIED: ['APPROVED_FOR_REDISTRIBUTION', 'RESTRICTED_USE', 'REJECTED_REGULATORY'],
  APPROVED_FOR_REDISTRIBUTION: ['DISTRIBUTED'],
  RESTRICTED_USE: ['DISTRIBUTED'],
  PHARMACY_REJECTED: [],
  REJECTED_REGULATORY: [],
  DISTRIBUTED: [],
  CANCELLED: [],
};

// Status each actor-facing operation must find the declaration in.
const REQUIRED_STATUS: Record<Exclude<DeclarationOperation, 'distribute'>, MedicineStatus> = {
  verify: 'SUBMITTED',
  validate: 'PHARMACY_VERIFIED',
  cancel: 'SUBMITTED',
};

const PHARMACY_REVIEWED: ReadonlySet<MedicineStatus> = new Set<MedicineStatus>([
  'PHARMACY_VERIFIED',
  'PHARMACY_REJECTED',
  'APPROVED_FOR_REDISTRIBUTION',
  'RESTRICTED_USE',
  'REJECTED_REGULATORY',
  'DISTRIBUTED',
]);

const REGULATORY_REVIEWED: ReadonlySet<MedicineStatus> = new Set<MedicineStatus>([
  'APPROVED_FOR_REDISTRIBUTION',
  'RESTRICTED_USE',
  'REJECTED_REGULATORY',
  'DISTRIBUTED',
]);

// Statuses that have (exactly one) proposition attached.
const PROPOSITION_BEARING: ReadonlySet<MedicineStatus> = new Set<MedicineStatus>([
  'PHARMACY_VERIFIED',
  'APPROVED_FOR_REDISTRIBUTION',
  'RESTRICTED_USE',
  'REJECTED_REGULATORY',
  'DISTRIBUTED',
]);

export function canTransition(from: MedicineStatus, to: MedicineStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: MedicineStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function hasProposition(status: MedicineStatus): boolean {
  return PROPOSITION_BEARING.has(status);
}

export function invalidStatusError(
  declaration: Pick<MedicineDeclaration, 'declarationId' | 'status'>,
  operation: DeclarationOperation,
  requiredStatus: MedicineStatus | readonly MedicineStatus[]
): WorkflowError {
  const required = typeof requiredStatus === 'string' ? requiredStatus : requiredStatus.join(' or ');
  return new WorkflowError(
    'INVALID_STATUS',
    'invalid_status',
    `Cannot ${operation} declaration in ${declaration.status} status (requires ${required})`,
    {
      declarationId: declaration.declarationId,
      currentStatus: declaration.status,
      requiredStatus: requiredStatus,
    }
  );
}

function assertRequiredStatus(
  declaration: MedicineDeclaration,
  operation: Exclude<DeclarationOperation, 'distribute'>
): void {
  const required = REQUIRED_STATUS[operation];
  if (declaration.status !== required) {
    throw invalidStatusError(declaration, operation, required);
  }
}

function assertTransition(declaration: MedicineDeclaration, to: MedicineStatus, operation: DeclarationOperation): void {
  if (!canTransition(declaration.status, to)) {
    const sources = MEDICINE_STATUSES.filter((from) => TRANSITIONS[from].includes(to));
    throw invalidStatusError(declaration, operation, sources);
  }
}

export function createDeclaration(params: {
  declarationId: DeclarationId;
  declarationCode: string;
  citizenId: UserId;
  draft: DeclarationDraft;
  at: Date;
}): MedicineDeclaration {
  const { draft, at } = params;
  return {
    declarationId: params.declarationId,
    declarationCode: params.declarationCode,
    name: draft.name,
    authorizationCode: draft.authorizationCode,
    batchNumber: draft.batchNumber,
    expirationDate: draft.expirationDate,
    quantity: draft.quantity,
    isImported: draft.isImported,
    countryOfOrigin: draft.isImported ? draft.countryOfOrigin : null,
    isRecalled: false,
    safetyRating: 100,
    status: 'SUBMITTED',
    citizenId: params.citizenId,
    pharmacyId: draft.pharmacyId,
    pharmacyVerifiedAt: null,
    pharmacyVerifiedBy: null,
    pharmacyNotes: null,
    regulatoryValidatedAt: null,
    regulatoryValidatedBy: null,
    regulatoryNotes: null,
    cancelledAt: null,
    createdAt: at,
    updatedAt: at,
  };
}

export function applyPharmacyVerification(
  declaration: MedicineDeclaration,
  verification: PharmacyVerification
): MedicineDeclaration {
  assertRequiredStatus(declaration, 'verify');
  const status: MedicineStatus = verification.approved ? 'PHARMACY_VERIFIED' : 'PHARMACY_REJECTED';
  assertTransition(declaration, status, 'verify');

  return {
    ...declaration,
    status,
    pharmacyVerifiedAt: verification.at,
    pharmacyVerifiedBy: verification.pharmacistId,
    pharmacyNotes: verification.notes,
    updatedAt: verification.at,
  };
}

export function decisionToStatus(decision: RegulatoryDecision): MedicineStatus {
  switch (decision) {
    case 'APPROVED':
      return 'APPROVED_FOR_REDISTRIBUTION';
    case 'RESTRICTED':
      return 'RESTRICTED_USE';
    case 'REJECTED':
      return 'REJECTED_REGULATORY';
    default:
      return assertNever(decision);
  }
}

export function applyRegulatoryDecision(
  declaration: MedicineDeclaration,
  validation: RegulatoryValidation
): MedicineDeclaration {
  assertRequiredStatus(declaration, 'validate');
  const status = decisionToStatus(validation.decision);
  assertTransition(declaration, status, 'validate');

  return {
    ...declaration,
    status,
    regulatoryValidatedAt: validation.at,
    regulatoryValidatedBy: validation.agentId,
    regulatoryNotes: validation.notes,
    updatedAt: validation.at,
  };
}

export function applyCancellation(
  declaration: MedicineDeclaration,
  cancellation: { citizenId: UserId; at: Date }
): MedicineDeclaration {
  if (declaration.citizenId !== cancellation.citizenId) {
    throw WorkflowError.forbidden('not_declaration_owner', 'Only the declaring citizen can cancel a declaration', {
      declarationId: declaration.declarationId,
    });
  }
  assertRequiredStatus(declaration, 'cancel');
  assertTransition(declaration, 'CANCELLED', 'cancel');

  return {
    ...declaration,
    status: 'CANCELLED',
    cancelledAt: cancellation.at,
    updatedAt: cancellation.at,
  };
}

// Proposition fulfilment: the stock has left the pharmacy.
export function applyDistribution(declaration: MedicineDeclaration, at: Date): MedicineDeclaration {
  if (!isRedistributableStatus(declaration.status)) {
    throw invalidStatusError(declaration, 'distribute', ['APPROVED_FOR_REDISTRIBUTION', 'RESTRICTED_USE']);
  }
  assertTransition(declaration, 'DISTRIBUTED', 'distribute');

  return {
    ...declaration,
    status: 'DISTRIBUTED',
    updatedAt: at,
  };
}

export function checkDeclarationInvariant(declaration: MedicineDeclaration): void {
  if (!isMedicineStatus(declaration.status)) {
    throw new Error(`DECLARATION_STATUS_INVARIANT_VIOLATION:${String(declaration.status)}`);
  }

  const pharmacyReviewed = PHARMACY_REVIEWED.has(declaration.status);
  const pharmacyFieldsSet = declaration.pharmacyVerifiedAt !== null && declaration.pharmacyVerifiedBy !== null;
  const pharmacyFieldsClear = declaration.pharmacyVerifiedAt === null && declaration.pharmacyVerifiedBy === null;
  if (pharmacyReviewed ? !pharmacyFieldsSet : !pharmacyFieldsClear) {
    throw new Error('DECLARATION_PHARMACY_VERIFICATION_INVARIANT_VIOLATION');
  }

  const regulatoryReviewed = REGULATORY_REVIEWED.has(declaration.status);
  const regulatoryFieldsSet = declaration.regulatoryValidatedAt !== null && declaration.regulatoryValidatedBy !== null;
  const regulatoryFieldsClear =
    declaration.regulatoryValidatedAt === null && declaration.regulatoryValidatedBy === null;
  if (regulatoryReviewed ? !regulatoryFieldsSet : !regulatoryFieldsClear) {
    throw new Error('DECLARATION_REGULATORY_VALIDATION_INVARIANT_VIOLATION');
  }

  if (!declaration.isImported && declaration.countryOfOrigin !== null) {
    throw new Error('DECLARATION_COUNTRY_OF_ORIGIN_INVARIANT_VIOLATION');
  }
  if (!Number.isInteger(declaration.quantity) || declaration.quantity < 1) {
    throw new Error('DECLARATION_QUANTITY_INVARIANT_VIOLATION');
  }
  if (!Number.isInteger(declaration.safetyRating) || declaration.safetyRating < 0 || declaration.safetyRating > 100) {
    throw new Error('DECLARATION_SAFETY_RATING_INVARIANT_VIOLATION');
  }
  if ((declaration.status === 'CANCELLED') !== (declaration.cancelledAt !== null)) {
    throw new Error('DECLARATION_CANCELLATION_INVARIANT_VIOLATION');
  }
}
