import { UserRole } from '../domain-types';
import { MedicineDeclaration } from '../domain/declaration/declaration-types';
import { MedicineProposition } from '../domain/proposition/proposition-logic';
import { AuditLogEntry, PropositionListing } from '../application/workflow-store';
import { AuditEntryResponse, DeclarationResponse, PropositionResponse } from './types';

const REVIEWER_ROLES: ReadonlySet<UserRole> = new Set<UserRole>(['PHARMACIST', 'REGULATORY_AGENT', 'ADMIN']);

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

export function presentDeclaration(
  declaration: MedicineDeclaration,
  role: UserRole,
  propositionId?: string | null
): DeclarationResponse {
  const response: DeclarationResponse = {
    declarationId: declaration.declarationId,
    declarationCode: declaration.declarationCode,
    name: declaration.name,
    authorizationCode: declaration.authorizationCode,
    batchNumber: declaration.batchNumber,
    expirationDate: declaration.expirationDate.toISOString(),
    quantity: declaration.quantity,
    isImported: declaration.isImported,
    countryOfOrigin: declaration.countryOfOrigin,
    status: declaration.status,
    citizenId: declaration.citizenId,
    pharmacyId: declaration.pharmacyId,
    pharmacyVerifiedAt: iso(declaration.pharmacyVerifiedAt),
    regulatoryValidatedAt: iso(declaration.regulatoryValidatedAt),
    cancelledAt: iso(declaration.cancelledAt),
    createdAt: declaration.createdAt.toISOString(),
    updatedAt: declaration.updatedAt.toISOString(),
  };
  if (propositionId !== undefined) {
    response.propositionId = propositionId;
  }

  if (REVIEWER_ROLES.has(role)) {
    response.isRecalled = declaration.isRecalled;
    response.safetyRating = declaration.safetyRating;
    response.pharmacyVerifiedBy = declaration.pharmacyVerifiedBy;
    response.pharmacyNotes = declaration.pharmacyNotes;
    response.regulatoryValidatedBy = declaration.regulatoryValidatedBy;
    response.regulatoryNotes = declaration.regulatoryNotes;
  }
  return response;
}

export function presentProposition(proposition: MedicineProposition): PropositionResponse {
  return {
    propositionId: proposition.propositionId,
    declarationId: proposition.declarationId,
    status: proposition.status,
    isActive: proposition.isActive,
    expiredAt: iso(proposition.expiredAt),
    requestingFacilityId: proposition.requestingFacilityId,
    requestedAt: iso(proposition.requestedAt),
    createdAt: proposition.createdAt.toISOString(),
  };
}

export function presentListing(listing: PropositionListing): PropositionResponse {
  return {
    ...presentProposition(listing.proposition),
    medicine: {
      name: listing.declaration.name,
      quantity: listing.declaration.quantity,
      expirationDate: listing.declaration.expirationDate.toISOString(),
      status: listing.declaration.status,
    },
    pharmacy: listing.pharmacy
      ? {
          pharmacyId: listing.pharmacy.pharmacyId,
          name: listing.pharmacy.name,
          address: listing.pharmacy.address,
          city: listing.pharmacy.city,
        }
      : null,
  };
}

export function presentAuditEntry(entry: AuditLogEntry): AuditEntryResponse {
  return {
    auditEntryId: entry.auditEntryId,
    actorId: entry.actorId,
    action: entry.action,
    entityType: entry.entityType,
    entityId: entry.entityId,
    details: entry.details,
    createdAt: entry.createdAt.toISOString(),
  };
}
