import {
  DeclarationId,
  MedicineStatus,
  PharmacyId,
  RegulatoryDecision,
  UserId,
} from '../../domain-types';

export interface MedicineDeclaration {
  declarationId: DeclarationId;
  declarationCode: string;
  name: string;
  authorizationCode: string;
  batchNumber: string;
  expirationDate: Date;
  quantity: number;
  isImported: boolean;
  countryOfOrigin: string | null;
  isRecalled: boolean;
  safetyRating: number; // 0-100, never shown to citizens
  status: MedicineStatus;
  citizenId: UserId;
  pharmacyId: PharmacyId | null;
  pharmacyVerifiedAt: Date | null;
  pharmacyVerifiedBy: UserId | null;
  pharmacyNotes: string | null;
  regulatoryValidatedAt: Date | null;
  regulatoryValidatedBy: UserId | null;
  regulatoryNotes: string | null;
  cancelledAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

// Output of declaration input validation: trimmed, typed, ready to persist.
export interface DeclarationDraft {
  name: string;
  authorizationCode: string;
  batchNumber: string;
  expirationDate: Date;
  quantity: number;
  isImported: boolean;
  countryOfOrigin: string | null;
  pharmacyId: PharmacyId | null;
}

export interface PharmacyVerification {
  approved: boolean;
  notes: string | null;
  pharmacistId: UserId;
  at: Date;
}

export interface RegulatoryValidation {
  decision: RegulatoryDecision;
  notes: string | null;
  agentId: UserId;
  at: Date;
}
