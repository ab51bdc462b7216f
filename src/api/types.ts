/**
 * Medicine Redistribution REST API types
 */

import { UserId, UserRole } from '../domain-types';

// ============================================
// COMMON TYPES
// ============================================

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    correlationId?: string;
  };
}

export interface PaginatedResponse<T> {
  items: T[];
  pagination: {
    offset: number;
    limit: number;
    hasMore: boolean;
  };
}

// ============================================
// AUTHENTICATION
// ============================================

// Verified bearer token claims
export interface AuthContext {
  userId: UserId;
  role: UserRole;
}

// ============================================
// DECLARATIONS
// ============================================

export interface DeclarationResponse {
  declarationId: string;
  declarationCode: string;
  name: string;
  authorizationCode: string;
  batchNumber: string;
  expirationDate: string;
  quantity: number;
  isImported: boolean;
  countryOfOrigin: string | null;
  status: string;
  citizenId: string;
  pharmacyId: string | null;
  pharmacyVerifiedAt: string | null;
  regulatoryValidatedAt: string | null;
  cancelledAt: string | null;
  createdAt: string;
  updatedAt: string;
  propositionId?: string | null;
  // Reviewer-only fields
  isRecalled?: boolean;
  safetyRating?: number;
  pharmacyVerifiedBy?: string | null;
  pharmacyNotes?: string | null;
  regulatoryValidatedBy?: string | null;
  regulatoryNotes?: string | null;
}

export interface EligibilityResponse {
  declarationId: string;
  status: string;
  isEligible: boolean;
  reasons: string[];
}

// ============================================
// PROPOSITIONS
// ============================================

export interface PropositionResponse {
  propositionId: string;
  declarationId: string;
  status: string;
  isActive: boolean;
  expiredAt: string | null;
  requestingFacilityId: string | null;
  requestedAt: string | null;
  createdAt: string;
  medicine?: {
    name: string;
    quantity: number;
    expirationDate: string;
    status: string;
  };
  pharmacy?: {
    pharmacyId: string;
    name: string;
    address: string;
    city: string;
  } | null;
}

// ============================================
// AUDIT
// ============================================

export interface AuditEntryResponse {
  auditEntryId: string;
  actorId: string;
  action: string;
  entityType: string;
  entityId: string | null;
  details: Record<string, unknown>;
  createdAt: string;
}
