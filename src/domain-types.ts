/**
 * MEDICINE REDISTRIBUTION DOMAIN PRIMITIVES
 * Branded identifiers and the closed vocabularies every transition guard matches on.
 */

import * as crypto from 'crypto';

// === BRANDED TYPES ===
export type UserId = string & { readonly brand: 'UserId' };
export type DeclarationId = string & { readonly brand: 'DeclarationId' };
export type PropositionId = string & { readonly brand: 'PropositionId' };
export type PharmacyId = string & { readonly brand: 'PharmacyId' };
export type AuditEntryId = string & { readonly brand: 'AuditEntryId' };

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// Built-in actor the expiration sweep records its audit entries under.
export const SYSTEM_ACTOR_ID = '00000000-0000-0000-0000-000000000000' as UserId;

// === CLOSED VOCABULARIES ===
export const USER_ROLES = [
  'CITIZEN',
  'PHARMACIST',
  'REGULATORY_AGENT',
  'HEALTH_FACILITY',
  'ADMIN',
  'SYSTEM',
] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const MEDICINE_STATUSES = [
  'SUBMITTED',
  'PHARMACY_VERIFIED',
  'PHARMACY_REJECTED',
  'APPROVED_FOR_REDISTRIBUTION',
  'RESTRICTED_USE',
  'REJECTED_REGULATORY',
  'DISTRIBUTED',
  'CANCELLED',
] as const;
export type MedicineStatus = (typeof MEDICINE_STATUSES)[number];

export const PROPOSITION_STATUSES = ['AVAILABLE', 'DISTRIBUTED', 'EXPIRED'] as const;
export type PropositionStatus = (typeof PROPOSITION_STATUSES)[number];

export const REGULATORY_DECISIONS = ['APPROVED', 'RESTRICTED', 'REJECTED'] as const;
export type RegulatoryDecision = (typeof REGULATORY_DECISIONS)[number];

export const SUPPLY_CONDITIONS = ['NEW', 'VERY_GOOD', 'GOOD'] as const;
export type SupplyCondition = (typeof SUPPLY_CONDITIONS)[number];

export const AUDIT_ACTIONS = [
  'MEDICINE_DECLARED',
  'MEDICINE_VERIFIED',
  'MEDICINE_REJECTED',
  'MEDICINE_APPROVED',
  'MEDICINE_RESTRICTED',
  'MEDICINE_REJECTED_REGULATORY',
  'MEDICINE_CANCELLED',
  'MEDICINE_DISTRIBUTED',
  'PROPOSITION_EXPIRED',
] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const AUDIT_ENTITY_TYPES = ['MEDICINE', 'PROPOSITION'] as const;
export type AuditEntityType = (typeof AUDIT_ENTITY_TYPES)[number];

function isMember<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && values.some((candidate) => candidate === value);
}

export const isUserRole = (value: unknown): value is UserRole => isMember(USER_ROLES, value);
export const isMedicineStatus = (value: unknown): value is MedicineStatus => isMember(MEDICINE_STATUSES, value);
export const isPropositionStatus = (value: unknown): value is PropositionStatus =>
  isMember(PROPOSITION_STATUSES, value);
export const isRegulatoryDecision = (value: unknown): value is RegulatoryDecision =>
  isMember(REGULATORY_DECISIONS, value);
export const isAuditAction = (value: unknown): value is AuditAction => isMember(AUDIT_ACTIONS, value);
export const isAuditEntityType = (value: unknown): value is AuditEntityType => isMember(AUDIT_ENTITY_TYPES, value);
export const isSupplyCondition = (value: unknown): value is SupplyCondition => isMember(SUPPLY_CONDITIONS, value);

export function assertNever(value: never): never {
  throw new Error(`UNHANDLED_VARIANT:${String(value)}`);
}

// === ID CREATION ===
export const Ids = {
  declaration: (): DeclarationId => crypto.randomUUID() as DeclarationId,
  proposition: (): PropositionId => crypto.randomUUID() as PropositionId,
  auditEntry: (): AuditEntryId => crypto.randomUUID() as AuditEntryId,

  /**
   * Human-facing declaration reference: DECL-YYYYMMDD-XXXXXXXX.
   * The date part is the UTC creation day; the suffix is 4 random bytes in upper-case hex.
   */
  declarationCode(at: Date): string {
    const day = at.toISOString().slice(0, 10).replace(/-/g, '');
    const suffix = crypto.randomBytes(4).toString('hex').toUpperCase();
    return `DECL-${day}-${suffix}`;
  },
};
