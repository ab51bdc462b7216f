import { MedicineStatus } from '../../domain-types';
import { MedicineDeclaration } from './declaration-types';

export type EligibilityInput = Pick<MedicineDeclaration, 'expirationDate' | 'isImported' | 'isRecalled' | 'status'>;

export interface EligibilityReport {
  isEligible: boolean;
  reasons: string[];
}

export const ELIGIBLE_MESSAGE = 'Medicine is eligible for redistribution';

const REDISTRIBUTABLE_STATUSES: ReadonlySet<MedicineStatus> = new Set<MedicineStatus>([
  'APPROVED_FOR_REDISTRIBUTION',
  'RESTRICTED_USE',
]);

export function isRedistributableStatus(status: MedicineStatus): boolean {
  return REDISTRIBUTABLE_STATUSES.has(status);
}

// An item expiring at exactly `now` already counts as expired.
export function isExpired(declaration: Pick<MedicineDeclaration, 'expirationDate'>, now: Date): boolean {
  return declaration.expirationDate.getTime() <= now.getTime();
}

/**
 * Every condition blocking redistribution, in a fixed order
 * (expiry, import, recall, status).
 */
export function eligibilityReasons(declaration: EligibilityInput, now: Date = new Date()): string[] {
  const reasons: string[] = [];

  if (isExpired(declaration, now)) {
    reasons.push(`Medicine expired on ${declaration.expirationDate.toISOString()}`);
  }
  if (declaration.isImported) {
    reasons.push('Imported medicines cannot be redistributed');
  }
  if (declaration.isRecalled) {
    reasons.push('Medicine has been recalled');
  }
  if (!isRedistributableStatus(declaration.status)) {
    reasons.push(`Status ${declaration.status} is not eligible for redistribution`);
  }

  return reasons.length > 0 ? reasons : [ELIGIBLE_MESSAGE];
}

export function canBeRedistributed(declaration: EligibilityInput, now: Date = new Date()): boolean {
  return (
    !isExpired(declaration, now) &&
    !declaration.isImported &&
    !declaration.isRecalled &&
    isRedistributableStatus(declaration.status)
  );
}

export function checkEligibility(declaration: EligibilityInput, now: Date = new Date()): EligibilityReport {
  return {
    isEligible: canBeRedistributed(declaration, now),
    reasons: eligibilityReasons(declaration, now),
  };
}
