import { AuditMode, AuditRecorder } from '../../src/application/audit-recorder';
import { DeclarationService } from '../../src/application/declaration-service';
import { PropositionService } from '../../src/application/proposition-service';
import { DeclarationId, PharmacyId, SYSTEM_ACTOR_ID, UserId } from '../../src/domain-types';
import { MedicineDeclaration } from '../../src/domain/declaration/declaration-types';
import { MemoryWorkflowStore } from './memory-workflow-store';

export const CITIZEN_ID = '11111111-1111-4111-8111-111111111111' as UserId;
export const OTHER_CITIZEN_ID = '11111111-1111-4111-8111-222222222222' as UserId;
export const PHARMACIST_ID = '22222222-2222-4222-8222-222222222222' as UserId;
export const AGENT_ID = '33333333-3333-4333-8333-333333333333' as UserId;
export const FACILITY_ID = '44444444-4444-4444-8444-444444444444' as UserId;
export const ADMIN_ID = '55555555-5555-4555-8555-555555555555' as UserId;
export const INACTIVE_PHARMACIST_ID = '22222222-2222-4222-8222-999999999999' as UserId;

export const RIVERTON_PHARMACY_ID = 'aaaaaaaa-0000-4000-8000-000000000001' as PharmacyId;
export const PORT_ELLIS_PHARMACY_ID = 'aaaaaaaa-0000-4000-8000-000000000002' as PharmacyId;

export const MISSING_DECLARATION_ID = '99999999-9999-4999-8999-999999999999' as DeclarationId;

export const START = new Date('2026-03-01T10:00:00.000Z');

// Settable clock shared by every service in a test context
export class TestClock {
  private current: Date;

  constructor(start: Date = START) {
    this.current = new Date(start);
  }

  readonly now = (): Date => new Date(this.current);

  set(at: Date | string): void {
    this.current = new Date(at);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function seedStore(store: MemoryWorkflowStore): void {
  store.addUser({ userId: SYSTEM_ACTOR_ID, username: 'system', email: 'system@localhost', role: 'SYSTEM' });
  store.addUser({ userId: CITIZEN_ID, username: 'citizen', email: 'citizen@example.org', role: 'CITIZEN' });
  store.addUser({ userId: OTHER_CITIZEN_ID, username: 'neighbour', email: 'neighbour@example.org', role: 'CITIZEN' });
  store.addUser({ userId: PHARMACIST_ID, username: 'pharmacist', email: 'pharmacist@example.org', role: 'PHARMACIST' });
  store.addUser({ userId: AGENT_ID, username: 'agent', email: 'agent@example.org', role: 'REGULATORY_AGENT' });
  store.addUser({ userId: FACILITY_ID, username: 'facility', email: 'facility@example.org', role: 'HEALTH_FACILITY' });
  store.addUser({ userId: ADMIN_ID, username: 'admin', email: 'admin@example.org', role: 'ADMIN' });
  store.addUser({
    userId: INACTIVE_PHARMACIST_ID,
    username: 'retired',
    email: 'retired@example.org',
    role: 'PHARMACIST',
    isActive: false,
  });
  store.addPharmacy({
    pharmacyId: RIVERTON_PHARMACY_ID,
    name: 'Central Pharmacy',
    address: '12 Main Street',
    city: 'Riverton',
  });
  store.addPharmacy({
    pharmacyId: PORT_ELLIS_PHARMACY_ID,
    name: 'Harbour Pharmacy',
    address: '4 Quay Road',
    city: 'Port Ellis',
  });
}

export interface TestContext {
  store: MemoryWorkflowStore;
  clock: TestClock;
  audit: AuditRecorder;
  declarations: DeclarationService;
  propositions: PropositionService;
}

export function createTestContext(options: { auditMode?: AuditMode } = {}): TestContext {
  const store = new MemoryWorkflowStore();
  seedStore(store);
  const clock = new TestClock();
  const audit = new AuditRecorder(store, { mode: options.auditMode, clock: clock.now });
  return {
    store,
    clock,
    audit,
    declarations: new DeclarationService(store, audit, { clock: clock.now }),
    propositions: new PropositionService(store, audit, { clock: clock.now }),
  };
}

export function validInput(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'Paracetamol 500mg',
    authorizationCode: 'AMM-12345',
    batchNumber: 'LOT-2026-001',
    expirationDate: '2027-01-31',
    quantity: 10,
    ...overrides,
  };
}

export function declarationFixture(overrides: Partial<MedicineDeclaration> = {}): MedicineDeclaration {
  return {
    declarationId: 'dddddddd-0000-4000-8000-000000000001' as DeclarationId,
    declarationCode: 'DECL-20260301-0A1B2C3D',
    name: 'Paracetamol 500mg',
    authorizationCode: 'AMM-12345',
    batchNumber: 'LOT-2026-001',
    expirationDate: new Date('2027-01-31T00:00:00.000Z'),
    quantity: 10,
    isImported: false,
    countryOfOrigin: null,
    isRecalled: false,
    safetyRating: 100,
    status: 'SUBMITTED',
    citizenId: CITIZEN_ID,
    pharmacyId: null,
    pharmacyVerifiedAt: null,
    pharmacyVerifiedBy: null,
    pharmacyNotes: null,
    regulatoryValidatedAt: null,
    regulatoryValidatedBy: null,
    regulatoryNotes: null,
    cancelledAt: null,
    createdAt: START,
    updatedAt: START,
    ...overrides,
  };
}

// Declares, verifies and validates a medicine so its proposition is requestable.
export async function approvedDeclaration(
  ctx: TestContext,
  overrides: Record<string, unknown> = {},
  decision: 'APPROVED' | 'RESTRICTED' | 'REJECTED' = 'APPROVED'
) {
  const declared = await ctx.declarations.declare(CITIZEN_ID, validInput(overrides));
  const verified = await ctx.declarations.verify(PHARMACIST_ID, declared.declarationId, {
    approved: true,
    notes: 'Packaging intact',
  });
  const validated = await ctx.declarations.validate(AGENT_ID, declared.declarationId, {
    decision,
    notes: 'Cleared',
  });
  if (!verified.proposition) {
    throw new Error('EXPECTED_PROPOSITION');
  }
  return { declaration: validated, proposition: verified.proposition };
}
