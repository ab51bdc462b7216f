/**
 * PROPOSITION SERVICE
 *
 * Proves:
 *   1. Facility request distributes proposition and declaration together
 *   2. Eligibility and status guards on requests
 *   3. Available listing: eligible only, closest expiry first, city filter
 */

import { PropositionId } from '../src/domain-types';
import {
  AGENT_ID,
  approvedDeclaration,
  CITIZEN_ID,
  createTestContext,
  FACILITY_ID,
  PHARMACIST_ID,
  PORT_ELLIS_PHARMACY_ID,
  RIVERTON_PHARMACY_ID,
  TestContext,
  validInput,
} from './support/fixtures';

describe('PropositionService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  // =========================================================
  // 1. FACILITY REQUEST
  // =========================================================
  describe('1. requestProposition', () => {
    test('approved stock is distributed to the requesting facility', async () => {
      const { declaration, proposition } = await approvedDeclaration(ctx, { pharmacyId: RIVERTON_PHARMACY_ID });
      ctx.clock.advance(3_600_000);

      const listing = await ctx.propositions.requestProposition(FACILITY_ID, proposition.propositionId);

      expect(listing.proposition).toMatchObject({
        status: 'DISTRIBUTED',
        isActive: false,
        requestingFacilityId: FACILITY_ID,
      });
      expect(listing.proposition.requestedAt?.toISOString()).toBe('2026-03-01T11:00:00.000Z');
      expect(listing.declaration.status).toBe('DISTRIBUTED');
      expect(listing.pharmacy?.city).toBe('Riverton');

      expect((await ctx.store.findDeclaration(declaration.declarationId))?.status).toBe('DISTRIBUTED');
      const entries = ctx.store.auditEntries();
      expect(entries[entries.length - 1]).toMatchObject({
        actorId: FACILITY_ID,
        action: 'MEDICINE_DISTRIBUTED',
        entityType: 'PROPOSITION',
        entityId: proposition.propositionId,
      });
    });

    test('restricted-use stock can be requested', async () => {
      const { proposition } = await approvedDeclaration(ctx, {}, 'RESTRICTED');
      const listing = await ctx.propositions.requestProposition(FACILITY_ID, proposition.propositionId);
      expect(listing.declaration.status).toBe('DISTRIBUTED');
    });

    test('second request is invalid_status', async () => {
      const { proposition } = await approvedDeclaration(ctx);
      await ctx.propositions.requestProposition(FACILITY_ID, proposition.propositionId);
      await expect(
        ctx.propositions.requestProposition(FACILITY_ID, proposition.propositionId)
      ).rejects.toMatchObject({ kind: 'INVALID_STATUS', details: { currentStatus: 'DISTRIBUTED' } });
    });

    test('two concurrent requests: exactly one facility wins', async () => {
      const { proposition } = await approvedDeclaration(ctx);

      const results = await Promise.allSettled([
        ctx.propositions.requestProposition(FACILITY_ID, proposition.propositionId),
        ctx.propositions.requestProposition(FACILITY_ID, proposition.propositionId),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toMatchObject({ kind: 'INVALID_STATUS', code: 'invalid_status' });
      expect(ctx.store.auditEntries().filter((entry) => entry.action === 'MEDICINE_DISTRIBUTED')).toHaveLength(1);
    });

    test('proposition awaiting regulatory review is not eligible', async () => {
      const declared = await ctx.declarations.declare(CITIZEN_ID, validInput());
      const { proposition } = await ctx.declarations.verify(PHARMACIST_ID, declared.declarationId, { approved: true });
      if (!proposition) throw new Error('EXPECTED_PROPOSITION');

      await expect(ctx.propositions.requestProposition(FACILITY_ID, proposition.propositionId)).rejects.toMatchObject({
        kind: 'NOT_ELIGIBLE',
        code: 'not_eligible',
        details: { reasons: ['Status PHARMACY_VERIFIED is not eligible for redistribution'] },
      });
      expect((await ctx.store.findProposition(proposition.propositionId))?.proposition.status).toBe('AVAILABLE');
    });

    test('expired but not yet swept stock is not eligible', async () => {
      const { proposition } = await approvedDeclaration(ctx, { expirationDate: '2026-03-02' });
      ctx.clock.set('2026-03-02T00:00:00.000Z');
      await expect(ctx.propositions.requestProposition(FACILITY_ID, proposition.propositionId)).rejects.toMatchObject({
        kind: 'NOT_ELIGIBLE',
        details: { reasons: ['Medicine expired on 2026-03-02T00:00:00.000Z'] },
      });
    });

    test('only health facilities request', async () => {
      const { proposition } = await approvedDeclaration(ctx);
      await expect(ctx.propositions.requestProposition(AGENT_ID, proposition.propositionId)).rejects.toMatchObject({
        kind: 'FORBIDDEN',
        code: 'role_required',
      });
    });

    test('unknown proposition is not found', async () => {
      await expect(
        ctx.propositions.requestProposition(FACILITY_ID, 'eeeeeeee-0000-4000-8000-00000000ffff' as PropositionId)
      ).rejects.toMatchObject({ kind: 'NOT_FOUND', code: 'proposition_not_found' });
    });
  });

  // =========================================================
  // 2. LISTING
  // =========================================================
  describe('2. listAvailablePropositions', () => {
    test('only eligible stock, closest expiry first', async () => {
      const late = await approvedDeclaration(ctx, { name: 'Late', expirationDate: '2027-06-01', pharmacyId: RIVERTON_PHARMACY_ID });
      const soon = await approvedDeclaration(ctx, { name: 'Soon', expirationDate: '2026-09-01', pharmacyId: PORT_ELLIS_PHARMACY_ID });
      const imported = await approvedDeclaration(ctx, { name: 'Imported', isImported: true, countryOfOrigin: 'Italy' });

      const declared = await ctx.declarations.declare(CITIZEN_ID, validInput({ name: 'Pending' }));
      await ctx.declarations.verify(PHARMACIST_ID, declared.declarationId, { approved: true });

      const listed = await ctx.propositions.listAvailablePropositions();
      expect(listed.map((l) => l.declaration.name)).toEqual(['Soon', 'Late']);
      expect(listed.map((l) => l.proposition.propositionId)).not.toContain(imported.proposition.propositionId);
      expect(listed[0].proposition.propositionId).toBe(soon.proposition.propositionId);
      expect(listed[1].proposition.propositionId).toBe(late.proposition.propositionId);
      expect(listed[1].pharmacy?.name).toBe('Central Pharmacy');
    });

    test('city filter is case-insensitive', async () => {
      await approvedDeclaration(ctx, { name: 'Riverton stock', pharmacyId: RIVERTON_PHARMACY_ID });
      await approvedDeclaration(ctx, { name: 'Harbour stock', pharmacyId: PORT_ELLIS_PHARMACY_ID });
      await approvedDeclaration(ctx, { name: 'Unassigned stock' });

      const listed = await ctx.propositions.listAvailablePropositions({ city: '  port ellis ' });
      expect(listed.map((l) => l.declaration.name)).toEqual(['Harbour stock']);
    });

    test('distributed stock leaves the listing', async () => {
      const { proposition } = await approvedDeclaration(ctx);
      await ctx.propositions.requestProposition(FACILITY_ID, proposition.propositionId);
      await expect(ctx.propositions.listAvailablePropositions()).resolves.toEqual([]);
    });

    test('city filter matches % and _ literally', async () => {
      await approvedDeclaration(ctx, { name: 'Riverton stock', pharmacyId: RIVERTON_PHARMACY_ID });
      await expect(ctx.propositions.listAvailablePropositions({ city: '%' })).resolves.toEqual([]);
      await expect(ctx.propositions.listAvailablePropositions({ city: 'R_verton' })).resolves.toEqual([]);
    });

    test('getProposition hides stock rejected by the regulator', async () => {
      const { proposition, declaration } = await approvedDeclaration(ctx, {}, 'REJECTED');
      expect(declaration.status).toBe('REJECTED_REGULATORY');

      await expect(ctx.propositions.getProposition(proposition.propositionId)).rejects.toMatchObject({
        kind: 'NOT_FOUND',
        code: 'proposition_not_found',
      });
      await expect(ctx.propositions.listAvailablePropositions()).resolves.toEqual([]);
    });

    test('getProposition returns the listing', async () => {
      const { proposition, declaration } = await approvedDeclaration(ctx);
      const listing = await ctx.propositions.getProposition(proposition.propositionId);
      expect(listing.declaration.declarationId).toBe(declaration.declarationId);
      expect(listing.pharmacy).toBeNull();
      await expect(ctx.propositions.findByDeclaration(declaration.declarationId)).resolves.toEqual(listing.proposition);
    });
  });
});
