import { SYSTEM_ACTOR_ID } from '../domain-types';
import { applyExpiration, checkPropositionInvariant } from '../domain/proposition/proposition-logic';
import { AuditRecorder } from '../application/audit-recorder';
import { WorkflowStore } from '../application/workflow-store';

/**
 * Expires every available proposition whose medicine expiration date is
 * strictly before `now`. One transaction for the whole batch: any failure
 * rolls every row back and is rethrown. Returns the number of rows expired.
 */
export async function sweepExpiredPropositions(
  store: WorkflowStore,
  audit: AuditRecorder,
  now: Date = new Date()
): Promise<number> {
  const expired = await store.transaction(async (tx) => {
    const candidates = await tx.lockExpirablePropositions(now);
    let count = 0;

    for (const proposition of candidates) {
      // Re-check after lock
      if (proposition.status !== 'AVAILABLE' || !proposition.isActive) continue;

      const next = applyExpiration(proposition, now);
      checkPropositionInvariant(next);
      if (!(await tx.updateProposition(next, proposition.status))) continue;

      await audit.recordTransition(tx, {
        actorId: SYSTEM_ACTOR_ID,
        action: 'PROPOSITION_EXPIRED',
        entityType: 'PROPOSITION',
        entityId: proposition.propositionId,
        details: {
          declarationId: proposition.declarationId,
          fromStatus: proposition.status,
          toStatus: next.status,
          expiredAt: now.toISOString(),
        },
      });
      count++;
    }

    return count;
  });

  if (expired === 0) {
    console.log('[Sweeper] No expired propositions', { at: now.toISOString() });
  } else {
    console.log('[Sweeper] Expired propositions', { count: expired, at: now.toISOString() });
  }
  return expired;
}
