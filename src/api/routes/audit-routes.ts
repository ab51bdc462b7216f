import { Router } from 'express';
import { AuditRecorder } from '../../application/audit-recorder';
import { UserId } from '../../domain-types';
import { requireRole } from '../middleware/auth';
import { presentAuditEntry } from '../presenters';
import { listAuditQuerySchema } from '../schemas/audit-schemas';

export function createAuditRoutes(audit: AuditRecorder) {
  const router = Router();

  // Audit Trail, newest first
  router.get('/', requireRole('ADMIN', 'REGULATORY_AGENT'), async (req, res, next) => {
    try {
      const query = listAuditQuerySchema.parse(req.query);
      const entries = await audit.listEntries({
        entityType: query.entityType,
        entityId: query.entityId,
        actorId: query.actorId === undefined ? undefined : (query.actorId as UserId),
        limit: query.limit,
      });
      res.json({ items: entries.map(presentAuditEntry) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
