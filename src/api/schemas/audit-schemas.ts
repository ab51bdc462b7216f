import { z } from 'zod';
import { AUDIT_ENTITY_TYPES } from '../../domain-types';

// List Audit Entries Query Schema
export const listAuditQuerySchema = z.object({
  entityType: z.enum(AUDIT_ENTITY_TYPES).optional(),
  entityId: z.string().min(1).max(64).optional(),
  actorId: z.string().uuid().optional(),
  limit: z.string().regex(/^\d+$/).transform(Number).default('100'),
});
