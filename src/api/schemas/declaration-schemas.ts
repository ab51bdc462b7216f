import { z } from 'zod';
import { NOTES_MAX_LENGTH } from '../../application/declaration-service';

// Resource id path parameter
export const idParamSchema = z.object({
  id: z.string().uuid(),
});

// Pharmacist verification
export const verifyDeclarationSchema = z.object({
  approved: z.boolean(),
  notes: z.string().max(NOTES_MAX_LENGTH).nullable().optional(),
});

// Regulatory validation. The decision itself is checked by the service,
// which answers an unknown decision with invalid_decision.
export const validateDeclarationSchema = z.object({
  decision: z.unknown(),
  notes: z.string().max(NOTES_MAX_LENGTH).nullable().optional(),
});

// Paged listings
export const pageQuerySchema = z.object({
  limit: z.string().regex(/^\d+$/).transform(Number).default('50'),
  offset: z.string().regex(/^\d+$/).transform(Number).default('0'),
});
