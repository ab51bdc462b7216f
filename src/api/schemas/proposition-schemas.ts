import { z } from 'zod';
import { pageQuerySchema } from './declaration-schemas';

// List Available Propositions Query Schema
export const listPropositionsQuerySchema = pageQuerySchema.extend({
  city: z.string().trim().max(100).optional(),
});
