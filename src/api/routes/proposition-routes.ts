import { Router } from 'express';
import { normalizePage } from '../../application/declaration-service';
import { PropositionService } from '../../application/proposition-service';
import { PropositionId } from '../../domain-types';
import { requireAuth, requireRole } from '../middleware/auth';
import { presentDeclaration, presentListing } from '../presenters';
import { idParamSchema } from '../schemas/declaration-schemas';
import { listPropositionsQuerySchema } from '../schemas/proposition-schemas';
import { PaginatedResponse, PropositionResponse } from '../types';

export function createPropositionRoutes(propositions: PropositionService) {
  const router = Router();

  // Available Propositions, closest expiry first
  router.get('/', async (req, res, next) => {
    try {
      const query = listPropositionsQuerySchema.parse(req.query);
      const page = normalizePage(query);
      const items = await propositions.listAvailablePropositions({ city: query.city, ...page });
      const response: PaginatedResponse<PropositionResponse> = {
        items: items.map(presentListing),
        pagination: { ...page, hasMore: items.length === page.limit },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  // Get Proposition
  router.get('/:id', async (req, res, next) => {
    try {
      const propositionId = idParamSchema.parse(req.params).id as PropositionId;
      const listing = await propositions.getProposition(propositionId);
      res.json(presentListing(listing));
    } catch (error) {
      next(error);
    }
  });

  // Facility Request
  router.post('/:id/request', requireRole('HEALTH_FACILITY'), async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const propositionId = idParamSchema.parse(req.params).id as PropositionId;
      const listing = await propositions.requestProposition(auth.userId, propositionId);
      res.json({
        proposition: presentListing(listing),
        declaration: presentDeclaration(listing.declaration, auth.role, listing.proposition.propositionId),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
