import { Router } from 'express';
import { DeclarationService, normalizePage } from '../../application/declaration-service';
import { PropositionService } from '../../application/proposition-service';
import { DeclarationId } from '../../domain-types';
import { requireAuth, requireRole } from '../middleware/auth';
import { presentDeclaration, presentProposition } from '../presenters';
import {
  idParamSchema,
  pageQuerySchema,
  validateDeclarationSchema,
  verifyDeclarationSchema,
} from '../schemas/declaration-schemas';
import { DeclarationResponse, EligibilityResponse, PaginatedResponse } from '../types';

export function createDeclarationRoutes(declarations: DeclarationService, propositions: PropositionService) {
  const router = Router();

  // Declare Medicine
  router.post('/', requireRole('CITIZEN'), async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const declaration = await declarations.declare(auth.userId, req.body);
      res.status(201).json(presentDeclaration(declaration, auth.role));
    } catch (error) {
      next(error);
    }
  });

  // List My Declarations
  router.get('/mine', requireRole('CITIZEN'), async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const page = normalizePage(pageQuerySchema.parse(req.query));
      const items = await declarations.listMyDeclarations(auth.userId, page);
      const response: PaginatedResponse<DeclarationResponse> = {
        items: items.map((declaration) => presentDeclaration(declaration, auth.role)),
        pagination: { ...page, hasMore: items.length === page.limit },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  // Pharmacist Review Queue
  router.get('/pending-pharmacy-review', requireRole('PHARMACIST'), async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const page = normalizePage(pageQuerySchema.parse(req.query));
      const items = await declarations.listPendingPharmacyReview(page);
      const response: PaginatedResponse<DeclarationResponse> = {
        items: items.map((declaration) => presentDeclaration(declaration, auth.role)),
        pagination: { ...page, hasMore: items.length === page.limit },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  // Regulatory Review Queue
  router.get('/pending-regulatory-review', requireRole('REGULATORY_AGENT'), async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const page = normalizePage(pageQuerySchema.parse(req.query));
      const items = await declarations.listPendingRegulatoryReview(page);
      const response: PaginatedResponse<DeclarationResponse> = {
        items: items.map((declaration) => presentDeclaration(declaration, auth.role)),
        pagination: { ...page, hasMore: items.length === page.limit },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  // Get Declaration
  router.get('/:id', async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const declarationId = idParamSchema.parse(req.params).id as DeclarationId;
      const declaration = await declarations.getDeclaration(auth, declarationId);
      const proposition = await propositions.findByDeclaration(declarationId);
      res.json(presentDeclaration(declaration, auth.role, proposition?.propositionId ?? null));
    } catch (error) {
      next(error);
    }
  });

  // Eligibility Report
  router.get('/:id/eligibility', async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const declarationId = idParamSchema.parse(req.params).id as DeclarationId;
      // Same visibility rule as reading the declaration
      await declarations.getDeclaration(auth, declarationId);
      const report = await declarations.checkEligibility(declarationId);
      const body: EligibilityResponse = {
        declarationId: report.declarationId,
        status: report.status,
        isEligible: report.isEligible,
        reasons: report.reasons,
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  // Pharmacist Verification
  router.post('/:id/verify', requireRole('PHARMACIST'), async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const declarationId = idParamSchema.parse(req.params).id as DeclarationId;
      const body = verifyDeclarationSchema.parse(req.body ?? {});
      const result = await declarations.verify(auth.userId, declarationId, body);
      res.json({
        declaration: presentDeclaration(result.declaration, auth.role, result.proposition?.propositionId ?? null),
        proposition: result.proposition ? presentProposition(result.proposition) : null,
      });
    } catch (error) {
      next(error);
    }
  });

  // Regulatory Validation
  router.post('/:id/validate', requireRole('REGULATORY_AGENT'), async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const declarationId = idParamSchema.parse(req.params).id as DeclarationId;
      const body = validateDeclarationSchema.parse(req.body ?? {});
      const declaration = await declarations.validate(auth.userId, declarationId, body);
      res.json(presentDeclaration(declaration, auth.role));
    } catch (error) {
      next(error);
    }
  });

  // Citizen Cancellation
  router.post('/:id/cancel', requireRole('CITIZEN'), async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const declarationId = idParamSchema.parse(req.params).id as DeclarationId;
      const declaration = await declarations.cancel(auth.userId, declarationId);
      res.json(presentDeclaration(declaration, auth.role));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
