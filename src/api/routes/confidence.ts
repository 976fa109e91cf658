import { Router, type Request, type Response } from 'express';
import { confidenceRequestInput } from '../../domain/schemas.js';
import type { ConfidenceWeights } from '../../domain/types.js';
import { aggregateConfidence } from '../../services/confidence/index.js';
import { successResponse, errorResponse } from '../middleware/error-handler.js';

export interface ConfidenceDefaults {
  weights: ConfidenceWeights;
  reviewThreshold: number;
}

export function createConfidenceRouter(defaults: ConfidenceDefaults): Router {
  const router = Router();

  router.post('/confidence', (req: Request, res: Response) => {
    const parsed = confidenceRequestInput.safeParse(req.body);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid request body', details));
      return;
    }

    const { sources, weights, reviewThreshold } = parsed.data;
    const breakdown = aggregateConfidence(
      sources,
      weights ?? defaults.weights,
      reviewThreshold ?? defaults.reviewThreshold,
    );

    res.json(successResponse(breakdown));
  });

  return router;
}
