import type { ConfidenceWeights } from '../../domain/types.js';

export const DEFAULT_CONFIDENCE_WEIGHTS: Readonly<ConfidenceWeights> = Object.freeze({
  judge: 0.5,
  structural: 0.3,
  validation: 0.2,
});

export const DEFAULT_REVIEW_THRESHOLD = 0.75;

/** Per-field completeness signals for a field-list output. */
export interface StructuralMetrics {
  fieldCount: number;
  fieldCompletionRatio: number;
  evidenceCoverageRatio: number;
  avgFieldConfidence: number | null;
}

export interface ValidationCounts {
  errors: number;
  warnings: number;
}
