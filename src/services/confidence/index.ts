import type {
  ConfidenceBreakdown,
  ConfidenceSources,
  ConfidenceWeights,
} from '../../domain/types.js';
import { DEFAULT_CONFIDENCE_WEIGHTS, DEFAULT_REVIEW_THRESHOLD } from './types.js';

export { DEFAULT_CONFIDENCE_WEIGHTS, DEFAULT_REVIEW_THRESHOLD } from './types.js';
export type { StructuralMetrics, ValidationCounts } from './types.js';
export {
  computeStructuralMetrics,
  structuralScore,
  structuralReading,
  validationPassRate,
  DEFAULT_VALIDATION_PASS_TARGET,
} from './signals.js';

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function usableWeight(weight: number | undefined): number {
  return weight !== undefined && Number.isFinite(weight) && weight > 0 ? weight : 0;
}

/**
 * Weighted mean of the available sources. Null, undefined and non-finite
 * scores are unavailable: they are reported as null and their weight is
 * dropped, so the remaining weights are renormalized to sum to 1.
 * Sources without a weight are reported but do not contribute.
 */
export function aggregateConfidence(
  sources: ConfidenceSources,
  weights: ConfidenceWeights = DEFAULT_CONFIDENCE_WEIGHTS,
  reviewThreshold: number = DEFAULT_REVIEW_THRESHOLD,
): ConfidenceBreakdown {
  const names = [...new Set([...Object.keys(weights), ...Object.keys(sources)])];
  const components: Record<string, number | null> = {};
  const available: Array<{ name: string; score: number; weight: number }> = [];

  for (const name of names) {
    const score = sources[name];
    if (typeof score !== 'number' || !Number.isFinite(score)) {
      if (name in sources) components[name] = null;
      continue;
    }
    components[name] = clamp01(score);
    available.push({ name, score: clamp01(score), weight: usableWeight(weights[name]) });
  }

  const totalWeight = available.reduce((sum, s) => sum + s.weight, 0);
  const effectiveWeights: Record<string, number> = {};
  let overall = 0;

  if (totalWeight > 0) {
    for (const source of available) {
      effectiveWeights[source.name] = source.weight / totalWeight;
    }
    overall = clamp01(available.reduce((sum, s) => sum + s.weight * s.score, 0) / totalWeight);
  }

  return {
    components,
    weights: effectiveWeights,
    overall,
    needsHumanReview: totalWeight === 0 || overall < reviewThreshold,
    reviewThreshold,
  };
}

/**
 * Run-level breakdown: each component is the mean of that component over the
 * steps that reported it, then aggregated with the same weights.
 */
export function aggregateRunConfidence(
  breakdowns: readonly ConfidenceBreakdown[],
  weights: ConfidenceWeights = DEFAULT_CONFIDENCE_WEIGHTS,
  reviewThreshold: number = DEFAULT_REVIEW_THRESHOLD,
): ConfidenceBreakdown {
  const totals = new Map<string, { sum: number; count: number }>();

  for (const breakdown of breakdowns) {
    for (const [name, score] of Object.entries(breakdown.components)) {
      const total = totals.get(name) ?? { sum: 0, count: 0 };
      if (score !== null) {
        total.sum += score;
        total.count += 1;
      }
      totals.set(name, total);
    }
  }

  const sources: ConfidenceSources = {};
  for (const [name, total] of totals) {
    sources[name] = total.count > 0 ? total.sum / total.count : null;
  }

  return aggregateConfidence(sources, weights, reviewThreshold);
}
