import type { Decision, DecisionThresholds, RubricNode } from '../../domain/types.js';

/** The numeric score is the only input; a judge's own decision text never reaches this. */
export function deriveDecision(score: number, thresholds: DecisionThresholds): Decision {
  if (score >= thresholds.acceptThreshold) return 'ACCEPT';
  if (score >= thresholds.reviseMin) return 'RETRY';
  return 'ESCALATE';
}

/** Clamps to [0,1] and rounds to a fixed number of decimals so equal judgements compare equal. */
export function normalizeScore(score: number, precision: number): number {
  const clamped = Math.min(1, Math.max(0, score));
  const factor = 10 ** precision;
  return Math.round(clamped * factor) / factor;
}

export function resolveThresholds(
  node: RubricNode | undefined,
  defaults: DecisionThresholds,
): DecisionThresholds {
  const acceptThreshold = node?.acceptThreshold ?? defaults.acceptThreshold;
  const reviseMin = Math.min(node?.reviseMin ?? defaults.reviseMin, acceptThreshold);
  return { acceptThreshold, reviseMin };
}
