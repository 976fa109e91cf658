import { describe, it, expect } from 'vitest';
import { loadEngineConfig } from '../../src/infrastructure/config.js';

describe('loadEngineConfig', () => {
  it('applies defaults when nothing is set', () => {
    const result = loadEngineConfig({});

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual({
        maxStepRetries: 3,
        maxGlobalRetries: 10,
        feedbackMaxItems: 10,
        noProgressLimit: 2,
        reviewThreshold: 0.75,
        weights: { judge: 0.5, structural: 0.3, validation: 0.2 },
        thresholds: { acceptThreshold: 0.8, reviseMin: 0.5 },
        scorePrecision: 2,
        escalationPolicy: 'retry',
        rubricPath: 'config/rubric.yaml',
        requiredFields: [],
        promptLabel: 'production',
      });
      expect(result.value.attemptTimeoutMs).toBeUndefined();
    }
  });

  it('reads overrides and treats blank values as unset', () => {
    const result = loadEngineConfig({
      MAX_STEP_RETRIES: '2',
      ATTEMPT_TIMEOUT_MS: '1500',
      ESCALATION_POLICY: 'stop',
      CONFIDENCE_WEIGHT_VALIDATION: '0',
      REVIEW_THRESHOLD: '   ',
      REQUIRED_FIELDS: 'title, license ,,doi',
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.maxStepRetries).toBe(2);
      expect(result.value.attemptTimeoutMs).toBe(1500);
      expect(result.value.escalationPolicy).toBe('stop');
      expect(result.value.weights.validation).toBe(0);
      expect(result.value.reviewThreshold).toBe(0.75);
      expect(result.value.requiredFields).toEqual(['title', 'license', 'doi']);
    }
  });

  it('returns a frozen config', () => {
    const result = loadEngineConfig({});
    expect(result.ok && Object.isFrozen(result.value)).toBe(true);
    expect(result.ok && Object.isFrozen(result.value.weights)).toBe(true);
  });

  it('rejects revise_min above accept_threshold', () => {
    const result = loadEngineConfig({ ACCEPT_THRESHOLD: '0.6', REVISE_MIN: '0.7' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('CONFIG_INVALID');
      expect(result.error.details).toBe('REVISE_MIN: REVISE_MIN must not exceed ACCEPT_THRESHOLD');
    }
  });

  it('rejects non-numeric and out-of-range values', () => {
    const result = loadEngineConfig({ MAX_STEP_RETRIES: 'many', REVIEW_THRESHOLD: '1.5' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.details).toContain('MAX_STEP_RETRIES');
      expect(result.error.details).toContain('REVIEW_THRESHOLD');
    }
  });

  it('rejects a zero attempt ceiling', () => {
    expect(loadEngineConfig({ MAX_STEP_RETRIES: '0' }).ok).toBe(false);
  });
});
