import { describe, it, expect } from 'vitest';
import {
  extractFieldConfidence,
  parseFieldListOutput,
  parseRecordOutput,
} from '../../src/services/extraction/index.js';

describe('parseRecordOutput', () => {
  it('keeps every key except the confidence map', () => {
    expect(parseRecordOutput({ title: 'Soil survey', keywords: ['carbon'], field_confidence: { title: 1 } })).toEqual({
      ok: true,
      value: { title: 'Soil survey', keywords: ['carbon'] },
    });
  });
});

describe('parseFieldListOutput', () => {
  it('normalizes fields', () => {
    const result = parseFieldListOutput({
      fields: [
        { name: ' site ', value: 'North Marsh', evidence: 'Site: North Marsh', confidence: '0.7' },
        { name: 'depth_cm', confidence: 5 },
        { name: 'crop', value: null, evidence: null },
      ],
    });

    expect(result).toEqual({
      ok: true,
      value: [
        { name: 'site', value: 'North Marsh', evidence: 'Site: North Marsh', confidence: 0.7 },
        { name: 'depth_cm', value: null, evidence: null, confidence: null },
        { name: 'crop', value: null, evidence: null, confidence: null },
      ],
    });
  });

  it('rejects a payload without a fields array', () => {
    const result = parseFieldListOutput({ site: 'North Marsh' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Response does not contain a valid fields list');
    expect(result.error.details).toBe('fields: Required');
  });

  it('rejects a field without a name', () => {
    const result = parseFieldListOutput({ fields: [{ name: '  ', value: 1 }] });

    expect(result.ok).toBe(false);
  });
});

describe('extractFieldConfidence', () => {
  it('keeps finite values clamped to [0,1]', () => {
    expect(extractFieldConfidence({ field_confidence: { site: 0.4, ph: 3, crop: 'high', depth: -1 } })).toEqual({
      site: 0.4,
      ph: 1,
      depth: 0,
    });
  });

  it('returns undefined without a usable map', () => {
    expect(extractFieldConfidence({})).toBeUndefined();
    expect(extractFieldConfidence({ field_confidence: [0.5] })).toBeUndefined();
    expect(extractFieldConfidence({ field_confidence: { site: 'high' } })).toBeUndefined();
  });
});
