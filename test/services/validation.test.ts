import { describe, it, expect } from 'vitest';
import {
  createValidationSource,
  fieldsToRecord,
  isExtractedField,
  validateFields,
  validateOutput,
} from '../../src/services/validation/index.js';

describe('validateFields', () => {
  const policy = { requiredFields: ['site', 'ph', 'sampled_on'] };

  it('returns no findings when every required field is populated', () => {
    expect(validateFields({ site: 'North Marsh', ph: 6.5, sampled_on: '2026-04-02' }, policy)).toEqual([]);
  });

  it('reports a missing required field', () => {
    expect(validateFields({ site: 'North Marsh', sampled_on: '2026-04-02' }, policy)).toEqual([
      { field: 'ph', code: 'missing_field', severity: 'error', message: "Required field 'ph' is missing" },
    ]);
  });

  it('reports null and blank values as empty', () => {
    expect(validateFields({ site: '  ', ph: null, sampled_on: '2026-04-02' }, policy)).toEqual([
      { field: 'site', code: 'empty_field', severity: 'error', message: "Required field 'site' is empty" },
      { field: 'ph', code: 'empty_field', severity: 'error', message: "Required field 'ph' is empty" },
    ]);
  });

  it('checks numeric ranges and accepts numeric strings', () => {
    const rules = { ph: { min: 0, max: 14 }, depth_cm: { min: 0 } };

    expect(validateFields({ ph: '7.2', depth_cm: 20 }, { requiredFields: [], rules })).toEqual([]);
    expect(validateFields({ ph: 15, depth_cm: -5 }, { requiredFields: [], rules })).toEqual([
      {
        field: 'ph',
        code: 'out_of_range',
        severity: 'error',
        message: "Field 'ph' value 15 is outside allowed range [0, 14]",
      },
      {
        field: 'depth_cm',
        code: 'out_of_range',
        severity: 'error',
        message: "Field 'depth_cm' value -5 is outside allowed range [0, ∞]",
      },
    ]);
  });

  it('reports non-numeric values under a range rule and skips empty ones', () => {
    expect(validateFields({ ph: 'neutral', depth_cm: null }, { requiredFields: [], rules: { ph: {}, depth_cm: { max: 100 } } })).toEqual([
      { field: 'ph', code: 'not_a_number', severity: 'error', message: "Field 'ph' is not numeric" },
    ]);
  });

  it('warns about populated fields without evidence when evidence is required', () => {
    const findings = validateFields(
      { site: 'North Marsh', ph: 6.5, crop: null },
      { requiredFields: [], requireEvidence: true },
      { site: 'Site: North Marsh', ph: ' ' },
    );

    expect(findings).toEqual([
      { field: 'ph', code: 'missing_evidence', severity: 'warning', message: "Field 'ph' has no supporting evidence" },
    ]);
  });
});

describe('fieldsToRecord', () => {
  it('splits values and evidence, later duplicates winning', () => {
    expect(
      fieldsToRecord([
        { name: 'site', value: 'A', evidence: 'first' },
        { name: 'ph', value: 6 },
        { name: 'site', value: 'B', evidence: 'second' },
      ]),
    ).toEqual({ data: { site: 'B', ph: 6 }, evidence: { site: 'second', ph: undefined } });
  });
});

describe('validateOutput', () => {
  it('counts errors and warnings and derives the pass rate', () => {
    const report = validateOutput(
      [
        { name: 'site', value: 'North Marsh', evidence: 'Site: North Marsh' },
        { name: 'ph', value: 6.5 },
      ],
      { requiredFields: ['site', 'ph', 'sampled_on'], requireEvidence: true },
    );

    expect(report.errors).toBe(1);
    expect(report.warnings).toBe(1);
    expect(report.findings.map((f) => f.code)).toEqual(['missing_field', 'missing_evidence']);
    expect(report.passRate).toBeCloseTo(0.6, 10);
  });

  it('scores a clean record at 1', () => {
    expect(validateOutput({ site: 'North Marsh' }, { requiredFields: ['site'] }).passRate).toBe(1);
  });

  it('applies the policy pass target', () => {
    const report = validateOutput({}, { requiredFields: ['site'], passTarget: 0.5 });
    expect(report.passRate).toBeCloseTo(0.3, 10);
  });
});

describe('createValidationSource', () => {
  const source = createValidationSource({ requiredFields: ['site'] });

  it('scores records and field lists with their finding counts', () => {
    expect(source({ site: 'North Marsh' })).toEqual({ score: 1, details: { errors: 0, warnings: 0 } });
    expect(source([{ name: 'site', value: 'North Marsh' }])).toEqual({ score: 1, details: { errors: 0, warnings: 0 } });
    expect(source([])).toEqual({ score: expect.closeTo(0.6, 10), details: { errors: 1, warnings: 0 } });
  });

  it('returns null for output it cannot check', () => {
    expect(source('free text')).toBeNull();
    expect(source(null)).toBeNull();
    expect(source([{ name: 'site' }, 'x'])).toBeNull();
  });
});

describe('isExtractedField', () => {
  it('requires a string name and a value key', () => {
    expect(isExtractedField({ name: 'site', value: null })).toBe(true);
    expect(isExtractedField({ name: 'site' })).toBe(false);
    expect(isExtractedField({ name: 3, value: 1 })).toBe(false);
  });
});
