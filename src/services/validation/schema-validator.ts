import type { ExtractedField } from '../../domain/types.js';
import type { ValidationFinding, ValidationPolicy } from './types.js';

function isEmpty(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function validateFields(
  data: Record<string, unknown>,
  policy: ValidationPolicy,
  evidence: Record<string, string | null | undefined> = {},
): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  for (const field of policy.requiredFields) {
    if (!(field in data)) {
      findings.push({ field, code: 'missing_field', severity: 'error', message: `Required field '${field}' is missing` });
    } else if (isEmpty(data[field])) {
      findings.push({ field, code: 'empty_field', severity: 'error', message: `Required field '${field}' is empty` });
    }
  }

  for (const [field, rule] of Object.entries(policy.rules ?? {})) {
    const raw = data[field];
    if (isEmpty(raw)) continue;

    const value = toNumber(raw);
    if (value === null) {
      findings.push({ field, code: 'not_a_number', severity: 'error', message: `Field '${field}' is not numeric` });
    } else if ((rule.min !== undefined && value < rule.min) || (rule.max !== undefined && value > rule.max)) {
      findings.push({
        field,
        code: 'out_of_range',
        severity: 'error',
        message: `Field '${field}' value ${value} is outside allowed range [${rule.min ?? '-∞'}, ${rule.max ?? '∞'}]`,
      });
    }
  }

  if (policy.requireEvidence) {
    for (const [field, value] of Object.entries(data)) {
      if (isEmpty(value)) continue;
      const support = evidence[field];
      if (typeof support !== 'string' || support.trim() === '') {
        findings.push({
          field,
          code: 'missing_evidence',
          severity: 'warning',
          message: `Field '${field}' has no supporting evidence`,
        });
      }
    }
  }

  return findings;
}

/** Flattens a field list into name→value and name→evidence maps. Later duplicates win. */
export function fieldsToRecord(fields: readonly ExtractedField[]): {
  data: Record<string, unknown>;
  evidence: Record<string, string | null | undefined>;
} {
  const data: Record<string, unknown> = {};
  const evidence: Record<string, string | null | undefined> = {};
  for (const field of fields) {
    data[field.name] = field.value;
    evidence[field.name] = field.evidence;
  }
  return { data, evidence };
}
