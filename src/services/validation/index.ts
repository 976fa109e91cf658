import { logger } from '../../infrastructure/logger.js';
import { validationPassRate } from '../confidence/index.js';
import { fieldsToRecord, validateFields } from './schema-validator.js';
import type { ExtractedField, SignalReading } from '../../domain/types.js';
import type { ValidatedOutput, ValidationPolicy, ValidationReport } from './types.js';

export type {
  FieldRule,
  ValidatedOutput,
  ValidationFinding,
  ValidationPolicy,
  ValidationReport,
  ValidationRules,
} from './types.js';
export { validateFields, fieldsToRecord } from './schema-validator.js';

const log = logger.child({ module: 'validation' });

export function validateOutput(output: ValidatedOutput, policy: ValidationPolicy, runId?: string): ValidationReport {
  const { data, evidence } = Array.isArray(output)
    ? fieldsToRecord(output)
    : { data: output, evidence: {} };

  const findings = validateFields(data, policy, evidence);
  const errors = findings.filter((f) => f.severity === 'error').length;
  const warnings = findings.length - errors;
  const passRate = validationPassRate({ errors, warnings }, policy.passTarget);

  if (findings.length > 0) {
    log.info({ runId, errors, warnings, passRate }, 'Validation found issues');
  } else {
    log.debug({ runId, passRate }, 'Validation passed');
  }

  return { findings, errors, warnings, passRate };
}

function toReading(report: ValidationReport): SignalReading {
  return { score: report.passRate, details: { errors: report.errors, warnings: report.warnings } };
}

/** Validation pass rate as a confidence source; null when the output has no checkable shape. */
export function createValidationSource(policy: ValidationPolicy): (output: unknown) => SignalReading | null {
  return (output) => {
    if (Array.isArray(output)) {
      const fields = output.filter(isExtractedField);
      return fields.length === output.length ? toReading(validateOutput(fields, policy)) : null;
    }
    if (isRecord(output)) return toReading(validateOutput(output, policy));
    return null;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isExtractedField(value: unknown): value is ExtractedField {
  return isRecord(value) && typeof value.name === 'string' && 'value' in value;
}
