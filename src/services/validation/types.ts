import type { ExtractedField } from '../../domain/types.js';

export type ValidationSeverity = 'error' | 'warning';

export type ValidationFindingCode =
  | 'missing_field'
  | 'empty_field'
  | 'out_of_range'
  | 'not_a_number'
  | 'missing_evidence';

export interface ValidationFinding {
  field: string;
  code: ValidationFindingCode;
  severity: ValidationSeverity;
  message: string;
}

export interface FieldRule {
  min?: number;
  max?: number;
}

export type ValidationRules = Record<string, FieldRule>;

export interface ValidationPolicy {
  requiredFields: readonly string[];
  rules?: ValidationRules;
  /** Populated fields without supporting evidence raise a warning. */
  requireEvidence?: boolean;
  passTarget?: number;
}

export interface ValidationReport {
  findings: ValidationFinding[];
  errors: number;
  warnings: number;
  passRate: number;
}

export type ValidatedOutput = Record<string, unknown> | ExtractedField[];
