import type { AppError } from '../../domain/errors.js';
import type { ContractField, NormalizerKind } from '../../domain/types.js';

export interface CompiledCandidate {
  id: string;
  regex: RegExp;
  template?: string;
  confidence: number;
}

export interface CompiledRule {
  field: ContractField;
  normalize: NormalizerKind;
  candidates: CompiledCandidate[];
  exclude: ReadonlySet<string>;
}

export interface CompiledRuleSet {
  rules: CompiledRule[];
  required: ContractField[];
  requiredAnyOf: ContractField[][];
  /** Upper-cased variation → canonical equipment code. */
  equipmentLookup: ReadonlyMap<string, string>;
}

export interface ExtractionError extends AppError {
  missingFields: string[];
}

export interface NormalizeContext {
  equipmentLookup: ReadonlyMap<string, string>;
}
