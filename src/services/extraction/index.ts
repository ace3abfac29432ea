import { ok, err, type Result } from '../../domain/result.js';
import { ErrorCode } from '../../domain/errors.js';
import type { ContractFields, ContractRecord, ExtractedField, SourceMetadata } from '../../domain/types.js';
import { normalizeValue } from './normalizers.js';
import type { CompiledCandidate, CompiledRule, CompiledRuleSet, ExtractionError, NormalizeContext } from './types.js';

export type { CompiledRuleSet, ExtractionError } from './types.js';
export { loadExtractionRules, parseRuleSet, compileRuleSet } from './rules.js';

function applyTemplate(match: RegExpMatchArray, template?: string): string {
  if (template === undefined) {
    return match[1] ?? match[0];
  }
  return template.replace(/\$(\d)/g, (_token, group: string) => match[Number(group)] ?? '');
}

function firstValue(
  text: string,
  rule: CompiledRule,
  candidate: CompiledCandidate,
  ctx: NormalizeContext,
): string | null {
  for (const match of text.matchAll(candidate.regex)) {
    const value = normalizeValue(rule.normalize, applyTemplate(match, candidate.template), ctx);
    if (value !== '' && !rule.exclude.has(value)) {
      return value;
    }
  }
  return null;
}

function extractField(text: string, rule: CompiledRule, ctx: NormalizeContext): ExtractedField | null {
  for (const candidate of rule.candidates) {
    const value = firstValue(text, rule, candidate, ctx);
    if (value !== null) {
      return { value, confidence: candidate.confidence, candidate: candidate.id };
    }
  }
  return null;
}

/**
 * Applies the rule table to document text. Pure: the same text and rules
 * always produce the same record.
 */
export function extractContractRecord(
  text: string,
  ruleSet: CompiledRuleSet,
  documentId: string,
  source: SourceMetadata,
): Result<ContractRecord, ExtractionError> {
  const ctx: NormalizeContext = { equipmentLookup: ruleSet.equipmentLookup };
  const fields: ContractFields = {};

  for (const rule of ruleSet.rules) {
    const extracted = extractField(text, rule, ctx);
    if (extracted) {
      fields[rule.field] = extracted;
    }
  }

  const missingFields: string[] = [];
  for (const field of ruleSet.required) {
    if (!fields[field]) missingFields.push(field);
  }
  for (const group of ruleSet.requiredAnyOf) {
    if (!group.some((field) => fields[field])) missingFields.push(group.join('_or_'));
  }

  if (missingFields.length > 0) {
    return err({
      code: ErrorCode.EXTRACTION_MISSING_FIELDS,
      message: `Missing required field(s): ${missingFields.join(', ')}`,
      retryable: false,
      details: source.name,
      missingFields,
    });
  }

  return ok({ documentId, sourceRef: source.sourceRef, fields });
}

export function fieldValue(record: ContractRecord, field: keyof ContractFields): string {
  return record.fields[field]?.value ?? '';
}
