import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import { extractionRuleSetSchema } from '../../domain/schemas.js';
import type { ContractField, ExtractionRuleSet } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { buildEquipmentLookup, normalizeValue } from './normalizers.js';
import type { CompiledCandidate, CompiledRule, CompiledRuleSet } from './types.js';

const log = logger.child({ module: 'extraction-rules' });

// A record is only processable with a customer and a way to reach them,
// whatever the rules file adds on top.
const BASELINE_REQUIRED: readonly ContractField[] = ['customer_name'];
const BASELINE_REQUIRED_ANY_OF: readonly (readonly ContractField[])[] = [['phone', 'address']];

function withBaseline(
  required: ContractField[],
  requiredAnyOf: ContractField[][],
): { required: ContractField[]; requiredAnyOf: ContractField[][] } {
  const groupKey = (group: readonly ContractField[]): string => [...group].sort().join('|');
  const configuredGroups = new Set(requiredAnyOf.map(groupKey));

  return {
    required: [...BASELINE_REQUIRED.filter((field) => !required.includes(field)), ...required],
    requiredAnyOf: [
      ...BASELINE_REQUIRED_ANY_OF.filter((group) => !configuredGroups.has(groupKey(group))).map((group) => [...group]),
      ...requiredAnyOf,
    ],
  };
}

function defaultConfidence(index: number): number {
  return Math.round(Math.max(0.5, 1 - 0.1 * index) * 100) / 100;
}

function invalidRules(message: string, details?: string): AppError {
  return createAppError(ErrorCode.CONFIG_INVALID, message, false, details);
}

export function compileRuleSet(ruleSet: ExtractionRuleSet): Result<CompiledRuleSet, AppError> {
  const equipmentLookup = buildEquipmentLookup(ruleSet.equipmentAliases);
  const seen = new Set<ContractField>();
  const rules: CompiledRule[] = [];

  for (const rule of ruleSet.rules) {
    if (seen.has(rule.field)) {
      return err(invalidRules(`Field '${rule.field}' has more than one rule`));
    }
    seen.add(rule.field);

    const candidates: CompiledCandidate[] = [];
    for (const [index, candidate] of rule.candidates.entries()) {
      let regex: RegExp;
      try {
        // matchAll needs the global flag; it clones the regex, so no lastIndex is shared
        regex = new RegExp(candidate.pattern, `${candidate.flags ?? ''}g`);
      } catch (cause) {
        return err(invalidRules(`Invalid pattern '${candidate.id}' for field '${rule.field}'`, describeError(cause)));
      }
      candidates.push({
        id: candidate.id,
        regex,
        template: candidate.template,
        confidence: candidate.confidence ?? defaultConfidence(index),
      });
    }

    const exclude = new Set(
      (rule.exclude ?? []).map((value) => normalizeValue(rule.normalize, value, { equipmentLookup })),
    );

    rules.push({ field: rule.field, normalize: rule.normalize, candidates, exclude });
  }

  return ok({
    rules,
    ...withBaseline(ruleSet.required, ruleSet.requiredAnyOf),
    equipmentLookup,
  });
}

export function parseRuleSet(raw: unknown): Result<CompiledRuleSet, AppError> {
  const parsed = extractionRuleSetSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(invalidRules('Invalid extraction rule set', details));
  }
  return compileRuleSet(parsed.data);
}

export async function loadExtractionRules(path: string): Promise<Result<CompiledRuleSet, AppError>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (cause) {
    const details = describeError(cause);
    log.error({ path, errorCode: ErrorCode.CONFIG_INVALID, details }, 'Failed to read extraction rules');
    return err(invalidRules('Failed to read extraction rules', details));
  }

  const result = parseRuleSet(raw);
  if (!result.ok) {
    log.error({ path, errorCode: result.error.code, details: result.error.details }, result.error.message);
    return result;
  }

  log.info({ path, ruleCount: result.value.rules.length }, 'Extraction rules loaded');
  return result;
}
