import { normalizePhone } from '../../domain/phone.js';
import type { NormalizerKind } from '../../domain/types.js';
import type { NormalizeContext } from './types.js';

type Normalizer = (raw: string, ctx: NormalizeContext) => string;

function normalizeText(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim();
}

function normalizeCurrency(raw: string): string {
  const cleaned = raw.replace(/[^\d.]/g, '');
  if (!/^\d+(\.\d+)?$/.test(cleaned)) return '';
  return Number(cleaned).toFixed(2);
}

function normalizeCode(raw: string): string {
  return raw.replace(/\s+/g, '').toUpperCase();
}

function normalizeEquipment(raw: string, ctx: NormalizeContext): string {
  const codes: string[] = [];
  for (const token of raw.split(/[\s,.\-/]+/)) {
    const upper = token.toUpperCase();
    if (upper.length < 2) continue;
    const code = ctx.equipmentLookup.get(upper) ?? upper;
    if (!codes.includes(code)) codes.push(code);
  }
  return codes.join(' ');
}

const NORMALIZERS: Record<NormalizerKind, Normalizer> = {
  text: normalizeText,
  phone: normalizePhone,
  currency: normalizeCurrency,
  code: normalizeCode,
  equipment: normalizeEquipment,
};

export function normalizeValue(kind: NormalizerKind, raw: string, ctx: NormalizeContext): string {
  return NORMALIZERS[kind](raw, ctx);
}

export function buildEquipmentLookup(aliases: Record<string, string[]>): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const [code, variations] of Object.entries(aliases)) {
    lookup.set(code.toUpperCase(), code);
    for (const variation of variations) {
      lookup.set(variation.toUpperCase(), code);
    }
  }
  return lookup;
}
