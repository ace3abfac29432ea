/** Lower-cases, strips diacritics and punctuation, and collapses whitespace. */
export function normalizeName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/['’.]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

function tokenize(normalized: string): string[] {
  return normalized.length === 0 ? [] : normalized.split(' ');
}

function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
}

/** 1 - distance / longer length. Zero when either side is empty. */
export function levenshteinRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  return 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
}

export function tokenSortRatio(a: string, b: string): number {
  const sortedA = tokenize(a).sort().join(' ');
  const sortedB = tokenize(b).sort().join(' ');
  return levenshteinRatio(sortedA, sortedB);
}

/**
 * Compares the shared tokens against each side's shared-plus-remaining
 * tokens, so a name with an extra middle initial still scores highly.
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = new Set(tokenize(a));
  const tokensB = new Set(tokenize(b));

  const shared = [...tokensA].filter((t) => tokensB.has(t)).sort();
  const onlyA = [...tokensA].filter((t) => !tokensB.has(t)).sort();
  const onlyB = [...tokensB].filter((t) => !tokensA.has(t)).sort();

  const t0 = shared.join(' ');
  const t1 = [...shared, ...onlyA].join(' ');
  const t2 = [...shared, ...onlyB].join(' ');

  return Math.max(levenshteinRatio(t0, t1), levenshteinRatio(t0, t2), levenshteinRatio(t1, t2));
}

/** Similarity of two raw names in [0, 1]. */
export function nameSimilarity(a: string, b: string): number {
  const left = normalizeName(a);
  const right = normalizeName(b);
  if (left.length === 0 || right.length === 0) return 0;
  if (left === right) return 1;
  return Math.max(levenshteinRatio(left, right), tokenSortRatio(left, right), tokenSetRatio(left, right));
}
