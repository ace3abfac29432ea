import type { MatchResult, RepresentativeIdentity, RepresentativeRegistry } from '../../domain/types.js';
import { nameSimilarity } from './similarity.js';

export { loadRepresentativeRegistry, parseRegistry } from './registry.js';
export { nameSimilarity, normalizeName } from './similarity.js';

export const DEFAULT_MATCH_THRESHOLD = 0.8;

interface ScoredIdentity {
  identity: RepresentativeIdentity;
  score: number;
  matchedName: string;
}

function scoreIdentity(rawName: string, identity: RepresentativeIdentity): ScoredIdentity {
  let best: ScoredIdentity = { identity, score: 0, matchedName: identity.name };
  for (const name of [identity.name, ...identity.aliases]) {
    const score = nameSimilarity(rawName, name);
    if (score > best.score) {
      best = { identity, score, matchedName: name };
    }
  }
  return best;
}

function outranks(candidate: ScoredIdentity, current: ScoredIdentity | null): boolean {
  if (current === null) return true;
  if (candidate.score !== current.score) return candidate.score > current.score;
  // equal scores: lexicographically first canonical name wins (code-unit order)
  return candidate.identity.name < current.identity.name;
}

/**
 * Resolves a raw representative name to a registry identity. The top score
 * is independent of the threshold; the threshold only decides whether that
 * top identity is accepted.
 */
export function resolveRepresentative(
  rawName: string | undefined,
  registry: RepresentativeRegistry,
  threshold: number = DEFAULT_MATCH_THRESHOLD,
): MatchResult {
  if (rawName === undefined || rawName.trim().length === 0) {
    return { status: 'unmatched', bestCandidate: null, confidence: 0 };
  }

  let best: ScoredIdentity | null = null;
  for (const identity of registry.representatives) {
    const scored = scoreIdentity(rawName, identity);
    if (outranks(scored, best)) best = scored;
  }

  if (best === null || best.score === 0) {
    return { status: 'unmatched', bestCandidate: null, confidence: 0 };
  }

  if (best.score >= threshold) {
    return {
      status: 'matched',
      identity: best.identity,
      confidence: best.score,
      matchedName: best.matchedName,
    };
  }

  return { status: 'unmatched', bestCandidate: best.identity, confidence: best.score };
}
