import type { CollaborationSuggestion, Lab, PairScore, Researcher } from '../../types/models/Collaboration';

export const BASE_SCORE = 30;
export const IDENTICAL_FOCUS_BONUS = 40;
export const SHARED_KEYWORD_BONUS = 20;
/** Awarded per (researcher of A, researcher of B) pair whose expertise overlaps. Not capped on its own. */
export const EXPERTISE_OVERLAP_BONUS = 15;
export const MAX_SCORE = 100;
export const SUGGESTION_THRESHOLD = 60;

const MIN_KEYWORD_LENGTH = 3;
const STOP_WORDS: ReadonlySet<string> = new Set([
  'and',
  'the',
  'for',
  'with',
  'from',
  'into',
  'via',
  'lab',
  'labs',
  'laboratory',
  'research',
  'studies',
]);

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function pairKey(labAId: string, labBId: string): string {
  return compareIds(labAId, labBId) <= 0 ? `${labAId}::${labBId}` : `${labBId}::${labAId}`;
}

export function normalizeFocus(focus: string): string {
  return focus.trim().toLowerCase();
}

export function focusKeywords(focus: string): Set<string> {
  const tokens = normalizeFocus(focus).split(/[^a-z0-9]+/);
  return new Set(tokens.filter(token => token.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(token)));
}

export function expertiseTags(researcher: Researcher): Set<string> {
  return new Set(researcher.expertise.map(tag => tag.trim().toLowerCase()).filter(tag => tag.length > 0));
}

function intersects(a: Set<string>, b: Set<string>): boolean {
  for (const value of a) {
    if (b.has(value)) {
      return true;
    }
  }
  return false;
}

/**
 * Scores one unordered pair of labs. The caller passes the pair in id order;
 * the result keeps that order.
 */
export function scorePair(labA: Lab, labB: Lab, researchersA: Researcher[], researchersB: Researcher[]): PairScore {
  const focusA = normalizeFocus(labA.focusArea);
  const focusB = normalizeFocus(labB.focusArea);

  let domainBonus = 0;
  let sharedKeywords: string[] = [];
  if (focusA && focusB) {
    if (focusA === focusB) {
      domainBonus = IDENTICAL_FOCUS_BONUS;
    } else {
      const keywordsB = focusKeywords(focusB);
      sharedKeywords = [...focusKeywords(focusA)].filter(keyword => keywordsB.has(keyword)).sort();
      if (sharedKeywords.length > 0) {
        domainBonus = SHARED_KEYWORD_BONUS;
      }
    }
  }

  const tagsB = researchersB.map(expertiseTags);
  let overlappingResearcherPairs = 0;
  for (const researcher of researchersA) {
    const tagsA = expertiseTags(researcher);
    overlappingResearcherPairs += tagsB.filter(tags => intersects(tagsA, tags)).length;
  }
  const expertiseBonus = overlappingResearcherPairs * EXPERTISE_OVERLAP_BONUS;

  return {
    labA,
    labB,
    score: Math.min(MAX_SCORE, BASE_SCORE + domainBonus + expertiseBonus),
    domainBonus,
    expertiseBonus,
    overlappingResearcherPairs,
    sharedKeywords,
  };
}

export function rationaleFor(pair: PairScore): string[] {
  const rationale: string[] = [];
  if (pair.domainBonus === IDENTICAL_FOCUS_BONUS) {
    rationale.push(`Identical research focus: ${pair.labA.focusArea.trim()}`);
  } else if (pair.sharedKeywords.length > 0) {
    rationale.push(`Related research focus (${pair.sharedKeywords.join(', ')})`);
  }
  if (pair.overlappingResearcherPairs > 0) {
    const noun = pair.overlappingResearcherPairs === 1 ? 'pair' : 'pairs';
    rationale.push(`${pair.overlappingResearcherPairs} researcher ${noun} with overlapping expertise`);
  }
  if (BASE_SCORE + pair.domainBonus + pair.expertiseBonus > MAX_SCORE) {
    rationale.push(`Score capped at ${MAX_SCORE}`);
  }
  return rationale;
}

export function groupResearchersByLab(researchers: Researcher[]): Map<string, Researcher[]> {
  const byLab = new Map<string, Researcher[]>();
  for (const researcher of researchers) {
    const list = byLab.get(researcher.labId) ?? [];
    list.push(researcher);
    byLab.set(researcher.labId, list);
  }
  return byLab;
}

/**
 * Every distinct pair of `labs`, each ordered so that `labA.id < labB.id`.
 */
export function scoreAllPairs(labs: Lab[], researchers: Researcher[]): PairScore[] {
  const ordered = [...labs].sort((a, b) => compareIds(a.id, b.id));
  const byLab = groupResearchersByLab(researchers);
  const pairs: PairScore[] = [];

  for (let i = 0; i < ordered.length; i++) {
    for (let j = i + 1; j < ordered.length; j++) {
      const labA = ordered[i];
      const labB = ordered[j];
      if (labA.id === labB.id) {
        continue;
      }
      pairs.push(scorePair(labA, labB, byLab.get(labA.id) ?? [], byLab.get(labB.id) ?? []));
    }
  }
  return pairs;
}

/**
 * Pairs scoring at least the suggestion threshold, best first. Equal scores
 * are ordered by `(labAId, labBId)`.
 */
export function suggestCollaborations(
  labs: Lab[],
  researchers: Researcher[],
  acceptedPairs: ReadonlySet<string> = new Set()
): CollaborationSuggestion[] {
  return scoreAllPairs(labs, researchers)
    .filter(pair => pair.score >= SUGGESTION_THRESHOLD)
    .sort(
      (a, b) =>
        b.score - a.score || compareIds(a.labA.id, b.labA.id) || compareIds(a.labB.id, b.labB.id)
    )
    .map(pair => ({
      labAId: pair.labA.id,
      labBId: pair.labB.id,
      labAName: pair.labA.name,
      labBName: pair.labB.name,
      score: pair.score,
      status: acceptedPairs.has(pairKey(pair.labA.id, pair.labB.id)) ? 'accepted' : 'suggested',
      rationale: rationaleFor(pair),
    }));
}
