import { titleKey } from './textCleaning';

/**
 * Edit distance between two strings, two rows at a time
 */
export function levenshteinDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(previous[j - 1] + cost, previous[j] + 1, current[j - 1] + 1);
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Title folded for matching, with a leading article dropped
 */
export function matchKey(title: string): string {
  return titleKey(title).replace(/^(?:the|a|an)\s+/, '');
}

/** 1 - distance / longer length, on already folded keys */
export function stringSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;
  return 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
}

/**
 * Share of words (longer than two characters) the keys have in common,
 * counting near-identical long words as partial matches. Tolerates
 * reordered words.
 */
export function tokenSimilarity(a: string, b: string): number {
  const wordsA = a.split(' ').filter(w => w.length > 2);
  const wordsB = b.split(' ').filter(w => w.length > 2);
  if (wordsA.length === 0 || wordsB.length === 0) return 0;

  let matched = 0;
  for (const wordA of wordsA) {
    for (const wordB of wordsB) {
      if (wordA === wordB) {
        matched++;
        break;
      }
      if (wordA.length > 4 && wordB.length > 4) {
        const sim = stringSimilarity(wordA, wordB);
        if (sim > 0.8) {
          matched += sim;
          break;
        }
      }
    }
  }

  return matched / new Set([...wordsA, ...wordsB]).size;
}

/**
 * Similarity of two match keys (see matchKey). A key contained in the
 * other scores by length ratio, which covers truncated titles.
 */
export function keySimilarity(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  if (a === b) return 1;
  if (a.includes(b) || b.includes(a)) {
    return Math.min(a.length, b.length) / Math.max(a.length, b.length);
  }
  return Math.max(stringSimilarity(a, b), tokenSimilarity(a, b));
}

export function titleSimilarity(a: string, b: string): number {
  return keySimilarity(matchKey(a), matchKey(b));
}
