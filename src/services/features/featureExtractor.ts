import type { ReferenceCandidate, Token, TokenFeatureVector } from '../../types';
import { MalformedCandidateError } from '../parsing/errors';
import { hasWordTokens, tokenize } from '../segmentation/tokenizer';
import { defaultTokenFeatures, type TokenFeature } from './features';

/**
 * Word shape: upper -> X, lower -> x, digit -> d, punctuation kept,
 * runs longer than four collapsed ("Journal," -> "Xxxxx,")
 */
export function wordShape(text: string): string {
  const mapped = [...text]
    .map(ch => {
      if (/\p{Lu}/u.test(ch)) return 'X';
      if (/\p{Ll}/u.test(ch)) return 'x';
      if (/\p{N}/u.test(ch)) return 'd';
      return ch;
    })
    .join('');
  return mapped.replace(/(.)\1{4,}/g, '$1$1$1$1');
}

export function featuresForTokens(
  tokens: readonly Token[],
  features: readonly TokenFeature[] = defaultTokenFeatures
): TokenFeatureVector[] {
  return tokens.map((token, index) => {
    const values: Record<string, number> = {};
    for (const feature of features) {
      const v = feature.apply({ tokens, index });
      if (v !== 0) values[feature.id] = v;
    }
    return { token, shape: wordShape(token.text), features: values };
  });
}

/**
 * Tokenize a candidate body and compute one feature vector per token.
 * Throws MalformedCandidateError when nothing word-like is left.
 */
export function extractFeatures(
  candidate: ReferenceCandidate,
  features: readonly TokenFeature[] = defaultTokenFeatures
): TokenFeatureVector[] {
  const tokens = tokenize(candidate.body);
  if (!hasWordTokens(tokens)) {
    throw new MalformedCandidateError(
      candidate.index,
      `Candidate ${candidate.index} (lines ${candidate.startLine + 1}-${candidate.endLine + 1}) has no tokens`
    );
  }
  return featuresForTokens(tokens, features);
}
