import type { Label, ReferenceCandidate, TokenFeatureVector } from '../types';
import { isYearToken } from '../services/features/features';
import { segmentReferences } from '../services/segmentation/referenceSegmenter';
import type { TagOptions, Tagger } from '../services/tagging/tagger';
import { createLogger } from '../services/utils/logger';

export const silentLogger = createLogger('test', 'silent');

/** First candidate segmented from a single line */
export function candidateOf(line: string): ReferenceCandidate {
  const [candidate] = segmentReferences([line]);
  if (!candidate) throw new Error(`no candidate in ${JSON.stringify(line)}`);
  return candidate;
}

/**
 * Labels everything before the first year token as author, the year itself
 * as year, and the rest as title
 */
export function yearSplitLabels(features: readonly TokenFeatureVector[]): Label[] {
  let seenYear = false;
  return features.map(({ token }) => {
    if (!seenYear && isYearToken(token.text)) {
      seenYear = true;
      return 'year';
    }
    return seenYear ? 'title' : 'author';
  });
}

export class StubTagger implements Tagger {
  readonly calls: TokenFeatureVector[][] = [];

  constructor(
    readonly name = 'stub',
    private readonly impl: (features: readonly TokenFeatureVector[], options: TagOptions) => Promise<Label[]> =
      async features => yearSplitLabels(features)
  ) {}

  tag(features: readonly TokenFeatureVector[], options: TagOptions): Promise<Label[]> {
    this.calls.push([...features]);
    return this.impl(features, options);
  }
}

/** A promise that settles only when the signal aborts */
export function untilAborted(signal: AbortSignal): Promise<Label[]> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}
