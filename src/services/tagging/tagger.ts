import type { Label, TokenFeatureVector } from '../../types';

export interface TagOptions {
  signal: AbortSignal;
}

/**
 * A sequence-labeling backend: one label per feature vector, in order.
 * Backends may be slow or fail; the tagging adapter bounds and checks them.
 */
export interface Tagger {
  readonly name: string;
  tag(features: readonly TokenFeatureVector[], options: TagOptions): Promise<Label[]>;
}
