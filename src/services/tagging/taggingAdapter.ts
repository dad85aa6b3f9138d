import { isLabel, type LabeledToken, type TokenFeatureVector } from '../../types';
import { TaggingUnavailableError } from '../parsing/errors';
import { createLogger, type Logger } from '../utils/logger';
import type { Tagger } from './tagger';

export interface TaggingAdapterOptions {
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * The single boundary to a tagging backend. Every call is bounded by a
 * timeout and its output checked against the input; any problem surfaces as
 * TaggingUnavailableError.
 */
export class TaggingAdapter {
  readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(readonly tagger: Tagger, options: TaggingAdapterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.logger ?? createLogger('tagging');
  }

  private call(features: readonly TokenFeatureVector[]): Promise<unknown> {
    const controller = new AbortController();
    const name = this.tagger.name;

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(new TaggingUnavailableError(name, `timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      Promise.resolve()
        .then(() => this.tagger.tag(features, { signal: controller.signal }))
        .then(
          labels => {
            clearTimeout(timer);
            resolve(labels);
          },
          (err: unknown) => {
            clearTimeout(timer);
            const message = err instanceof Error ? err.message : String(err);
            reject(new TaggingUnavailableError(name, message, { cause: err }));
          }
        );
    });
  }

  async label(features: readonly TokenFeatureVector[]): Promise<LabeledToken[]> {
    const name = this.tagger.name;
    const labels = await this.call(features);

    if (!Array.isArray(labels)) {
      throw new TaggingUnavailableError(name, 'returned no label sequence');
    }
    if (labels.length !== features.length) {
      this.log.warn(`${name} returned ${labels.length} labels for ${features.length} tokens`);
      throw new TaggingUnavailableError(
        name,
        `returned ${labels.length} labels for ${features.length} tokens`
      );
    }

    return features.map((vector, i) => {
      const label: unknown = labels[i];
      if (!isLabel(label)) {
        throw new TaggingUnavailableError(name, `returned unknown label "${String(label)}" at token ${i}`);
      }
      return { token: vector.token, label };
    });
  }
}
