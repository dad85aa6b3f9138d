import type { ParseProgress, ParseResult, RawInput, ReferenceCandidate } from '../../types';
import { defaultSettings } from '../../types/settings';
import { assembleSpans } from '../assembly/spanAssembler';
import { extractFeatures } from '../features/featureExtractor';
import { normalizeRecord } from '../normalization/recordNormalizer';
import { segmentReferences, splitLines } from '../segmentation/referenceSegmenter';
import { SequenceTagger } from '../tagging/sequenceTagger';
import type { Tagger } from '../tagging/tagger';
import { TaggingAdapter } from '../tagging/taggingAdapter';
import { createLogger, type Logger } from '../utils/logger';
import { buildFailure, failureFromError, isRecoverable } from './errors';

export interface ParserOptions {
  tagger?: Tagger;
  /** Candidates processed concurrently per wave */
  batchSize?: number;
  continueOnFailure?: boolean;
  taggingTimeoutMs?: number;
  onProgress?: (progress: ParseProgress) => void;
  logger?: Logger;
}

export interface ReferenceParser {
  readonly tagger: Tagger;
  parse(rawText: string): Promise<ParseResult[]>;
  parseLines(lines: RawInput): Promise<ParseResult[]>;
}

// Shared by every parser, so loggers passed to several parsers still get
// distinct timer labels
let runCount = 0;

function preview(candidate: ReferenceCandidate): string {
  const text = candidate.text;
  return text.length > 80 ? `${text.slice(0, 77)}...` : text || `Reference ${candidate.index + 1}`;
}

async function processCandidate(
  candidate: ReferenceCandidate,
  run: number,
  adapter: TaggingAdapter,
  log: Logger
): Promise<ParseResult> {
  const label = `run ${run} candidate ${candidate.index + 1}`;
  log.time(label);
  try {
    const features = extractFeatures(candidate);
    const labeled = await adapter.label(features);
    const spans = assembleSpans(candidate.body, labeled);
    const record = normalizeRecord(spans, candidate);
    return { ok: true, candidate, record };
  } catch (err) {
    if (!isRecoverable(err)) throw err;
    log.warn(`Reference ${candidate.index + 1} (line ${candidate.startLine + 1}) failed:`, err.message);
    return { ok: false, candidate, failure: failureFromError(candidate, err) };
  } finally {
    log.timeEnd(label);
  }
}

/**
 * Build a reference parser. Each call to parse() is self-contained: the
 * candidates of one run share nothing but the (stateless) tagging adapter.
 */
export function createParser(options: ParserOptions = {}): ReferenceParser {
  const log = options.logger ?? createLogger('parser');
  const tagger = options.tagger ?? new SequenceTagger();
  const batchSize = Math.max(1, Math.floor(options.batchSize ?? defaultSettings.pipeline.batchSize));
  const continueOnFailure = options.continueOnFailure ?? defaultSettings.pipeline.continueOnFailure;
  const adapter = new TaggingAdapter(tagger, {
    timeoutMs: options.taggingTimeoutMs ?? defaultSettings.tagging.timeoutMs,
    logger: log.child('tagging'),
  });

  const parseLines = async (lines: RawInput): Promise<ParseResult[]> => {
    const run = ++runCount;
    const candidates = segmentReferences(lines);
    const results: ParseResult[] = [];
    if (candidates.length === 0) return results;

    log.info(`Parsing ${candidates.length} reference(s) with ${tagger.name}`);
    let completed = 0;
    let aborted = false;

    for (let start = 0; start < candidates.length; start += batchSize) {
      const wave = candidates.slice(start, start + batchSize);

      if (aborted) {
        for (const candidate of wave) {
          results.push({
            ok: false,
            candidate,
            failure: buildFailure(candidate, 'BatchAborted', 'Skipped after an earlier failure'),
          });
        }
        continue;
      }

      const waveResults = await Promise.all(
        wave.map(async candidate => {
          const result = await processCandidate(candidate, run, adapter, log);
          completed++;
          options.onProgress?.({ total: candidates.length, completed, current: preview(candidate) });
          return result;
        })
      );

      for (const result of waveResults) {
        results.push(result);
        if (!result.ok && !continueOnFailure) aborted = true;
      }
    }

    const failed = results.filter(r => !r.ok).length;
    log.info(`Parsed ${results.length} reference(s): ${results.length - failed} ok, ${failed} failed`);
    return results;
  };

  return {
    tagger,
    parse: rawText => parseLines(splitLines(rawText)),
    parseLines,
  };
}

/**
 * One-shot convenience around createParser().parse()
 */
export function parseReferences(rawText: string, options: ParserOptions = {}): Promise<ParseResult[]> {
  return createParser(options).parse(rawText);
}
