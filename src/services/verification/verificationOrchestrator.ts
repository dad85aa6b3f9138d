import type {
  CitationRecord,
  UrlCheck,
  VerificationResult,
  VerificationSource,
  VerificationSourceName,
} from '../../types';
import { createLogger, type Logger } from '../utils/logger';
import { verifyWithCrossref } from './crossrefLookup';
import { DEFAULT_HTTP_TIMEOUT_MS, type FetchLike } from './http';
import { DEFAULT_MATCH_THRESHOLD, type LocalTitleIndex } from './localTitleIndex';
import { verifyWithOpenAlex } from './openAlexLookup';
import { checkUrl } from './urlAvailability';

export interface VerifierOptions {
  knownTitles?: LocalTitleIndex | null;
  crossref?: boolean;
  openAlex?: boolean;
  checkUrls?: boolean;
  /** Score a source must reach for the record to count as verified */
  threshold?: number;
  fetch?: FetchLike;
  mailto?: string | null;
  timeoutMs?: number;
  logger?: Logger;
}

export interface ReferenceVerifier {
  readonly sources: readonly VerificationSourceName[];
  verify(record: CitationRecord): Promise<VerificationResult>;
  verifyAll(records: readonly CitationRecord[]): Promise<VerificationResult[]>;
}

function best(sources: readonly VerificationSource[]): VerificationSource | null {
  let top: VerificationSource | null = null;
  for (const source of sources) {
    if (source.found && (!top || source.matchScore > top.matchScore)) top = source;
  }
  return top;
}

/**
 * Build a verifier that checks records against the known-title list and
 * then the enabled remote sources, in that order, stopping at the first
 * source that reaches the threshold.
 */
export function createVerifier(options: VerifierOptions = {}): ReferenceVerifier {
  const log = options.logger ?? createLogger('verify');
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const http = {
    fetch: options.fetch,
    timeoutMs: options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
    mailto: options.mailto ?? null,
    logger: log,
  };

  const steps: Array<[VerificationSourceName, (record: CitationRecord) => Promise<VerificationSource>]> = [];
  const knownTitles = options.knownTitles;
  if (knownTitles) steps.push(['local', async record => knownTitles.verify(record, threshold)]);
  if (options.crossref) steps.push(['crossref', record => verifyWithCrossref(record, http)]);
  if (options.openAlex) steps.push(['openalex', record => verifyWithOpenAlex(record, http)]);

  const verify = async (record: CitationRecord): Promise<VerificationResult> => {
    const sources: VerificationSource[] = [];
    for (const [, step] of steps) {
      const source = await step(record);
      sources.push(source);
      if (source.found && source.matchScore >= threshold) break;
    }

    const urls: UrlCheck[] = [];
    if (options.checkUrls) {
      for (const url of record.urls) urls.push(await checkUrl(url, http));
    }

    const bestMatch = best(sources);
    const status = bestMatch && bestMatch.matchScore >= threshold ? 'verified' : 'unverified';
    log.debug(`Record ${record.id}: ${status}`, bestMatch ? `(${bestMatch.name} ${bestMatch.matchScore.toFixed(2)})` : '');
    return { recordId: record.id, status, bestMatch, sources, urls };
  };

  return {
    sources: steps.map(([name]) => name),
    verify,
    // sequential; the remote APIs rate-limit per client
    verifyAll: async records => {
      const results: VerificationResult[] = [];
      for (const record of records) results.push(await verify(record));
      const verified = results.filter(r => r.status === 'verified').length;
      log.info(`Verified ${verified} of ${results.length} record(s)`);
      return results;
    },
  };
}
