import type { CitationRecord, RetrievedReferenceData, VerificationSource } from '../../types';
import { surnameOf } from '../utils/authorNormalization';
import { titleSimilarity } from '../utils/stringMatching';
import type { Logger } from '../utils/logger';
import { fetchJson, firstString, isRecord, messageOf, stringField, withMailto, type HttpOptions } from './http';
import { sourceResult } from './matchScoring';

const CROSSREF_API = 'https://api.crossref.org/works';
// Search hits below this title similarity are not considered
const SEARCH_MIN_SIMILARITY = 0.6;

export interface RemoteLookupOptions extends HttpOptions {
  mailto?: string | null;
  logger?: Logger;
}

function yearOf(date: unknown): number | null {
  if (!isRecord(date)) return null;
  const parts: unknown = date['date-parts'];
  if (!Array.isArray(parts)) return null;
  const first: unknown = parts[0];
  if (!Array.isArray(first)) return null;
  const year: unknown = first[0];
  return typeof year === 'number' ? year : null;
}

function authorsOf(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((author: unknown) => {
    if (!isRecord(author)) return [];
    const family = stringField(author, 'family');
    if (!family) return [];
    const given = stringField(author, 'given');
    return [given ? `${given} ${family}` : family];
  });
}

/**
 * Fields of a Crossref work, or null when the value is not one
 */
export function crossrefWorkData(work: unknown): RetrievedReferenceData | null {
  if (!isRecord(work)) return null;
  const doi = stringField(work, 'DOI');
  const title = firstString(work.title) ?? '';
  if (!doi && !title) return null;

  return {
    title,
    authors: authorsOf(work.author),
    year: yearOf(work['published-print']) ?? yearOf(work['published-online']) ?? yearOf(work.issued),
    venue: firstString(work['container-title']),
    doi,
    url: doi ? `https://doi.org/${doi}` : null,
  };
}

async function lookupByDoi(doi: string, options: RemoteLookupOptions): Promise<RetrievedReferenceData | null> {
  const body = await fetchJson(withMailto(`${CROSSREF_API}/${encodeURIComponent(doi)}`, options.mailto), options);
  return isRecord(body) ? crossrefWorkData(body.message) : null;
}

async function searchByTitle(record: CitationRecord, options: RemoteLookupOptions): Promise<RetrievedReferenceData | null> {
  const [firstAuthor] = record.authors;
  const query = firstAuthor ? `${record.title} ${surnameOf(firstAuthor)}` : record.title;
  const url = withMailto(`${CROSSREF_API}?query.bibliographic=${encodeURIComponent(query)}&rows=5`, options.mailto);

  const body = await fetchJson(url, options);
  if (!isRecord(body) || !isRecord(body.message)) return null;
  const items: unknown = body.message.items;
  if (!Array.isArray(items)) return null;

  let best: RetrievedReferenceData | null = null;
  let bestScore = SEARCH_MIN_SIMILARITY;
  for (const item of items) {
    const data = crossrefWorkData(item);
    if (!data) continue;
    const score = titleSimilarity(record.title, data.title);
    options.logger?.debug('Crossref candidate:', data.title, 'score:', score.toFixed(2));
    if (score > bestScore) {
      bestScore = score;
      best = data;
    }
  }
  return best;
}

/**
 * Look a record up in Crossref: by DOI first, then by title and first
 * author. Request failures end up in `errors`; they never reject.
 */
export async function verifyWithCrossref(
  record: CitationRecord,
  options: RemoteLookupOptions = {}
): Promise<VerificationSource> {
  const errors: string[] = [];
  let data: RetrievedReferenceData | null = null;

  if (record.doi) {
    try {
      data = await lookupByDoi(record.doi, options);
    } catch (err) {
      options.logger?.warn('Crossref DOI lookup failed:', messageOf(err));
      errors.push(`Crossref DOI lookup failed: ${messageOf(err)}`);
    }
  }

  if (!data && record.title) {
    try {
      data = await searchByTitle(record, options);
    } catch (err) {
      options.logger?.warn('Crossref search failed:', messageOf(err));
      errors.push(`Crossref search failed: ${messageOf(err)}`);
    }
  }

  if (!data && errors.length === 0) errors.push('Not found in Crossref');
  return sourceResult('crossref', record, data, errors);
}
