import type { CitationRecord, RetrievedReferenceData, VerificationSource } from '../../types';
import { titleSimilarity } from '../utils/stringMatching';
import { titleKey } from '../utils/textCleaning';
import type { RemoteLookupOptions } from './crossrefLookup';
import { fetchJson, isRecord, messageOf, stringField, withMailto } from './http';
import { sourceResult } from './matchScoring';

const OPENALEX_API = 'https://api.openalex.org/works';
const SEARCH_MIN_SIMILARITY = 0.6;

function authorsOf(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((authorship: unknown) => {
    if (!isRecord(authorship) || !isRecord(authorship.author)) return [];
    const name = stringField(authorship.author, 'display_name');
    return name ? [name] : [];
  });
}

function venueOf(location: unknown): string | null {
  if (!isRecord(location) || !isRecord(location.source)) return null;
  return stringField(location.source, 'display_name');
}

export function openAlexWorkData(work: unknown): RetrievedReferenceData | null {
  if (!isRecord(work)) return null;
  const title = stringField(work, 'display_name') ?? stringField(work, 'title') ?? '';
  const doiUrl = stringField(work, 'doi');
  if (!title && !doiUrl) return null;

  return {
    title,
    authors: authorsOf(work.authorships),
    year: typeof work.publication_year === 'number' ? work.publication_year : null,
    venue: venueOf(work.primary_location),
    doi: doiUrl ? doiUrl.replace(/^https?:\/\/(?:dx\.)?doi\.org\//, '') : null,
    url: doiUrl,
  };
}

async function lookupByDoi(doi: string, options: RemoteLookupOptions): Promise<RetrievedReferenceData | null> {
  return openAlexWorkData(await fetchJson(withMailto(`${OPENALEX_API}/https://doi.org/${doi}`, options.mailto), options));
}

async function searchByTitle(title: string, options: RemoteLookupOptions): Promise<RetrievedReferenceData | null> {
  const url = withMailto(`${OPENALEX_API}?search=${encodeURIComponent(titleKey(title))}&per-page=5`, options.mailto);
  const body = await fetchJson(url, options);
  if (!isRecord(body) || !Array.isArray(body.results)) return null;

  let best: RetrievedReferenceData | null = null;
  let bestScore = SEARCH_MIN_SIMILARITY;
  for (const work of body.results) {
    const data = openAlexWorkData(work);
    if (!data) continue;
    const score = titleSimilarity(title, data.title);
    options.logger?.debug('OpenAlex candidate:', data.title, 'score:', score.toFixed(2));
    if (score > bestScore) {
      bestScore = score;
      best = data;
    }
  }
  return best;
}

/**
 * Look a record up in OpenAlex, by DOI first and then by title
 */
export async function verifyWithOpenAlex(
  record: CitationRecord,
  options: RemoteLookupOptions = {}
): Promise<VerificationSource> {
  const errors: string[] = [];
  let data: RetrievedReferenceData | null = null;

  if (record.doi) {
    try {
      data = await lookupByDoi(record.doi, options);
    } catch (err) {
      options.logger?.warn('OpenAlex DOI lookup failed:', messageOf(err));
      errors.push(`OpenAlex DOI lookup failed: ${messageOf(err)}`);
    }
  }

  if (!data && record.title) {
    try {
      data = await searchByTitle(record.title, options);
    } catch (err) {
      options.logger?.warn('OpenAlex search failed:', messageOf(err));
      errors.push(`OpenAlex search failed: ${messageOf(err)}`);
    }
  }

  if (!data && errors.length === 0) errors.push('Not found in OpenAlex');
  return sourceResult('openalex', record, data, errors);
}
