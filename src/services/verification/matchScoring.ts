import type { CitationRecord, RetrievedReferenceData, VerificationSource, VerificationSourceName } from '../../types';
import { surnameOf } from '../utils/authorNormalization';
import { titleSimilarity } from '../utils/stringMatching';

const TITLE_WEIGHT = 0.5;
const AUTHOR_WEIGHT = 0.3;
const YEAR_WEIGHT = 0.2;

function surnameKey(name: string): string {
  return surnameOf(name).toLowerCase().replace(/[^\p{L}]/gu, '');
}

/** Share of surnames found on both sides, over the longer list */
export function authorOverlap(recorded: readonly string[], retrieved: readonly string[]): number {
  const ours = recorded.map(surnameKey).filter(Boolean);
  const theirs = retrieved.map(surnameKey).filter(Boolean);
  if (ours.length === 0 || theirs.length === 0) return 0;

  const matched = ours.filter(name => theirs.some(other => other.includes(name) || name.includes(other))).length;
  return matched / Math.max(ours.length, theirs.length);
}

export function yearScore(recorded: number, retrieved: number): number {
  const diff = Math.abs(recorded - retrieved);
  return diff === 0 ? 1 : diff === 1 ? 0.9 : diff === 2 ? 0.7 : 0.3;
}

/**
 * Weighted agreement between a record and what a source returned: title
 * 0.5, authors 0.3, year 0.2. Fields missing on either side drop out of
 * the weighting.
 */
export function matchScore(record: CitationRecord, retrieved: RetrievedReferenceData): number {
  let score = 0;
  let weights = 0;

  if (record.title && retrieved.title) {
    score += titleSimilarity(record.title, retrieved.title) * TITLE_WEIGHT;
    weights += TITLE_WEIGHT;
  }

  if (record.authors.length > 0 && retrieved.authors.length > 0) {
    score += authorOverlap(record.authors, retrieved.authors) * AUTHOR_WEIGHT;
    weights += AUTHOR_WEIGHT;
  }

  if (record.year !== undefined && retrieved.year !== null) {
    score += yearScore(record.year, retrieved.year) * YEAR_WEIGHT;
    weights += YEAR_WEIGHT;
  }

  return weights > 0 ? score / weights : 0;
}

export function sourceResult(
  name: VerificationSourceName,
  record: CitationRecord,
  retrieved: RetrievedReferenceData | null,
  errors: string[]
): VerificationSource {
  if (!retrieved) return { name, found: false, matchScore: 0, retrievedData: null, errors };
  return { name, found: true, matchScore: matchScore(record, retrieved), retrievedData: retrieved, errors };
}
