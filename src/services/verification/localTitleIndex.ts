import { readFile } from 'fs/promises';
import type { CitationRecord, VerificationSource } from '../../types';
import { keySimilarity, matchKey } from '../utils/stringMatching';

export const DEFAULT_MATCH_THRESHOLD = 0.8;

export interface KnownTitleMatch {
  title: string;
  score: number;
}

/**
 * One title per line; blank lines and lines starting with "#" are skipped
 */
export function parseKnownTitles(text: string): string[] {
  return text
    .split(/\r\n|\r|\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * In-memory list of known titles, matched by folded title key
 */
export class LocalTitleIndex {
  private readonly entries: Array<{ title: string; key: string }> = [];

  constructor(titles: Iterable<string>) {
    const seen = new Set<string>();
    for (const title of titles) {
      const key = matchKey(title);
      if (!key || seen.has(key)) continue;
      seen.add(key);
      this.entries.push({ title, key });
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /** Best known title scoring at least `threshold`, or null */
  match(title: string, threshold = DEFAULT_MATCH_THRESHOLD): KnownTitleMatch | null {
    const key = matchKey(title);
    if (!key) return null;

    let best: KnownTitleMatch | null = null;
    for (const entry of this.entries) {
      const score = keySimilarity(key, entry.key);
      if (!best || score > best.score) best = { title: entry.title, score };
      if (score === 1) break;
    }

    return best && best.score >= threshold ? best : null;
  }

  verify(record: CitationRecord, threshold = DEFAULT_MATCH_THRESHOLD): VerificationSource {
    const hit = this.match(record.title, threshold);
    if (!hit) {
      return { name: 'local', found: false, matchScore: 0, retrievedData: null, errors: ['Title not in the known-title list'] };
    }
    return {
      name: 'local',
      found: true,
      matchScore: hit.score,
      retrievedData: { title: hit.title, authors: [], year: null, venue: null, doi: null, url: null },
      errors: [],
    };
  }
}

export async function loadKnownTitles(path: string): Promise<LocalTitleIndex> {
  return new LocalTitleIndex(parseKnownTitles(await readFile(path, 'utf8')));
}
