import { v4 as uuidv4 } from 'uuid';
import type { CitationRecord, FieldSpan, Label, ReferenceCandidate } from '../../types';
import { parseAuthors } from '../utils/authorNormalization';
import { extractDOI, extractURLs } from '../utils/doiParser';
import { detectScript, titleKey, trimSpanText } from '../utils/textCleaning';
import { resolveVenue } from './venueAbbreviations';

const FOUR_DIGITS = /(?<!\d)\d{4}(?!\d)/;
const VOLUME_ISSUE = /^(?:vol(?:ume)?\.?\s*)?(\d+[A-Za-z]?)\s*\(([^)]+)\)/i;

/**
 * Trimmed span texts grouped by label, in token order; empty ones dropped
 */
export function groupSpanTexts(spans: readonly FieldSpan[]): Map<Label, string[]> {
  const groups = new Map<Label, string[]>();
  for (const span of spans) {
    const text = trimSpanText(span.text);
    if (!text) continue;
    const list = groups.get(span.label) ?? [];
    list.push(text);
    groups.set(span.label, list);
  }
  return groups;
}

function joined(groups: Map<Label, string[]>, label: Label): string | undefined {
  const texts = groups.get(label);
  return texts && texts.length > 0 ? texts.join(' ') : undefined;
}

export function parseYear(text: string | undefined): number | undefined {
  if (!text) return undefined;
  const m = text.match(FOUR_DIGITS);
  return m ? parseInt(m[0], 10) : undefined;
}

export function parseVolume(text: string | undefined): { volume?: string; issue?: string } {
  if (!text) return {};
  const m = text.match(VOLUME_ISSUE);
  if (m && m[1] && m[2]) return { volume: m[1], issue: m[2].trim() };
  const volume = text.replace(/^vol(?:ume)?\.?\s*/i, '').replace(/\.$/, '').trim();
  return volume ? { volume } : {};
}

export function parsePages(text: string | undefined): string | undefined {
  if (!text) return undefined;
  const pages = text
    .replace(/^pp?\.\s*/i, '')
    .replace(/\s*[–—]\s*/g, '-')
    .replace(/\.$/, '')
    .trim();
  return pages || undefined;
}

function collectUrls(urlTexts: readonly string[], raw: string): string[] {
  const urls: string[] = [];
  for (const url of [...urlTexts.flatMap(extractURLs), ...extractURLs(raw)]) {
    if (!urls.includes(url)) urls.push(url);
  }
  return urls;
}

/**
 * Turn labeled spans into a citation record. Never throws: fields that
 * cannot be recovered are left out, and `raw` always carries the candidate
 * text verbatim. The record and its lists are frozen.
 */
export function normalizeRecord(spans: readonly FieldSpan[], candidate: ReferenceCandidate): CitationRecord {
  const groups = groupSpanTexts(spans);
  const raw = candidate.text;

  const title = joined(groups, 'title') ?? '';
  const authors = (groups.get('author') ?? []).flatMap(parseAuthors);
  const year = parseYear(joined(groups, 'year'));
  const venueText = joined(groups, 'venue');
  const venue = venueText ? resolveVenue(venueText) : undefined;
  const { volume, issue } = parseVolume(joined(groups, 'volume'));
  const pages = parsePages(joined(groups, 'pages'));
  const publisher = joined(groups, 'publisher');
  const doiText = joined(groups, 'doi');
  const doi = (doiText ? extractDOI(doiText) : null) ?? extractDOI(raw);

  const record: CitationRecord = {
    id: uuidv4(),
    raw,
    title,
    authors: Object.freeze(authors),
    ...(year !== undefined ? { year } : {}),
    ...(venue !== undefined ? { venue } : {}),
    ...(volume !== undefined ? { volume } : {}),
    ...(issue !== undefined ? { issue } : {}),
    ...(pages !== undefined ? { pages } : {}),
    ...(publisher !== undefined ? { publisher } : {}),
    doi,
    urls: Object.freeze(collectUrls(groups.get('url') ?? [], raw)),
    citationNumber: candidate.citationNumber,
    titleKey: titleKey(title),
    script: detectScript(raw),
  };

  return Object.freeze(record);
}
