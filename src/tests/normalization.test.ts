import { describe, expect, it } from 'vitest';
import type { Label, LabeledToken } from '../types';
import { assembleSpans } from '../services/assembly/spanAssembler';
import { parsePages, parseVolume, parseYear, normalizeRecord } from '../services/normalization/recordNormalizer';
import { resolveVenue } from '../services/normalization/venueAbbreviations';
import { tokenize } from '../services/segmentation/tokenizer';
import { isInitialsOnly, parseAuthors } from '../services/utils/authorNormalization';
import { extractDOI, extractURLs } from '../services/utils/doiParser';
import { detectScript, titleKey, trimSpanText } from '../services/utils/textCleaning';
import { candidateOf } from './helpers';

const EXAMPLE = 'Smith, J. (2020). A Study of Things. Journal of Examples, 12(3), 1-10.';

function label(body: string, labels: Label[]): LabeledToken[] {
  const tokens = tokenize(body);
  if (tokens.length !== labels.length) throw new Error(`${tokens.length} tokens, ${labels.length} labels`);
  return tokens.map((token, i) => ({ token, label: labels[i] ?? 'other' }));
}

const EXAMPLE_LABELS: Label[] = [
  'author',
  'author',
  'other',
  'year',
  'title',
  'title',
  'title',
  'title',
  'title',
  'venue',
  'venue',
  'venue',
  'venue',
  'venue',
];

describe('assembleSpans', () => {
  it('merges runs of equal labels', () => {
    const body = 'Smith, J. (2020). A Study';
    const spans = assembleSpans(body, label(body, ['author', 'author', 'other', 'year', 'title', 'title', 'title']));
    expect(spans.map(s => [s.label, s.start, s.end, s.text])).toEqual([
      ['author', 0, 2, 'Smith, J.'],
      ['other', 2, 3, '('],
      ['year', 3, 4, '2020'],
      ['title', 4, 7, '). A Study'],
    ]);
  });

  it('partitions the tokens with no equal neighbours', () => {
    const labels: Label[] = ['author', 'title', 'title', 'author', 'author', 'venue', 'venue', 'other', 'pages', 'pages', 'pages', 'pages', 'doi', 'doi'];
    const labeled = label(EXAMPLE, labels);
    const spans = assembleSpans(EXAMPLE, labeled);

    expect(spans.flatMap(s => s.tokens)).toEqual(labeled.map(l => l.token));
    spans.forEach((span, i) => {
      expect(span.end - span.start).toBe(span.tokens.length);
      if (i > 0) {
        expect(spans[i - 1]?.end).toBe(span.start);
        expect(spans[i - 1]?.label).not.toBe(span.label);
      }
    });
    expect(spans[spans.length - 1]?.end).toBe(labeled.length);
  });

  it('returns no spans for no tokens', () => {
    expect(assembleSpans('', [])).toEqual([]);
  });
});

describe('text cleaning', () => {
  it('trims separators but keeps terminal periods and balanced brackets', () => {
    expect(trimSpanText('). A Study of Things.')).toBe('A Study of Things.');
    expect(trimSpanText('Journal of Examples,')).toBe('Journal of Examples');
    expect(trimSpanText('Smith, J. (')).toBe('Smith, J.');
    expect(trimSpanText('2020)')).toBe('2020');
    expect(trimSpanText('Sequencing (DNA)')).toBe('Sequencing (DNA)');
    expect(trimSpanText(' ,;')).toBe('');
  });

  it('folds titles for matching', () => {
    expect(titleKey('A Study of Things.')).toBe('a study of things');
    expect(titleKey('Self-Supervised   Learning: A Survey')).toBe('selfsupervised learning a survey');
    expect(titleKey('ＡＢＣ Test')).toBe('abc test');
    expect(titleKey('')).toBe('');
  });

  it('detects CJK text', () => {
    expect(detectScript('王小明. 研究方法.')).toBe('cjk');
    expect(detectScript('Smith, J.')).toBe('latin');
  });
});

describe('authors', () => {
  it('keeps initials with their surname', () => {
    expect(parseAuthors('Smith, J.')).toEqual(['Smith, J.']);
    expect(parseAuthors('Smith, J., Doe, A., & Lee, K.')).toEqual(['Smith, J.', 'Doe, A.', 'Lee, K.']);
    expect(parseAuthors('Smith, J. K. and Doe, A.')).toEqual(['Smith, J. K.', 'Doe, A.']);
  });

  it('splits full names and drops et al.', () => {
    expect(parseAuthors('Jane Smith, John Doe')).toEqual(['Jane Smith', 'John Doe']);
    expect(parseAuthors('Smith, J., et al.')).toEqual(['Smith, J.']);
  });

  it('keeps surnames that begin with "et al"', () => {
    expect(parseAuthors('Etalle, S.')).toEqual(['Etalle, S.']);
    expect(parseAuthors('Etalle, S., et al.')).toEqual(['Etalle, S.']);
  });

  it('treats short capital runs as initials but not surnames', () => {
    expect(isInitialsOnly('JK')).toBe(true);
    expect(isInitialsOnly('J.-P.')).toBe(true);
    expect(isInitialsOnly('DOE')).toBe(false);
    expect(isInitialsOnly('Doe')).toBe(false);
  });
});

describe('field parsers', () => {
  it('parses years, volumes and pages', () => {
    expect(parseYear('(2020a).')).toBe(2020);
    expect(parseYear('n.d.')).toBeUndefined();
    expect(parseVolume('12(3)')).toEqual({ volume: '12', issue: '3' });
    expect(parseVolume('Vol. 7')).toEqual({ volume: '7' });
    expect(parsePages('pp. 1–10.')).toBe('1-10');
    expect(parsePages('')).toBeUndefined();
  });

  it('extracts identifiers', () => {
    expect(extractDOI('doi:10.1000/xyz123.')).toBe('10.1000/xyz123');
    expect(extractDOI('no identifier')).toBeNull();
    expect(extractURLs('see https://example.org/a, and http://example.com/b.')).toEqual([
      'https://example.org/a',
      'http://example.com/b',
    ]);
  });

  it('expands known venue abbreviations', () => {
    expect(resolveVenue('Phys. Rev. Lett.')).toBe('Physical Review Letters');
    expect(resolveVenue('phys rev lett')).toBe('Physical Review Letters');
    expect(resolveVenue('Journal of Examples')).toBe('Journal of Examples');
  });
});

describe('normalizeRecord', () => {
  it('builds a record from labeled spans', () => {
    const candidate = candidateOf(EXAMPLE);
    const record = normalizeRecord(assembleSpans(candidate.body, label(candidate.body, EXAMPLE_LABELS)), candidate);

    expect(record.authors).toEqual(['Smith, J.']);
    expect(record.year).toBe(2020);
    expect(record.title).toBe('A Study of Things.');
    expect(record.venue).toContain('Journal of Examples');
    expect(record.raw).toBe(EXAMPLE);
    expect(record.doi).toBeNull();
    expect(record.urls).toEqual([]);
    expect(record.titleKey).toBe('a study of things');
    expect(record.script).toBe('latin');
    expect(record.citationNumber).toBeNull();
    expect(record.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.authors)).toBe(true);
    expect(Object.isFrozen(record.urls)).toBe(true);
  });

  it('joins separate title spans with a space', () => {
    const candidate = candidateOf('Doe, A. 2019. Fast Things, Part Two. Phys. Rev. Lett.');
    const labels: Label[] = ['author', 'author', 'year', 'title', 'title', 'other', 'title', 'venue', 'venue', 'venue'];
    const spans = assembleSpans(candidate.body, label(candidate.body, labels));
    expect(spans.filter(s => s.label === 'title').map(s => s.text)).toEqual(['Fast Things,', 'Two.']);

    const record = normalizeRecord(spans, candidate);
    expect(record.title).toBe('Fast Things Two.');
    expect(record.titleKey).toBe('fast things two');
    expect(record.venue).toBe('Physical Review Letters');
  });

  it('collects authors from every author span in citation order', () => {
    const candidate = candidateOf('Zhu, Q., & Adams, B. 2020. Title.');
    const labels: Label[] = ['author', 'author', 'other', 'author', 'author', 'year', 'title'];
    const record = normalizeRecord(assembleSpans(candidate.body, label(candidate.body, labels)), candidate);
    expect(record.authors).toEqual(['Zhu, Q.', 'Adams, B.']);
    expect(record.year).toBe(2020);
  });

  it('fills volume, issue, pages and identifiers', () => {
    const text = '[4] Doe, A. 2019. Fast Things. Phys. Rev. Lett. 12(3), pp. 1–10. doi:10.1000/abc.9 https://example.org/x';
    const candidate = candidateOf(text);
    const labels: Label[] = [
      'author', 'author', 'year', 'title', 'title',
      'venue', 'venue', 'venue', 'volume', 'pages', 'pages', 'doi', 'url',
    ];
    const record = normalizeRecord(assembleSpans(candidate.body, label(candidate.body, labels)), candidate);

    expect(record).toMatchObject({
      authors: ['Doe, A.'],
      year: 2019,
      title: 'Fast Things.',
      venue: 'Physical Review Letters',
      volume: '12',
      issue: '3',
      pages: '1-10',
      doi: '10.1000/abc.9',
      urls: ['https://example.org/x'],
      citationNumber: 4,
    });
    expect(record.raw).toBe(text);
  });

  it('leaves unrecovered fields out and falls back to identifiers in the raw text', () => {
    const candidate = candidateOf('Something odd 10.1234/found here');
    const record = normalizeRecord(
      assembleSpans(candidate.body, label(candidate.body, ['other', 'other', 'other', 'other'])),
      candidate
    );
    expect(record.title).toBe('');
    expect(record.authors).toEqual([]);
    expect(record.doi).toBe('10.1234/found');
    expect('year' in record).toBe(false);
    expect('venue' in record).toBe(false);
  });
});
