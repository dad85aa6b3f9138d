import type { Token } from '../../types';
import { CONJUNCTIONS, NON_TERMINAL_ABBREVIATIONS, PUBLISHER_KEYWORDS, STOP_WORDS, VENUE_KEYWORDS } from './lexicon';

export interface TokenFeatureContext {
  tokens: readonly Token[];
  index: number;
}

export interface TokenFeature {
  id: string;
  apply(ctx: TokenFeatureContext): number;
}

const YEAR = /^(1[5-9]\d\d|20\d\d)[a-z]?[.,;:]?$/;
const INITIAL = /^\p{Lu}\.(?:-?\p{Lu}\.)*[,;]?$/u;
const PAGE_RANGE = /^(?:pp?\.)?\d+[-–—]\d+[.,;]?$/;
const VOLUME_ISSUE = /^\d{1,4}(?:\(\d+(?:[-–]\d+)?\))?[.,;:]?$/;
const DOI = /^(?:doi:|https?:\/\/(?:dx\.)?doi\.org\/)?10\.\d{4,9}\//i;
const URL_PATTERN = /^https?:\/\//i;
const WORD_CHAR = /[\p{L}\p{N}]/u;

function clamp(x: number, min = -1, max = 1): number {
  return Math.max(min, Math.min(max, x));
}

/** Lower-cased token text with surrounding punctuation removed */
export function core(text: string): string {
  return text.toLowerCase().replace(/^[^\p{L}\p{N}&]+|[^\p{L}\p{N}&]+$/gu, '');
}

export function isYearToken(text: string): boolean {
  return YEAR.test(text);
}

export function isInitialToken(text: string): boolean {
  return INITIAL.test(text);
}

export function isDoiToken(text: string): boolean {
  return DOI.test(text);
}

/**
 * Whether a token closes a sentence-like unit ("Things.", ")."), as opposed
 * to an initial or a known abbreviation ("J.", "al.", "pp.")
 */
export function endsSentence(text: string): boolean {
  if (!/[.?!]$/.test(text)) return false;
  if (isInitialToken(text)) return false;
  return !NON_TERMINAL_ABBREVIATIONS.has(core(text));
}

function tokenAt(ctx: TokenFeatureContext, offset: number): Token | undefined {
  return ctx.tokens[ctx.index + offset];
}

function current(ctx: TokenFeatureContext): string {
  return tokenAt(ctx, 0)?.text ?? '';
}

function sentenceIndex(ctx: TokenFeatureContext): number {
  let count = 0;
  for (let i = 0; i < ctx.index; i++) {
    const t = ctx.tokens[i];
    if (t && endsSentence(t.text)) count++;
  }
  return count;
}

const flag = (id: string, test: (text: string) => boolean): TokenFeature => ({
  id,
  apply: ctx => (test(current(ctx)) ? 1 : 0),
});

export const bias: TokenFeature = { id: 'bias', apply: () => 1 };

export const capitalized = flag('token.capitalized', t => /^\p{Lu}\p{Ll}/u.test(t));
export const allCaps = flag('token.all_caps', t => /^\p{Lu}{2,}[.,;:]?$/u.test(t));
export const initial = flag('token.initial', isInitialToken);
export const lowercase = flag('token.lowercase', t => /^\p{Ll}/u.test(t));
export const stopWord = flag('token.stopword', t => STOP_WORDS.has(core(t)));
export const conjunction = flag('token.conjunction', t => CONJUNCTIONS.has(core(t)) || t === '&');
export const year = flag('token.year', isYearToken);
export const pageRange = flag('token.page_range', t => PAGE_RANGE.test(t) || core(t) === 'pp');
export const volumeIssue = flag('token.volume_issue', t => VOLUME_ISSUE.test(t) && !isYearToken(t));
export const doi = flag('token.doi', isDoiToken);
export const url = flag('token.url', t => URL_PATTERN.test(t) && !isDoiToken(t));
export const venueKeyword = flag('token.venue_keyword', t => VENUE_KEYWORDS.has(core(t)));
export const inMarker = flag('token.in_marker', t => t === 'In' || t === 'In:');
export const publisherKeyword = flag('token.publisher_keyword', t => PUBLISHER_KEYWORDS.has(core(t)));
export const endsComma = flag('token.ends_comma', t => t.endsWith(','));
export const endsPeriod = flag('token.ends_period', t => t.endsWith('.'));
export const punctOnly = flag('token.punct_only', t => !WORD_CHAR.test(t));

export const digitRatio: TokenFeature = {
  id: 'token.digit_ratio',
  apply(ctx) {
    const text = current(ctx);
    const digits = text.match(/\d/g)?.length ?? 0;
    return clamp(digits / (text.length || 1));
  },
};

export const relativePosition: TokenFeature = {
  id: 'position.relative',
  apply(ctx) {
    if (ctx.tokens.length <= 1) return 0;
    return ctx.index / (ctx.tokens.length - 1);
  },
};

export const isFirst: TokenFeature = { id: 'position.first', apply: ctx => (ctx.index === 0 ? 1 : 0) };
export const isLast: TokenFeature = {
  id: 'position.last',
  apply: ctx => (ctx.index === ctx.tokens.length - 1 ? 1 : 0),
};

export const prevSentenceEnd: TokenFeature = {
  id: 'context.prev_sentence_end',
  apply(ctx) {
    const prev = tokenAt(ctx, -1);
    return prev && endsSentence(prev.text) ? 1 : 0;
  },
};

export const prevInitial: TokenFeature = {
  id: 'context.prev_initial',
  apply(ctx) {
    const prev = tokenAt(ctx, -1);
    return prev && isInitialToken(prev.text) ? 1 : 0;
  },
};

export const nextInitial: TokenFeature = {
  id: 'context.next_initial',
  apply(ctx) {
    const next = tokenAt(ctx, 1);
    return next && isInitialToken(next.text) ? 1 : 0;
  },
};

export const prevYear: TokenFeature = {
  id: 'context.prev_year',
  apply(ctx) {
    const prev = tokenAt(ctx, -1);
    return prev && isYearToken(prev.text) ? 1 : 0;
  },
};

export const seenYear: TokenFeature = {
  id: 'context.seen_year',
  apply(ctx) {
    for (let i = 0; i < ctx.index; i++) {
      const t = ctx.tokens[i];
      if (t && isYearToken(t.text)) return 1;
    }
    return 0;
  },
};

// One-hot buckets over the number of sentence ends before the token:
// authors tend to sit in the first unit, titles in the second.
export const sentence0: TokenFeature = { id: 'context.sentence_0', apply: ctx => (sentenceIndex(ctx) === 0 ? 1 : 0) };
export const sentence1: TokenFeature = { id: 'context.sentence_1', apply: ctx => (sentenceIndex(ctx) === 1 ? 1 : 0) };
export const sentence2Plus: TokenFeature = {
  id: 'context.sentence_2plus',
  apply: ctx => (sentenceIndex(ctx) >= 2 ? 1 : 0),
};

export const defaultTokenFeatures: TokenFeature[] = [
  bias,
  capitalized,
  allCaps,
  initial,
  lowercase,
  stopWord,
  conjunction,
  year,
  pageRange,
  volumeIssue,
  doi,
  url,
  venueKeyword,
  inMarker,
  publisherKeyword,
  endsComma,
  endsPeriod,
  punctOnly,
  digitRatio,
  relativePosition,
  isFirst,
  isLast,
  prevSentenceEnd,
  prevInitial,
  nextInitial,
  prevYear,
  seenYear,
  sentence0,
  sentence1,
  sentence2Plus,
];
