import type { ScriptKind } from '../../types';

const LEADING_JUNK = /^[\s\p{P}\p{S}]+/u;
const TRAILING_SEPARATOR = /[\s,;:\-–—(\[{"“”'‘’«»\/]$/;
const CLOSERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };
const DASHES = /[-\u2010-\u2015\u2212\uff0d]/g;
const CJK = /[\u3400-\u4dbf\u4e00-\u9fff]/;

function count(text: string, ch: string): number {
  let n = 0;
  for (const c of text) if (c === ch) n++;
  return n;
}

/**
 * Strip leading punctuation/whitespace and trailing separators from a span.
 * A terminal ".", "?" or "!" stays, as does a closing bracket that has its
 * opener inside the span ("(DNA)").
 */
export function trimSpanText(text: string): string {
  let out = text.replace(LEADING_JUNK, '');
  for (;;) {
    const last = out.charAt(out.length - 1);
    if (!last) break;
    if (TRAILING_SEPARATOR.test(last)) {
      out = out.slice(0, -1);
      continue;
    }
    const opener = CLOSERS[last];
    if (opener !== undefined && count(out, opener) < count(out, last)) {
      out = out.slice(0, -1);
      continue;
    }
    break;
  }
  return out;
}

/**
 * Fold a title for matching: NFKC, dashes dropped, letters/digits/spaces
 * only, lower case, whitespace collapsed
 */
export function titleKey(text: string): string {
  if (!text) return '';
  const folded = text
    .normalize('NFKC')
    .replace(DASHES, '')
    .replace(/[^\p{L}\p{N}\p{Zs}\s]/gu, '')
    .toLowerCase();
  return folded.replace(/\s+/g, ' ').trim();
}

export function detectScript(text: string): ScriptKind {
  return CJK.test(text) ? 'cjk' : 'latin';
}
