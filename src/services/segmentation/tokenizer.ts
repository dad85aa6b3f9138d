import type { Token } from '../../types';

const OPENERS = new Set(['(', '[', '{', '"', '“', '‘', '«']);
const CLOSER_TO_OPENER: Record<string, string> = {
  ')': '(',
  ']': '[',
  '}': '{',
  '"': '"',
  '”': '“',
  '’': '‘',
  '»': '«',
};

// Closing brackets/quotes with any sentence punctuation around them: ")." '."'
const CLOSING_TAIL = /[.,;:?!]*[)\]}"”’»]+[.,;:?!]*$/;

const WORD_CHAR = /[\p{L}\p{N}]/u;

function isBalanced(text: string, closer: string): boolean {
  const opener = CLOSER_TO_OPENER[closer];
  if (opener === undefined) return true;
  let opens = 0;
  let closes = 0;
  for (const ch of text) {
    if (opener === closer) {
      if (ch === closer) opens++;
    } else if (ch === opener) {
      opens++;
    } else if (ch === closer) {
      closes++;
    }
  }
  return opener === closer ? opens % 2 === 0 : opens >= closes;
}

function splitChunk(chunk: string, offset: number): Array<{ text: string; start: number }> {
  const out: Array<{ text: string; start: number }> = [];
  let rest = chunk;
  let start = offset;

  while (rest.length > 1 && OPENERS.has(rest.charAt(0))) {
    out.push({ text: rest.charAt(0), start });
    rest = rest.slice(1);
    start += 1;
  }

  const tail = rest.match(CLOSING_TAIL);
  if (tail && tail.index !== undefined && tail.index > 0) {
    const closers = tail[0].replace(/[.,;:?!]/g, '');
    const unbalanced = [...closers].some(ch => !isBalanced(rest, ch));
    if (unbalanced) {
      out.push({ text: rest.slice(0, tail.index), start });
      out.push({ text: tail[0], start: start + tail.index });
      return out;
    }
  }

  out.push({ text: rest, start });
  return out;
}

/**
 * Whitespace tokenization with opening and unbalanced closing brackets and
 * quotes split off; "(2020)." becomes "(", "2020", ")." while "12(3)," stays
 * one token.
 */
export function tokenize(body: string): Token[] {
  const tokens: Token[] = [];
  for (const match of body.matchAll(/\S+/g)) {
    const offset = match.index ?? 0;
    for (const part of splitChunk(match[0], offset)) {
      tokens.push({
        index: tokens.length,
        text: part.text,
        start: part.start,
        end: part.start + part.text.length,
      });
    }
  }
  return tokens;
}

/**
 * True when at least one token carries a letter or digit
 */
export function hasWordTokens(tokens: Token[]): boolean {
  return tokens.some(t => WORD_CHAR.test(t.text));
}
