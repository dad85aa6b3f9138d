import type { FieldSpan, LabeledToken } from '../../types';

/**
 * Merge runs of equally labeled tokens into spans, left to right.
 * Spans partition the tokens and no two neighbours share a label.
 */
export function assembleSpans(body: string, labeled: readonly LabeledToken[]): FieldSpan[] {
  const spans: FieldSpan[] = [];
  let current: FieldSpan | null = null;

  labeled.forEach(({ token, label }, i) => {
    if (current && current.label === label) {
      current.end = i + 1;
      current.tokens.push(token);
      return;
    }
    current = { label, start: i, end: i + 1, text: '', tokens: [token] };
    spans.push(current);
  });

  for (const span of spans) {
    const first = span.tokens[0];
    const last = span.tokens[span.tokens.length - 1];
    span.text = first && last ? body.slice(first.start, last.end) : '';
  }

  return spans;
}
