import type { RawInput, ReferenceCandidate } from '../../types';

// [12] / (12) / 12. / 12) at the start of a line. Four-digit numbers are
// left alone so a wrapped "2020. Journal..." line is not read as a marker.
const NUMBER_MARKER = /^\s*(?:\[(\d{1,3})\]\s*|\((\d{1,3})\)\s*|(\d{1,3})[.)]\s+)/;

// A wrapped line ends mid-phrase
const OPEN_LINE_END = /(?:[-,&:]|\band)$/i;

export type ReferenceLayout = 'numbered' | 'hanging' | 'flat';

interface PendingCandidate {
  startLine: number;
  endLine: number;
  lines: string[];
}

function isBlank(line: string | undefined): boolean {
  return !line || line.trim().length === 0;
}

function indentOf(line: string): number {
  return line.match(/^\s*/)?.[0].length ?? 0;
}

/**
 * Split raw input into lines, accepting any newline convention
 */
export function splitLines(rawText: string): string[] {
  if (rawText.length === 0) return [];
  return rawText.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
}

/**
 * Decide how references are delimited in this input
 */
export function detectLayout(lines: RawInput): ReferenceLayout {
  if (lines.some(line => NUMBER_MARKER.test(line))) return 'numbered';

  for (let i = 1; i < lines.length; i++) {
    const prev = lines[i - 1];
    const curr = lines[i];
    if (prev === undefined || curr === undefined) continue;
    if (isBlank(prev) || isBlank(curr)) continue;
    if (indentOf(curr) > indentOf(prev)) return 'hanging';
  }

  return 'flat';
}

/**
 * Join the lines of one candidate, undoing end-of-line hyphenation
 * (e.g. "pro-" + "posal" -> "proposal")
 */
export function joinCandidateLines(lines: string[]): string {
  let text = '';
  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;
    if (!text) {
      text = line;
    } else if (/[a-z]-$/.test(text) && /^[a-z]/.test(line)) {
      text = text.slice(0, -1) + line;
    } else {
      text = `${text} ${line}`;
    }
  }
  return text;
}

function toCandidate(pending: PendingCandidate, index: number): ReferenceCandidate {
  const text = joinCandidateLines(pending.lines);
  const marker = text.match(NUMBER_MARKER);
  const numberText = marker ? marker[1] ?? marker[2] ?? marker[3] : undefined;
  const bodyOffset = marker ? marker[0].length : 0;

  return Object.freeze({
    index,
    startLine: pending.startLine,
    endLine: pending.endLine,
    text,
    body: text.slice(bodyOffset),
    bodyOffset,
    citationNumber: numberText !== undefined ? parseInt(numberText, 10) : null,
  });
}

/**
 * Segment raw reference-list lines into one candidate per reference.
 *
 * Blank lines always close a candidate. Whether a non-blank line opens a new
 * candidate depends on the detected layout: numbering markers, hanging
 * indentation, or one reference per line with lines that end mid-phrase
 * ("and", a comma, a hyphen) folded into the next.
 */
export function segmentReferences(lines: RawInput): ReferenceCandidate[] {
  const layout = detectLayout(lines);
  let baseIndent = Number.MAX_SAFE_INTEGER;
  for (const line of lines) {
    if (!isBlank(line)) baseIndent = Math.min(baseIndent, indentOf(line));
  }

  const pending: PendingCandidate[] = [];
  let current: PendingCandidate | null = null;
  let previous = '';

  const startsCandidate = (line: string): boolean => {
    if (current === null) return true;
    switch (layout) {
      case 'numbered':
        return NUMBER_MARKER.test(line);
      case 'hanging':
        return indentOf(line) <= baseIndent;
      case 'flat':
        return !OPEN_LINE_END.test(previous.trim());
    }
  };

  lines.forEach((line, lineIndex) => {
    if (isBlank(line)) {
      current = null;
      previous = '';
      return;
    }

    if (startsCandidate(line)) {
      current = { startLine: lineIndex, endLine: lineIndex, lines: [line] };
      pending.push(current);
    } else if (current !== null) {
      current.endLine = lineIndex;
      current.lines.push(line);
    }
    previous = line;
  });

  return pending.map((p, index) => toCandidate(p, index));
}
