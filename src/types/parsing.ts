import type { CitationRecord, ReferenceCandidate } from './reference';

export type ParseFailureKind = 'MalformedCandidate' | 'TaggingUnavailable' | 'BatchAborted';

export interface ParseFailure {
  kind: ParseFailureKind;
  message: string;
  candidateIndex: number;
  raw: string;
  startLine: number;
  endLine: number;
}

export type ParseResult =
  | { ok: true; candidate: ReferenceCandidate; record: CitationRecord }
  | { ok: false; candidate: ReferenceCandidate; failure: ParseFailure };

export interface ParseProgress {
  total: number;
  completed: number;
  current: string;
}
