import type { ParseFailure, ParseFailureKind, ReferenceCandidate } from '../../types';

export class ReferenceParserError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised when a candidate has no word tokens left after tokenization
 */
export class MalformedCandidateError extends ReferenceParserError {
  readonly kind = 'MalformedCandidate' as const;

  constructor(readonly candidateIndex: number, message = `Candidate ${candidateIndex} has no tokens`) {
    super(message);
  }
}

/**
 * Raised when the tagging backend fails, times out or returns a label
 * sequence that does not line up with the tokens
 */
export class TaggingUnavailableError extends ReferenceParserError {
  readonly kind = 'TaggingUnavailable' as const;

  constructor(readonly tagger: string, message: string, options?: { cause?: unknown }) {
    super(`${tagger}: ${message}`, options);
  }
}

export function isRecoverable(err: unknown): err is MalformedCandidateError | TaggingUnavailableError {
  return err instanceof MalformedCandidateError || err instanceof TaggingUnavailableError;
}

export function buildFailure(
  candidate: ReferenceCandidate,
  kind: ParseFailureKind,
  message: string
): ParseFailure {
  return {
    kind,
    message,
    candidateIndex: candidate.index,
    raw: candidate.text,
    startLine: candidate.startLine,
    endLine: candidate.endLine,
  };
}

export function failureFromError(
  candidate: ReferenceCandidate,
  err: MalformedCandidateError | TaggingUnavailableError
): ParseFailure {
  return buildFailure(candidate, err.kind, err.message);
}
