export const LABELS = [
  'author',
  'title',
  'year',
  'venue',
  'volume',
  'pages',
  'publisher',
  'doi',
  'url',
  'other',
] as const;

export type Label = (typeof LABELS)[number];

const LABEL_SET: ReadonlySet<string> = new Set(LABELS);

export function isLabel(value: unknown): value is Label {
  return typeof value === 'string' && LABEL_SET.has(value);
}

/** Ordered text lines as submitted by the caller */
export type RawInput = readonly string[];

export interface ReferenceCandidate {
  index: number;
  startLine: number; // 0-based, inclusive
  endLine: number; // 0-based, inclusive
  text: string;
  body: string; // text without the numbering marker
  bodyOffset: number;
  citationNumber: number | null;
}

export interface Token {
  index: number;
  text: string;
  start: number; // offset into the candidate body
  end: number;
}

export interface TokenFeatureVector {
  token: Token;
  shape: string;
  features: Record<string, number>;
}

export interface LabeledToken {
  token: Token;
  label: Label;
}

export interface FieldSpan {
  label: Label;
  start: number; // token offset, inclusive
  end: number; // token offset, exclusive
  text: string;
  tokens: Token[];
}

export type ScriptKind = 'latin' | 'cjk';

export interface CitationRecord {
  id: string;
  raw: string;
  title: string;
  authors: readonly string[];
  year?: number;
  venue?: string;
  volume?: string;
  issue?: string;
  pages?: string;
  publisher?: string;
  doi: string | null;
  urls: readonly string[];
  citationNumber: number | null;
  titleKey: string;
  script: ScriptKind;
}
