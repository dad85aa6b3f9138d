import { execFile } from 'child_process';
import { existsSync } from 'fs';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { XMLParser } from 'fast-xml-parser';
import type { Label, TokenFeatureVector } from '../../types';
import type { TagOptions, Tagger } from './tagger';

export type CommandRunner = (
  command: string,
  args: string[],
  options: { signal: AbortSignal }
) => Promise<string>;

export interface AnystyleTaggerOptions {
  command?: string;
  cjkModelPath?: string;
  run?: CommandRunner;
}

// AnyStyle's segment names -> our labels; anything missing maps to "other"
const ANYSTYLE_LABELS: Record<string, Label> = {
  author: 'author',
  editor: 'author',
  title: 'title',
  date: 'year',
  journal: 'venue',
  'container-title': 'venue',
  booktitle: 'venue',
  volume: 'volume',
  pages: 'pages',
  publisher: 'publisher',
  doi: 'doi',
  url: 'url',
};

const CJK = /[\u4e00-\u9fff]/;

export interface AnystyleSegment {
  tag: string;
  text: string;
}

export const runCommand: CommandRunner = (command, args, { signal }) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { encoding: 'utf8', signal, maxBuffer: 8 * 1024 * 1024 }, (err, stdout) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(stdout);
    });
  });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function textOf(children: unknown): string {
  if (!Array.isArray(children)) return '';
  return children
    .map(child => {
      if (!isRecord(child)) return '';
      const t = child['#text'];
      if (typeof t === 'string' || typeof t === 'number') return String(t);
      // nested markup inside a segment: flatten its text
      return Object.entries(child)
        .filter(([key]) => key !== ':@')
        .map(([, value]) => textOf(value))
        .join('');
    })
    .join('');
}

function childrenOf(nodes: unknown, name: string): unknown[] {
  if (!Array.isArray(nodes)) return [];
  const out: unknown[] = [];
  for (const node of nodes) {
    if (isRecord(node) && name in node) out.push(node[name]);
  }
  return out;
}

/**
 * Parse the XML dataset printed by `anystyle -f xml parse` into ordered
 * segments, across all sequences
 */
export function parseAnystyleXml(xml: string): AnystyleSegment[] {
  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    trimValues: true,
  });

  const parsed: unknown = parser.parse(xml);
  const datasets = childrenOf(parsed, 'dataset');
  if (datasets.length === 0) throw new Error('AnyStyle output has no <dataset>');

  const segments: AnystyleSegment[] = [];
  for (const dataset of datasets) {
    for (const sequence of childrenOf(dataset, 'sequence')) {
      if (!Array.isArray(sequence)) continue;
      for (const segment of sequence) {
        if (!isRecord(segment)) continue;
        for (const [tag, children] of Object.entries(segment)) {
          if (tag === ':@' || tag === '#text') continue;
          segments.push({ tag, text: textOf(children) });
        }
      }
    }
  }
  return segments;
}

/**
 * Rebuild the candidate body from token offsets; gaps between tokens were
 * whitespace
 */
export function bodyFromFeatures(features: readonly TokenFeatureVector[]): string {
  let body = '';
  for (const { token } of features) {
    body = body.padEnd(token.start, ' ') + token.text;
  }
  return body;
}

/**
 * Map labeled segments back onto tokens by character position, ignoring
 * whitespace. Throws when a segment does not continue the text where the
 * previous one stopped.
 */
export function alignSegments(
  features: readonly TokenFeatureVector[],
  segments: readonly AnystyleSegment[]
): Label[] {
  const body = bodyFromFeatures(features);
  const compactToBody: number[] = [];
  let compact = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (/\s/.test(ch)) continue;
    compact += ch;
    compactToBody.push(i);
  }

  const charLabels = new Array<Label>(body.length).fill('other');
  let cursor = 0;
  for (const segment of segments) {
    const piece = segment.text.replace(/\s+/g, '');
    if (!piece) continue;
    if (!compact.startsWith(piece, cursor)) {
      throw new Error(`AnyStyle segment <${segment.tag}> does not align at offset ${cursor}`);
    }
    const label = ANYSTYLE_LABELS[segment.tag] ?? 'other';
    for (let k = cursor; k < cursor + piece.length; k++) {
      const at = compactToBody[k];
      if (at !== undefined) charLabels[at] = label;
    }
    cursor += piece.length;
  }

  return features.map(({ token }) => charLabels[token.start] ?? 'other');
}

/**
 * Tagger backed by the AnyStyle CLI. Each call writes the candidate to a
 * temporary file and reads back the labeled XML dataset.
 */
export class AnystyleTagger implements Tagger {
  readonly name = 'anystyle';
  private readonly command: string;
  private readonly cjkModelPath: string | null;
  private readonly run: CommandRunner;

  constructor(options: AnystyleTaggerOptions = {}) {
    this.command = options.command ?? 'anystyle';
    this.cjkModelPath = options.cjkModelPath ?? null;
    this.run = options.run ?? runCommand;
  }

  buildArgs(text: string, inputPath: string): string[] {
    const args: string[] = [];
    // CJK references go through the alternate parser model when one is installed
    if (this.cjkModelPath && CJK.test(text) && existsSync(this.cjkModelPath)) {
      args.push('-P', this.cjkModelPath);
    }
    args.push('-f', 'xml', 'parse', inputPath);
    return args;
  }

  async tag(features: readonly TokenFeatureVector[], options: TagOptions): Promise<Label[]> {
    const text = bodyFromFeatures(features);
    const dir = await mkdtemp(join(tmpdir(), 'refparse-'));
    try {
      const inputPath = join(dir, 'reference.txt');
      await writeFile(inputPath, `${text}\n`, 'utf8');
      const stdout = await this.run(this.command, this.buildArgs(text, inputPath), { signal: options.signal });
      return alignSegments(features, parseAnystyleXml(stdout));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
