import { readFileSync } from 'fs';
import { isLabel, type Label, type TokenFeatureVector } from '../../types';
import type { TagOptions, Tagger } from './tagger';
import defaultModelJson from './model/defaultModel.json';

export interface SequenceModel {
  labels: Label[];
  start: Partial<Record<Label, number>>;
  transitions: Partial<Record<Label, Partial<Record<Label, number>>>>;
  emissions: Partial<Record<Label, Record<string, number>>>;
}

interface VCell {
  score: number;
  prev: number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberMap(value: unknown, where: string): Record<string, number> {
  if (value === undefined) return {};
  if (!isRecord(value)) throw new Error(`Invalid model: ${where} must be an object`);
  const out: Record<string, number> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw new Error(`Invalid model: ${where}.${key} must be a finite number`);
    }
    out[key] = v;
  }
  return out;
}

function labelMap(value: unknown, where: string): Partial<Record<Label, number>> {
  const out: Partial<Record<Label, number>> = {};
  for (const [key, v] of Object.entries(numberMap(value, where))) {
    if (!isLabel(key)) throw new Error(`Invalid model: unknown label "${key}" in ${where}`);
    out[key] = v;
  }
  return out;
}

/**
 * Validate a parsed model file
 */
export function parseSequenceModel(value: unknown): SequenceModel {
  if (!isRecord(value)) throw new Error('Invalid model: expected an object');

  const rawLabels = value['labels'];
  if (!Array.isArray(rawLabels) || rawLabels.length === 0) {
    throw new Error('Invalid model: labels must be a non-empty array');
  }
  const labels: Label[] = [];
  for (const l of rawLabels) {
    if (!isLabel(l)) throw new Error(`Invalid model: unknown label "${String(l)}"`);
    labels.push(l);
  }

  const transitions: SequenceModel['transitions'] = {};
  const rawTransitions = value['transitions'] ?? {};
  if (!isRecord(rawTransitions)) throw new Error('Invalid model: transitions must be an object');
  for (const [from, row] of Object.entries(rawTransitions)) {
    if (!isLabel(from)) throw new Error(`Invalid model: unknown label "${from}" in transitions`);
    transitions[from] = labelMap(row, `transitions.${from}`);
  }

  const emissions: SequenceModel['emissions'] = {};
  const rawEmissions = value['emissions'] ?? {};
  if (!isRecord(rawEmissions)) throw new Error('Invalid model: emissions must be an object');
  for (const [label, weights] of Object.entries(rawEmissions)) {
    if (!isLabel(label)) throw new Error(`Invalid model: unknown label "${label}" in emissions`);
    emissions[label] = numberMap(weights, `emissions.${label}`);
  }

  return { labels, start: labelMap(value['start'], 'start'), transitions, emissions };
}

export function loadSequenceModel(path: string): SequenceModel {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseSequenceModel(raw);
}

export const defaultSequenceModel: SequenceModel = parseSequenceModel(defaultModelJson);

function emissionScore(model: SequenceModel, label: Label, vector: TokenFeatureVector): number {
  const weights = model.emissions[label];
  if (!weights) return 0;
  let score = 0;
  for (const [id, value] of Object.entries(vector.features)) {
    score += (weights[id] ?? 0) * value;
  }
  return score;
}

function transitionScore(model: SequenceModel, prev: Label, curr: Label): number {
  return model.transitions[prev]?.[curr] ?? 0;
}

/**
 * Best label sequence under a linear-chain model: emission scores are
 * weighted sums of token features, plus start and transition scores.
 */
export function viterbiDecode(model: SequenceModel, vectors: readonly TokenFeatureVector[]): Label[] {
  const n = vectors.length;
  const labels = model.labels;
  if (n === 0) return [];

  const dp: VCell[][] = [];

  const first = vectors[0];
  if (!first) return [];
  dp.push(
    labels.map(label => ({
      score: (model.start[label] ?? 0) + emissionScore(model, label, first),
      prev: null,
    }))
  );

  for (let t = 1; t < n; t++) {
    const vector = vectors[t];
    const prevRow = dp[t - 1];
    if (!vector || !prevRow) break;
    const row: VCell[] = labels.map(label => {
      const emit = emissionScore(model, label, vector);
      let best: VCell = { score: Number.NEGATIVE_INFINITY, prev: null };
      prevRow.forEach((cell, j) => {
        const prevLabel = labels[j];
        if (prevLabel === undefined) return;
        const score = cell.score + transitionScore(model, prevLabel, label) + emit;
        // ties keep the earlier label so decoding is deterministic
        if (score > best.score) best = { score, prev: j };
      });
      return best;
    });
    dp.push(row);
  }

  const lastRow = dp[dp.length - 1] ?? [];
  let bestIndex = 0;
  lastRow.forEach((cell, i) => {
    const current = lastRow[bestIndex];
    if (current && cell.score > current.score) bestIndex = i;
  });

  const path: Label[] = new Array<Label>(n);
  let pointer: number | null = bestIndex;
  for (let t = n - 1; t >= 0 && pointer !== null; t--) {
    const label = labels[pointer];
    const cell: VCell | undefined = dp[t]?.[pointer];
    if (label === undefined || !cell) break;
    path[t] = label;
    pointer = cell.prev;
  }
  return path;
}

/**
 * In-process tagger backed by a weighted linear-chain model
 */
export class SequenceTagger implements Tagger {
  readonly name = 'builtin';

  constructor(private readonly model: SequenceModel = defaultSequenceModel) {}

  static fromFile(path: string): SequenceTagger {
    return new SequenceTagger(loadSequenceModel(path));
  }

  async tag(features: readonly TokenFeatureVector[], options: TagOptions): Promise<Label[]> {
    options.signal.throwIfAborted();
    return viterbiDecode(this.model, features);
  }
}
