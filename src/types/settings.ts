import type { LogLevel } from '../services/utils/logger';

export type TaggerKind = 'builtin' | 'anystyle';

export interface TaggingSettings {
  tagger: TaggerKind;
  timeoutMs: number;
  modelPath: string | null; // override for the built-in model weights
}

export interface AnystyleSettings {
  command: string;
  cjkModelPath: string;
}

export interface PipelineSettings {
  batchSize: number;
  continueOnFailure: boolean;
}

export interface VerificationSettings {
  knownTitlesPath: string | null; // one title per line
  threshold: number;
  crossref: boolean;
  openAlex: boolean;
  checkUrls: boolean;
  mailto: string | null; // sent to Crossref and OpenAlex for their polite pools
  timeoutMs: number;
}

export interface ServerSettings {
  port: number;
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
}

export interface AppSettings {
  logLevel: LogLevel;
  tagging: TaggingSettings;
  anystyle: AnystyleSettings;
  pipeline: PipelineSettings;
  verification: VerificationSettings;
  server: ServerSettings;
}

export const defaultSettings: AppSettings = {
  logLevel: 'info',
  tagging: {
    tagger: 'builtin',
    timeoutMs: 10_000,
    modelPath: null,
  },
  anystyle: {
    command: 'anystyle',
    cjkModelPath: 'custom.mod',
  },
  pipeline: {
    batchSize: 8,
    continueOnFailure: true,
  },
  verification: {
    knownTitlesPath: null,
    threshold: 0.8,
    crossref: false,
    openAlex: false,
    checkUrls: false,
    mailto: null,
    timeoutMs: 10_000,
  },
  server: {
    port: 5174,
    rateLimitWindowMs: 60 * 1000,
    rateLimitMaxRequests: 100,
  },
};
