import { defaultSettings, type AppSettings, type TaggerKind } from '../types/settings';
import { isLogLevel } from '../services/utils/logger';

export type Env = Record<string, string | undefined>;

export function envNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export function envString(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw && raw.trim().length > 0 ? raw.trim() : fallback;
}

export function envBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
}

function envTagger(env: Env, fallback: TaggerKind): TaggerKind {
  const raw = envString(env, 'TAGGER', fallback);
  return raw === 'anystyle' || raw === 'builtin' ? raw : fallback;
}

/**
 * Settings from environment variables, falling back to defaults for
 * anything missing or unparseable
 */
export function loadSettings(env: Env = process.env): AppSettings {
  const d = defaultSettings;
  const logLevel = envString(env, 'LOG_LEVEL', d.logLevel);
  const modelPath = envString(env, 'TAGGER_MODEL_PATH', '');
  const knownTitlesPath = envString(env, 'KNOWN_TITLES_PATH', '');
  const mailto = envString(env, 'VERIFY_MAILTO', '');
  const threshold = envNumber(env, 'VERIFY_THRESHOLD', d.verification.threshold);

  return {
    logLevel: isLogLevel(logLevel) ? logLevel : d.logLevel,
    tagging: {
      tagger: envTagger(env, d.tagging.tagger),
      timeoutMs: Math.max(1, envNumber(env, 'TAGGING_TIMEOUT_MS', d.tagging.timeoutMs)),
      modelPath: modelPath || null,
    },
    anystyle: {
      command: envString(env, 'ANYSTYLE_CMD', d.anystyle.command),
      cjkModelPath: envString(env, 'ANYSTYLE_MODEL', d.anystyle.cjkModelPath),
    },
    pipeline: {
      batchSize: Math.max(1, Math.floor(envNumber(env, 'PARSE_BATCH_SIZE', d.pipeline.batchSize))),
      continueOnFailure: envBoolean(env, 'CONTINUE_ON_FAILURE', d.pipeline.continueOnFailure),
    },
    verification: {
      knownTitlesPath: knownTitlesPath || null,
      threshold: threshold > 0 && threshold <= 1 ? threshold : d.verification.threshold,
      crossref: envBoolean(env, 'VERIFY_CROSSREF', d.verification.crossref),
      openAlex: envBoolean(env, 'VERIFY_OPENALEX', d.verification.openAlex),
      checkUrls: envBoolean(env, 'VERIFY_URLS', d.verification.checkUrls),
      mailto: mailto || null,
      timeoutMs: Math.max(1, envNumber(env, 'VERIFY_TIMEOUT_MS', d.verification.timeoutMs)),
    },
    server: {
      port: envNumber(env, 'PORT', d.server.port),
      rateLimitWindowMs: d.server.rateLimitWindowMs,
      rateLimitMaxRequests: envNumber(env, 'RATE_LIMIT_MAX_REQUESTS', d.server.rateLimitMaxRequests),
    },
  };
}
