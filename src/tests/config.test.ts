import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadSettings } from '../config/env';
import { defaultSettings, type ParseResult } from '../types';
import { resultsToCsv } from '../services/export/csvExport';
import { createLogger } from '../services/utils/logger';
import { candidateOf } from './helpers';

describe('loadSettings', () => {
  it('falls back to defaults', () => {
    expect(loadSettings({})).toEqual(defaultSettings);
  });

  it('reads overrides from the environment', () => {
    const settings = loadSettings({
      PORT: '8080',
      TAGGER: 'anystyle',
      ANYSTYLE_CMD: ' /opt/anystyle/bin/anystyle ',
      TAGGER_MODEL_PATH: 'model.json',
      TAGGING_TIMEOUT_MS: '2500',
      PARSE_BATCH_SIZE: '3',
      CONTINUE_ON_FAILURE: 'no',
      LOG_LEVEL: 'debug',
      RATE_LIMIT_MAX_REQUESTS: '10',
    });

    expect(settings.server.port).toBe(8080);
    expect(settings.server.rateLimitMaxRequests).toBe(10);
    expect(settings.tagging).toEqual({ tagger: 'anystyle', timeoutMs: 2500, modelPath: 'model.json' });
    expect(settings.anystyle.command).toBe('/opt/anystyle/bin/anystyle');
    expect(settings.pipeline).toEqual({ batchSize: 3, continueOnFailure: false });
    expect(settings.logLevel).toBe('debug');
  });

  it('reads verification switches', () => {
    const settings = loadSettings({
      KNOWN_TITLES_PATH: 'titles.txt',
      VERIFY_THRESHOLD: '0.9',
      VERIFY_CROSSREF: 'true',
      VERIFY_URLS: '1',
      VERIFY_MAILTO: 'dev@example.org',
    });
    expect(settings.verification).toEqual({
      knownTitlesPath: 'titles.txt',
      threshold: 0.9,
      crossref: true,
      openAlex: false,
      checkUrls: true,
      mailto: 'dev@example.org',
      timeoutMs: 10_000,
    });
    expect(loadSettings({ VERIFY_THRESHOLD: '1.5' }).verification.threshold).toBe(0.8);
  });

  it('ignores values it cannot use', () => {
    const settings = loadSettings({
      PORT: 'abc',
      TAGGER: 'grobid',
      PARSE_BATCH_SIZE: '0',
      CONTINUE_ON_FAILURE: 'maybe',
      LOG_LEVEL: 'verbose',
    });

    expect(settings.server.port).toBe(5174);
    expect(settings.tagging.tagger).toBe('builtin');
    expect(settings.pipeline).toEqual({ batchSize: 1, continueOnFailure: true });
    expect(settings.logLevel).toBe('info');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createLogger('parser', 'warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^\[\d{4}-\d\d-\d\dT[^\]]+\] \[parser\]$/);
    expect(warn.mock.calls[0]?.[1]).toBe('shown');
  });

  it('scopes children under their parent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('parser').child('tagging').error('failed');
    expect(error.mock.calls[0]?.[0]).toMatch(/\[parser:tagging\]$/);
  });
});

describe('resultsToCsv', () => {
  it('writes one escaped row per result', () => {
    const ok = candidateOf('Smith, J. (2020). A "Quoted" Title, Part 2.');
    const bad = candidateOf('.');
    const results: ParseResult[] = [
      {
        ok: true,
        candidate: ok,
        record: {
          id: 'test-id',
          raw: ok.text,
          title: 'A "Quoted" Title, Part 2.',
          authors: ['Smith, J.', 'Doe, A.'],
          year: 2020,
          doi: null,
          urls: [],
          citationNumber: null,
          titleKey: 'a quoted title part 2',
          script: 'latin',
        },
      },
      {
        ok: false,
        candidate: { ...bad, index: 1 },
        failure: {
          kind: 'MalformedCandidate',
          message: 'Candidate 1 (lines 2-2) has no tokens',
          candidateIndex: 1,
          raw: '.',
          startLine: 1,
          endLine: 1,
        },
      },
    ];

    expect(resultsToCsv(results).split('\r\n')).toEqual([
      'index,status,authors,title,year,venue,volume,issue,pages,publisher,doi,urls,raw,error',
      '1,ok,"Smith, J.; Doe, A.","A ""Quoted"" Title, Part 2.",2020,,,,,,,,"Smith, J. (2020). A ""Quoted"" Title, Part 2.",',
      '2,failed,,,,,,,,,,,.,MalformedCandidate: Candidate 1 (lines 2-2) has no tokens',
      '',
    ]);
  });
});
