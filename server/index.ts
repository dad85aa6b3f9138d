import { loadSettings } from '../src/config/env';
import { createParser } from '../src/services/parsing/parseOrchestrator';
import { createTagger } from '../src/services/tagging/taggerFactory';
import { createLogger } from '../src/services/utils/logger';
import { loadKnownTitles } from '../src/services/verification/localTitleIndex';
import { createVerifier } from '../src/services/verification/verificationOrchestrator';
import { createApp } from './app';

const settings = loadSettings();
const logger = createLogger('server', settings.logLevel);

const parser = createParser({
  tagger: createTagger(settings),
  batchSize: settings.pipeline.batchSize,
  continueOnFailure: settings.pipeline.continueOnFailure,
  taggingTimeoutMs: settings.tagging.timeoutMs,
  logger: createLogger('parser', settings.logLevel),
});

const { verification } = settings;
const knownTitles = verification.knownTitlesPath ? await loadKnownTitles(verification.knownTitlesPath) : null;
if (knownTitles) logger.info(`Loaded ${knownTitles.size} known title(s) from ${verification.knownTitlesPath}`);

const verifier =
  knownTitles || verification.crossref || verification.openAlex || verification.checkUrls
    ? createVerifier({
        knownTitles,
        crossref: verification.crossref,
        openAlex: verification.openAlex,
        checkUrls: verification.checkUrls,
        threshold: verification.threshold,
        mailto: verification.mailto,
        timeoutMs: verification.timeoutMs,
        logger: createLogger('verify', settings.logLevel),
      })
    : null;

const app = createApp({ settings, parser, verifier, logger });

app.listen(settings.server.port, () => {
  logger.info(`Reference parser listening on http://localhost:${settings.server.port} (tagger: ${parser.tagger.name})`);
});
