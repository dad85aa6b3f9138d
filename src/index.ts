// Curated public API
export type {
  Label,
  RawInput,
  ReferenceCandidate,
  Token,
  TokenFeatureVector,
  LabeledToken,
  FieldSpan,
  CitationRecord,
  ParseFailure,
  ParseFailureKind,
  ParseResult,
  ParseProgress,
  AppSettings,
  RetrievedReferenceData,
  UrlCheck,
  VerificationResult,
  VerificationSource,
  VerificationSourceName,
  VerificationStatus,
} from './types';
export { LABELS, isLabel, defaultSettings } from './types';
export { segmentReferences, splitLines, detectLayout } from './services/segmentation/referenceSegmenter';
export { tokenize } from './services/segmentation/tokenizer';
export { extractFeatures } from './services/features/featureExtractor';
export type { TokenFeature, TokenFeatureContext } from './services/features/features';
export type { Tagger, TagOptions } from './services/tagging/tagger';
export { TaggingAdapter } from './services/tagging/taggingAdapter';
export { SequenceTagger, parseSequenceModel, loadSequenceModel } from './services/tagging/sequenceTagger';
export type { SequenceModel } from './services/tagging/sequenceTagger';
export { AnystyleTagger } from './services/tagging/anystyleTagger';
export { createTagger } from './services/tagging/taggerFactory';
export { assembleSpans } from './services/assembly/spanAssembler';
export { normalizeRecord } from './services/normalization/recordNormalizer';
export { createParser, parseReferences } from './services/parsing/parseOrchestrator';
export type { ParserOptions, ReferenceParser } from './services/parsing/parseOrchestrator';
export { ReferenceParserError, MalformedCandidateError, TaggingUnavailableError } from './services/parsing/errors';
export { titleSimilarity, levenshteinDistance } from './services/utils/stringMatching';
export { LocalTitleIndex, loadKnownTitles, parseKnownTitles } from './services/verification/localTitleIndex';
export { verifyWithCrossref } from './services/verification/crossrefLookup';
export type { RemoteLookupOptions } from './services/verification/crossrefLookup';
export { verifyWithOpenAlex } from './services/verification/openAlexLookup';
export { checkUrl } from './services/verification/urlAvailability';
export { createVerifier } from './services/verification/verificationOrchestrator';
export type { ReferenceVerifier, VerifierOptions } from './services/verification/verificationOrchestrator';
export type { FetchLike } from './services/verification/http';
export { resultsToCsv } from './services/export/csvExport';
export { loadSettings } from './config/env';
export { createLogger } from './services/utils/logger';
