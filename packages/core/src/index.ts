/**
 * @tessera/core - record model, merge engine, connectors and parsers
 */

export const APP_NAME = 'Tessera';

export { clampConfidence, makeField, isPresent } from './field';
export {
  createEmptyRecord,
  createEmptyUnderlying,
  fieldValuesEqual,
  hasContent,
  recordFromJson,
  recordsEqual,
  withField,
} from './record';
export { mergeRecords, OVERRIDE_REASON, type MergeResult } from './merge';
export {
  TesseraError,
  ParseFailure,
  FetchTransientError,
  FetchRateLimitedError,
  FetchAuthInvalidError,
  FetchError,
  StorageConflictError,
  ConfigError,
  describeError,
  isFatalError,
  isRetryableError,
  type ErrorKind,
} from './errors';
export { sha256Hex, contentHashFor } from './hashing';
export {
  MAX_EXCERPT_LENGTH,
  normalizeWhitespace,
  parseNumberCh,
  parseSwissDate,
  truncateExcerpt,
} from './text';
export {
  BASE_CURRENCY,
  PARSE_VERSION,
  deriveFxRisk,
  meanConfidence,
  stampDocument,
  type DocumentStamp,
} from './derive';
export {
  RUN_TRANSITIONS,
  TERMINAL_STATUSES,
  RunNotFoundError,
  RunTransitionError,
  allowedSources,
  canTransition,
  isTerminal,
} from './crawl/run-state';
export {
  parseDocument,
  parseTermsheetText,
  extractDates,
  TERMSHEET_SOURCE,
  type ParseOptions,
  type ParseOutcome,
  type SourceHint,
} from './parsing';
export * from './connectors';
