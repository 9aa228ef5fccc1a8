export { CrawlEngine, type CrawlEngineOptions } from './orchestrator/crawl-engine.js';
export type {
  CrawlEngineConfig,
  CrawlEngineDependencies,
  HarvestOutcome,
  HarvestStatus,
  StateStorage,
} from './orchestrator/types.js';
export { DocumentFetcher, parseDocument } from './web-engine/document-fetcher.js';
export type {
  Document,
  DocumentFetcherConfig,
  DocumentSource,
  FetchOptions,
  HttpClient,
} from './web-engine/types.js';
export { RetryStrategy } from './retry/retry-strategy.js';
export type { ErrorClass, RetryDecision, RetryStrategyConfig } from './retry/types.js';
export { RelationExtractor } from './extraction/relation-extractor.js';
export { MemberExtractor } from './extraction/member-extractor.js';
export { MemberIdentifier } from './extraction/member-identifier.js';
export {
  EVENT_STREAM_TYPES,
  FIELD_SYNONYMS,
  isEventStream,
  readField,
  type FieldConcept,
  type FieldPolicy,
} from './extraction/field-policy.js';
export {
  NTriplesMemberSink,
  artifactName,
  buildMemberDocument,
  type MemberSink,
  type PersistResult,
} from './pipeline/member-sink.js';
export { JsonLdCodec, type JsonLdCodecOptions } from './pipeline/jsonld-codec.js';
export { StateStore } from './pipeline/state-store.js';
export { CrawlState } from './pipeline/crawl-state.js';
export type { CrawlStateSnapshot, HarvestStatsSnapshot } from './pipeline/types.js';
export { HarvestStats } from './observability/harvest-stats.js';
export {
  ConversionFailure,
  FetchFailure,
  HttpStatusError,
  ParseFailure,
  StatePersistFailure,
  isPageFailure,
  type PageFailure,
} from './errors.js';
export { runHarvestAction, harvestArgsSchema } from './actions/harvest.js';
