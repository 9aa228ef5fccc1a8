import type { JsonValue } from '../utils/json.js';
import type { Document } from '../web-engine/types.js';
import type { DocumentSource } from '../web-engine/types.js';
import type { MemberSink } from '../pipeline/member-sink.js';
import type { StateStore } from '../pipeline/state-store.js';
import type { RelationExtractor } from '../extraction/relation-extractor.js';
import type { MemberExtractor } from '../extraction/member-extractor.js';
import type { MemberIdentifier } from '../extraction/member-identifier.js';

/** A page waiting on the worklist, with the context inherited from its parent. */
type WorkItem = {
  url: string;
  context: JsonValue | undefined;
  /** Already fetched body, so the entry page is not requested twice. */
  document?: Document;
};

type CrawlEngineConfig = {
  entryUrl: string;
  cacheDir: string;
  resume: boolean;
  /** Processed pages between two checkpoints. */
  checkpointInterval: number;
};

type StateStorage = Pick<StateStore, 'load' | 'save'>;

type CrawlEngineDependencies = {
  source: DocumentSource;
  sink: MemberSink;
  store: StateStorage;
  relationExtractor?: RelationExtractor;
  memberExtractor?: MemberExtractor;
  memberIdentifier?: MemberIdentifier;
};

type HarvestStatus = 'completed' | 'interrupted';

/** Counts cover this run only; the state file keeps the cumulative totals. */
type HarvestOutcome = {
  status: HarvestStatus;
  pagesProcessed: number;
  membersHarvested: number;
  errors: number;
  durationMs: number;
};

export type {
  CrawlEngineConfig,
  CrawlEngineDependencies,
  HarvestOutcome,
  HarvestStatus,
  StateStorage,
  WorkItem,
};
