import { createLogger } from '@ldes-harvester/logger';
import { describeCause, isPageFailure } from '../errors.js';
import { isEventStream, readField } from '../extraction/field-policy.js';
import { MemberExtractor } from '../extraction/member-extractor.js';
import { MemberIdentifier } from '../extraction/member-identifier.js';
import { RelationExtractor } from '../extraction/relation-extractor.js';
import { CrawlState } from '../pipeline/crawl-state.js';
import type { MemberSink } from '../pipeline/member-sink.js';
import { resolveHttpUrl } from '../utils/url.js';
import type { JsonValue } from '../utils/json.js';
import type { Document, DocumentSource } from '../web-engine/types.js';
import type {
  CrawlEngineConfig,
  CrawlEngineDependencies,
  HarvestOutcome,
  StateStorage,
  WorkItem,
} from './types.js';

const log = createLogger('CrawlEngine');

const DEFAULT_CHECKPOINT_INTERVAL = 10;

type CrawlEngineOptions = Pick<CrawlEngineConfig, 'entryUrl' | 'cacheDir'> &
  Partial<CrawlEngineConfig>;

/**
 * Walks an event stream page by page and hands every unseen member to the
 * sink.
 *
 * Traversal is depth-first over an explicit worklist. A page enters the
 * frontier as soon as it is discovered and leaves it once all its members
 * were handled, so a checkpoint taken at any point lists every page that
 * still needs a visit. Pages already processed are only re-fetched when
 * they are seeds, to pick up relations added since the last run.
 */
export class CrawlEngine {
  private readonly config: CrawlEngineConfig;
  private readonly source: DocumentSource;
  private readonly sink: MemberSink;
  private readonly store: StateStorage;
  private readonly relationExtractor: RelationExtractor;
  private readonly memberExtractor: MemberExtractor;
  private readonly memberIdentifier: MemberIdentifier;
  private state: CrawlState;
  private worklist: WorkItem[];
  private interrupted: boolean;
  private abortController: AbortController;

  constructor(options: CrawlEngineOptions, dependencies: CrawlEngineDependencies) {
    this.config = {
      resume: true,
      checkpointInterval: DEFAULT_CHECKPOINT_INTERVAL,
      ...options,
    };
    this.source = dependencies.source;
    this.sink = dependencies.sink;
    this.store = dependencies.store;
    this.relationExtractor = dependencies.relationExtractor ?? new RelationExtractor();
    this.memberExtractor = dependencies.memberExtractor ?? new MemberExtractor();
    this.memberIdentifier = dependencies.memberIdentifier ?? new MemberIdentifier();
    this.state = new CrawlState();
    this.worklist = [];
    this.interrupted = false;
    this.abortController = new AbortController();
  }

  get crawlState(): CrawlState {
    return this.state;
  }

  async run(): Promise<HarvestOutcome> {
    log.info(`Starting LDES harvest from: ${this.config.entryUrl}`);

    this.interrupted = false;
    this.abortController = new AbortController();
    this.worklist = [];
    this.state = this.loadState();

    const stats = this.state.stats;
    const baseline = {
      pagesProcessed: stats.get('pagesProcessed'),
      membersHarvested: stats.get('membersHarvested'),
      errors: stats.get('errors'),
    };
    const startedAt = performance.now();
    let durationMs = 0;
    let failed = false;

    const onSignal = (signal: NodeJS.Signals) => this.handleSignal(signal);
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    try {
      await this.traverse();
    } catch (error) {
      failed = true;
      log.error('Harvesting failed:', error);
      throw error;
    } finally {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);

      durationMs = performance.now() - startedAt;
      stats.finish(durationMs);
      this.checkpoint();

      stats.logSummary(log, {
        title: failed
          ? 'HARVESTING FAILED'
          : this.interrupted
            ? 'HARVESTING INTERRUPTED'
            : 'HARVESTING COMPLETE',
        durationMs,
        cacheDir: this.config.cacheDir,
      });
    }

    return {
      status: this.interrupted ? 'interrupted' : 'completed',
      pagesProcessed: stats.get('pagesProcessed') - baseline.pagesProcessed,
      membersHarvested: stats.get('membersHarvested') - baseline.membersHarvested,
      errors: stats.get('errors') - baseline.errors,
      durationMs,
    };
  }

  /** A first signal interrupts gracefully; a repeated one exits at once. */
  handleSignal(signal: NodeJS.Signals): void {
    if (this.interrupted) {
      log.warn(`Received ${signal} again, exiting immediately`);
      this.checkpoint();
      process.exit(1);
    }

    log.warn(`Received ${signal}, saving state before exit`);
    this.interrupt();
  }

  /**
   * Stops the traversal before the next page, abandons the in-flight fetch
   * and writes a checkpoint right away.
   */
  interrupt(): void {
    if (this.interrupted) {
      return;
    }

    this.interrupted = true;
    this.abortController.abort();
    log.warn('Harvest interrupted, saving state...');
    this.checkpoint();
  }

  checkpoint(): boolean {
    return this.store.save(this.state.toSnapshot());
  }

  private loadState(): CrawlState {
    if (!this.config.resume) {
      log.info('Resume disabled, starting a fresh harvest');
      return new CrawlState();
    }

    const snapshot = this.store.load();
    if (!snapshot) {
      return new CrawlState();
    }

    const state = new CrawlState(snapshot);
    log.info(
      `Loaded state: ${state.processedPageCount} processed pages, ${state.processedMemberCount} processed members, ${state.pendingCount} pending pages`,
    );
    return state;
  }

  private async traverse(): Promise<void> {
    if (this.config.resume && this.state.pendingCount > 0) {
      log.info(`Resuming with ${this.state.pendingCount} pending pages`);
      this.push(this.state.pendingPages.map((url) => ({ url, context: undefined })));
      await this.drain();

      if (this.interrupted) {
        return;
      }

      if (this.state.pendingCount === 0) {
        log.info('All pending pages processed, harvest complete');
        return;
      }
    }

    await this.seedFromEntryPoint();
    await this.drain();
  }

  private async seedFromEntryPoint(): Promise<void> {
    const entryUrl = this.config.entryUrl;

    let document: Document;
    try {
      document = await this.fetchDocument(entryUrl);
    } catch (error) {
      if (this.interrupted) {
        log.debug(`Abandoned ${entryUrl} after interrupt`);
        return;
      }
      // Without the entry point there is nothing to traverse.
      this.state.stats.increment('errors');
      throw error;
    }

    const context = readField(document, 'context');

    if (!isEventStream(document)) {
      log.info('Processing entry point as a single LDES page');
      this.push([{ url: entryUrl, context, document }]);
      return;
    }

    const seeds = [...new Set(this.resolveRelations(document, entryUrl))];
    log.info(`Detected EventStream collection, ${seeds.length} initial pages to process`);

    for (const url of seeds) {
      if (!this.state.isPageProcessed(url)) {
        this.state.discoverPage(url);
      }
    }
    this.push(seeds.map((url) => ({ url, context })));
  }

  private async drain(): Promise<void> {
    while (!this.interrupted) {
      const item = this.worklist.pop();
      if (!item) {
        return;
      }

      if (this.state.isPageProcessed(item.url)) {
        await this.revisitPage(item);
      } else {
        await this.processPage(item);
      }
    }
  }

  // Processed pages may have gained relations; members are not extracted again.
  private async revisitPage(item: WorkItem): Promise<void> {
    log.debug(`Already processed page: ${item.url}, checking for new relations`);

    const document = await this.load(item);
    if (!document) {
      return;
    }

    this.pushRelations(document, item.url, readField(document, 'context') ?? item.context);
  }

  private async processPage(item: WorkItem): Promise<void> {
    this.state.discoverPage(item.url);

    const document = await this.load(item);
    if (!document || this.interrupted) {
      return;
    }

    const context = readField(document, 'context') ?? item.context;
    const members = this.memberExtractor.extract(document);
    log.info(`Found ${members.length} members on page: ${item.url}`);

    for (const member of members) {
      const identity = this.memberIdentifier.identify(member);
      if (this.state.isMemberProcessed(identity)) {
        log.debug(`Skipping already harvested member: ${identity}`);
        continue;
      }

      const result = await this.sink.persist(identity, member, context);
      if (result.success) {
        this.state.markMemberProcessed(identity);
        this.state.stats.increment('membersHarvested');
      } else {
        log.error(result.error.message);
        this.state.stats.increment('errors');
      }
    }

    this.state.markPageProcessed(item.url);
    const pagesProcessed = this.state.stats.increment('pagesProcessed');

    // Relations go into the frontier before the checkpoint that marks this page done.
    this.pushRelations(document, item.url, context);

    if (pagesProcessed % this.config.checkpointInterval === 0) {
      log.debug(`Checkpoint after ${pagesProcessed} pages`);
      this.checkpoint();
    }
  }

  private async load(item: WorkItem): Promise<Document | undefined> {
    if (item.document) {
      return item.document;
    }

    try {
      return await this.fetchDocument(item.url);
    } catch (error) {
      this.recordPageFailure(item.url, error);
      return undefined;
    }
  }

  private async fetchDocument(url: string): Promise<Document> {
    const startTime = performance.now();
    try {
      return await this.source.fetch(url, { signal: this.abortController.signal });
    } finally {
      this.state.stats.recordFetchDuration(performance.now() - startTime);
    }
  }

  // The page stays in the frontier so a later run retries it.
  private recordPageFailure(url: string, error: unknown): void {
    if (this.interrupted) {
      log.debug(`Abandoned ${url} after interrupt`);
      return;
    }

    log.error(
      isPageFailure(error)
        ? error.message
        : `Failed to process page ${url}: ${describeCause(error)}`,
    );
    this.state.stats.increment('errors');
  }

  private resolveRelations(document: Document, baseUrl: string): string[] {
    const urls: string[] = [];
    for (const candidate of this.relationExtractor.extract(document)) {
      const url = resolveHttpUrl(candidate, baseUrl);
      if (url) {
        urls.push(url);
      }
    }
    return urls;
  }

  private pushRelations(
    document: Document,
    baseUrl: string,
    context: JsonValue | undefined,
  ): void {
    const discovered: WorkItem[] = [];
    for (const url of this.resolveRelations(document, baseUrl)) {
      if (this.state.discoverPage(url)) {
        discovered.push({ url, context });
      }
    }
    this.push(discovered);
  }

  // Reversed so the first item is popped first.
  private push(items: WorkItem[]): void {
    for (let index = items.length - 1; index >= 0; index -= 1) {
      const item = items[index];
      if (item) {
        this.worklist.push(item);
      }
    }
  }
}

export type { CrawlEngineOptions };
