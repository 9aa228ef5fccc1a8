import type { Logger } from '@ldes-harvester/logger';
import type { HarvestStatsSnapshot } from '../pipeline/types.js';

type StatCounter = 'membersHarvested' | 'pagesProcessed' | 'errors';

type DurationSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type SummaryOptions = {
  title: string;
  durationMs: number;
  cacheDir?: string;
};

const RULE = '='.repeat(60);

/**
 * Running harvest statistics. Counters are cumulative across resumed runs;
 * fetch durations only cover the current process.
 */
export class HarvestStats {
  private readonly counters: Record<StatCounter, number>;
  private readonly fetches: DurationSummary;
  private startTime: string;
  private totalDuration: number;
  private endTime: string | undefined;

  constructor(snapshot?: HarvestStatsSnapshot) {
    this.counters = {
      membersHarvested: snapshot?.members_harvested ?? 0,
      pagesProcessed: snapshot?.pages_processed ?? 0,
      errors: snapshot?.errors ?? 0,
    };
    this.fetches = { count: 0, min: 0, max: 0, avg: 0, total: 0 };
    this.startTime = snapshot?.start_time ?? new Date().toISOString();
    this.totalDuration = snapshot?.total_duration ?? 0;
    this.endTime = snapshot?.end_time;
  }

  increment(counter: StatCounter, amount = 1): number {
    this.counters[counter] += amount;
    return this.counters[counter];
  }

  get(counter: StatCounter): number {
    return this.counters[counter];
  }

  recordFetchDuration(ms: number): void {
    const fetches = this.fetches;
    fetches.min = fetches.count === 0 ? ms : Math.min(fetches.min, ms);
    fetches.max = fetches.count === 0 ? ms : Math.max(fetches.max, ms);
    fetches.count += 1;
    fetches.total += ms;
    fetches.avg = fetches.total / fetches.count;
  }

  /** Stamps the end of a run; `total_duration` is that run's length in seconds. */
  finish(durationMs: number, now: Date = new Date()): void {
    this.totalDuration = durationMs / 1000;
    this.endTime = now.toISOString();
  }

  fetchDurationSummary(): DurationSummary {
    return { ...this.fetches };
  }

  snapshot(): HarvestStatsSnapshot {
    const snapshot: HarvestStatsSnapshot = {
      start_time: this.startTime,
      members_harvested: this.counters.membersHarvested,
      pages_processed: this.counters.pagesProcessed,
      errors: this.counters.errors,
      total_duration: this.totalDuration,
    };

    if (this.endTime) {
      snapshot.end_time = this.endTime;
    }

    return snapshot;
  }

  logSummary(logger: Pick<Logger, 'info'>, options: SummaryOptions): void {
    const fetches = this.fetchDurationSummary();

    logger.info(RULE);
    logger.info(options.title);
    logger.info(RULE);
    logger.info(`Members harvested: ${this.counters.membersHarvested}`);
    logger.info(`Pages processed: ${this.counters.pagesProcessed}`);
    logger.info(`Errors encountered: ${this.counters.errors}`);
    logger.info(`Duration: ${(options.durationMs / 1000).toFixed(2)} seconds`);
    if (fetches.count > 0) {
      logger.info(
        `Fetches: ${fetches.count} (avg ${fetches.avg.toFixed(0)} ms, max ${fetches.max.toFixed(0)} ms)`,
      );
    }
    if (options.cacheDir) {
      logger.info(`Cache directory: ${options.cacheDir}`);
    }
    logger.info(RULE);
  }
}

export type { DurationSummary, StatCounter, SummaryOptions };
