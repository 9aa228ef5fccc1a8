import { HarvestStats } from '../observability/harvest-stats.js';
import { Frontier } from '../queue/frontier.js';
import type { CrawlStateSnapshot } from './types.js';

/**
 * In-memory crawl progress: processed pages, processed member identities,
 * the frontier and the running statistics. Only the crawl engine mutates
 * it; the state store only sees snapshots.
 */
export class CrawlState {
  private readonly processedPages: Set<string>;
  private readonly processedMembers: Set<string>;
  private readonly frontier: Frontier;
  readonly stats: HarvestStats;

  constructor(snapshot?: CrawlStateSnapshot) {
    this.processedPages = new Set(snapshot?.processed_pages ?? []);
    this.processedMembers = new Set(snapshot?.processed_members ?? []);
    // Pending entries that are already processed are dropped here.
    this.frontier = new Frontier(
      (url) => this.processedPages.has(url),
      snapshot?.pending_pages ?? [],
    );
    this.stats = new HarvestStats(snapshot?.stats);
  }

  isPageProcessed(url: string): boolean {
    return this.processedPages.has(url);
  }

  isPagePending(url: string): boolean {
    return this.frontier.has(url);
  }

  /** Adds a page to the frontier; false when it is already pending or processed. */
  discoverPage(url: string): boolean {
    return this.frontier.add(url);
  }

  markPageProcessed(url: string): void {
    this.processedPages.add(url);
    this.frontier.remove(url);
  }

  isMemberProcessed(identity: string): boolean {
    return this.processedMembers.has(identity);
  }

  markMemberProcessed(identity: string): void {
    this.processedMembers.add(identity);
  }

  get pendingPages(): string[] {
    return this.frontier.values();
  }

  get pendingCount(): number {
    return this.frontier.size();
  }

  get processedPageCount(): number {
    return this.processedPages.size;
  }

  get processedMemberCount(): number {
    return this.processedMembers.size;
  }

  toSnapshot(now: Date = new Date()): CrawlStateSnapshot {
    return {
      processed_pages: [...this.processedPages],
      processed_members: [...this.processedMembers],
      pending_pages: this.frontier.values(),
      stats: this.stats.snapshot(),
      last_updated: now.toISOString(),
    };
  }
}
