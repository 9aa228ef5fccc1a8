type HarvestStatsSnapshot = {
  start_time: string;
  members_harvested: number;
  pages_processed: number;
  errors: number;
  /** Seconds taken by the most recent run. */
  total_duration: number;
  end_time?: string;
};

/** On-disk form of the crawl progress, written to `state.json`. */
type CrawlStateSnapshot = {
  processed_pages: string[];
  processed_members: string[];
  pending_pages: string[];
  stats: HarvestStatsSnapshot;
  last_updated: string;
};

export type { CrawlStateSnapshot, HarvestStatsSnapshot };
