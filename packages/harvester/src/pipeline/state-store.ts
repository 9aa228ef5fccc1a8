import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@ldes-harvester/logger';
import { StatePersistFailure, describeCause } from '../errors.js';
import { formatJson } from '../utils/json.js';
import type { CrawlStateSnapshot } from './types.js';

const log = createLogger('StateStore');

const statsSchema = z.object({
  start_time: z.string(),
  members_harvested: z.number().int().nonnegative().default(0),
  pages_processed: z.number().int().nonnegative().default(0),
  errors: z.number().int().nonnegative().default(0),
  total_duration: z.number().nonnegative().default(0),
  end_time: z.string().optional(),
});

const snapshotSchema = z.object({
  processed_pages: z.array(z.string()).default([]),
  processed_members: z.array(z.string()).default([]),
  pending_pages: z.array(z.string()).default([]),
  stats: statsSchema,
  last_updated: z.string(),
});

/**
 * Reads and writes the crawl snapshot. Neither operation throws: a missing
 * or unusable file loads as `undefined`, and a failed write is logged and
 * reported as `false`.
 */
export class StateStore {
  readonly statePath: string;

  constructor(statePath: string) {
    this.statePath = statePath;
  }

  load(): CrawlStateSnapshot | undefined {
    if (!existsSync(this.statePath)) {
      return undefined;
    }

    try {
      const content = readFileSync(this.statePath, 'utf-8');
      const parsed = snapshotSchema.safeParse(JSON.parse(content));

      if (!parsed.success) {
        log.warn(
          `Ignoring invalid state file ${this.statePath}:`,
          parsed.error.issues[0]?.message ?? 'schema mismatch',
        );
        return undefined;
      }

      return parsed.data;
    } catch (error) {
      log.warn(`Ignoring unreadable state file ${this.statePath}:`, describeCause(error));
      return undefined;
    }
  }

  /** Replaces the stored snapshot entirely. */
  save(snapshot: CrawlStateSnapshot): boolean {
    try {
      const dir = dirname(this.statePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      writeFileSync(this.statePath, formatJson(snapshot, true), 'utf-8');
      return true;
    } catch (error) {
      const failure = new StatePersistFailure(this.statePath, error);
      log.error(failure.message);
      return false;
    }
  }
}
