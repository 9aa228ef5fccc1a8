import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { attachLogFile, log, setLogLevel } from '@ldes-harvester/logger';
import { z } from 'zod';
import { CrawlEngine } from '../orchestrator/crawl-engine.js';
import { NTriplesMemberSink } from '../pipeline/member-sink.js';
import { StateStore } from '../pipeline/state-store.js';
import { isHttpUrl } from '../utils/url.js';
import { DocumentFetcher } from '../web-engine/document-fetcher.js';
import type { DocumentSource } from '../web-engine/types.js';

const DEFAULT_CACHE_DIR = './cache';
const STATE_FILE = 'state.json';
const LOG_FILE = 'harvester.log';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

const harvestArgsSchema = z.object({
  url: z
    .string({ required_error: 'Missing <url>. Provide the LDES entry point URL.' })
    .trim()
    .url('Invalid <url>. Provide an absolute URL.')
    .refine(isHttpUrl, 'Invalid <url>. Only http(s) URLs can be harvested.'),
  cacheDir: z
    .preprocess(
      (value) => {
        if (value === undefined) {
          return DEFAULT_CACHE_DIR;
        }

        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length && trimmed !== 'true' ? trimmed : undefined;
        }

        return value;
      },
      z.string({ required_error: 'Invalid --cacheDir path' }).min(1),
    ),
  noResume: z
    .preprocess((value) => {
      if (value === undefined) {
        return 'false';
      }

      if (typeof value === 'string') {
        return value.toLowerCase();
      }

      return value;
    }, booleanFromCliSchema),
  logLevel: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      logLevelSchema,
    )
    .optional(),
});

type HarvestArgs = z.infer<typeof harvestArgsSchema>;

type RunHarvestActionOptions = {
  cacheDir?: string;
  resume?: boolean;
  logLevel?: z.infer<typeof logLevelSchema>;
  /** Replaces the HTTP fetcher. */
  source?: DocumentSource;
};

/**
 * Harvests the stream behind `entryUrl` into the cache directory and maps
 * the result to a process exit code: 0 once the traversal finished, 1 for
 * setup failures, fatal engine errors and interrupts.
 */
export async function runHarvestAction(
  entryUrl: string,
  options?: RunHarvestActionOptions,
): Promise<number> {
  if (options?.logLevel) {
    setLogLevel(options.logLevel);
  }

  const cacheDir = resolve(options?.cacheDir ?? DEFAULT_CACHE_DIR);
  const resume = options?.resume ?? true;

  try {
    await mkdir(cacheDir, { recursive: true });
  } catch (error) {
    log.fatal(`Cannot create cache directory ${cacheDir}:`, error);
    return 1;
  }

  attachLogFile(join(cacheDir, LOG_FILE));
  log.info('Starting harvest action', { entryUrl, cacheDir, resume });

  const engine = new CrawlEngine(
    { entryUrl, cacheDir, resume },
    {
      source: options?.source ?? new DocumentFetcher(),
      sink: new NTriplesMemberSink(cacheDir),
      store: new StateStore(join(cacheDir, STATE_FILE)),
    },
  );

  try {
    const outcome = await engine.run();
    return outcome.status === 'interrupted' ? 1 : 0;
  } catch (error) {
    log.fatal('Harvest aborted:', error);
    return 1;
  }
}

export { DEFAULT_CACHE_DIR, harvestArgsSchema };
export type { HarvestArgs, RunHarvestActionOptions };
