import { setTimeout as sleep } from 'node:timers/promises';
import axios from 'axios';
import { createLogger } from '@ldes-harvester/logger';
import { FetchFailure, ParseFailure, HttpStatusError, describeCause } from '../errors.js';
import { RetryStrategy } from '../retry/retry-strategy.js';
import { isJsonObject } from '../utils/json.js';
import type {
  Document,
  DocumentFetcherConfig,
  DocumentSource,
  FetchOptions,
  HttpClient,
} from './types.js';

const log = createLogger('DocumentFetcher');

const DEFAULT_CONFIG: DocumentFetcherConfig = {
  timeoutMs: 30_000,
  maxRedirects: 5,
  userAgent: 'ldes-harvester/0.1',
  maxAttempts: 3,
  baseDelayMs: 1000,
  jitterMs: 250,
};

/**
 * Axios-based document transport for event stream pages.
 * Transient failures are retried with exponential backoff; anything else
 * surfaces as a `FetchFailure` or `ParseFailure` for the caller to count.
 */
export class DocumentFetcher implements DocumentSource {
  private readonly config: DocumentFetcherConfig;
  private readonly client: HttpClient;
  private readonly retryStrategy: RetryStrategy;

  constructor(config?: Partial<DocumentFetcherConfig>, client?: HttpClient) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.retryStrategy = new RetryStrategy({
      maxAttempts: this.config.maxAttempts,
      baseDelayMs: this.config.baseDelayMs,
      jitterMs: this.config.jitterMs,
    });
    this.client =
      client ??
      axios.create({
        timeout: this.config.timeoutMs,
        maxRedirects: this.config.maxRedirects,
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/ld+json, application/json;q=0.9, */*;q=0.1',
          ...this.config.headers,
        },
      });
  }

  async fetch(url: string, options?: FetchOptions): Promise<Document> {
    const signal = options?.signal;
    const maxAttempts = this.retryStrategy.maxAttempts;

    for (let attempt = 0; ; attempt += 1) {
      try {
        log.info(`Fetching: ${url}`);
        return await this.fetchOnce(url, signal);
      } catch (error) {
        const errorClass = this.retryStrategy.classify(error);
        const decision = this.retryStrategy.decide(errorClass, attempt);

        log.warn(
          `Attempt ${attempt + 1}/${maxAttempts} failed for ${url}: ${describeCause(error)} (class: ${errorClass})`,
        );

        if (error instanceof ParseFailure) {
          throw error;
        }

        if (!decision.shouldRetry || signal?.aborted) {
          throw new FetchFailure(url, error, attempt + 1);
        }

        try {
          await sleep(decision.delayMs, undefined, { signal });
        } catch (abortError) {
          throw new FetchFailure(url, abortError, attempt + 1);
        }
      }
    }
  }

  private async fetchOnce(url: string, signal?: AbortSignal): Promise<Document> {
    const response = await this.client.get<string>(url, {
      signal,
      responseType: 'text',
      validateStatus: () => true,
    });

    if (response.status >= 400) {
      throw new HttpStatusError(url, response.status, response.statusText);
    }

    return parseDocument(url, response.data);
  }
}

export function parseDocument(url: string, body: unknown): Document {
  if (isJsonObject(body)) {
    return body;
  }

  if (typeof body !== 'string' || body.trim().length === 0) {
    throw new ParseFailure(url, new Error('Empty response body'));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new ParseFailure(url, error);
  }

  if (!isJsonObject(parsed)) {
    throw new ParseFailure(url, new Error('Document root is not a JSON object'));
  }

  return parsed;
}
