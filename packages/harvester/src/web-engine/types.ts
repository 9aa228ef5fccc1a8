import type { AxiosInstance } from 'axios';
import type { JsonObject } from '../utils/json.js';
import type { RetryStrategyConfig } from '../retry/types.js';

/** A fetched page or collection body whose root is a JSON object. */
type Document = JsonObject;

type FetchOptions = {
  signal?: AbortSignal;
};

/**
 * Anything that can turn a URL into a parsed document. Implementations
 * reject with `FetchFailure` or `ParseFailure`.
 */
interface DocumentSource {
  fetch(url: string, options?: FetchOptions): Promise<Document>;
}

type HttpClient = Pick<AxiosInstance, 'get'>;

type DocumentFetcherConfig = RetryStrategyConfig & {
  timeoutMs: number;
  maxRedirects: number;
  userAgent: string;
  headers?: Record<string, string>;
};

export type {
  Document,
  DocumentFetcherConfig,
  DocumentSource,
  FetchOptions,
  HttpClient,
};
