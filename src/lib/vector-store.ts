/**
 * Enterprise Vector Store client
 *
 * Talks to the vector store REST service over fetch. Authorization headers are
 * produced by a credentials provider so an expired session can be refreshed
 * without rebuilding the client.
 */

import type { Logger } from './logger';
import { VectorStoreError, errorMessage } from './errors';
import type { VectorStoreSettings } from '../config/types';

export interface SimilaritySearchRequest {
  question: string;
  topK: number;
  outputColumns?: string[] | undefined;
}

export type CredentialsProvider = () => Promise<string>;

export interface VectorStore {
  readonly name: string;
  similaritySearch(request: SimilaritySearchRequest): Promise<unknown>;
  refresh(): Promise<void>;
}

export type FetchFn = typeof fetch;

const API_PREFIX = '/data-insights/api/v1/vectorstores';

export function basicCredentials(user: string, password: string): CredentialsProvider {
  return async () => `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}

export function bearerCredentials(token: string): CredentialsProvider {
  return async () => `Bearer ${token}`;
}

export class VectorStoreClient implements VectorStore {
  private authorization: string | undefined;
  private readonly logger: Logger;

  constructor(
    readonly name: string,
    private readonly baseUrl: string,
    private readonly credentials: CredentialsProvider,
    logger: Logger,
    private readonly options: { timeout?: number; fetch?: FetchFn } = {},
  ) {
    this.logger = logger.child({ component: 'VectorStoreClient', vectorStore: name });
  }

  /**
   * Confirm the store exists and the credentials are accepted
   */
  async verify(): Promise<void> {
    await this.request('GET', '');
  }

  async similaritySearch(request: SimilaritySearchRequest): Promise<unknown> {
    this.logger.debug({ question: request.question, topK: request.topK }, 'Similarity search');
    return this.request('POST', '/similarity-search', {
      question: request.question,
      top_k: request.topK,
      ...(request.outputColumns && { output_columns: request.outputColumns }),
    });
  }

  /**
   * Re-read the Authorization header from the credentials provider. No
   * request is sent. The built-in Basic and Bearer providers return the same
   * header each time, so a retry after refresh only recovers from failures
   * that do not depend on the credentials; a provider that fetches a fresh
   * token gets a new one here.
   */
  async refresh(): Promise<void> {
    this.logger.warn('Refreshing vector store session');
    this.authorization = await this.credentials();
  }

  private async request(method: 'GET' | 'POST', suffix: string, body?: unknown): Promise<unknown> {
    const fetchFn = this.options.fetch ?? fetch;
    const url = `${this.baseUrl.replace(/\/+$/, '')}${API_PREFIX}/${encodeURIComponent(this.name)}${suffix}`;
    this.authorization ??= await this.credentials();

    let response: Response;
    try {
      response = await fetchFn(url, {
        method,
        headers: {
          Authorization: this.authorization,
          Accept: 'application/json',
          ...(body !== undefined && { 'Content-Type': 'application/json' }),
        },
        ...(body !== undefined && { body: JSON.stringify(body) }),
        signal: AbortSignal.timeout(this.options.timeout ?? 30000),
      });
    } catch (error) {
      throw new VectorStoreError(
        `Vector store request failed: ${errorMessage(error)}`,
        undefined,
        error instanceof Error ? error : undefined,
      );
    }

    const text = await response.text();
    if (!response.ok) {
      throw new VectorStoreError(
        `Vector store request failed with status ${response.status}: ${text}`,
        response.status,
      );
    }
    if (text.length === 0) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }
}

/**
 * Build a client from configuration, or undefined when the settings are incomplete
 */
export function createVectorStoreClient(
  settings: VectorStoreSettings,
  logger: Logger,
  fetchFn?: FetchFn,
): VectorStoreClient | undefined {
  if (!settings.baseUrl) {
    logger.error({ vectorStore: settings.name }, 'VS_BASE_URL is required when VS_NAME is set');
    return undefined;
  }
  let credentials: CredentialsProvider;
  if (settings.token) {
    credentials = bearerCredentials(settings.token);
  } else if (settings.user && settings.password) {
    credentials = basicCredentials(settings.user, settings.password);
  } else {
    logger.error(
      { vectorStore: settings.name },
      'Vector store credentials missing: set VS_TOKEN or VS_USER and VS_PASSWORD',
    );
    return undefined;
  }
  return new VectorStoreClient(settings.name, settings.baseUrl, credentials, logger, {
    timeout: settings.timeout,
    ...(fetchFn && { fetch: fetchFn }),
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const LIST_KEYS = ['similar_objects', 'records', 'items', 'data'] as const;

/**
 * Normalise a similarity search response into an array of records
 */
export function materializeRecords(raw: unknown): Record<string, unknown>[] {
  if (typeof raw === 'string') {
    const parsed: unknown = JSON.parse(raw);
    return materializeRecords(parsed);
  }
  if (Array.isArray(raw)) {
    return raw.filter(isRecord);
  }
  if (isRecord(raw)) {
    for (const key of LIST_KEYS) {
      const value = raw[key];
      if (Array.isArray(value)) {
        return value.filter(isRecord);
      }
    }
  }
  throw new TypeError(`Unable to materialize similarity search result of type ${typeof raw}`);
}
