import * as crypto from 'crypto';
import pRetry from 'p-retry';
import { z } from 'zod';
import type { ContentID } from '../types';
import {
  ContentNotFoundError,
  StorageUnavailableError,
  errorMessage
} from '../utils/errors';
import { Logger } from '../utils/Logger';

/**
 * Content-addressed blob store. Implementations raise
 * `StorageUnavailableError` for transient failures and
 * `ContentNotFoundError` for a missing CID.
 */
export interface ContentStore {
  put(bytes: Uint8Array): Promise<ContentID>;
  get(cid: ContentID): Promise<Uint8Array>;
  isHealthy(): Promise<boolean>;
}

export function contentIdFor(bytes: Uint8Array): ContentID {
  return 'sha256-' + crypto.createHash('sha256').update(bytes).digest('hex');
}

/** In-process store; CIDs are sha256 digests so identical blobs share a CID. */
export class MemoryContentStore implements ContentStore {
  private blobs = new Map<ContentID, Uint8Array>();

  async put(bytes: Uint8Array): Promise<ContentID> {
    const cid = contentIdFor(bytes);
    if (!this.blobs.has(cid)) {
      this.blobs.set(cid, Uint8Array.from(bytes));
    }
    return cid;
  }

  async get(cid: ContentID): Promise<Uint8Array> {
    const blob = this.blobs.get(cid);
    if (!blob) {
      throw new ContentNotFoundError(cid);
    }
    return Uint8Array.from(blob);
  }

  has(cid: ContentID): boolean {
    return this.blobs.has(cid);
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }
}

const PublishResponseSchema = z.union([
  z.object({ newlyCreated: z.object({ blobObject: z.object({ blobId: z.string() }) }) }),
  z.object({ alreadyCertified: z.object({ blobId: z.string() }) })
]);

export interface HttpContentStoreOptions {
  publisherUrl: string;
  aggregatorUrl?: string;
  timeoutMs?: number;
  retries?: number;
  /** Storage epochs to keep the blob for. */
  epochs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Walrus-style HTTP store: blobs are written with `PUT {publisher}/v1/blobs`
 * and read with `GET {aggregator}/v1/blobs/{id}`. Every request has a
 * timeout and is retried with backoff before surfacing as unavailable.
 */
export class HttpContentStore implements ContentStore {
  private logger = new Logger('HttpContentStore');
  private publisherUrl: string;
  private aggregatorUrl: string;
  private timeoutMs: number;
  private retries: number;
  private epochs: number;
  private fetchImpl: typeof fetch;

  constructor(options: HttpContentStoreOptions) {
    this.publisherUrl = options.publisherUrl.replace(/\/+$/, '');
    this.aggregatorUrl = (options.aggregatorUrl ?? options.publisherUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.retries = options.retries ?? 3;
    this.epochs = options.epochs ?? 1;
    this.fetchImpl = options.fetchImpl ?? fetch.bind(globalThis);
  }

  async put(bytes: Uint8Array): Promise<ContentID> {
    const response = await this.request(
      `${this.publisherUrl}/v1/blobs?epochs=${this.epochs}`,
      { method: 'PUT', body: bytes, headers: { 'Content-Type': 'application/octet-stream' } },
      'put'
    );

    const parsed = PublishResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new StorageUnavailableError('Content store returned an unrecognised publish response');
    }

    const cid = 'newlyCreated' in parsed.data
      ? parsed.data.newlyCreated.blobObject.blobId
      : parsed.data.alreadyCertified.blobId;
    this.logger.debug(`Stored blob ${cid}`, { size: bytes.byteLength });
    return cid;
  }

  async get(cid: ContentID): Promise<Uint8Array> {
    const response = await this.request(
      `${this.aggregatorUrl}/v1/blobs/${encodeURIComponent(cid)}`,
      { method: 'GET' },
      'get',
      cid
    );
    return new Uint8Array(await response.arrayBuffer());
  }

  async isHealthy(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.aggregatorUrl}/v1/api`, {
        method: 'GET',
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      return response.status < 500;
    } catch (error) {
      this.logger.warn('Content store health check failed', { error: errorMessage(error) });
      return false;
    }
  }

  private async request(url: string, init: RequestInit, operation: string, cid?: ContentID): Promise<Response> {
    try {
      return await pRetry(
        async () => {
          let response: Response;
          try {
            response = await this.fetchImpl(url, {
              ...init,
              signal: AbortSignal.timeout(this.timeoutMs)
            });
          } catch (error) {
            // fetch rejects with a TypeError that p-retry would not retry
            throw new StorageUnavailableError(`Content store ${operation} failed: ${errorMessage(error)}`);
          }

          if (response.status === 404 && cid !== undefined) {
            throw new pRetry.AbortError(new ContentNotFoundError(cid));
          }
          if (response.status >= 400 && response.status < 500) {
            throw new pRetry.AbortError(
              new StorageUnavailableError(`Content store rejected ${operation}: ${response.status}`)
            );
          }
          if (!response.ok) {
            throw new StorageUnavailableError(`Content store ${operation} failed: ${response.status}`);
          }
          return response;
        },
        {
          retries: this.retries,
          minTimeout: 100,
          factor: 2,
          onFailedAttempt: (error) => {
            this.logger.warn(`Content store ${operation} attempt ${error.attemptNumber} failed`, {
              retriesLeft: error.retriesLeft,
              error: error.message
            });
          }
        }
      );
    } catch (error) {
      if (error instanceof ContentNotFoundError || error instanceof StorageUnavailableError) {
        throw error;
      }
      throw new StorageUnavailableError(`Content store ${operation} failed: ${errorMessage(error)}`);
    }
  }
}
