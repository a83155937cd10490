import type { PutOutcome } from '../crypto/idAllocator';

export interface StorageProvider {
  readonly name: string;
  readonly type: StorageProviderType;

  /**
   * Prepare the provider (connect, create schema, ...)
   */
  initialize(): Promise<void>;

  /**
   * Atomically insert a record. Reports 'conflict' when the id already exists.
   */
  put(item: StoredItem): Promise<PutOutcome>;

  /**
   * Fetch a record, or null when it does not exist
   */
  get(id: string): Promise<StoredItem | null>;

  /**
   * Remove a record. Removing an absent id is not an error.
   */
  delete(id: string): Promise<void>;

  /**
   * Ids of records created before `cutoff`, yielded in batches of at most `batchSize`
   */
  listExpired(cutoff: Date, batchSize?: number): AsyncIterable<string[]>;

  /**
   * Get storage provider health status
   */
  healthCheck(): Promise<ProviderHealth>;

  /**
   * Cleanup resources
   */
  cleanup(): Promise<void>;
}

export type StorageProviderType = 'memory' | 'postgres';

export interface StoredItem {
  id: string;
  ciphertext: Buffer;
  nonce: Buffer;
  createdAt: Date;
}

export interface ProviderHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  message?: string;
  responseTime?: number;
  lastCheck: Date;
}

export const DEFAULT_BATCH_SIZE = 500;

export function assertBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
}
