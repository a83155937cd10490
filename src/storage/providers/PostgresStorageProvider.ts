import type { PutOutcome } from '../../crypto/idAllocator';
import type { Queryable } from '../../database/connection';
import { DatabaseConnection } from '../../database/connection';
import { ItemRepository, errorCode } from '../../database/models/Item';
import type { ExpiredCursor } from '../../database/models/Item';
import { BackendUnavailableError } from '../../errors';
import { DEFAULT_BATCH_SIZE, assertBatchSize } from '../interfaces';
import type { ProviderHealth, StorageProvider, StorageProviderType, StoredItem } from '../interfaces';

export interface PostgresProviderOptions {
  /** Run database/schema.sql on initialize */
  createSchema?: boolean;
  /** Extra attempts after a connectivity failure */
  retries?: number;
  retryDelayMs?: number;
  /** Called from cleanup() to release the pool */
  onClose?: () => Promise<void>;
}

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENOTFOUND',
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03'  // cannot_connect_now
]);

export function isConnectivityError(error: unknown): boolean {
  const code = errorCode(error);
  if (code && (TRANSIENT_CODES.has(code) || code.startsWith('08'))) {
    return true;
  }
  if (error instanceof Error) {
    return /Connection terminated|timeout exceeded when trying to connect/i.test(error.message);
  }
  return false;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Durable provider backed by a single Postgres table, shared by every server process.
 */
export class PostgresStorageProvider implements StorageProvider {
  readonly name = 'postgres';
  readonly type: StorageProviderType = 'postgres';

  private readonly repository: ItemRepository;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(private readonly db: Queryable, private readonly options: PostgresProviderOptions = {}) {
    this.repository = new ItemRepository(db);
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 100;
  }

  async initialize(): Promise<void> {
    if (this.options.createSchema) {
      await this.withRetry(() => DatabaseConnection.initializeSchema(this.db));
    }
  }

  async put(item: StoredItem): Promise<PutOutcome> {
    const inserted = await this.withRetry(() => this.repository.insert(item));
    return inserted ? 'ok' : 'conflict';
  }

  async get(id: string): Promise<StoredItem | null> {
    return this.withRetry(() => this.repository.findById(id));
  }

  async delete(id: string): Promise<void> {
    await this.withRetry(() => this.repository.deleteById(id));
  }

  async *listExpired(cutoff: Date, batchSize: number = DEFAULT_BATCH_SIZE): AsyncIterable<string[]> {
    assertBatchSize(batchSize);
    let after: ExpiredCursor | null = null;

    while (true) {
      const cursor: ExpiredCursor | null = after;
      const page: ExpiredCursor[] = await this.withRetry(() => this.repository.findExpiredPage(cutoff, cursor, batchSize));
      if (page.length === 0) {
        return;
      }

      yield page.map(row => row.id);

      if (page.length < batchSize) {
        return;
      }
      after = page[page.length - 1];
    }
  }

  async healthCheck(): Promise<ProviderHealth> {
    const started = Date.now();
    try {
      const total = await this.repository.count();
      return {
        status: 'healthy',
        message: `${total} items stored`,
        responseTime: Date.now() - started,
        lastCheck: new Date()
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown error',
        responseTime: Date.now() - started,
        lastCheck: new Date()
      };
    }
  }

  async cleanup(): Promise<void> {
    if (this.options.onClose) {
      await this.options.onClose();
    }
  }

  /**
   * Retry connectivity failures a few times, then surface BackendUnavailableError.
   * Any other error propagates untouched.
   */
  private async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (!isConnectivityError(error)) {
          throw error;
        }
        if (attempt >= this.retries) {
          console.error(`❌ Database unavailable after ${attempt + 1} attempts:`, error instanceof Error ? error.message : error);
          throw new BackendUnavailableError(this.name, error);
        }
        console.warn(`⚠️ Database connectivity error, retrying (${attempt + 1}/${this.retries})`);
        await sleep(this.retryDelayMs * (attempt + 1));
      }
    }
  }
}
