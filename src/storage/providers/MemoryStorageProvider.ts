import type { PutOutcome } from '../../crypto/idAllocator';
import { DEFAULT_BATCH_SIZE, assertBatchSize } from '../interfaces';
import type { ProviderHealth, StorageProvider, StorageProviderType, StoredItem } from '../interfaces';

function copyItem(item: StoredItem): StoredItem {
  return {
    id: item.id,
    ciphertext: Buffer.from(item.ciphertext),
    nonce: Buffer.from(item.nonce),
    createdAt: new Date(item.createdAt.getTime())
  };
}

/**
 * Process-local provider. Everything is lost when the process exits.
 */
export class MemoryStorageProvider implements StorageProvider {
  readonly name = 'memory';
  readonly type: StorageProviderType = 'memory';

  private items: Map<string, StoredItem> = new Map();

  async initialize(): Promise<void> {
    // nothing to prepare
  }

  async put(item: StoredItem): Promise<PutOutcome> {
    if (this.items.has(item.id)) {
      return 'conflict';
    }
    this.items.set(item.id, copyItem(item));
    return 'ok';
  }

  async get(id: string): Promise<StoredItem | null> {
    const item = this.items.get(id);
    return item ? copyItem(item) : null;
  }

  async delete(id: string): Promise<void> {
    this.items.delete(id);
  }

  async *listExpired(cutoff: Date, batchSize: number = DEFAULT_BATCH_SIZE): AsyncIterable<string[]> {
    assertBatchSize(batchSize);
    const expired = [...this.items.values()]
      .filter(item => item.createdAt.getTime() < cutoff.getTime())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(item => item.id);

    for (let offset = 0; offset < expired.length; offset += batchSize) {
      yield expired.slice(offset, offset + batchSize);
    }
  }

  async healthCheck(): Promise<ProviderHealth> {
    return {
      status: 'healthy',
      message: `${this.items.size} items in memory`,
      responseTime: 0,
      lastCheck: new Date()
    };
  }

  async cleanup(): Promise<void> {
    this.items.clear();
  }

  get size(): number {
    return this.items.size;
  }
}
