import { buildCryptoConfig } from '../src/crypto/cryptoConfig';
import type { CryptoConfig } from '../src/crypto/cryptoConfig';
import { MemoryStorageProvider } from '../src/storage/providers/MemoryStorageProvider';
import { SecureItemStore } from '../src/storage/SecureItemStore';
import type { IdAllocator } from '../src/crypto/idAllocator';
import type { StorageProvider } from '../src/storage/interfaces';
import { DAY_MS } from '../src/types';

// 32 bytes of 0x07, hex encoded
export const TEST_SECRET = '07'.repeat(32);

export function testCryptoConfig(secret: string = TEST_SECRET): CryptoConfig {
  return buildCryptoConfig({ secret });
}

/**
 * Manually advanced clock
 */
export class TestClock {
  private current: number;

  constructor(start: string = '2024-01-01T00:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now = (): Date => new Date(this.current);

  advanceDays(days: number): void {
    this.current += days * DAY_MS;
  }

  advanceMs(ms: number): void {
    this.current += ms;
  }
}

export interface TestStore<P extends StorageProvider = MemoryStorageProvider> {
  store: SecureItemStore;
  provider: P;
  clock: TestClock;
}

export interface TestStoreOptions {
  maxLength?: number;
  dayspan?: number;
  allocator?: IdAllocator;
}

export function createTestStoreOver<P extends StorageProvider>(provider: P, options: TestStoreOptions = {}): TestStore<P> {
  const clock = new TestClock();
  const store = new SecureItemStore({
    provider,
    cryptoConfig: testCryptoConfig(),
    retention: { maxLength: options.maxLength ?? 5000, dayspan: options.dayspan ?? 90 },
    now: clock.now,
    allocator: options.allocator
  });

  return { store, provider, clock };
}

export function createTestStore(options: TestStoreOptions = {}): TestStore {
  return createTestStoreOver(new MemoryStorageProvider(), options);
}
