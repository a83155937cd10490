import type { AppConfig } from '../config/config';
import { MEMORY_DB } from '../config/config';
import { DatabaseConnection } from '../database/connection';
import type { StorageProvider } from './interfaces';
import { MemoryStorageProvider } from './providers/MemoryStorageProvider';
import { PostgresStorageProvider } from './providers/PostgresStorageProvider';

/**
 * Owns the provider selected by the `db` setting. Nothing outside this class
 * knows which variant is active.
 */
export class StorageManager {
  private provider: StorageProvider | null = null;

  constructor(private readonly config: Pick<AppConfig, 'db' | 'database'>) {}

  get isDurable(): boolean {
    return this.config.db !== MEMORY_DB;
  }

  async initialize(): Promise<StorageProvider> {
    const provider: StorageProvider = this.isDurable
      ? new PostgresStorageProvider(DatabaseConnection.getPool(this.config.database), {
        createSchema: this.config.database.create,
        onClose: () => DatabaseConnection.close()
      })
      : new MemoryStorageProvider();

    await provider.initialize();
    this.provider = provider;

    console.log(`✅ Storage initialized with provider: ${provider.name}`);
    return provider;
  }

  getProvider(): StorageProvider {
    if (!this.provider) {
      throw new Error('Storage not initialized. Call initialize() during startup.');
    }
    return this.provider;
  }

  async cleanup(): Promise<void> {
    if (!this.provider) {
      return;
    }
    try {
      await this.provider.cleanup();
    } catch (error) {
      console.error('Error cleaning up storage provider:', error);
    }
    this.provider = null;
  }
}
