import type { CryptoConfig } from '../crypto/cryptoConfig';
import { IdAllocator, isValidId } from '../crypto/idAllocator';
import { ItemCipher } from '../crypto/ItemCipher';
import { IntegrityError, InvalidIdError, NotFoundError, TooLargeError } from '../errors';
import { DAY_MS } from '../types';
import type { RetentionConfig, TextMetadata } from '../types';
import type { ProviderHealth, StorageProvider, StoredItem } from './interfaces';

export interface SecureItemStoreOptions {
  provider: StorageProvider;
  cryptoConfig: CryptoConfig;
  retention: RetentionConfig;
  /** Defaults to the wall clock */
  now?: () => Date;
  /** Overrides the allocator, mostly for collision tests */
  allocator?: IdAllocator;
}

/**
 * Stores texts encrypted under a key derived from their own id and the server secret.
 */
export class SecureItemStore {
  private readonly provider: StorageProvider;
  private readonly allocator: IdAllocator;
  private readonly cipher: ItemCipher;
  private readonly retention: RetentionConfig;
  private readonly now: () => Date;

  constructor(options: SecureItemStoreOptions) {
    this.provider = options.provider;
    this.allocator = options.allocator ?? new IdAllocator(options.cryptoConfig);
    this.cipher = new ItemCipher(options.cryptoConfig);
    this.retention = options.retention;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Encrypt and persist a text, returning its id
   */
  async store(plaintext: string): Promise<string> {
    const { id } = await this.create(plaintext);
    return id;
  }

  /**
   * Same as store, but also reports the stamped creation and expiry dates
   */
  async create(plaintext: string): Promise<TextMetadata> {
    const length = [...plaintext].length;
    if (length > this.retention.maxLength) {
      throw new TooLargeError(length, this.retention.maxLength);
    }

    const createdAt = this.now();

    const id = await this.allocator.allocate(candidate => {
      const { ciphertext, nonce } = this.cipher.encrypt(candidate, plaintext);
      return this.provider.put({ id: candidate, ciphertext, nonce, createdAt });
    });

    return { id, createdAt, expiresAt: this.expiresAt({ createdAt }) };
  }

  async retrieve(id: string): Promise<string> {
    const { plaintext } = await this.open(id);
    return plaintext;
  }

  /**
   * Content and metadata in one backend round trip
   */
  async read(id: string): Promise<{ content: string; metadata: TextMetadata }> {
    const { item, plaintext } = await this.open(id);
    return { content: plaintext, metadata: this.toMetadata(item) };
  }

  /**
   * Creation and expiry dates of a readable text
   */
  async describe(id: string): Promise<TextMetadata> {
    const { item } = await this.open(id);
    return this.toMetadata(item);
  }

  /**
   * Delete a text before it expires. Knowing the id is the only credential.
   */
  async remove(id: string): Promise<void> {
    if (!isValidId(id)) {
      throw new InvalidIdError();
    }

    const item = await this.provider.get(id);
    if (!item || this.isExpired(item)) {
      throw new NotFoundError();
    }

    await this.provider.delete(id);
    console.log(`🗑️ Text deleted: ${shortId(id)}`);
  }

  expiresAt(item: Pick<StoredItem, 'createdAt'>): Date {
    return new Date(item.createdAt.getTime() + this.retention.dayspan * DAY_MS);
  }

  async healthCheck(): Promise<ProviderHealth> {
    return this.provider.healthCheck();
  }

  async cleanup(): Promise<void> {
    await this.provider.cleanup();
  }

  private toMetadata(item: StoredItem): TextMetadata {
    return {
      id: item.id,
      createdAt: item.createdAt,
      expiresAt: this.expiresAt(item)
    };
  }

  private isExpired(item: StoredItem): boolean {
    return this.now().getTime() - item.createdAt.getTime() > this.retention.dayspan * DAY_MS;
  }

  private async open(id: string): Promise<{ item: StoredItem; plaintext: string }> {
    if (!isValidId(id)) {
      throw new InvalidIdError();
    }

    const item = await this.provider.get(id);
    if (!item) {
      throw new NotFoundError();
    }

    if (this.isExpired(item)) {
      await this.deleteQuietly(id);
      throw new NotFoundError();
    }

    try {
      return { item, plaintext: this.cipher.decrypt(id, item.ciphertext, item.nonce) };
    } catch (error) {
      if (error instanceof IntegrityError) {
        console.warn(`🚨 Integrity check failed for text ${shortId(id)}: possible tampering or corruption`);
        throw new NotFoundError();
      }
      throw error;
    }
  }

  private async deleteQuietly(id: string): Promise<void> {
    try {
      await this.provider.delete(id);
    } catch (error) {
      console.warn(`⚠️ Lazy delete of expired text ${shortId(id)} failed:`, error instanceof Error ? error.message : error);
    }
  }
}

function shortId(id: string): string {
  return `${id.slice(0, 8)}…`;
}
