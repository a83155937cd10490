import { createCipheriv, createDecipheriv, hkdfSync, randomBytes } from 'crypto';
import { IntegrityError } from '../errors';
import { KEY_LENGTH, NONCE_LENGTH, TAG_LENGTH } from '../types';
import type { CryptoConfig } from './cryptoConfig';

export interface SealedText {
  /** AES-GCM output with the 16 byte tag appended */
  ciphertext: Buffer;
  nonce: Buffer;
}

/**
 * Per-item AES-256-GCM. The key is HKDF-SHA256 over the item id, salted with the
 * server secret, and the id is bound as associated data.
 */
export class ItemCipher {
  private static readonly ALGORITHM = 'aes-256-gcm';

  constructor(private readonly cryptoConfig: CryptoConfig) {}

  deriveKey(id: string): Buffer {
    return Buffer.from(
      hkdfSync('sha256', Buffer.from(id, 'utf8'), this.cryptoConfig.secret, this.cryptoConfig.info, KEY_LENGTH)
    );
  }

  encrypt(id: string, plaintext: string): SealedText {
    const nonce = randomBytes(NONCE_LENGTH);
    const cipher = createCipheriv(ItemCipher.ALGORITHM, this.deriveKey(id), nonce, {
      authTagLength: TAG_LENGTH
    });
    cipher.setAAD(Buffer.from(id, 'utf8'));

    const ciphertext = Buffer.concat([
      cipher.update(plaintext, 'utf8'),
      cipher.final(),
      cipher.getAuthTag()
    ]);

    return { ciphertext, nonce };
  }

  decrypt(id: string, ciphertext: Buffer, nonce: Buffer): string {
    if (nonce.length !== NONCE_LENGTH || ciphertext.length < TAG_LENGTH) {
      throw new IntegrityError('Stored ciphertext or nonce has the wrong size');
    }

    const body = ciphertext.subarray(0, ciphertext.length - TAG_LENGTH);
    const tag = ciphertext.subarray(ciphertext.length - TAG_LENGTH);

    try {
      const decipher = createDecipheriv(ItemCipher.ALGORITHM, this.deriveKey(id), nonce, {
        authTagLength: TAG_LENGTH
      });
      decipher.setAAD(Buffer.from(id, 'utf8'));
      decipher.setAuthTag(tag);

      return Buffer.concat([decipher.update(body), decipher.final()]).toString('utf8');
    } catch (error) {
      throw new IntegrityError(error instanceof Error ? error.message : 'Ciphertext failed authentication');
    }
  }
}
