import { randomBytes } from 'crypto';
import { ConfigurationError } from '../errors';
import { MIN_SECRET_LENGTH } from '../types';

/**
 * Process-wide cryptographic settings. Built once at startup, frozen, and handed
 * to the allocator and cipher constructors.
 */
export interface CryptoConfig {
  readonly secret: Buffer;
  readonly info: string;
  readonly maxAllocationAttempts: number;
}

export interface CryptoConfigOptions {
  /** base64 or hex encoded secret */
  secret?: string;
  /** Refuse to invent a secret (durable backends must survive restarts) */
  requireSecret?: boolean;
  maxAllocationAttempts?: number;
}

export const KEY_INFO = 'pastevault:item-key:v1';

function unpadded(base64: string): string {
  return base64.replace(/=+$/, '');
}

export function decodeSecret(raw: string): Buffer {
  const trimmed = raw.trim();
  const isHex = /^[0-9a-fA-F]+$/.test(trimmed) && trimmed.length % 2 === 0;
  const decoded = isHex ? Buffer.from(trimmed, 'hex') : Buffer.from(trimmed, 'base64');

  // Buffer.from skips characters outside the alphabet, so compare the re-encoding
  if (!isHex && unpadded(decoded.toString('base64')) !== unpadded(trimmed)) {
    throw new ConfigurationError('SECRET must be hex or base64 encoded');
  }
  if (decoded.length < MIN_SECRET_LENGTH) {
    throw new ConfigurationError(`SECRET must decode to at least ${MIN_SECRET_LENGTH} bytes`);
  }
  return decoded;
}

export function buildCryptoConfig(options: CryptoConfigOptions = {}): CryptoConfig {
  let secret: Buffer;

  if (options.secret) {
    secret = decodeSecret(options.secret);
  } else if (options.requireSecret) {
    throw new ConfigurationError('SECRET is required when using a durable database');
  } else {
    secret = randomBytes(MIN_SECRET_LENGTH);
    console.warn('⚠️ No SECRET configured - generated an ephemeral one, texts will not survive a restart');
  }

  return Object.freeze({
    secret,
    info: KEY_INFO,
    maxAllocationAttempts: options.maxAllocationAttempts ?? 5
  });
}

/**
 * Generate a secret suitable for the SECRET variable
 */
export function generateSecret(): string {
  return randomBytes(MIN_SECRET_LENGTH).toString('base64');
}
