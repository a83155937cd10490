import { v4 as uuidv4, validate, version } from 'uuid';
import { AllocationExhaustedError } from '../errors';
import type { CryptoConfig } from './cryptoConfig';

export type PutOutcome = 'ok' | 'conflict';

/**
 * Issues random UUID v4 identifiers: 36 chars of [0-9a-f-], 122 random bits.
 */
export class IdAllocator {
  private readonly maxAttempts: number;

  constructor(
    cryptoConfig: Pick<CryptoConfig, 'maxAllocationAttempts'>,
    private readonly generator: () => string = uuidv4
  ) {
    this.maxAttempts = cryptoConfig.maxAllocationAttempts;
  }

  generate(): string {
    return this.generator();
  }

  /**
   * Keep generating ids until `tryPut` accepts one.
   * `tryPut` receives each candidate and reports whether the id was already taken.
   */
  async allocate(tryPut: (id: string) => Promise<PutOutcome>): Promise<string> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const id = this.generate();
      const outcome = await tryPut(id);
      if (outcome === 'ok') {
        return id;
      }
      console.warn(`⚠️ Identifier collision on attempt ${attempt}/${this.maxAttempts}`);
    }

    throw new AllocationExhaustedError(this.maxAttempts);
  }
}

export function isValidId(id: unknown): id is string {
  return typeof id === 'string' && validate(id) && version(id) === 4;
}
