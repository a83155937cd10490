import { describe, it, expect, beforeEach, vi } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import { IdAllocator } from '../src/crypto/idAllocator';
import {
  AllocationExhaustedError,
  BackendUnavailableError,
  InvalidIdError,
  NotFoundError,
  TooLargeError
} from '../src/errors';
import { createTestStore } from './helpers';
import type { TestStore } from './helpers';

const ABSENT_ID = '3b241101-e2bb-4255-8caf-4136c566a962';

describe('SecureItemStore', () => {
  let ctx: TestStore;

  beforeEach(() => {
    ctx = createTestStore({ maxLength: 5000, dayspan: 90 });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  describe('store / retrieve', () => {
    it('should round-trip texts', async () => {
      const texts = ['hello', ' padded text ', 'line one\nline two', 'Grüße 👋 日本語', 'x'.repeat(5000)];

      for (const text of texts) {
        const id = await ctx.store.store(text);
        await expect(ctx.store.retrieve(id)).resolves.toBe(text);
      }
    });

    it('should allow unlimited reads', async () => {
      const id = await ctx.store.store('read me twice');

      await expect(ctx.store.retrieve(id)).resolves.toBe('read me twice');
      await expect(ctx.store.retrieve(id)).resolves.toBe('read me twice');
    });

    it('should never persist the plaintext', async () => {
      const id = await ctx.store.store('top secret payload');
      const row = await ctx.provider.get(id);

      expect(row).not.toBeNull();
      expect(row?.ciphertext.includes(Buffer.from('top secret payload'))).toBe(false);
      expect(row?.nonce.length).toBe(12);
    });

    it('should stamp the creation time from the clock', async () => {
      const id = await ctx.store.store('hello');
      const row = await ctx.provider.get(id);

      expect(row?.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    });
  });

  describe('size limit', () => {
    it('should count characters, not bytes', async () => {
      const small = createTestStore({ maxLength: 3 });
      const id = await small.store.store('👋👋👋');
      await expect(small.store.retrieve(id)).resolves.toBe('👋👋👋');
    });

    it('should reject oversized text before doing any work', async () => {
      const generator = vi.fn(() => uuidv4());
      const small = createTestStore({ maxLength: 5, allocator: new IdAllocator({ maxAllocationAttempts: 5 }, generator) });

      const attempt = small.store.store('toolong');
      await expect(attempt).rejects.toBeInstanceOf(TooLargeError);
      await expect(attempt).rejects.toMatchObject({ code: 'TOO_LARGE', length: 7, maxLength: 5 });

      expect(generator).not.toHaveBeenCalled();
      expect(small.provider.size).toBe(0);
    });
  });

  describe('lookups', () => {
    it('should report NotFound for ids it never issued', async () => {
      await expect(ctx.store.retrieve(ABSENT_ID)).rejects.toBeInstanceOf(NotFoundError);
      await expect(ctx.store.retrieve(uuidv4())).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject malformed ids', async () => {
      await expect(ctx.store.retrieve('ab12CD-9f')).rejects.toBeInstanceOf(InvalidIdError);
      await expect(ctx.store.retrieve('')).rejects.toBeInstanceOf(InvalidIdError);
      await expect(ctx.store.describe('../etc')).rejects.toBeInstanceOf(InvalidIdError);
    });
  });

  describe('expiry', () => {
    it('should stay readable up to exactly dayspan days', async () => {
      const id = await ctx.store.store('hello');
      ctx.clock.advanceDays(90);

      await expect(ctx.store.retrieve(id)).resolves.toBe('hello');
    });

    it('should return NotFound past the horizon and delete the row', async () => {
      const id = await ctx.store.store('hello');
      ctx.clock.advanceDays(90);
      ctx.clock.advanceMs(1);

      await expect(ctx.store.retrieve(id)).rejects.toBeInstanceOf(NotFoundError);
      expect(ctx.provider.size).toBe(0);
    });

    it('should still answer NotFound when the lazy delete fails', async () => {
      const id = await ctx.store.store('hello');
      ctx.clock.advanceDays(91);
      vi.spyOn(ctx.provider, 'delete').mockRejectedValue(new Error('read-only replica'));

      await expect(ctx.store.retrieve(id)).rejects.toBeInstanceOf(NotFoundError);
      expect(ctx.provider.size).toBe(1);
    });
  });

  describe('tamper detection', () => {
    async function rewrite(id: string, change: (ciphertext: Buffer, nonce: Buffer) => void): Promise<void> {
      const row = await ctx.provider.get(id);
      if (!row) {
        throw new Error(`row ${id} missing`);
      }
      change(row.ciphertext, row.nonce);
      await ctx.provider.delete(id);
      await ctx.provider.put(row);
    }

    it('should turn a flipped ciphertext byte into NotFound', async () => {
      const id = await ctx.store.store('hello');
      await rewrite(id, ciphertext => {
        ciphertext[2] ^= 0xff;
      });

      await expect(ctx.store.retrieve(id)).rejects.toBeInstanceOf(NotFoundError);
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Integrity check failed'));
    });

    it('should turn a modified nonce into NotFound', async () => {
      const id = await ctx.store.store('hello');
      await rewrite(id, (ciphertext, nonce) => {
        nonce[0] ^= 0x01;
      });

      await expect(ctx.store.retrieve(id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should refuse a ciphertext moved under another id', async () => {
      const first = await ctx.store.store('first text');
      const second = await ctx.store.store('second text');
      const firstRow = await ctx.provider.get(first);
      if (!firstRow) {
        throw new Error('row missing');
      }

      await ctx.provider.delete(second);
      await ctx.provider.put({ ...firstRow, id: second });

      await expect(ctx.store.retrieve(second)).rejects.toBeInstanceOf(NotFoundError);
      await expect(ctx.store.retrieve(first)).resolves.toBe('first text');
    });

    it('should not describe a tampered item', async () => {
      const id = await ctx.store.store('hello');
      await rewrite(id, ciphertext => {
        ciphertext[0] ^= 0x01;
      });

      await expect(ctx.store.describe(id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('allocation', () => {
    it('should retry when a generated id is already taken', async () => {
      const ids = ['11111111-1111-4111-8111-111111111111', '11111111-1111-4111-8111-111111111111', '22222222-2222-4222-8222-222222222222'];
      let next = 0;
      const allocator = new IdAllocator({ maxAllocationAttempts: 5 }, () => ids[next++]);
      const local = createTestStore({ allocator });
      vi.spyOn(console, 'warn').mockImplementation(() => {});

      const first = await local.store.store('one');
      const second = await local.store.store('two');

      expect(first).toBe(ids[0]);
      expect(second).toBe(ids[2]);
      await expect(local.store.retrieve(first)).resolves.toBe('one');
      await expect(local.store.retrieve(second)).resolves.toBe('two');
    });

    it('should fail with AllocationExhausted and leave the existing row alone', async () => {
      const taken = '11111111-1111-4111-8111-111111111111';
      const allocator = new IdAllocator({ maxAllocationAttempts: 3 }, () => taken);
      const local = createTestStore({ allocator });

      await local.store.store('original');
      await expect(local.store.store('intruder')).rejects.toBeInstanceOf(AllocationExhaustedError);
      await expect(local.store.retrieve(taken)).resolves.toBe('original');
      expect(local.provider.size).toBe(1);
    });

    it('should issue distinct ids to parallel callers', async () => {
      const texts = Array.from({ length: 50 }, (_, i) => `text number ${i}`);

      const ids = await Promise.all(texts.map(text => ctx.store.store(text)));

      expect(new Set(ids).size).toBe(50);
      const readBack = await Promise.all(ids.map(id => ctx.store.retrieve(id)));
      expect(readBack).toEqual(texts);
    });

    it('should propagate backend outages from store', async () => {
      vi.spyOn(ctx.provider, 'put').mockRejectedValue(new BackendUnavailableError('memory'));

      await expect(ctx.store.store('hello')).rejects.toBeInstanceOf(BackendUnavailableError);
    });
  });

  describe('describe', () => {
    it('should report creation and expiry dates', async () => {
      const id = await ctx.store.store('hello');

      await expect(ctx.store.describe(id)).resolves.toEqual({
        id,
        createdAt: new Date('2024-01-01T00:00:00.000Z'),
        expiresAt: new Date('2024-03-31T00:00:00.000Z')
      });
    });
  });

  describe('create', () => {
    it('should report the stamped dates without reading the row back', async () => {
      const get = vi.spyOn(ctx.provider, 'get');

      const metadata = await ctx.store.create('hello');

      expect(metadata.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
      expect(metadata.expiresAt.toISOString()).toBe('2024-03-31T00:00:00.000Z');
      expect(get).not.toHaveBeenCalled();
      await expect(ctx.store.retrieve(metadata.id)).resolves.toBe('hello');
    });
  });

  describe('read', () => {
    it('should return content and metadata together', async () => {
      const id = await ctx.store.store('hello');

      const { content, metadata } = await ctx.store.read(id);
      expect(content).toBe('hello');
      expect(metadata.expiresAt.toISOString()).toBe('2024-03-31T00:00:00.000Z');
    });
  });

  describe('remove', () => {
    it('should delete a text ahead of its expiry', async () => {
      const id = await ctx.store.store('hello');

      await ctx.store.remove(id);

      await expect(ctx.store.retrieve(id)).rejects.toBeInstanceOf(NotFoundError);
      expect(ctx.provider.size).toBe(0);
    });

    it('should report NotFound for unknown or expired ids', async () => {
      await expect(ctx.store.remove(ABSENT_ID)).rejects.toBeInstanceOf(NotFoundError);

      const id = await ctx.store.store('hello');
      ctx.clock.advanceDays(91);
      await expect(ctx.store.remove(id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject malformed ids', async () => {
      await expect(ctx.store.remove('nope')).rejects.toBeInstanceOf(InvalidIdError);
    });
  });

  it('should follow a text through its whole life', async () => {
    const id = await ctx.store.store('hello');

    await expect(ctx.store.retrieve(id)).resolves.toBe('hello');

    ctx.clock.advanceDays(91);
    await expect(ctx.store.retrieve(id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
