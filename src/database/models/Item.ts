import type { Queryable } from '../connection';
import type { StoredItem } from '../../storage/interfaces';

export interface ExpiredCursor {
  createdAt: Date;
  id: string;
}

const UNIQUE_VIOLATION = '23505';

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function readColumn(row: unknown, column: string): unknown {
  if (typeof row === 'object' && row !== null && column in row) {
    return Reflect.get(row, column);
  }
  return undefined;
}

export class ItemRepository {
  constructor(private readonly db: Queryable) {}

  /**
   * Insert a row; false when the id is already taken
   */
  async insert(item: StoredItem): Promise<boolean> {
    const query = `
      INSERT INTO items (id, ciphertext, nonce, created_at)
      VALUES ($1, $2, $3, $4)
      ON CONFLICT (id) DO NOTHING
    `;

    try {
      const result = await this.db.query(query, [item.id, item.ciphertext, item.nonce, item.createdAt]);
      return result.rowCount === 1;
    } catch (error) {
      if (errorCode(error) === UNIQUE_VIOLATION) {
        return false;
      }
      throw error;
    }
  }

  async findById(id: string): Promise<StoredItem | null> {
    const query = 'SELECT id, ciphertext, nonce, created_at FROM items WHERE id = $1';
    const result = await this.db.query(query, [id]);

    if (result.rows.length === 0) {
      return null;
    }

    return this.mapRowToStoredItem(result.rows[0]);
  }

  async deleteById(id: string): Promise<void> {
    await this.db.query('DELETE FROM items WHERE id = $1', [id]);
  }

  /**
   * One page of rows older than `cutoff`, ordered by (created_at, id) and starting after `after`
   */
  async findExpiredPage(cutoff: Date, after: ExpiredCursor | null, limit: number): Promise<ExpiredCursor[]> {
    const result = after
      ? await this.db.query(
        `SELECT id, created_at FROM items
         WHERE created_at < $1 AND (created_at, id) > ($2, $3)
         ORDER BY created_at, id
         LIMIT $4`,
        [cutoff, after.createdAt, after.id, limit]
      )
      : await this.db.query(
        `SELECT id, created_at FROM items
         WHERE created_at < $1
         ORDER BY created_at, id
         LIMIT $2`,
        [cutoff, limit]
      );

    return result.rows.map(row => this.mapRowToCursor(row));
  }

  async count(): Promise<number> {
    const result = await this.db.query('SELECT COUNT(*) AS total FROM items');
    const total = readColumn(result.rows[0], 'total');
    return total === undefined ? 0 : parseInt(String(total), 10);
  }

  private mapRowToStoredItem(row: unknown): StoredItem {
    const id = readColumn(row, 'id');
    const ciphertext = readColumn(row, 'ciphertext');
    const nonce = readColumn(row, 'nonce');
    const createdAt = readColumn(row, 'created_at');

    if (typeof id !== 'string' || !Buffer.isBuffer(ciphertext) || !Buffer.isBuffer(nonce) || !(createdAt instanceof Date)) {
      throw new Error('Unexpected row in items table');
    }

    return { id, ciphertext, nonce, createdAt };
  }

  private mapRowToCursor(row: unknown): ExpiredCursor {
    const id = readColumn(row, 'id');
    const createdAt = readColumn(row, 'created_at');

    if (typeof id !== 'string' || !(createdAt instanceof Date)) {
      throw new Error('Unexpected row in items table');
    }

    return { id, createdAt };
  }
}
